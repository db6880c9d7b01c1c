/**
 * Watcher routes: POST /api/watcher/start, POST /api/watcher/stop
 */

import { NextFunction, Request, Response, Router } from 'express';

import { extractVideoId } from '@chatcast/livechat';
import type {
  IWatcherStartOptions,
  LiveChatWatcher,
  WatcherStartFailureReason,
} from '@chatcast/livechat';

import { readBody, readOptionalBoolean, readOptionalString } from '../helpers.js';

const STATUS_BY_REASON: Record<WatcherStartFailureReason, number> = {
  'already-running': 409,
  'previous-loop-active': 409,
  misconfigured: 400,
};

const STRING_FIELDS = [
  'channelId',
  'videoId',
  'chatId',
  'persona',
  'character',
  'startGreeting',
  'endGreeting',
] as const;

const BOOLEAN_FIELDS = ['autoReply', 'autoGreet'] as const;

type StartStringField = (typeof STRING_FIELDS)[number];
type StartBooleanField = (typeof BOOLEAN_FIELDS)[number];

/**
 * Validates a start request body. Blank strings count as absent.
 */
export function parseStartOptions(
  body: Record<string, unknown>,
): { options: IWatcherStartOptions } | { error: string } {
  const text: Partial<Record<StartStringField, string>> = {};
  for (const key of STRING_FIELDS) {
    const { value, error } = readOptionalString(body, key);
    if (error) return { error };
    const trimmed = value?.trim();
    if (trimmed) text[key] = trimmed;
  }

  const flags: Partial<Record<StartBooleanField, boolean>> = {};
  for (const key of BOOLEAN_FIELDS) {
    const { value, error } = readOptionalBoolean(body, key);
    if (error) return { error };
    if (value !== undefined) flags[key] = value;
  }

  let videoId: string | undefined;
  if (text.videoId) {
    const extracted = extractVideoId(text.videoId);
    if (!extracted) {
      return { error: `Not a YouTube video id or URL: ${text.videoId}` };
    }
    videoId = extracted;
  }

  const options: IWatcherStartOptions = {
    chatId: text.chatId,
    personaName: text.persona,
    characterName: text.character,
    autoReply: flags.autoReply,
    autoGreet: flags.autoGreet,
  };
  if (text.channelId || videoId) {
    options.owner = { channelId: text.channelId, videoId };
  }
  if (text.startGreeting || text.endGreeting) {
    options.greetings = { start: text.startGreeting, end: text.endGreeting };
  }
  return { options };
}

export interface IWatcherRoutesDeps {
  watcher: LiveChatWatcher;
}

export function createWatcherRoutes(deps: IWatcherRoutesDeps): Router {
  const { watcher } = deps;
  const router = Router();

  router.post('/start', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const parsed = parseStartOptions(readBody(req));
      if ('error' in parsed) {
        res.status(400).json({ error: parsed.error });
        return;
      }

      const result = await watcher.start(parsed.options);
      if (result.started) {
        res.json({ started: true, status: watcher.getStatus() });
        return;
      }
      res.status(STATUS_BY_REASON[result.reason]).json({ error: result.message, reason: result.reason });
    } catch (err) {
      next(err);
    }
  });

  router.post('/stop', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { value: sendFarewell, error } = readOptionalBoolean(readBody(req), 'sendFarewell');
      if (error) {
        res.status(400).json({ error });
        return;
      }
      res.json(await watcher.stop(sendFarewell ?? true));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
