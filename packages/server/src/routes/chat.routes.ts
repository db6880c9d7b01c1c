/**
 * Chat routes: /api/chat, /api/chat/events, /api/chat/send, /api/chat/greetings/:kind
 */

import { NextFunction, Request, Response, Router } from 'express';

import type { ChatLog, IManualSendResult, LiveChatWatcher } from '@chatcast/livechat';

import { readBody, readOptionalString } from '../helpers.js';
import { SseClientSet, openSseStream, writeSseEvent } from '../middleware/sse.middleware.js';

export const DEFAULT_CHAT_TAIL = 100;

/**
 * Parse the `limit` query value. Null when it is not a positive integer;
 * values above `max` are capped.
 */
export function parseTailLimit(raw: unknown, max: number): number | null {
  if (raw === undefined) return Math.min(DEFAULT_CHAT_TAIL, max);
  if (typeof raw !== 'string' || !/^\d+$/.test(raw)) return null;
  const limit = parseInt(raw, 10);
  if (limit <= 0) return null;
  return Math.min(limit, max);
}

function sendResult(res: Response, result: IManualSendResult): void {
  if (result.reason === 'empty') {
    res.status(400).json({ error: 'text must not be empty', reason: result.reason });
    return;
  }
  if (result.reason === 'not-connected') {
    res.status(409).json({ error: 'No live chat is connected', reason: result.reason });
    return;
  }
  res.json({ sent: result.sent });
}

export interface IChatRoutesDeps {
  watcher: LiveChatWatcher;
  chatLog: ChatLog;
  sseClients: SseClientSet;
}

export function createChatRoutes(deps: IChatRoutesDeps): Router {
  const { watcher, chatLog, sseClients } = deps;
  const router = Router();

  router.get('/', (req: Request, res: Response): void => {
    const limit = parseTailLimit(req.query.limit, chatLog.limit);
    if (limit === null) {
      res.status(400).json({ error: 'limit must be a positive integer' });
      return;
    }
    res.json(chatLog.tail(limit));
  });

  // SSE endpoint: full snapshot first, then one event per appended record
  router.get('/events', (req: Request, res: Response): void => {
    openSseStream(req, res, sseClients);
    writeSseEvent(res, 'chat_snapshot', chatLog.snapshot());
  });

  router.post('/send', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { value, error } = readOptionalString(readBody(req), 'text');
      if (error) {
        res.status(400).json({ error });
        return;
      }
      sendResult(res, await watcher.sendManual(value ?? ''));
    } catch (err) {
      next(err);
    }
  });

  router.post(
    '/greetings/:kind',
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const { kind } = req.params;
        if (kind !== 'start' && kind !== 'end') {
          res.status(400).json({ error: 'greeting kind must be "start" or "end"' });
          return;
        }
        sendResult(res, await watcher.sendGreeting(kind));
      } catch (err) {
        next(err);
      }
    },
  );

  return router;
}
