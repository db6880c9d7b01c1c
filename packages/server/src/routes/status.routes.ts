/**
 * Status routes: /api/status
 */

import { Request, Response, Router } from 'express';

import type { IChatcastConfig } from '@chatcast/core';
import type { LiveChatWatcher } from '@chatcast/livechat';

export interface IStatusRoutesDeps {
  watcher: LiveChatWatcher;
  config: IChatcastConfig;
}

export function createStatusRoutes(deps: IStatusRoutesDeps): Router {
  const { watcher, config } = deps;
  const router = Router();

  router.get('/', (_req: Request, res: Response): void => {
    res.json({
      ...watcher.getStatus(),
      aiProvider: config.ai.enabled ? config.ai.provider : null,
      chatLogLimit: config.watcher.chatLogLimit,
    });
  });

  return router;
}
