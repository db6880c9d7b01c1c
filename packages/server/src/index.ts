/**
 * HTTP API Server for Chatcast
 * Exposes the watcher status, the chat log (JSON and SSE) and the operator
 * actions to a presentation front end.
 */

import 'reflect-metadata';

import type { Server } from 'http';

import cors from 'cors';
import express, { Express } from 'express';

import {
  CONFIG_TOKEN,
  PERSONA_SOURCE_TOKEN,
  container,
  createLogger,
  initContainer,
} from '@chatcast/core';
import type { IChatcastConfig, IPersonaSource } from '@chatcast/core';
import { createLiveChatStack } from '@chatcast/livechat';
import type { ChatLog, LiveChatWatcher } from '@chatcast/livechat';

import { errorHandler } from './middleware/error-handler.middleware.js';
import { setupGracefulShutdown } from './middleware/graceful-shutdown.middleware.js';
import { SseClientSet, startChatRecordBroadcast } from './middleware/sse.middleware.js';
import { createChatRoutes } from './routes/chat.routes.js';
import { createStatusRoutes } from './routes/status.routes.js';
import { createWatcherRoutes } from './routes/watcher.routes.js';

export { parseTailLimit } from './routes/chat.routes.js';
export { parseStartOptions } from './routes/watcher.routes.js';

const log = createLogger('server');

export interface IServerDeps {
  watcher: LiveChatWatcher;
  chatLog: ChatLog;
  config: IChatcastConfig;
}

/** The Express app plus the teardown for its chat log subscription. */
export type ChatcastApp = Express & { closeChatBroadcast(): void };

export function createApp(deps: IServerDeps): ChatcastApp {
  const { watcher, chatLog, config } = deps;
  const app = express();
  app.use(cors());
  app.use(express.json());

  const sseClients: SseClientSet = new Set();
  const unsubscribe = startChatRecordBroadcast(sseClients, chatLog);

  app.use('/api/status', createStatusRoutes({ watcher, config }));
  app.use('/api/chat', createChatRoutes({ watcher, chatLog, sseClients }));
  app.use('/api/watcher', createWatcherRoutes({ watcher }));

  app.use(errorHandler);
  return Object.assign(app, { closeChatBroadcast: unsubscribe });
}

// ==================== Server Startup ====================

export function startServer(projectDir: string, port?: number): Server {
  initContainer(projectDir);
  const config = container.resolve<IChatcastConfig>(CONFIG_TOKEN);
  const personaSource = container.resolve<IPersonaSource>(PERSONA_SOURCE_TOKEN);
  const { watcher, chatLog, generator } = createLiveChatStack(config, personaSource);
  const app = createApp({ watcher, chatLog, config });
  const listenPort = port ?? config.server.port;

  const server = app.listen(listenPort, () => {
    log.info(`Chatcast API  http://localhost:${listenPort}`);
    log.info(`Project       ${projectDir}`);
    log.info(`AI replies    ${generator ? `${generator.provider} (${generator.model})` : 'disabled'}`);
  });

  server.on('close', () => app.closeChatBroadcast());

  setupGracefulShutdown(server, async () => {
    const result = await watcher.stop(true);
    if (result.stopped) {
      log.info('watcher stopped before shutdown', { farewellSent: result.farewellSent });
    }
  });

  return server;
}
