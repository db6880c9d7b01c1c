/**
 * Graceful shutdown handler for the HTTP server.
 */

import type { Server } from 'http';
import type { Socket } from 'net';

import { createLogger, extractErrorMessage, withTimeout } from '@chatcast/core';

const log = createLogger('server');

const PRE_SHUTDOWN_TIMEOUT_MS = 5_000;
const GRACEFUL_SHUTDOWN_TIMEOUT_MS = 12_000;

/**
 * On SIGINT/SIGTERM run `beforeClose` (bounded), then close the server.
 * A second signal forces the exit.
 */
export function setupGracefulShutdown(
  server: Server,
  beforeClose?: () => Promise<void> | void,
): void {
  let shuttingDown = false;
  const sockets = new Set<Socket>();

  server.on('connection', (socket: Socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
  });

  // Open SSE streams never finish on their own.
  const closeOpenConnections = (): void => {
    server.closeIdleConnections();
    server.closeAllConnections();
    for (const socket of sockets) {
      socket.destroy();
    }
  };

  const shutdown = (signal: 'SIGTERM' | 'SIGINT'): void => {
    if (shuttingDown) {
      log.warn(`${signal} received again, forcing shutdown`);
      closeOpenConnections();
      process.exit(signal === 'SIGINT' ? 130 : 143);
      return;
    }
    shuttingDown = true;
    log.info(`${signal} received, shutting down server`);

    const forceExitTimer = setTimeout(() => {
      log.warn(`Graceful shutdown timed out after ${GRACEFUL_SHUTDOWN_TIMEOUT_MS}ms; forcing exit`);
      closeOpenConnections();
      process.exit(1);
    }, GRACEFUL_SHUTDOWN_TIMEOUT_MS);
    forceExitTimer.unref();

    const runPreShutdown = beforeClose
      ? withTimeout(Promise.resolve(beforeClose()), PRE_SHUTDOWN_TIMEOUT_MS, 'Pre-shutdown cleanup')
      : Promise.resolve();

    void runPreShutdown
      .catch((err: unknown) => {
        log.warn('Pre-shutdown cleanup failed', { error: extractErrorMessage(err) });
      })
      .finally(() => {
        server.close((err?: Error) => {
          clearTimeout(forceExitTimer);
          if (err) {
            log.warn(`Server close failed: ${err.message}`);
            process.exit(1);
            return;
          }
          log.info('Server closed');
          process.exit(0);
        });
        closeOpenConnections();
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}
