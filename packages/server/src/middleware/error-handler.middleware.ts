/**
 * Global Express error handler.
 */

import { NextFunction, Request, Response } from 'express';

import { createLogger, extractErrorMessage } from '@chatcast/core';

const log = createLogger('server');

/** HTTP status carried by body-parser and http-errors style errors */
function readHttpStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('status' in err)) return null;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 600 ? status : null;
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const status = readHttpStatus(err) ?? 500;
  const message = extractErrorMessage(err);

  if (status >= 500) {
    log.error('request failed', { method: req.method, path: req.path, error: message });
    res.status(status).json({ error: 'Internal server error' });
    return;
  }

  res.status(status).json({ error: message });
}
