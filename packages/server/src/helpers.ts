/**
 * Request body readers shared by the route modules.
 */

import { Request } from 'express';

export function readBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return {};
  }
  return Object.fromEntries(Object.entries(body));
}

/** Optional string field; returns an error message when present but mistyped */
export function readOptionalString(
  body: Record<string, unknown>,
  key: string,
): { value?: string; error?: string } {
  const raw = body[key];
  if (raw === undefined || raw === null) return {};
  if (typeof raw !== 'string') return { error: `${key} must be a string` };
  return { value: raw };
}

export function readOptionalBoolean(
  body: Record<string, unknown>,
  key: string,
): { value?: boolean; error?: string } {
  const raw = body[key];
  if (raw === undefined || raw === null) return {};
  if (typeof raw !== 'boolean') return { error: `${key} must be a boolean` };
  return { value: raw };
}
