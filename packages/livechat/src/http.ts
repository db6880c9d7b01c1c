/**
 * HTTP helpers shared by the YouTube and AI clients.
 */

import { createLogger, extractErrorMessage, sleep } from '@chatcast/core';

const log = createLogger('http');

export const RETRY_DELAYS_MS = [1_000, 2_000, 4_000];

export interface IFetchRetryOptions {
  /** Delay before each retry; the number of entries is the retry budget */
  delaysMs?: readonly number[];
}

/**
 * Fetch with automatic retry on network errors (TypeError: fetch failed)
 * and transient server errors (5xx). An aborted request is never retried.
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  options: IFetchRetryOptions = {},
): Promise<Response> {
  const delays = options.delaysMs ?? RETRY_DELAYS_MS;
  const signal = init.signal ?? undefined;
  let lastErr: unknown;
  let lastResponse: Response | undefined;

  for (let attempt = 0; attempt <= delays.length; attempt++) {
    try {
      const response = await fetch(url, init);
      if (response.status >= 500 && attempt < delays.length) {
        const delay = delays[attempt];
        log.warn('API server error, retrying', { status: response.status, attempt: attempt + 1, delayMs: delay });
        lastResponse = response;
        await sleep(delay, signal);
        if (signal?.aborted) break;
        continue;
      }
      return response;
    } catch (err) {
      lastErr = err;
      if (signal?.aborted) throw err;
      const delay = delays[attempt];
      if (delay !== undefined) {
        log.warn('fetch failed, retrying', { attempt: attempt + 1, delayMs: delay, error: extractErrorMessage(err) });
        await sleep(delay, signal);
      }
    }
  }

  if (lastResponse) return lastResponse;
  throw lastErr;
}

/**
 * Join a base URL with a route path, handling trailing slashes.
 */
export function joinBaseUrl(baseUrl: string, route: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${route}`;
}

// ==================== JSON narrowing ====================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function asNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/** Parse a response body as JSON; a body that is not JSON reads as `{}`. */
export async function readJsonObject(response: Response): Promise<Record<string, unknown>> {
  const text = await response.text();
  if (!text) return {};
  try {
    const parsed: unknown = JSON.parse(text);
    return asRecord(parsed);
  } catch {
    return {};
  }
}
