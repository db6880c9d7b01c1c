/**
 * SSE (Server-Sent Events) client registry and broadcaster utilities.
 */

import { Request, Response } from 'express';

import type { ChatLog } from '@chatcast/livechat';

/**
 * SSE client registry type
 */
export type SseClientSet = Set<Response>;

export function writeSseEvent(res: Response, event: string, data: unknown): void {
  res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
}

/**
 * Broadcast an SSE event to all connected clients.
 */
export function broadcastSSE(clients: SseClientSet, event: string, data: unknown): void {
  for (const client of clients) {
    try {
      writeSseEvent(client, event, data);
    } catch {
      clients.delete(client);
    }
  }
}

/**
 * Switch the response into event-stream mode and register it until the
 * request closes.
 */
export function openSseStream(req: Request, res: Response, clients: SseClientSet): void {
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.flushHeaders();

  clients.add(res);

  req.on('close', () => {
    clients.delete(res);
  });
}

/**
 * Forward every appended chat record to the connected clients.
 * Returns the unsubscribe function.
 */
export function startChatRecordBroadcast(clients: SseClientSet, chatLog: ChatLog): () => void {
  return chatLog.subscribe((record) => {
    if (clients.size === 0) return;
    broadcastSSE(clients, 'chat_record', record);
  });
}
