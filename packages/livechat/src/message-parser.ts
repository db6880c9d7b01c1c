/**
 * Conversions from transport items to chat messages and display records.
 */

import type { IRawChatItem } from './transport/types.js';
import type { DisplayRecordInput, IChatMessage } from './types.js';

const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]{11}$/;
const VIDEO_URL_PATTERN = /(?:v=|youtu\.be\/|\/live\/|\/shorts\/)([A-Za-z0-9_-]{11})/;

/**
 * Extract an 11-character video id from a bare id or a watch, share, live or
 * shorts URL. Returns null when none is found.
 */
export function extractVideoId(urlOrId: string): string | null {
  const value = urlOrId.trim();
  if (!value) return null;
  if (VIDEO_ID_PATTERN.test(value)) return value;
  const match = VIDEO_URL_PATTERN.exec(value);
  return match ? match[1] : null;
}

/**
 * Build an ingested message from a transport item. Returns null for items
 * without text, which the watch loop skips.
 */
export function toChatMessage(item: IRawChatItem, arrivalOrder: number): IChatMessage | null {
  if (item.text === null) return null;
  return {
    id: item.id,
    authorName: item.authorName,
    authorId: item.authorId,
    isPrivileged: item.isOwner || item.isModerator,
    text: item.text,
    publishedAt: item.publishedAt,
    arrivalOrder,
  };
}

/** Keeps the posting time when the transport supplied a parseable one. */
export function viewerRecord(message: IChatMessage): DisplayRecordInput {
  const record: DisplayRecordInput = {
    author: message.authorName,
    text: message.text,
    isBot: false,
    kind: 'viewer',
    isPrivileged: message.isPrivileged,
  };
  if (message.publishedAt && !Number.isNaN(Date.parse(message.publishedAt))) {
    record.timestamp = message.publishedAt;
  }
  return record;
}

export function botRecord(text: string, delivered: boolean): DisplayRecordInput {
  return {
    author: 'Bot',
    text,
    isBot: true,
    kind: 'bot',
    isPrivileged: true,
    delivered,
  };
}

export function systemRecord(text: string): DisplayRecordInput {
  return {
    author: 'System',
    text,
    isBot: true,
    kind: 'system',
    isPrivileged: true,
  };
}
