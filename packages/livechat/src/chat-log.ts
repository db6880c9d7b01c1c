/**
 * Bounded, append-only display log shared by the watch loop and the
 * presentation layer.
 *
 * Every method is synchronous, so a read or an append is atomic with respect
 * to the other side on the single event loop.
 */

import { DEFAULT_CHAT_LOG_LIMIT, createLogger } from '@chatcast/core';

import type { DisplayRecordInput, IDisplayRecord } from './types.js';

const log = createLogger('chat-log');

export type ChatLogListener = (record: IDisplayRecord) => void;

export interface IChatLogOptions {
  /** Maximum number of retained records; the oldest are evicted first */
  limit?: number;
  now?: () => Date;
}

export class ChatLog {
  private readonly records: IDisplayRecord[] = [];
  private readonly listeners = new Set<ChatLogListener>();
  private readonly maxRecords: number;
  private readonly now: () => Date;
  private nextSeq = 1;

  constructor(options: IChatLogOptions = {}) {
    const limit = options.limit ?? DEFAULT_CHAT_LOG_LIMIT;
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new Error(`chat log limit must be a positive integer, got ${limit}`);
    }
    this.maxRecords = limit;
    this.now = options.now ?? (() => new Date());
  }

  get limit(): number {
    return this.maxRecords;
  }

  get size(): number {
    return this.records.length;
  }

  /** Store a record, evicting beyond the limit, then notify subscribers. */
  append(input: DisplayRecordInput): IDisplayRecord {
    const record: IDisplayRecord = {
      ...input,
      seq: this.nextSeq++,
      timestamp: input.timestamp ?? this.now().toISOString(),
    };
    Object.freeze(record);

    this.records.push(record);
    if (this.records.length > this.maxRecords) {
      this.records.splice(0, this.records.length - this.maxRecords);
    }

    for (const listener of this.listeners) {
      try {
        listener(record);
      } catch (err) {
        log.warn('chat log subscriber threw', { seq: record.seq, error: err });
      }
    }

    return record;
  }

  /** Last `n` records in append order (all of them when `n` is omitted). */
  tail(n?: number): IDisplayRecord[] {
    if (n === undefined) return this.records.slice();
    if (n <= 0) return [];
    return this.records.slice(-n);
  }

  snapshot(): IDisplayRecord[] {
    return this.records.slice();
  }

  /** Records appended after `seq` that are still retained. */
  since(seq: number): IDisplayRecord[] {
    return this.records.filter((r) => r.seq > seq);
  }

  subscribe(listener: ChatLogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
