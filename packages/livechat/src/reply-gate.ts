/**
 * Per-author reply rate limiting.
 */

import { DEFAULT_REPLY_COOLDOWN_MS } from '@chatcast/core';

export interface IReplyGateOptions {
  cooldownMs?: number;
  /** Whether a generator is configured at all */
  hasGenerator: boolean;
  now?: () => number;
}

/**
 * Decides whether a viewer message gets an automatic reply.
 * The check and the timestamp write happen in one synchronous call, so two
 * messages from the same author can never both pass inside the cooldown.
 */
export class ReplyGate {
  private readonly lastReplies = new Map<string, number>();
  private readonly cooldownMs: number;
  private readonly hasGenerator: boolean;
  private readonly now: () => number;

  constructor(options: IReplyGateOptions) {
    this.cooldownMs = options.cooldownMs ?? DEFAULT_REPLY_COOLDOWN_MS;
    this.hasGenerator = options.hasGenerator;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.lastReplies.size;
  }

  shouldReply(authorId: string, autoReplyEnabled: boolean, isSelf: boolean): boolean {
    if (!autoReplyEnabled || !this.hasGenerator) return false;
    if (isSelf || !authorId) return false;

    const now = this.now();
    const last = this.lastReplies.get(authorId);
    if (last !== undefined && now - last < this.cooldownMs) {
      return false;
    }

    this.lastReplies.set(authorId, now);
    return true;
  }

  lastReplyAt(authorId: string): number | null {
    return this.lastReplies.get(authorId) ?? null;
  }

  /** Forget every author; called when a new watcher session starts. */
  reset(): void {
    this.lastReplies.clear();
  }
}
