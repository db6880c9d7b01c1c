/**
 * Live chat domain types: ingested messages, display records and the
 * watcher's public result shapes.
 */

import type { IChatOwner } from './transport/types.js';

/**
 * A viewer message after ingestion. `arrivalOrder` is assigned by the watch
 * loop and is the only ordering key; `publishedAt` is informational.
 */
export interface IChatMessage {
  id: string;
  authorName: string;
  authorId: string;
  /** Channel owner or moderator */
  isPrivileged: boolean;
  text: string;
  publishedAt: string;
  arrivalOrder: number;
}

export type DisplayKind = 'viewer' | 'bot' | 'system';

/**
 * One line of the display log. Records are frozen once appended.
 */
export interface IDisplayRecord {
  /** Assigned by ChatLog in append order */
  seq: number;
  /** ISO-8601 time the message was posted, or the append time when unknown */
  timestamp: string;
  author: string;
  text: string;
  isBot: boolean;
  kind: DisplayKind;
  isPrivileged: boolean;
  /** Bot records only: whether the transport accepted the message */
  delivered?: boolean;
}

/** What callers hand to ChatLog.append; the log fills in seq, and timestamp when absent. */
export type DisplayRecordInput = Omit<IDisplayRecord, 'seq' | 'timestamp'> & { timestamp?: string };

export type GreetingKind = 'start' | 'end';

/** Per-session replacements for the character's configured greeting texts */
export interface IGreetingOverrides {
  start?: string;
  end?: string;
}

export interface IWatcherStartOptions {
  /** Channel or video used to resolve the active chat */
  owner?: IChatOwner;
  /** Explicit chat id; skips resolution */
  chatId?: string;
  personaName?: string;
  characterName?: string;
  autoReply?: boolean;
  autoGreet?: boolean;
  greetings?: IGreetingOverrides;
}

export type WatcherStartFailureReason = 'already-running' | 'previous-loop-active' | 'misconfigured';

export type IWatcherStartResult =
  | { started: true }
  | { started: false; reason: WatcherStartFailureReason; message: string };

export interface IWatcherStopResult {
  /** False when there was no running session */
  stopped: boolean;
  /** False when the loop did not exit within the stop timeout and was abandoned */
  exitedCleanly: boolean;
  farewellSent: boolean;
}

export type ManualSendFailureReason = 'not-connected' | 'empty';

export interface IManualSendResult {
  sent: boolean;
  reason?: ManualSendFailureReason;
}

export interface IWatcherStatus {
  running: boolean;
  connected: boolean;
  chatId: string | null;
  autoReply: boolean;
  autoGreet: boolean;
  aiAvailable: boolean;
  persona: string | null;
  character: string | null;
  transport: string;
  messagesSeen: number;
}
