export { ChatLog } from './chat-log.js';
export type { ChatLogListener, IChatLogOptions } from './chat-log.js';
export { createLiveChatStack } from './factory.js';
export type { ILiveChatStack } from './factory.js';
export { GreetingStateMachine, greetingText } from './greeting-state-machine.js';
export type { ConnectionState } from './greeting-state-machine.js';
export { LiveChatWatcher } from './watcher.js';
export type { ILiveChatWatcherDeps } from './watcher.js';
export { WatchSession } from './watch-session.js';
export type { IWatchSessionDeps, IWatchSessionSettings } from './watch-session.js';
export { ReplyGate } from './reply-gate.js';
export type { IReplyGateOptions } from './reply-gate.js';

// Prompt and output shaping
export { PromptBuilder, buildStyleGuide } from './prompt-builder.js';
export {
  cleanGeneratedReply,
  dedupeRepeatedSentences,
  stripWrappingQuotes,
  truncateToLength,
} from './humanizer.js';

// Message conversion
export {
  botRecord,
  extractVideoId,
  systemRecord,
  toChatMessage,
  viewerRecord,
} from './message-parser.js';

// Transport
export { YouTubeLiveChatClient } from './transport/youtube-client.js';
export type { IYouTubeClientOptions } from './transport/youtube-client.js';
export type { IChatOwner, IChatPage, IChatTransport, IRawChatItem } from './transport/types.js';

// AI
export * from './ai/index.js';

export { RETRY_DELAYS_MS, fetchWithRetry, joinBaseUrl } from './http.js';

export type {
  DisplayKind,
  DisplayRecordInput,
  GreetingKind,
  IChatMessage,
  IDisplayRecord,
  IGreetingOverrides,
  IManualSendResult,
  IWatcherStartOptions,
  IWatcherStartResult,
  IWatcherStatus,
  IWatcherStopResult,
  ManualSendFailureReason,
  WatcherStartFailureReason,
} from './types.js';
