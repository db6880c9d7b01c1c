/**
 * Default configuration values for Chatcast
 */

import {
  AIProvider,
  IAIConfig,
  IPersonaSelection,
  IPromptConfig,
  IServerConfig,
  IWatcherConfig,
  IYouTubeConfig,
} from './types.js';

export const VERSION = '0.1.0';

export const CONFIG_FILE_NAME = 'chatcast.config.json';

// Persona catalog
export const DEFAULT_PERSONAS_PATH = 'personas.json';

// YouTube Data API
export const DEFAULT_YOUTUBE_BASE_URL = 'https://www.googleapis.com/youtube/v3';
/** Hard limit YouTube applies to a live chat message */
export const YOUTUBE_MAX_MESSAGE_LENGTH = 200;

export const DEFAULT_YOUTUBE: IYouTubeConfig = {
  baseUrl: DEFAULT_YOUTUBE_BASE_URL,
  accessToken: '',
  apiKey: '',
  channelId: '',
  videoId: '',
  liveChatId: '',
  selfChannelId: '',
};

// Generative text provider
export const DEFAULT_AI_PROVIDER: AIProvider = 'gemini';
export const VALID_AI_PROVIDERS: AIProvider[] = ['gemini', 'anthropic', 'openai'];

export const AI_PROVIDER_DEFAULT_MODELS: Record<AIProvider, string> = {
  gemini: 'gemini-1.5-flash',
  anthropic: 'claude-sonnet-4-6',
  openai: 'gpt-4o',
};

export const AI_PROVIDER_DEFAULT_BASE_URLS: Record<AIProvider, string> = {
  gemini: 'https://generativelanguage.googleapis.com',
  anthropic: 'https://api.anthropic.com',
  openai: 'https://api.openai.com',
};

/** Environment variable that carries the API key for each provider */
export const AI_PROVIDER_KEY_ENV: Record<AIProvider, string> = {
  gemini: 'GEMINI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
};

export const DEFAULT_AI: IAIConfig = {
  enabled: true,
  provider: DEFAULT_AI_PROVIDER,
  model: '',
  baseUrl: '',
  apiKey: '',
  maxTokens: 256,
  temperature: 0.8,
};

// Watch loop (all durations in milliseconds)
export const DEFAULT_REPLY_COOLDOWN_MS = 15_000;
export const DEFAULT_POLL_INTERVAL_MS = 3_000;
export const MIN_POLL_INTERVAL_MS = 1_000;
export const DEFAULT_RESOLVE_BACKOFF_MS = 20_000;
export const DEFAULT_ERROR_BACKOFF_MS = 5_000;
export const DEFAULT_STOP_TIMEOUT_MS = 3_000;
export const DEFAULT_CALL_TIMEOUT_MS = 10_000;
export const DEFAULT_GENERATION_TIMEOUT_MS = 15_000;
export const DEFAULT_CHAT_LOG_LIMIT = 800;

export const DEFAULT_WATCHER: IWatcherConfig = {
  autoReply: true,
  autoGreet: true,
  replyCooldownMs: DEFAULT_REPLY_COOLDOWN_MS,
  defaultPollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
  minPollIntervalMs: MIN_POLL_INTERVAL_MS,
  resolveBackoffMs: DEFAULT_RESOLVE_BACKOFF_MS,
  errorBackoffMs: DEFAULT_ERROR_BACKOFF_MS,
  stopTimeoutMs: DEFAULT_STOP_TIMEOUT_MS,
  callTimeoutMs: DEFAULT_CALL_TIMEOUT_MS,
  generationTimeoutMs: DEFAULT_GENERATION_TIMEOUT_MS,
  chatLogLimit: DEFAULT_CHAT_LOG_LIMIT,
};

// Prompt construction
export const DEFAULT_PROMPT: IPromptConfig = {
  maxReplyChars: 50,
  maxStyleHints: 6,
  styleSeparator: ' / ',
  fallbackStyle: 'polite',
};

export const DEFAULT_PERSONA_SELECTION: IPersonaSelection = {
  personaName: '',
  characterName: '',
  startGreeting: '',
  endGreeting: '',
};

// HTTP API
export const DEFAULT_SERVER: IServerConfig = {
  port: 7676,
};

// Persona catalog defaults, filled in by the load-time normalisation pass
export const DEFAULT_PERSONA_NAME = 'Default';
export const DEFAULT_CHARACTER_NAME = 'Character';
export const DEFAULT_START_GREETING =
  'Hello everyone, welcome to the stream! Let\'s have a great time together!';
export const DEFAULT_END_GREETING =
  'Thank you all for watching today! See you at the next stream. Take care!';
