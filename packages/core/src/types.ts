/**
 * TypeScript interfaces for Chatcast configuration and the persona model
 */

/**
 * Supported generative text providers
 */
export type AIProvider = 'gemini' | 'anthropic' | 'openai';

/**
 * Generative text service configuration
 */
export interface IAIConfig {
  /** Whether automatic replies may use the generator at all */
  enabled: boolean;
  provider: AIProvider;
  /** Model id. Empty string means the provider default. */
  model: string;
  /** API base URL. Empty string means the provider default. */
  baseUrl: string;
  apiKey: string;
  maxTokens: number;
  temperature: number;
}

/**
 * YouTube Data API connection settings.
 * Credential acquisition happens outside Chatcast; tokens arrive here as plain values.
 */
export interface IYouTubeConfig {
  baseUrl: string;
  /** OAuth access token, required for sending messages */
  accessToken: string;
  /** API key, enough for read-only calls */
  apiKey: string;
  /** Channel whose active broadcast is watched */
  channelId: string;
  /** Video id or URL of a specific broadcast */
  videoId: string;
  /** Explicit live chat id; skips resolution entirely */
  liveChatId: string;
  /** The bot's own channel id. Empty string means "ask the API". */
  selfChannelId: string;
}

/**
 * Watch loop timing and behaviour
 */
export interface IWatcherConfig {
  autoReply: boolean;
  autoGreet: boolean;
  /** Minimum time between two automatic replies to the same author */
  replyCooldownMs: number;
  /** Poll interval used when the transport does not recommend one */
  defaultPollIntervalMs: number;
  /** Floor applied to the transport-recommended interval */
  minPollIntervalMs: number;
  /** Sleep when no live chat id is resolvable */
  resolveBackoffMs: number;
  /** Sleep after a failed fetch or send */
  errorBackoffMs: number;
  /** How long stop() waits for the loop before abandoning it */
  stopTimeoutMs: number;
  /** Per-call timeout for transport requests */
  callTimeoutMs: number;
  /** Hard timeout for one generation request */
  generationTimeoutMs: number;
  /** Retention bound of the display log */
  chatLogLimit: number;
}

/**
 * Prompt construction limits
 */
export interface IPromptConfig {
  maxReplyChars: number;
  maxStyleHints: number;
  styleSeparator: string;
  /** Tone hint used when a character has no reply hints */
  fallbackStyle: string;
}

/**
 * Active persona/character selection and greeting overrides.
 * Empty strings mean "first entry" / "use the character's configured text".
 */
export interface IPersonaSelection {
  personaName: string;
  characterName: string;
  startGreeting: string;
  endGreeting: string;
}

export interface IServerConfig {
  port: number;
}

/**
 * Complete Chatcast configuration
 */
export interface IChatcastConfig {
  /** Persona catalog file (relative to the project directory or absolute) */
  personasPath: string;
  youtube: IYouTubeConfig;
  ai: IAIConfig;
  watcher: IWatcherConfig;
  prompt: IPromptConfig;
  persona: IPersonaSelection;
  server: IServerConfig;
}

// ==================== Persona model ====================

export interface ICharacterGreetings {
  /** Sent when the chat becomes reachable */
  start: string;
  /** Sent when the chat goes away or the watcher stops */
  end: string;
  /** Style hints biasing generated replies; never sent verbatim */
  replies: string[];
}

export interface ICharacter {
  name: string;
  greetings: ICharacterGreetings;
}

export interface IPersona {
  name: string;
  characters: ICharacter[];
}

export interface IPersonaSelectionResult {
  persona: IPersona;
  character: ICharacter;
}

