/**
 * Configuration loader for Chatcast
 * Loads config from: defaults -> config file -> environment variables
 */

import * as fs from 'fs';
import * as path from 'path';

import {
  AI_PROVIDER_KEY_ENV,
  CONFIG_FILE_NAME,
  DEFAULT_AI,
  DEFAULT_PERSONAS_PATH,
  DEFAULT_PERSONA_SELECTION,
  DEFAULT_PROMPT,
  DEFAULT_SERVER,
  DEFAULT_WATCHER,
  DEFAULT_YOUTUBE,
  VALID_AI_PROVIDERS,
} from './constants.js';
import {
  AIProvider,
  IAIConfig,
  IChatcastConfig,
  IPersonaSelection,
  IPromptConfig,
  IServerConfig,
  IWatcherConfig,
  IYouTubeConfig,
} from './types.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('config');

/**
 * Partial view of the config as read from a file or the environment.
 * Each section is itself partial so sources can override single keys.
 */
export interface IPartialChatcastConfig {
  personasPath?: string;
  youtube?: Partial<IYouTubeConfig>;
  ai?: Partial<IAIConfig>;
  watcher?: Partial<IWatcherConfig>;
  prompt?: Partial<IPromptConfig>;
  persona?: Partial<IPersonaSelection>;
  server?: Partial<IServerConfig>;
}

/**
 * Get the default configuration values
 */
export function getDefaultConfig(): IChatcastConfig {
  return {
    personasPath: DEFAULT_PERSONAS_PATH,
    youtube: { ...DEFAULT_YOUTUBE },
    ai: { ...DEFAULT_AI },
    watcher: { ...DEFAULT_WATCHER },
    prompt: { ...DEFAULT_PROMPT },
    persona: { ...DEFAULT_PERSONA_SELECTION },
    server: { ...DEFAULT_SERVER },
  };
}

const readString = (value: unknown): string | undefined =>
  typeof value === 'string' ? value : undefined;
const readNumber = (value: unknown): number | undefined =>
  typeof value === 'number' && !Number.isNaN(value) ? value : undefined;
const readBoolean = (value: unknown): boolean | undefined =>
  typeof value === 'boolean' ? value : undefined;
const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === 'object' && !Array.isArray(value);
const readObject = (value: unknown): Record<string, unknown> | undefined =>
  isRecord(value) ? value : undefined;

/** Copy only the keys of `patch` that carry a value, so unset keys keep the base. */
function mergeSection<T extends object>(base: T, patch?: Partial<T>): T {
  const out = { ...base };
  if (!patch) return out;
  for (const key in patch) {
    const value = patch[key];
    if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

/**
 * Validate and return a provider value
 */
export function validateAIProvider(value: string): AIProvider | null {
  const normalized = value.trim().toLowerCase();
  return VALID_AI_PROVIDERS.find((p) => p === normalized) ?? null;
}

/**
 * Parse a boolean string value
 */
export function parseBoolean(value: string): boolean | null {
  const normalized = value.toLowerCase().trim();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }
  return null;
}

/**
 * Read only well-typed values from a raw config object. Anything with the
 * wrong type is ignored so the default for that key survives.
 */
export function normalizeConfig(rawConfig: Record<string, unknown>): IPartialChatcastConfig {
  const normalized: IPartialChatcastConfig = {};

  normalized.personasPath = readString(rawConfig.personasPath);

  const youtube = readObject(rawConfig.youtube);
  if (youtube) {
    normalized.youtube = {
      baseUrl: readString(youtube.baseUrl),
      accessToken: readString(youtube.accessToken),
      apiKey: readString(youtube.apiKey),
      channelId: readString(youtube.channelId),
      videoId: readString(youtube.videoId),
      liveChatId: readString(youtube.liveChatId),
      selfChannelId: readString(youtube.selfChannelId),
    };
  }

  const ai = readObject(rawConfig.ai);
  if (ai) {
    const provider = readString(ai.provider);
    normalized.ai = {
      enabled: readBoolean(ai.enabled),
      provider: provider !== undefined ? (validateAIProvider(provider) ?? undefined) : undefined,
      model: readString(ai.model),
      baseUrl: readString(ai.baseUrl),
      apiKey: readString(ai.apiKey),
      maxTokens: readNumber(ai.maxTokens),
      temperature: readNumber(ai.temperature),
    };
  }

  const watcher = readObject(rawConfig.watcher);
  if (watcher) {
    normalized.watcher = {
      autoReply: readBoolean(watcher.autoReply),
      autoGreet: readBoolean(watcher.autoGreet),
      replyCooldownMs: readNumber(watcher.replyCooldownMs),
      defaultPollIntervalMs: readNumber(watcher.defaultPollIntervalMs),
      minPollIntervalMs: readNumber(watcher.minPollIntervalMs),
      resolveBackoffMs: readNumber(watcher.resolveBackoffMs),
      errorBackoffMs: readNumber(watcher.errorBackoffMs),
      stopTimeoutMs: readNumber(watcher.stopTimeoutMs),
      callTimeoutMs: readNumber(watcher.callTimeoutMs),
      generationTimeoutMs: readNumber(watcher.generationTimeoutMs),
      chatLogLimit: readNumber(watcher.chatLogLimit),
    };
  }

  const prompt = readObject(rawConfig.prompt);
  if (prompt) {
    normalized.prompt = {
      maxReplyChars: readNumber(prompt.maxReplyChars),
      maxStyleHints: readNumber(prompt.maxStyleHints),
      styleSeparator: readString(prompt.styleSeparator),
      fallbackStyle: readString(prompt.fallbackStyle),
    };
  }

  const persona = readObject(rawConfig.persona);
  if (persona) {
    normalized.persona = {
      personaName: readString(persona.personaName),
      characterName: readString(persona.characterName),
      startGreeting: readString(persona.startGreeting),
      endGreeting: readString(persona.endGreeting),
    };
  }

  const server = readObject(rawConfig.server);
  if (server) {
    normalized.server = { port: readNumber(server.port) };
  }

  return normalized;
}

/**
 * Load configuration from a JSON file
 */
function loadConfigFile(configPath: string): IPartialChatcastConfig | null {
  try {
    if (!fs.existsSync(configPath)) {
      return null;
    }

    const content = fs.readFileSync(configPath, 'utf-8');
    const rawConfig: unknown = JSON.parse(content);
    const root = readObject(rawConfig);
    if (!root) {
      log.warn('config file is not a JSON object, ignoring', { path: configPath });
      return null;
    }

    return normalizeConfig(root);
  } catch (error) {
    // If file exists but can't be parsed, warn but don't fail
    log.warn('could not parse config file', {
      path: configPath,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

function readIntEnv(name: string, min = 1): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const value = parseInt(raw, 10);
  return !isNaN(value) && value >= min ? value : undefined;
}

function readBoolEnv(name: string): boolean | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  return parseBoolean(raw) ?? undefined;
}

function readStringEnv(name: string): string | undefined {
  const raw = process.env[name];
  return raw ? raw : undefined;
}

/**
 * Collect CHATCAST_* (and provider key) environment overrides.
 * The AI key variable depends on the provider chosen by the earlier sources.
 */
function loadEnvConfig(providerSoFar: AIProvider): IPartialChatcastConfig {
  const providerEnv = readStringEnv('CHATCAST_AI_PROVIDER');
  const provider = providerEnv ? (validateAIProvider(providerEnv) ?? undefined) : undefined;
  const effectiveProvider = provider ?? providerSoFar;

  return {
    personasPath: readStringEnv('CHATCAST_PERSONAS_PATH'),
    youtube: {
      baseUrl: readStringEnv('CHATCAST_YOUTUBE_BASE_URL'),
      accessToken: readStringEnv('YOUTUBE_ACCESS_TOKEN'),
      apiKey: readStringEnv('YOUTUBE_API_KEY'),
      channelId: readStringEnv('CHATCAST_CHANNEL_ID'),
      videoId: readStringEnv('CHATCAST_VIDEO_ID'),
      liveChatId: readStringEnv('CHATCAST_LIVE_CHAT_ID'),
      selfChannelId: readStringEnv('CHATCAST_SELF_CHANNEL_ID'),
    },
    ai: {
      enabled: readBoolEnv('CHATCAST_AI_ENABLED'),
      provider,
      model: readStringEnv('CHATCAST_AI_MODEL'),
      baseUrl: readStringEnv('CHATCAST_AI_BASE_URL'),
      apiKey: readStringEnv(AI_PROVIDER_KEY_ENV[effectiveProvider]),
    },
    watcher: {
      autoReply: readBoolEnv('CHATCAST_AUTO_REPLY'),
      autoGreet: readBoolEnv('CHATCAST_AUTO_GREET'),
      replyCooldownMs: readIntEnv('CHATCAST_REPLY_COOLDOWN_MS', 0),
      chatLogLimit: readIntEnv('CHATCAST_CHAT_LOG_LIMIT'),
    },
    persona: {
      personaName: readStringEnv('CHATCAST_PERSONA'),
      characterName: readStringEnv('CHATCAST_CHARACTER'),
    },
    server: { port: readIntEnv('CHATCAST_PORT') },
  };
}

/**
 * Replace non-positive or non-finite durations/limits with their defaults.
 * A zero cooldown is allowed (it disables rate limiting).
 */
function sanitizeWatcherConfig(watcher: IWatcherConfig): IWatcherConfig {
  const positive = (value: number, fallback: number): number =>
    Number.isFinite(value) && value > 0 ? Math.floor(value) : fallback;

  return {
    ...watcher,
    replyCooldownMs:
      Number.isFinite(watcher.replyCooldownMs) && watcher.replyCooldownMs >= 0
        ? watcher.replyCooldownMs
        : DEFAULT_WATCHER.replyCooldownMs,
    defaultPollIntervalMs: positive(watcher.defaultPollIntervalMs, DEFAULT_WATCHER.defaultPollIntervalMs),
    minPollIntervalMs: positive(watcher.minPollIntervalMs, DEFAULT_WATCHER.minPollIntervalMs),
    resolveBackoffMs: positive(watcher.resolveBackoffMs, DEFAULT_WATCHER.resolveBackoffMs),
    errorBackoffMs: positive(watcher.errorBackoffMs, DEFAULT_WATCHER.errorBackoffMs),
    stopTimeoutMs: positive(watcher.stopTimeoutMs, DEFAULT_WATCHER.stopTimeoutMs),
    callTimeoutMs: positive(watcher.callTimeoutMs, DEFAULT_WATCHER.callTimeoutMs),
    generationTimeoutMs: positive(watcher.generationTimeoutMs, DEFAULT_WATCHER.generationTimeoutMs),
    chatLogLimit: positive(watcher.chatLogLimit, DEFAULT_WATCHER.chatLogLimit),
  };
}

function sanitizePromptConfig(prompt: IPromptConfig): IPromptConfig {
  return {
    ...prompt,
    maxReplyChars:
      Number.isFinite(prompt.maxReplyChars) && prompt.maxReplyChars > 0
        ? Math.floor(prompt.maxReplyChars)
        : DEFAULT_PROMPT.maxReplyChars,
    maxStyleHints:
      Number.isFinite(prompt.maxStyleHints) && prompt.maxStyleHints >= 0
        ? Math.floor(prompt.maxStyleHints)
        : DEFAULT_PROMPT.maxStyleHints,
  };
}

/**
 * Merge configuration sources section by section.
 * Later sources take precedence over earlier ones.
 */
export function mergeConfigs(
  base: IChatcastConfig,
  ...sources: Array<IPartialChatcastConfig | null>
): IChatcastConfig {
  const merged: IChatcastConfig = {
    ...base,
    youtube: { ...base.youtube },
    ai: { ...base.ai },
    watcher: { ...base.watcher },
    prompt: { ...base.prompt },
    persona: { ...base.persona },
    server: { ...base.server },
  };

  for (const source of sources) {
    if (!source) continue;
    if (source.personasPath !== undefined) merged.personasPath = source.personasPath;
    merged.youtube = mergeSection(merged.youtube, source.youtube);
    merged.ai = mergeSection(merged.ai, source.ai);
    merged.watcher = mergeSection(merged.watcher, source.watcher);
    merged.prompt = mergeSection(merged.prompt, source.prompt);
    merged.persona = mergeSection(merged.persona, source.persona);
    merged.server = mergeSection(merged.server, source.server);
  }

  merged.watcher = sanitizeWatcherConfig(merged.watcher);
  merged.prompt = sanitizePromptConfig(merged.prompt);
  if (!Number.isInteger(merged.server.port) || merged.server.port <= 0) {
    merged.server.port = DEFAULT_SERVER.port;
  }

  return merged;
}

/**
 * Load Chatcast configuration
 * Priority: defaults < config file < environment variables
 *
 * @param projectDir - The project directory to load config from
 * @returns Merged configuration object
 */
export function loadConfig(projectDir: string): IChatcastConfig {
  const defaults = getDefaultConfig();
  const fileConfig = loadConfigFile(path.join(projectDir, CONFIG_FILE_NAME));
  const providerSoFar = fileConfig?.ai?.provider ?? defaults.ai.provider;
  const envConfig = loadEnvConfig(providerSoFar);

  return mergeConfigs(defaults, fileConfig, envConfig);
}

/**
 * Resolve the persona catalog path against the project directory.
 */
export function resolvePersonasPath(projectDir: string, config: IChatcastConfig): string {
  return path.isAbsolute(config.personasPath)
    ? config.personasPath
    : path.join(projectDir, config.personasPath);
}
