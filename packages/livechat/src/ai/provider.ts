/**
 * AI provider configuration resolution.
 * Fills the provider's default model and base URL where the config leaves them empty.
 */

import {
  AI_PROVIDER_DEFAULT_BASE_URLS,
  AI_PROVIDER_DEFAULT_MODELS,
  DEFAULT_AI,
} from '@chatcast/core';
import type { AIProvider, IAIConfig } from '@chatcast/core';

export interface IResolvedAIConfig {
  provider: AIProvider;
  model: string;
  baseUrl: string;
  apiKey: string;
  maxTokens: number;
  temperature: number;
}

export function resolveAIConfig(config: IAIConfig): IResolvedAIConfig {
  const provider = config.provider;
  return {
    provider,
    model: config.model.trim() || AI_PROVIDER_DEFAULT_MODELS[provider],
    baseUrl: config.baseUrl.trim() || AI_PROVIDER_DEFAULT_BASE_URLS[provider],
    apiKey: config.apiKey.trim(),
    maxTokens: config.maxTokens > 0 ? config.maxTokens : DEFAULT_AI.maxTokens,
    temperature: config.temperature,
  };
}
