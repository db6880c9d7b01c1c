/**
 * Tests for AI provider configuration resolution.
 */

import { describe, expect, it } from 'vitest';
import { DEFAULT_AI } from '@chatcast/core';
import type { IAIConfig } from '@chatcast/core';

import { resolveAIConfig } from '../../ai/provider.js';

function buildConfig(overrides: Partial<IAIConfig> = {}): IAIConfig {
  return { ...DEFAULT_AI, apiKey: 'test-key', ...overrides };
}

describe('resolveAIConfig', () => {
  it('fills the gemini defaults', () => {
    const resolved = resolveAIConfig(buildConfig());

    expect(resolved).toEqual({
      provider: 'gemini',
      model: 'gemini-1.5-flash',
      baseUrl: 'https://generativelanguage.googleapis.com',
      apiKey: 'test-key',
      maxTokens: 256,
      temperature: 0.8,
    });
  });

  it('fills the defaults of the chosen provider', () => {
    expect(resolveAIConfig(buildConfig({ provider: 'anthropic' })).baseUrl).toBe('https://api.anthropic.com');
    expect(resolveAIConfig(buildConfig({ provider: 'openai' })).model).toBe('gpt-4o');
  });

  it('keeps explicit model and base URL', () => {
    const resolved = resolveAIConfig(
      buildConfig({ provider: 'openai', model: 'local-model', baseUrl: 'http://localhost:8080' }),
    );

    expect(resolved.model).toBe('local-model');
    expect(resolved.baseUrl).toBe('http://localhost:8080');
  });

  it('replaces a non-positive token budget with the default', () => {
    expect(resolveAIConfig(buildConfig({ maxTokens: 0 })).maxTokens).toBe(256);
  });
});
