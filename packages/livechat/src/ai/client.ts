/**
 * Text generation over the Gemini, Anthropic and OpenAI HTTP APIs.
 */

import { createLogger } from '@chatcast/core';
import type { IAIConfig } from '@chatcast/core';

import { asArray, asRecord, asString, fetchWithRetry, joinBaseUrl, readJsonObject } from '../http.js';
import { resolveAIConfig } from './provider.js';
import type { IResolvedAIConfig } from './provider.js';

const log = createLogger('ai');

/**
 * Produces one reply for a prompt. An empty string or a rejection means no
 * reply is sent.
 */
export interface ITextGenerator {
  generate(prompt: string, signal?: AbortSignal): Promise<string>;
}

export interface IAiTextGeneratorOptions {
  retryDelaysMs?: readonly number[];
}

export class AiTextGenerator implements ITextGenerator {
  constructor(
    private readonly resolved: IResolvedAIConfig,
    private readonly options: IAiTextGeneratorOptions = {},
  ) {}

  get provider(): string {
    return this.resolved.provider;
  }

  get model(): string {
    return this.resolved.model;
  }

  async generate(prompt: string, signal?: AbortSignal): Promise<string> {
    switch (this.resolved.provider) {
      case 'gemini':
        return this.callGemini(prompt, signal);
      case 'anthropic':
        return this.callAnthropic(prompt, signal);
      case 'openai':
        return this.callOpenAI(prompt, signal);
    }
  }

  private async post(url: string, headers: Record<string, string>, body: unknown, signal?: AbortSignal): Promise<Response> {
    return fetchWithRetry(
      url,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...headers },
        body: JSON.stringify(body),
        signal,
      },
      { delaysMs: this.options.retryDelaysMs },
    );
  }

  private async callGemini(prompt: string, signal?: AbortSignal): Promise<string> {
    const { baseUrl, model, apiKey, maxTokens, temperature } = this.resolved;
    const route = `/v1beta/models/${encodeURIComponent(model)}:generateContent?key=${encodeURIComponent(apiKey)}`;

    const response = await this.post(
      joinBaseUrl(baseUrl, route),
      {},
      {
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        generationConfig: { maxOutputTokens: maxTokens, temperature },
      },
      signal,
    );

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`Gemini API error: ${response.status} ${error}`);
    }

    const data = await readJsonObject(response);
    const candidate = asRecord(asArray(data.candidates)[0]);
    const parts = asArray(asRecord(candidate.content).parts);
    return parts
      .map((part) => asString(asRecord(part).text) ?? '')
      .join('')
      .trim();
  }

  private async callAnthropic(prompt: string, signal?: AbortSignal): Promise<string> {
    const { baseUrl, model, apiKey, maxTokens, temperature } = this.resolved;

    const response = await this.post(
      joinBaseUrl(baseUrl, '/v1/messages'),
      { 'x-api-key': apiKey, 'anthropic-version': '2023-06-01' },
      {
        model,
        max_tokens: maxTokens,
        temperature,
        messages: [{ role: 'user', content: prompt }],
      },
      signal,
    );

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`Anthropic API error: ${response.status} ${error}`);
    }

    const data = await readJsonObject(response);
    const textBlock = asArray(data.content)
      .map(asRecord)
      .find((block) => block.type === 'text');
    return asString(textBlock?.text)?.trim() ?? '';
  }

  private async callOpenAI(prompt: string, signal?: AbortSignal): Promise<string> {
    const { baseUrl, model, apiKey, maxTokens, temperature } = this.resolved;

    const response = await this.post(
      joinBaseUrl(baseUrl, '/v1/chat/completions'),
      { Authorization: `Bearer ${apiKey}` },
      {
        model,
        max_tokens: maxTokens,
        temperature,
        messages: [{ role: 'user', content: prompt }],
      },
      signal,
    );

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`OpenAI API error: ${response.status} ${error}`);
    }

    const data = await readJsonObject(response);
    const choice = asRecord(asArray(data.choices)[0]);
    return asString(asRecord(choice.message).content)?.trim() ?? '';
  }
}

/**
 * Build the generator for the configured provider, or null when AI replies
 * are disabled or no API key is available.
 */
export function createTextGenerator(
  config: IAIConfig,
  options: IAiTextGeneratorOptions = {},
): AiTextGenerator | null {
  if (!config.enabled) {
    log.info('AI replies disabled by configuration');
    return null;
  }

  const resolved = resolveAIConfig(config);
  if (!resolved.apiKey) {
    log.warn('no API key configured, AI replies unavailable', { provider: resolved.provider });
    return null;
  }

  return new AiTextGenerator(resolved, options);
}
