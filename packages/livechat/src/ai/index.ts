/**
 * AI module barrel exports.
 */

export type { IResolvedAIConfig } from './provider.js';
export { resolveAIConfig } from './provider.js';
export type { IAiTextGeneratorOptions, ITextGenerator } from './client.js';
export { AiTextGenerator, createTextGenerator } from './client.js';
