/**
 * Builds the generation prompt for one viewer message.
 */

import { DEFAULT_PROMPT } from '@chatcast/core';
import type { ICharacter, IPersona, IPromptConfig } from '@chatcast/core';

/**
 * Tone guidance from the character's reply hints: the first `maxStyleHints`
 * joined by the separator, or the fallback style when there are none.
 */
export function buildStyleGuide(character: ICharacter, config: IPromptConfig = DEFAULT_PROMPT): string {
  const hints = character.greetings.replies.slice(0, Math.max(0, config.maxStyleHints));
  return hints.length > 0 ? hints.join(config.styleSeparator) : config.fallbackStyle;
}

export class PromptBuilder {
  constructor(private readonly config: IPromptConfig = DEFAULT_PROMPT) {}

  get maxReplyChars(): number {
    return this.config.maxReplyChars;
  }

  /** Pure: the same inputs always produce the same prompt. */
  build(persona: IPersona, character: ICharacter, userText: string): string {
    const style = buildStyleGuide(character, this.config);
    return [
      `You are replying in a live stream chat as the character "${character.name}" of "${persona.name}".`,
      `Return exactly one short reply of at most ${this.config.maxReplyChars} characters.`,
      'Use emoji sparingly.',
      `Reference phrases for tone: ${style}`,
      `Viewer: ${userText}`,
    ].join('\n');
  }
}
