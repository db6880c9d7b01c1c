/**
 * Tests for PromptBuilder and the style guide derived from reply hints.
 */

import { describe, expect, it } from 'vitest';
import type { ICharacter, IPersona } from '@chatcast/core';

import { PromptBuilder, buildStyleGuide } from '../../prompt-builder.js';

function buildCharacter(replies: string[]): ICharacter {
  return { name: 'Pilot', greetings: { start: 'hi', end: 'bye', replies } };
}

const persona: IPersona = { name: 'Nova', characters: [] };

describe('buildStyleGuide', () => {
  it('joins up to six hints with " / "', () => {
    const character = buildCharacter(['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h']);

    expect(buildStyleGuide(character)).toBe('a / b / c / d / e / f');
  });

  it('falls back to "polite" when there are no hints', () => {
    expect(buildStyleGuide(buildCharacter([]))).toBe('polite');
  });

  it('follows the configured limits', () => {
    const guide = buildStyleGuide(buildCharacter(['a', 'b', 'c']), {
      maxReplyChars: 30,
      maxStyleHints: 2,
      styleSeparator: ', ',
      fallbackStyle: 'casual',
    });

    expect(guide).toBe('a, b');
  });
});

describe('PromptBuilder', () => {
  it('builds the full prompt', () => {
    const builder = new PromptBuilder();

    const prompt = builder.build(persona, buildCharacter(['Amazing!', 'I see!']), 'What game is this?');

    expect(prompt).toBe(
      [
        'You are replying in a live stream chat as the character "Pilot" of "Nova".',
        'Return exactly one short reply of at most 50 characters.',
        'Use emoji sparingly.',
        'Reference phrases for tone: Amazing! / I see!',
        'Viewer: What game is this?',
      ].join('\n'),
    );
  });

  it('ends with the viewer text', () => {
    const prompt = new PromptBuilder().build(persona, buildCharacter([]), 'hello there');

    expect(prompt.split('\n').at(-1)).toBe('Viewer: hello there');
    expect(prompt).toContain('Reference phrases for tone: polite');
  });

  it('is deterministic for the same inputs', () => {
    const builder = new PromptBuilder();
    const character = buildCharacter(['x', 'y']);

    expect(builder.build(persona, character, 'same')).toBe(builder.build(persona, character, 'same'));
  });

  it('does not modify its inputs', () => {
    const character = buildCharacter(['a', 'b', 'c', 'd', 'e', 'f', 'g']);
    const before = JSON.stringify(character);

    new PromptBuilder().build(persona, character, 'text');

    expect(JSON.stringify(character)).toBe(before);
  });

  it('uses the configured reply length', () => {
    const builder = new PromptBuilder({
      maxReplyChars: 30,
      maxStyleHints: 6,
      styleSeparator: ' / ',
      fallbackStyle: 'polite',
    });

    expect(builder.maxReplyChars).toBe(30);
    expect(builder.build(persona, buildCharacter([]), 'x')).toContain('at most 30 characters');
  });
});
