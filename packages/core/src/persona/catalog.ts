/**
 * Immutable view over the configured personas and their characters.
 */

import { ICharacter, IPersona, IPersonaSelectionResult } from '../types.js';

function freezePersona(persona: IPersona): IPersona {
  const characters = persona.characters.map((character) => {
    const replies = [...character.greetings.replies];
    Object.freeze(replies);
    const greetings = { ...character.greetings, replies };
    Object.freeze(greetings);
    const copy: ICharacter = { name: character.name, greetings };
    Object.freeze(copy);
    return copy;
  });
  Object.freeze(characters);
  const copy: IPersona = { name: persona.name, characters };
  Object.freeze(copy);
  return copy;
}

export class PersonaCatalog {
  private readonly personas: readonly IPersona[];

  constructor(personas: IPersona[]) {
    const frozen = personas.map(freezePersona);
    Object.freeze(frozen);
    this.personas = frozen;
  }

  /** True when no persona carries at least one character */
  get isEmpty(): boolean {
    return !this.personas.some((p) => p.characters.length > 0);
  }

  list(): readonly IPersona[] {
    return this.personas;
  }

  findPersona(name: string): IPersona | null {
    return this.personas.find((p) => p.name === name) ?? null;
  }

  findCharacter(personaName: string, characterName: string): ICharacter | null {
    return this.findPersona(personaName)?.characters.find((c) => c.name === characterName) ?? null;
  }

  /**
   * Pick a persona/character pair. Empty or unknown names fall back to the
   * first persona that has characters, then to its first character.
   */
  select(personaName?: string, characterName?: string): IPersonaSelectionResult | null {
    const named = personaName ? this.findPersona(personaName) : null;
    const persona =
      named && named.characters.length > 0
        ? named
        : this.personas.find((p) => p.characters.length > 0);
    if (!persona) {
      return null;
    }

    const character =
      (characterName ? persona.characters.find((c) => c.name === characterName) : undefined) ??
      persona.characters[0];
    if (!character) {
      return null;
    }

    return { persona, character };
  }
}
