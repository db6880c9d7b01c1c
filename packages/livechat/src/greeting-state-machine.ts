/**
 * Start/end greeting edges for one watcher session.
 */

import type { ICharacter } from '@chatcast/core';

import type { GreetingKind, IGreetingOverrides } from './types.js';

export type ConnectionState = 'disconnected' | 'connected';

/**
 * Emits `start` on the disconnected -> connected edge and `end` on the way
 * back. Each connected stretch arms one farewell latch, shared by the `end`
 * edge and `claimFarewell()` (used by stop), so only one farewell goes out.
 */
export class GreetingStateMachine {
  private current: ConnectionState = 'disconnected';
  private farewellClaimed = true;

  get state(): ConnectionState {
    return this.current;
  }

  get connected(): boolean {
    return this.current === 'connected';
  }

  observe(resolvable: boolean): GreetingKind | null {
    if (this.current === 'disconnected' && resolvable) {
      this.current = 'connected';
      this.farewellClaimed = false;
      return 'start';
    }

    if (this.current === 'connected' && !resolvable) {
      this.current = 'disconnected';
      if (this.farewellClaimed) return null;
      this.farewellClaimed = true;
      return 'end';
    }

    return null;
  }

  /** True exactly once per connected stretch, and only while connected. */
  claimFarewell(): boolean {
    if (this.current !== 'connected' || this.farewellClaimed) {
      return false;
    }
    this.farewellClaimed = true;
    return true;
  }

  reset(): void {
    this.current = 'disconnected';
    this.farewellClaimed = true;
  }
}

/** Override text when one is set, the character's configured greeting otherwise. */
export function greetingText(
  kind: GreetingKind,
  character: ICharacter,
  overrides: IGreetingOverrides = {},
): string {
  const override = overrides[kind]?.trim();
  if (override) return override;
  return character.greetings[kind];
}
