/**
 * Tests for GreetingStateMachine - start/end greeting edges and the farewell latch.
 */

import { describe, expect, it } from 'vitest';
import type { ICharacter } from '@chatcast/core';

import { GreetingStateMachine, greetingText } from '../../greeting-state-machine.js';

function feed(machine: GreetingStateMachine, pattern: boolean[]): string[] {
  return pattern.map((v) => machine.observe(v)).filter((e): e is 'start' | 'end' => e !== null);
}

describe('GreetingStateMachine', () => {
  it('emits exactly one start and one end for F* T+ F+', () => {
    const machine = new GreetingStateMachine();

    const emitted = feed(machine, [false, false, true, true, true, false, false]);

    expect(emitted).toEqual(['start', 'end']);
  });

  it('emits nothing on self-transitions', () => {
    const machine = new GreetingStateMachine();

    expect(machine.observe(false)).toBeNull();
    expect(machine.observe(true)).toBe('start');
    expect(machine.observe(true)).toBeNull();
    expect(machine.state).toBe('connected');
  });

  it('greets again after reconnecting', () => {
    const machine = new GreetingStateMachine();

    expect(feed(machine, [true, false, true, false])).toEqual(['start', 'end', 'start', 'end']);
  });

  it('grants the farewell latch once while connected', () => {
    const machine = new GreetingStateMachine();
    expect(machine.claimFarewell()).toBe(false);

    machine.observe(true);

    expect(machine.claimFarewell()).toBe(true);
    expect(machine.claimFarewell()).toBe(false);
  });

  it('suppresses the end edge once the farewell was claimed', () => {
    const machine = new GreetingStateMachine();
    machine.observe(true);
    machine.claimFarewell();

    expect(machine.observe(false)).toBeNull();
    expect(machine.connected).toBe(false);
  });

  it('refuses the latch after the end edge already fired', () => {
    const machine = new GreetingStateMachine();
    machine.observe(true);
    machine.observe(false);

    expect(machine.claimFarewell()).toBe(false);
  });

  it('returns to disconnected on reset', () => {
    const machine = new GreetingStateMachine();
    machine.observe(true);

    machine.reset();

    expect(machine.state).toBe('disconnected');
    expect(machine.claimFarewell()).toBe(false);
    expect(machine.observe(true)).toBe('start');
  });
});

describe('greetingText', () => {
  const character: ICharacter = {
    name: 'Pilot',
    greetings: { start: 'Welcome aboard!', end: 'Safe travels!', replies: [] },
  };

  it('uses the character text without overrides', () => {
    expect(greetingText('start', character)).toBe('Welcome aboard!');
    expect(greetingText('end', character, {})).toBe('Safe travels!');
  });

  it('prefers a non-blank override', () => {
    expect(greetingText('start', character, { start: 'Hi all' })).toBe('Hi all');
    expect(greetingText('end', character, { end: '   ' })).toBe('Safe travels!');
  });
});
