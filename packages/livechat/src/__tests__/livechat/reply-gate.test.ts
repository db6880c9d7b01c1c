/**
 * Tests for ReplyGate - per-author reply cooldown.
 */

import { describe, expect, it } from 'vitest';

import { ReplyGate } from '../../reply-gate.js';

function buildGate(options: { cooldownMs?: number; hasGenerator?: boolean } = {}) {
  const clock = { now: 0 };
  const gate = new ReplyGate({
    cooldownMs: options.cooldownMs ?? 15_000,
    hasGenerator: options.hasGenerator ?? true,
    now: () => clock.now,
  });
  return { gate, clock };
}

describe('ReplyGate', () => {
  it('authorizes at t=0, refuses at t=10s and authorizes again at t=20s', () => {
    const { gate, clock } = buildGate();

    clock.now = 0;
    expect(gate.shouldReply('viewer-a', true, false)).toBe(true);
    clock.now = 10_000;
    expect(gate.shouldReply('viewer-a', true, false)).toBe(false);
    clock.now = 20_000;
    expect(gate.shouldReply('viewer-a', true, false)).toBe(true);
  });

  it('does not refresh the timestamp on a refused request', () => {
    const { gate, clock } = buildGate();

    gate.shouldReply('viewer-a', true, false);
    clock.now = 14_999;
    gate.shouldReply('viewer-a', true, false);

    expect(gate.lastReplyAt('viewer-a')).toBe(0);
    clock.now = 15_000;
    expect(gate.shouldReply('viewer-a', true, false)).toBe(true);
  });

  it('authorizes at most one reply per author within the cooldown', () => {
    const { gate } = buildGate();

    const decisions = [1, 2, 3].map(() => gate.shouldReply('viewer-a', true, false));

    expect(decisions.filter(Boolean)).toHaveLength(1);
  });

  it('tracks authors independently', () => {
    const { gate } = buildGate();

    expect(gate.shouldReply('viewer-a', true, false)).toBe(true);
    expect(gate.shouldReply('viewer-b', true, false)).toBe(true);
    expect(gate.size).toBe(2);
  });

  it('refuses when auto-reply is disabled without recording anything', () => {
    const { gate } = buildGate();

    expect(gate.shouldReply('viewer-a', false, false)).toBe(false);
    expect(gate.lastReplyAt('viewer-a')).toBeNull();
  });

  it('refuses when no generator is configured', () => {
    const { gate } = buildGate({ hasGenerator: false });

    expect(gate.shouldReply('viewer-a', true, false)).toBe(false);
  });

  it('never authorizes the bot itself or an empty author id', () => {
    const { gate } = buildGate();

    expect(gate.shouldReply('bot-channel', true, true)).toBe(false);
    expect(gate.shouldReply('', true, false)).toBe(false);
    expect(gate.size).toBe(0);
  });

  it('forgets every author on reset', () => {
    const { gate } = buildGate();
    gate.shouldReply('viewer-a', true, false);

    gate.reset();

    expect(gate.size).toBe(0);
    expect(gate.shouldReply('viewer-a', true, false)).toBe(true);
  });
});
