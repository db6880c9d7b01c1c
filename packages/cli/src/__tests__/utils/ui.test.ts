import { describe, it, expect, beforeEach } from 'vitest';
import chalk from 'chalk';

import type { IDisplayRecord } from '@chatcast/livechat';

import { formatRecord } from '../../utils/ui.js';

function record(overrides: Partial<IDisplayRecord>): IDisplayRecord {
  return {
    seq: 1,
    timestamp: '2026-03-14T18:05:09.000Z',
    author: 'viewer-1',
    text: 'hello',
    isBot: false,
    kind: 'viewer',
    isPrivileged: false,
    ...overrides,
  };
}

describe('formatRecord', () => {
  beforeEach(() => {
    chalk.level = 0;
  });

  it('should print time, author and text', () => {
    expect(formatRecord(record({}))).toBe('18:05:09 viewer-1: hello');
  });

  it('should mark bot messages the transport refused', () => {
    const line = formatRecord(
      record({ author: 'Bot', text: 'Thanks!', isBot: true, kind: 'bot', delivered: false }),
    );

    expect(line).toBe('18:05:09 Bot: Thanks! (not delivered)');
  });

  it('should not mark delivered bot messages', () => {
    const line = formatRecord(record({ author: 'Bot', text: 'Thanks!', isBot: true, kind: 'bot', delivered: true }));

    expect(line).toBe('18:05:09 Bot: Thanks!');
  });

  it('should colour System records when colours are on', () => {
    chalk.level = 1;

    const line = formatRecord(record({ author: 'System', text: 'Watcher error: boom', kind: 'system' }));

    expect(line).toContain(chalk.yellow('System'));
  });
});
