/**
 * Tests for personas command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { Command } from 'commander';
import chalk from 'chalk';

import { personasCommand } from '../../commands/personas.js';

describe('personas command', () => {
  let tempDir: string;

  beforeEach(() => {
    chalk.level = 0;
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'chatcast-personas-test-'));
    vi.spyOn(process, 'cwd').mockReturnValue(tempDir);
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  function writeCatalog(name: string, content: unknown): string {
    const file = path.join(tempDir, name);
    fs.writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content));
    return file;
  }

  async function run(...args: string[]): Promise<void> {
    const program = new Command();
    personasCommand(program);
    await program.parseAsync(['node', 'test', 'personas', ...args]);
  }

  it('should print the normalised catalog as JSON', async () => {
    writeCatalog('personas.json', {
      personas: [
        {
          name: ' Nova ',
          characters: [
            { name: 'Pilot', greetings: { start: 'Hi', end: 'Bye', replies: ['calm', '  '] } },
          ],
        },
      ],
    });
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await run('--json');

    const output = consoleSpy.mock.calls.map((call) => call[0]).join('\n');
    expect(JSON.parse(output)).toEqual([
      {
        name: 'Nova',
        characters: [{ name: 'Pilot', greetings: { start: 'Hi', end: 'Bye', replies: ['calm'] } }],
      },
    ]);
  });

  it('should read the file given with --path relative to the project', async () => {
    writeCatalog('cast.json', {
      personas: [{ name: 'Echo', characters: [{ name: 'Host' }] }],
    });
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await run('--path', 'cast.json', '--json');

    const output = JSON.parse(consoleSpy.mock.calls.map((call) => call[0]).join('\n'));
    expect(output[0].name).toBe('Echo');
    expect(output[0].characters[0].name).toBe('Host');
  });

  it('should print a table with one row per character', async () => {
    writeCatalog('personas.json', {
      personas: [
        {
          name: 'Nova',
          characters: [
            { name: 'Pilot', greetings: { start: 'Hi', end: 'Bye', replies: ['calm'] } },
            { name: 'Navigator', greetings: { start: 'Hello', end: 'Later', replies: [] } },
          ],
        },
      ],
    });
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await run();

    const output = consoleSpy.mock.calls.map((call) => String(call[0] ?? '')).join('\n');
    expect(output).toContain('Personas');
    expect(output).toContain(path.join(tempDir, 'personas.json'));
    expect(output).toContain('Pilot');
    expect(output).toContain('Navigator');
    expect(output).toContain('Later');
  });

  it('should exit with 1 on an invalid catalog', async () => {
    writeCatalog('personas.json', { personas: 'nope' });
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit ${code}`);
    });

    await expect(run()).rejects.toThrow('process.exit 1');
    expect(errorSpy).toHaveBeenCalledWith('✖', 'Invalid persona catalog: personas must be an array');
  });

  it('should exit with 1 on a file that is not JSON', async () => {
    writeCatalog('personas.json', '{ broken');
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit ${code}`);
    });

    await expect(run()).rejects.toThrow('process.exit 1');
    expect(String(errorSpy.mock.calls[0][1])).toContain('is not valid JSON');
  });
});
