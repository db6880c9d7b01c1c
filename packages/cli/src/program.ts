import { Command } from 'commander';

import { VERSION } from '@chatcast/core';

import { personasCommand } from './commands/personas.js';
import { serveCommand } from './commands/serve.js';
import { watchCommand } from './commands/watch.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('chatcast')
    .description('Live stream chat companion: replies and greets as a configured character')
    .version(VERSION);

  serveCommand(program);
  watchCommand(program);
  personasCommand(program);

  return program;
}
