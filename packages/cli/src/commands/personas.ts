/**
 * Personas command for the Chatcast CLI
 * Validates the persona catalog and lists its personas and characters
 */

import * as path from 'path';
import { Command } from 'commander';
import chalk from 'chalk';

import {
  extractErrorMessage,
  loadConfig,
  loadPersonaCatalog,
  resolvePersonasPath,
} from '@chatcast/core';
import type { PersonaCatalog } from '@chatcast/core';

import * as ui from '../utils/ui.js';

export interface IPersonasOptions {
  path?: string;
  json?: boolean;
}

function preview(text: string, max = 40): string {
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

function printCatalog(catalog: PersonaCatalog, filePath: string): void {
  ui.header('Personas');
  ui.dim(filePath);

  if (catalog.isEmpty) {
    ui.dim('No persona has a character; the watcher cannot start with this catalog.');
  }

  const table = ui.createTable({
    head: ['Persona', 'Character', 'Start greeting', 'End greeting', 'Style hints'],
  });

  for (const persona of catalog.list()) {
    if (persona.characters.length === 0) {
      table.push([persona.name, chalk.dim('-'), chalk.dim('-'), chalk.dim('-'), chalk.dim('0')]);
      continue;
    }
    for (const character of persona.characters) {
      table.push([
        persona.name,
        character.name,
        preview(character.greetings.start),
        preview(character.greetings.end),
        String(character.greetings.replies.length),
      ]);
    }
  }

  console.log(table.toString());
}

export function personasCommand(program: Command): void {
  program
    .command('personas')
    .description('Validate the persona catalog and list its characters')
    .option('--path <file>', 'Persona catalog file (default: personasPath from config)')
    .option('--json', 'Output the normalised catalog as JSON')
    .action((options: IPersonasOptions) => {
      const projectDir = process.cwd();
      const filePath = options.path
        ? path.resolve(projectDir, options.path)
        : resolvePersonasPath(projectDir, loadConfig(projectDir));

      let catalog: PersonaCatalog;
      try {
        catalog = loadPersonaCatalog(filePath);
      } catch (err) {
        ui.error(`Invalid persona catalog: ${extractErrorMessage(err)}`);
        process.exit(1);
      }

      if (options.json) {
        console.log(JSON.stringify(catalog.list(), null, 2));
        return;
      }

      printCatalog(catalog, filePath);
    });
}
