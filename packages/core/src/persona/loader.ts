/**
 * Persona catalog loading.
 * All shape checks and default filling happen here, once, so the rest of the
 * system only ever sees a well-formed PersonaCatalog.
 */

import * as fs from 'fs';

import { inject, injectable } from 'tsyringe';

import {
  DEFAULT_CHARACTER_NAME,
  DEFAULT_END_GREETING,
  DEFAULT_PERSONA_NAME,
  DEFAULT_START_GREETING,
} from '../constants.js';
import { PERSONAS_PATH_TOKEN } from '../di/tokens.js';
import { ICharacter, IPersona } from '../types.js';
import { extractErrorMessage } from '../utils/async.js';
import { createLogger } from '../utils/logger.js';
import { PersonaCatalog } from './catalog.js';

const log = createLogger('personas');

/**
 * Where the watcher gets its persona catalog from at each start.
 */
export interface IPersonaSource {
  load(): Promise<PersonaCatalog>;
}

/** Catalog used when the file is missing or lists no personas */
export const DEFAULT_PERSONAS: IPersona[] = [
  {
    name: DEFAULT_PERSONA_NAME,
    characters: [
      {
        name: 'Streamer',
        greetings: {
          start: 'Hello everyone, welcome to the stream!',
          end: 'Thank you so much for watching today!',
          replies: ['Amazing!', 'I see!', 'That is so funny!', 'Thanks for the support!'],
        },
      },
    ],
  },
];

export function createDefaultCatalog(): PersonaCatalog {
  return new PersonaCatalog(DEFAULT_PERSONAS);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function readText(value: unknown, where: string, fallback: string): string {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'string') {
    throw new Error(`${where} must be a string`);
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : fallback;
}

function readReplies(value: unknown, where: string): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new Error(`${where} must be an array of strings`);
  }
  return value.map((v) => v.trim()).filter((v) => v.length > 0);
}

function normalizeCharacter(raw: unknown, where: string): ICharacter {
  if (!isRecord(raw)) {
    throw new Error(`${where} must be an object`);
  }

  const greetingsRaw = raw.greetings ?? {};
  if (!isRecord(greetingsRaw)) {
    throw new Error(`${where}.greetings must be an object`);
  }

  return {
    name: readText(raw.name, `${where}.name`, DEFAULT_CHARACTER_NAME),
    greetings: {
      start: readText(greetingsRaw.start, `${where}.greetings.start`, DEFAULT_START_GREETING),
      end: readText(greetingsRaw.end, `${where}.greetings.end`, DEFAULT_END_GREETING),
      replies: readReplies(greetingsRaw.replies, `${where}.greetings.replies`),
    },
  };
}

function normalizePersona(raw: unknown, where: string): IPersona {
  if (!isRecord(raw)) {
    throw new Error(`${where} must be an object`);
  }

  const charactersRaw = raw.characters ?? [];
  if (!Array.isArray(charactersRaw)) {
    throw new Error(`${where}.characters must be an array`);
  }

  const characters: ICharacter[] = [];
  const seen = new Set<string>();
  charactersRaw.forEach((entry: unknown, index) => {
    const character = normalizeCharacter(entry, `${where}.characters[${index}]`);
    if (seen.has(character.name)) {
      throw new Error(`${where}.characters[${index}]: duplicate character name "${character.name}"`);
    }
    seen.add(character.name);
    characters.push(character);
  });

  return {
    name: readText(raw.name, `${where}.name`, DEFAULT_PERSONA_NAME),
    characters,
  };
}

/**
 * Validate raw catalog JSON (`{ personas: [...] }`) and fill defaults.
 * Throws an Error naming the offending path on malformed input.
 */
export function normalizePersonaCatalog(raw: unknown): PersonaCatalog {
  if (!isRecord(raw)) {
    throw new Error('persona catalog must be a JSON object');
  }

  const list = raw.personas ?? [];
  if (!Array.isArray(list)) {
    throw new Error('personas must be an array');
  }

  const personas: IPersona[] = [];
  const seen = new Set<string>();
  list.forEach((entry: unknown, index) => {
    const persona = normalizePersona(entry, `personas[${index}]`);
    if (seen.has(persona.name)) {
      throw new Error(`personas[${index}]: duplicate persona name "${persona.name}"`);
    }
    seen.add(persona.name);
    personas.push(persona);
  });

  if (personas.length === 0) {
    return createDefaultCatalog();
  }

  return new PersonaCatalog(personas);
}

/**
 * Read and normalise a persona catalog file.
 * A missing file yields the default catalog; unreadable JSON throws.
 */
export function loadPersonaCatalog(filePath: string): PersonaCatalog {
  if (!fs.existsSync(filePath)) {
    log.warn('persona catalog not found, using the default catalog', { path: filePath });
    return createDefaultCatalog();
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new Error(`persona catalog ${filePath} is not valid JSON: ${extractErrorMessage(error)}`);
  }

  return normalizePersonaCatalog(raw);
}

/**
 * Persona source backed by a JSON file. Every load re-reads the file, so an
 * edited catalog takes effect on the next watcher start.
 */
@injectable()
export class JsonFilePersonaSource implements IPersonaSource {
  constructor(@inject(PERSONAS_PATH_TOKEN) private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<PersonaCatalog> {
    return loadPersonaCatalog(this.filePath);
  }
}
