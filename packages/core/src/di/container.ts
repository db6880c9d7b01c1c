/**
 * DI composition root for Chatcast.
 * Registers the loaded configuration and the persona source so the server and
 * the CLI resolve the same instances through tsyringe string tokens.
 */

import 'reflect-metadata';

import { container } from 'tsyringe';

import { loadConfig, resolvePersonasPath } from '../config.js';
import { JsonFilePersonaSource } from '../persona/loader.js';
import { IChatcastConfig } from '../types.js';
import {
  CONFIG_TOKEN,
  PERSONAS_PATH_TOKEN,
  PERSONA_SOURCE_TOKEN,
  PROJECT_DIR_TOKEN,
} from './tokens.js';

export { CONFIG_TOKEN, PERSONAS_PATH_TOKEN, PERSONA_SOURCE_TOKEN, PROJECT_DIR_TOKEN };

/**
 * Initialize the DI container for `projectDir`.
 * Safe to call multiple times: later calls are no-ops while the config token
 * is registered.
 *
 * @param projectDir  Directory holding chatcast.config.json and the persona catalog
 */
export function initContainer(projectDir: string): void {
  if (container.isRegistered(CONFIG_TOKEN)) {
    return;
  }

  const config = loadConfig(projectDir);

  container.registerInstance<string>(PROJECT_DIR_TOKEN, projectDir);
  container.registerInstance<IChatcastConfig>(CONFIG_TOKEN, config);
  container.registerInstance<string>(PERSONAS_PATH_TOKEN, resolvePersonasPath(projectDir, config));
  container.registerSingleton(PERSONA_SOURCE_TOKEN, JsonFilePersonaSource);
}

/**
 * Returns true when the container has been initialized via initContainer().
 */
export function isContainerInitialized(): boolean {
  return container.isRegistered(CONFIG_TOKEN);
}

/** Drop every registration (tests and re-initialisation with another project dir). */
export function resetContainer(): void {
  container.reset();
}

export { container };
