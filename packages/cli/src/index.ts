// CLI package public API

export { createProgram } from './program.js';
export { personasCommand } from './commands/personas.js';
export type { IPersonasOptions } from './commands/personas.js';
export {
  acquireServeLock,
  getServeLockPath,
  releaseServeLock,
  resolveServePort,
  serveCommand,
} from './commands/serve.js';
export type { IServeOptions } from './commands/serve.js';
export { buildStartOptions, watchCommand } from './commands/watch.js';
export type { IWatchOptions } from './commands/watch.js';
