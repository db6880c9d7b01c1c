/** String tokens used with `@inject(...)` across the workspace packages. */

export const CONFIG_TOKEN = 'Config';
export const PROJECT_DIR_TOKEN = 'ProjectDir';
export const PERSONAS_PATH_TOKEN = 'PersonasPath';
export const PERSONA_SOURCE_TOKEN = 'PersonaSource';
