/**
 * Default configuration values and on-disk layout constants.
 *
 * Dependency direction: defaults.ts → schema.ts, types.ts
 * Used by: manager.ts, registry.ts, CLI init command
 */

import { projectConfigSchema } from './schema.js';
import type { ProjectConfig } from './types.js';
import type { StackLanguage } from './stacks.js';

/** The directory name where deliverpilot state lives (inside a project or the tool home). */
export const CONFIG_DIR_NAME = '.deliverpilot';

/** Project config file name, inside CONFIG_DIR_NAME. */
export const PROJECT_CONFIG_FILE_NAME = 'project.json';

/** Registry file name, inside the tool home's CONFIG_DIR_NAME. */
export const REGISTRY_FILE_NAME = 'registry.json';

/** Directory for cached clones of registered repositories. */
export const REPOS_DIR_NAME = 'repos';

/** Directory for user-editable agent prompts, inside a project's CONFIG_DIR_NAME. */
export const PROMPTS_DIR_NAME = 'prompts';

/** Default directory (relative to the tool home) holding local, unregistered projects. */
export const PROJECTS_DIR_NAME = 'projects';

/** Default smoke-check budget, applied to install and smoke separately. */
export const DEFAULT_SMOKE_TIMEOUT_MS = 60_000;

export const DEFAULT_SMOKE_HEALTH_PATH = '/health';

/** Runtime commands suggested for a new project, per language. */
const STARTER_RUNTIME: Record<StackLanguage, { installCommand: string; smokeCommand: string }> = {
    python: {
        installCommand: 'pip install -r requirements.txt',
        smokeCommand: 'python -c "import app.main"',
    },
    javascript: { installCommand: 'npm install', smokeCommand: 'npm run build' },
    typescript: { installCommand: 'npm install', smokeCommand: 'npm run build' },
    php: { installCommand: 'composer install', smokeCommand: 'php -l public/index.php' },
};

/**
 * Build a complete default project config.
 *
 * Defaults to Ollama so a project can run codegen without API keys.
 */
export function getDefaultConfig(name: string, language: StackLanguage = 'python'): ProjectConfig {
    return projectConfigSchema.parse({
        name,
        language,
        runtime: {
            backend: STARTER_RUNTIME[language],
        },
    });
}
