/**
 * Configuration manager: load, save, and validate project configs.
 *
 * Dependency direction: manager.ts → schema.ts, defaults.ts, utils/fs.ts, errors.ts
 * Used by: config provider, CLI commands
 */

import { join, resolve } from 'node:path';
import type { ZodIssue } from 'zod';
import { projectConfigSchema } from './schema.js';
import { CONFIG_DIR_NAME, PROJECT_CONFIG_FILE_NAME } from './defaults.js';
import type { ProjectConfig } from './types.js';
import { fileExists, readJsonFile, writeJsonFile } from '../../utils/fs.js';
import { ConfigError } from '../errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Resolve the config directory path for a given project root.
 */
export function getConfigDir(projectRoot: string): string {
    return join(resolve(projectRoot), CONFIG_DIR_NAME);
}

/**
 * Resolve the full config file path for a given project root.
 */
export function getConfigPath(projectRoot: string): string {
    return join(getConfigDir(projectRoot), PROJECT_CONFIG_FILE_NAME);
}

export function configExists(projectRoot: string): boolean {
    return fileExists(getConfigPath(projectRoot));
}

/** Format zod issues one per line for error messages. */
export function formatIssues(issues: readonly ZodIssue[]): string {
    return issues.map((i) => `  - ${i.path.join('.') || '(root)'}: ${i.message}`).join('\n');
}

/**
 * Load and validate the project configuration from disk.
 *
 * @param projectRoot - The project's working directory (where .deliverpilot/ lives)
 * @throws {ConfigError} if the file doesn't exist, is invalid JSON, or fails validation
 */
export function loadProjectConfig(projectRoot: string): ProjectConfig {
    const configPath = getConfigPath(projectRoot);

    if (!fileExists(configPath)) {
        throw new ConfigError(
            `No project configuration found at ${configPath}. Run "deliverpilot init" first.`,
            { configPath, projectRoot },
        );
    }

    logger.debug(`Loading project config from ${configPath}`);

    const result = projectConfigSchema.safeParse(readJsonFile(configPath));

    if (!result.success) {
        throw new ConfigError(
            `Invalid project configuration:\n${formatIssues(result.error.issues)}`,
            { configPath, issues: result.error.issues },
        );
    }

    return result.data;
}

/**
 * Save a project configuration, validating before write.
 *
 * @throws {ConfigError} if validation fails or write fails
 */
export function saveProjectConfig(projectRoot: string, config: ProjectConfig): void {
    const result = projectConfigSchema.safeParse(config);

    if (!result.success) {
        throw new ConfigError(
            `Cannot save invalid project configuration:\n${formatIssues(result.error.issues)}`,
            { issues: result.error.issues },
        );
    }

    const configPath = getConfigPath(projectRoot);
    writeJsonFile(configPath, result.data);
    logger.debug(`Project config saved to ${configPath}`);
}
