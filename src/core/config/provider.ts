/**
 * Config provider: resolves a project id to a working directory and its config.
 *
 * Resolution order: a registered project resolves to its cached clone; any
 * other id resolves to `<projectsDir>/<projectId>` when that directory
 * exists. Unknown projects resolve to null and fail to load.
 *
 * Dependency direction: provider.ts → manager.ts, git/repository-cache, utils
 * Used by: workflow coordinator, CLI commands
 */

import { join, resolve } from 'node:path';
import { loadProjectConfig } from './manager.js';
import type { ProjectConfig } from './types.js';
import type { RepositoryCache } from '../../git/repository-cache.js';
import { ConfigError } from '../errors.js';
import { isDirectory } from '../../utils/fs.js';

/** What the coordinator needs from configuration storage. */
export interface ConfigProvider {
    /** @throws {ConfigError} when the project is unknown or its config is invalid */
    load(projectId: string): Promise<ProjectConfig>;
    resolveWorkingDirectory(projectId: string): Promise<string | null>;
}

export class FileConfigProvider implements ConfigProvider {
    private readonly projectsDir: string;
    private readonly repositories: RepositoryCache;

    constructor(projectsDir: string, repositories: RepositoryCache) {
        this.projectsDir = resolve(projectsDir);
        this.repositories = repositories;
    }

    async resolveWorkingDirectory(projectId: string): Promise<string | null> {
        const cloned = await this.repositories.resolve(projectId);
        if (cloned) return cloned;

        const local = join(this.projectsDir, projectId);
        return isDirectory(local) ? local : null;
    }

    async load(projectId: string): Promise<ProjectConfig> {
        const workingDirectory = await this.resolveWorkingDirectory(projectId);
        if (!workingDirectory) {
            throw new ConfigError(`Project "${projectId}" not found`, {
                projectId,
                projectsDir: this.projectsDir,
            });
        }
        return loadProjectConfig(workingDirectory);
    }
}
