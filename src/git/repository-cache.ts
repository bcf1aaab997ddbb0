/**
 * Repository cache: maps registered project ids to local clones.
 *
 * The cache is an explicit object owned by whoever builds the coordinator.
 * Clones live under `<home>/.deliverpilot/repos/<projectId>`; the in-memory
 * map only remembers what has been resolved during this process and is
 * cleared or invalidated explicitly.
 *
 * Dependency direction: repository-cache.ts → simple-git, config/registry, utils
 * Used by: config provider
 */

import { join, resolve } from 'node:path';
import { rm } from 'node:fs/promises';
import { simpleGit } from 'simple-git';
import { CONFIG_DIR_NAME, REPOS_DIR_NAME } from '../core/config/defaults.js';
import type { ProjectRegistry } from '../core/config/registry.js';
import { GitError, errorMessage } from '../core/errors.js';
import { isDirectory } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/** Clones `url` into `destination`. Injected so tests never touch a network. */
export type CloneFn = (url: string, destination: string) => Promise<void>;

const defaultClone: CloneFn = async (url, destination) => {
    await simpleGit().clone(url, destination);
};

export class RepositoryCache {
    private readonly reposDir: string;
    private readonly registry: ProjectRegistry;
    private readonly clone: CloneFn;
    private readonly resolved = new Map<string, string>();

    constructor(homeDir: string, registry: ProjectRegistry, clone: CloneFn = defaultClone) {
        this.reposDir = join(resolve(homeDir), CONFIG_DIR_NAME, REPOS_DIR_NAME);
        this.registry = registry;
        this.clone = clone;
    }

    /** Where the clone for a project lives (whether or not it exists yet). */
    pathFor(projectId: string): string {
        return join(this.reposDir, projectId);
    }

    /**
     * Return the local clone for a registered project, cloning on first use.
     * Returns null for projects that are not in the registry.
     *
     * @throws {GitError} if the clone fails
     */
    async resolve(projectId: string): Promise<string | null> {
        const cached = this.resolved.get(projectId);
        if (cached) return cached;

        const entry = this.registry.get(projectId);
        if (!entry) return null;

        const destination = this.pathFor(projectId);
        if (!isDirectory(destination)) {
            logger.info(`Cloning ${entry.repoUrl} into ${destination}`);
            try {
                await this.clone(entry.repoUrl, destination);
            } catch (err) {
                throw new GitError(`Failed to clone ${entry.repoUrl}: ${errorMessage(err)}`, {
                    projectId,
                    repoUrl: entry.repoUrl,
                });
            }
        }

        this.resolved.set(projectId, destination);
        return destination;
    }

    /** Forget a project's resolution; with `removeClone`, delete the clone too. */
    async invalidate(projectId: string, removeClone = false): Promise<void> {
        this.resolved.delete(projectId);
        if (removeClone) {
            await rm(this.pathFor(projectId), { recursive: true, force: true });
        }
    }

    clear(): void {
        this.resolved.clear();
    }

    get size(): number {
        return this.resolved.size;
    }
}
