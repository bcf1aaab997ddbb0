/**
 * Project registry: tracks projects backed by a remote repository.
 *
 * Entries are persisted as JSON under the tool home
 * (`<home>/.deliverpilot/registry.json`). Unregistered projects are still
 * usable from the local projects directory; see config provider.
 *
 * Dependency direction: registry.ts → schema.ts, utils/fs, errors
 * Used by: config provider, repository cache, CLI project command
 */

import { join, resolve } from 'node:path';
import { registryFileSchema, registeredProjectSchema } from './schema.js';
import { CONFIG_DIR_NAME, REGISTRY_FILE_NAME } from './defaults.js';
import type { RegisteredProject, RegistryFile } from './types.js';
import { formatIssues } from './manager.js';
import { fileExists, readJsonFile, writeJsonFile } from '../../utils/fs.js';
import { ConfigError, ValidationError } from '../errors.js';
import { logger } from '../../utils/logger.js';

export function getRegistryPath(homeDir: string): string {
    return join(resolve(homeDir), CONFIG_DIR_NAME, REGISTRY_FILE_NAME);
}

export class ProjectRegistry {
    private readonly registryPath: string;
    private readonly now: () => Date;
    private readonly projects: Map<string, RegisteredProject>;

    constructor(homeDir: string, now: () => Date = () => new Date()) {
        this.registryPath = getRegistryPath(homeDir);
        this.now = now;
        this.projects = this.read();
    }

    get path(): string {
        return this.registryPath;
    }

    /**
     * Register a new project.
     * @throws {ValidationError} if the id is taken or the entry is invalid
     */
    register(projectId: string, repoUrl: string, metadata: Record<string, unknown> = {}): RegisteredProject {
        if (this.projects.has(projectId)) {
            throw new ValidationError(`Project "${projectId}" is already registered`, { projectId });
        }

        const parsed = registeredProjectSchema.safeParse({
            projectId,
            repoUrl,
            metadata,
            registeredAt: this.now().toISOString(),
        });
        if (!parsed.success) {
            throw new ValidationError(`Invalid project registration:\n${formatIssues(parsed.error.issues)}`, {
                projectId,
                issues: parsed.error.issues,
            });
        }

        this.projects.set(projectId, parsed.data);
        this.write();
        logger.debug(`Registered project ${projectId} → ${repoUrl}`);
        return parsed.data;
    }

    get(projectId: string): RegisteredProject | undefined {
        return this.projects.get(projectId);
    }

    list(): RegisteredProject[] {
        return [...this.projects.values()];
    }

    /** Remove a project. Returns false when it was not registered. */
    unregister(projectId: string): boolean {
        const removed = this.projects.delete(projectId);
        if (removed) this.write();
        return removed;
    }

    /** Shallow-merge metadata into an entry. Returns false when the project is unknown. */
    updateMetadata(projectId: string, metadata: Record<string, unknown>): boolean {
        const existing = this.projects.get(projectId);
        if (!existing) return false;

        this.projects.set(projectId, { ...existing, metadata: { ...existing.metadata, ...metadata } });
        this.write();
        return true;
    }

    private read(): Map<string, RegisteredProject> {
        if (!fileExists(this.registryPath)) {
            return new Map();
        }

        const result = registryFileSchema.safeParse(readJsonFile(this.registryPath));
        if (!result.success) {
            throw new ConfigError(`Invalid project registry:\n${formatIssues(result.error.issues)}`, {
                registryPath: this.registryPath,
                issues: result.error.issues,
            });
        }

        return new Map(Object.entries(result.data.projects));
    }

    private write(): void {
        const file: RegistryFile = {
            version: 1,
            projects: Object.fromEntries(this.projects),
        };
        writeJsonFile(this.registryPath, file);
    }
}
