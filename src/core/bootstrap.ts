/**
 * Wires the production collaborators into a WorkflowCoordinator.
 *
 * The tool home (registry, cached clones, local projects) defaults to the
 * user's home directory and can be moved with DELIVERPILOT_HOME.
 *
 * Dependency direction: bootstrap.ts → config, git, agents, workflow/coordinator
 * Used by: CLI commands, library callers
 */

import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { CONFIG_DIR_NAME, PROJECTS_DIR_NAME } from './config/defaults.js';
import { FileConfigProvider } from './config/provider.js';
import { ProjectRegistry } from './config/registry.js';
import { RepositoryCache, type CloneFn } from '../git/repository-cache.js';
import { createCodegenAgent, createRemediationAgent } from '../agents/factory.js';
import { WorkflowCoordinator } from './workflow/coordinator.js';
import type { CommandExecutor } from './workflow/exec.js';

export interface ToolContextOptions {
    readonly homeDir?: string;
    readonly projectsDir?: string;
    readonly clone?: CloneFn;
    readonly exec?: CommandExecutor;
}

export interface ToolContext {
    readonly homeDir: string;
    readonly registry: ProjectRegistry;
    readonly repositories: RepositoryCache;
    readonly configProvider: FileConfigProvider;
    readonly coordinator: WorkflowCoordinator;
}

export function resolveHomeDir(env: NodeJS.ProcessEnv = process.env): string {
    return resolve(env['DELIVERPILOT_HOME'] ?? homedir());
}

export function createToolContext(options: ToolContextOptions = {}): ToolContext {
    const homeDir = options.homeDir ?? resolveHomeDir();
    const registry = new ProjectRegistry(homeDir);
    const repositories = new RepositoryCache(homeDir, registry, options.clone);
    const configProvider = new FileConfigProvider(
        options.projectsDir ?? join(homeDir, CONFIG_DIR_NAME, PROJECTS_DIR_NAME),
        repositories,
    );

    const coordinator = new WorkflowCoordinator({
        configProvider,
        createCodeGenerator: createCodegenAgent,
        createFixSuggester: createRemediationAgent,
        exec: options.exec,
    });

    return { homeDir, registry, repositories, configProvider, coordinator };
}
