/**
 * `deliverpilot project`: Manage the project registry.
 *
 * Dependency direction: project.ts → commander, chalk, bootstrap
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createToolContext } from '../../core/bootstrap.js';
import { errorMessage } from '../../core/errors.js';
import { logger } from '../../utils/logger.js';

const registerCommand = new Command('register')
    .description('Register a project backed by a remote repository')
    .argument('<projectId>', 'Project id')
    .argument('<repoUrl>', 'Repository URL (https, ssh or file)')
    .action((projectId: string, repoUrl: string) => {
        try {
            const { registry } = createToolContext();
            const entry = registry.register(projectId, repoUrl);
            logger.success(`Registered ${entry.projectId} → ${entry.repoUrl}`);
        } catch (err) {
            logger.error(errorMessage(err));
            process.exit(1);
        }
    });

const listCommand = new Command('list')
    .description('List registered projects')
    .action(() => {
        const { registry } = createToolContext();
        const projects = registry.list();

        if (projects.length === 0) {
            logger.info('No projects registered.');
            return;
        }

        for (const project of projects) {
            console.log(`  ${chalk.bold(project.projectId)}  ${project.repoUrl}  ${chalk.gray(project.registeredAt)}`);
        }
    });

const removeCommand = new Command('remove')
    .description('Remove a project from the registry')
    .argument('<projectId>', 'Project id')
    .option('--purge', 'Delete the cached clone as well')
    .action(async (projectId: string, options: { purge?: boolean }) => {
        const { registry, repositories } = createToolContext();

        if (!registry.unregister(projectId)) {
            logger.error(`Project "${projectId}" is not registered`);
            process.exit(1);
        }

        await repositories.invalidate(projectId, options.purge ?? false);
        logger.success(`Removed ${projectId}${options.purge ? ' and its clone' : ''}`);
    });

export const projectCommand = new Command('project')
    .description('Register, list and remove projects')
    .addCommand(registerCommand)
    .addCommand(listCommand)
    .addCommand(removeCommand);
