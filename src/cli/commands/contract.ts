/**
 * `deliverpilot contract draft`: Write a design contract into a project.
 *
 * With `--idea` the contract agent drafts the whole document; otherwise it is
 * rendered from `--name`, `--summary`, `--problem` and `--story`. The file is
 * written to the project's working copy, by default at `contracts/<slug>.md`.
 *
 * Dependency direction: contract.ts → commander, ora, chalk, bootstrap, core/contracts, agents/factory, git
 * Used by: cli/index.ts
 */

import { Command, InvalidArgumentError } from 'commander';
import ora from 'ora';
import chalk from 'chalk';
import { createToolContext } from '../../core/bootstrap.js';
import { createContractFromFields, createContractFromIdea } from '../../core/contracts/contract.js';
import { createContractAgent } from '../../agents/factory.js';
import { GitClient } from '../../git/client.js';
import { ConfigError, ValidationError, errorMessage } from '../../core/errors.js';
import { logger } from '../../utils/logger.js';

interface DraftOptions {
    idea?: string;
    name?: string;
    summary?: string;
    problem?: string;
    story?: string;
    notes?: string;
    context: Record<string, string>;
    output?: string;
    force?: boolean;
}

function collectContext(entry: string, previous: Record<string, string>): Record<string, string> {
    const separator = entry.indexOf('=');
    const key = entry.slice(0, Math.max(separator, 0)).trim();
    if (separator < 0 || !key) {
        throw new InvalidArgumentError('Expected key=value.');
    }
    return { ...previous, [key]: entry.slice(separator + 1).trim() };
}

const draftCommand = new Command('draft')
    .description('Draft a design contract from an idea or from structured fields')
    .argument('<projectId>', 'Registered or local project id')
    .option('-i, --idea <text>', 'Feature idea for the contract agent to expand')
    .option('--name <text>', 'Feature name')
    .option('--summary <text>', 'One-paragraph summary')
    .option('--problem <text>', 'Problem statement')
    .option('--story <text>', 'User story')
    .option('--notes <text>', 'Extra notes')
    .option('--context <key=value>', 'Extra context for the agent (repeatable)', collectContext, {})
    .option('-o, --output <path>', 'Contract path, relative to the repository root')
    .option('-f, --force', 'Overwrite an existing contract')
    .action(async (projectId: string, options: DraftOptions) => {
        try {
            const { configProvider } = createToolContext();
            const config = await configProvider.load(projectId);
            const workingDirectory = await configProvider.resolveWorkingDirectory(projectId);
            if (!workingDirectory) {
                throw new ConfigError(`No working directory for project "${projectId}"`, { projectId });
            }

            const vcs = new GitClient(workingDirectory);
            const writeOptions = { path: options.output, force: options.force ?? false };
            let contractPath: string;

            if (options.idea !== undefined) {
                const agent = createContractAgent(config, workingDirectory);
                const spinner = ora(`Drafting contract for ${projectId}...`).start();
                try {
                    contractPath = await createContractFromIdea(
                        vcs,
                        agent,
                        { idea: options.idea, config, context: options.context },
                        writeOptions,
                    );
                } finally {
                    spinner.stop();
                }
            } else {
                const { name, summary, problem, story } = options;
                if (!name || !summary || !problem || !story) {
                    throw new ValidationError('Give --idea, or all of --name, --summary, --problem and --story');
                }
                contractPath = await createContractFromFields(
                    vcs,
                    { name, summary, problem, userStory: story, notes: options.notes },
                    writeOptions,
                );
            }

            console.log(chalk.gray(`Next: deliverpilot run ${projectId} --contract ${contractPath}`));
        } catch (err) {
            logger.error(errorMessage(err));
            process.exit(1);
        }
    });

export const contractCommand = new Command('contract').description('Design contracts').addCommand(draftCommand);
