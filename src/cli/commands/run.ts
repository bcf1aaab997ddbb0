/**
 * `deliverpilot run`: Run a feature or bugfix workflow for a project.
 *
 * Runs are dry by default: config, repository and contract are validated and
 * nothing else happens until `--execute` is given.
 *
 * Dependency direction: run.ts → commander, ora, bootstrap, workflow/request, cli/utils
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import ora from 'ora';
import { createToolContext } from '../../core/bootstrap.js';
import { parseWorkflowRequest } from '../../core/workflow/request.js';
import { AppError, errorMessage } from '../../core/errors.js';
import type { WorkflowRequest } from '../../core/workflow/types.js';
import { logger } from '../../utils/logger.js';
import { exitCodeFor, formatReport } from '../utils/report.js';

interface RunOptions {
    kind: string;
    contract?: string;
    execute?: boolean;
    codegen?: boolean;
    tests?: boolean;
    smoke?: boolean;
    changeRequest?: boolean;
    remediate?: boolean;
    push?: boolean;
    branch?: string;
    base?: string;
    title?: string;
    body?: string;
    commitMessage?: string;
    smokeTimeout?: string;
    healthPath?: string;
    json?: boolean;
}

export const runCommand = new Command('run')
    .description('Run a delivery workflow for a project')
    .argument('<projectId>', 'Registered or local project id')
    .option('-k, --kind <kind>', 'Workflow kind: feature or bugfix', 'feature')
    .option('-c, --contract <path>', 'Design contract, relative to the repository root')
    .option('-x, --execute', 'Actually run the steps (default is a dry run)')
    .option('--codegen', 'Generate code from the contract')
    .option('--tests', 'Run the test command')
    .option('--smoke', 'Run the smoke check')
    .option('--change-request', 'Commit, evaluate policy and open a change request')
    .option('--remediate', 'Ask for a fix when tests fail')
    .option('--push', 'Push the change-request branch')
    .option('--branch <name>', 'Change-request branch name')
    .option('--base <branch>', 'Change-request base branch')
    .option('--title <text>', 'Change-request title')
    .option('--body <text>', 'Change-request body')
    .option('--commit-message <text>', 'Commit message')
    .option('--smoke-timeout <ms>', 'Timeout for install and smoke, each')
    .option('--health-path <path>', 'Health path exported to the smoke command as HEALTH_PATH')
    .option('--json', 'Print the report as JSON')
    .action(async (projectId: string, options: RunOptions) => {
        let request: WorkflowRequest;
        try {
            request = parseWorkflowRequest({
                kind: options.kind,
                projectId,
                contractPath: options.contract,
                dryRun: !options.execute,
                runCodegen: options.codegen ?? false,
                runTests: options.tests ?? false,
                runSmoke: options.smoke ?? false,
                createChangeRequest: options.changeRequest ?? false,
                runRemediation: options.remediate ?? false,
                push: options.push ?? false,
                branchName: options.branch,
                base: options.base,
                title: options.title,
                body: options.body,
                commitMessage: options.commitMessage,
                smokeTimeoutMs: options.smokeTimeout !== undefined ? Number(options.smokeTimeout) : undefined,
                smokeHealthPath: options.healthPath,
            });
        } catch (err) {
            logger.error(err instanceof AppError ? err.message : `Invalid arguments: ${errorMessage(err)}`);
            process.exit(1);
        }

        const { coordinator } = createToolContext();
        const spinner = options.json ? null : ora(`Running ${request.kind} workflow for ${projectId}...`).start();
        const report = await coordinator.run(request);
        spinner?.stop();

        if (options.json) {
            console.log(JSON.stringify(report, null, 2));
        } else {
            console.log(formatReport(report));
        }

        process.exit(exitCodeFor(report));
    });
