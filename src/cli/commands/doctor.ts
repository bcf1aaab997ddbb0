/**
 * `deliverpilot doctor`: Health check for the local setup.
 *
 * Verifies the project config, the registry and the configured provider.
 *
 * Dependency direction: doctor.ts → commander, ora, chalk, config module, provider registry
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { configExists, loadProjectConfig } from '../../core/config/manager.js';
import { createToolContext } from '../../core/bootstrap.js';
import { validateAllProviders } from '../../providers/registry.js';
import type { ProjectConfig } from '../../core/config/types.js';
import { errorMessage } from '../../core/errors.js';
import { logger } from '../../utils/logger.js';

export const doctorCommand = new Command('doctor')
    .description('Check project setup and provider health')
    .action(async () => {
        const projectRoot = process.cwd();

        logger.header('deliverpilot — Health Check');

        if (!configExists(projectRoot)) {
            console.log(chalk.red('  ✘ No configuration file — run "deliverpilot init"'));
            process.exit(1);
        }
        console.log(chalk.green('  ✔ Configuration file found'));

        let config: ProjectConfig;
        try {
            config = loadProjectConfig(projectRoot);
        } catch (err) {
            console.log(chalk.red(`  ✘ ${errorMessage(err)}`));
            process.exit(1);
        }
        console.log(chalk.green(`  ✔ Configuration is valid (${config.name}, ${config.language})`));

        try {
            const { registry } = createToolContext();
            console.log(chalk.green(`  ✔ Registry readable (${registry.list().length} project(s))`));
        } catch (err) {
            console.log(chalk.red(`  ✘ ${errorMessage(err)}`));
        }

        console.log();
        logger.info('Checking provider connections...');

        const spinner = ora('Testing providers...').start();
        const results = await validateAllProviders(config.providers);
        spinner.stop();

        const active = config.llm.provider;
        for (const [name, healthy] of Object.entries(results)) {
            if (healthy) {
                console.log(chalk.green(`  ✔ ${name} — connected`));
            } else if (name === active) {
                console.log(chalk.red(`  ✘ ${name} — connection failed`));
            } else {
                console.log(chalk.gray(`  - ${name} — unavailable (not the configured provider)`));
            }
        }

        console.log();
        if (results[active]) {
            logger.success('All checks passed!');
        } else {
            logger.warn(`The configured provider "${active}" is not reachable. Codegen and remediation will fail.`);
            process.exit(1);
        }
    });
