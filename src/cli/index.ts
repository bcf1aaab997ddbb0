#!/usr/bin/env node

/**
 * CLI entry point: registers all commands with Commander.js.
 *
 * Dependency direction: cli/index.ts → commander, all command files
 * Used by: package.json bin entry ("deliverpilot" binary)
 */

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { runCommand } from './commands/run.js';
import { projectCommand } from './commands/project.js';
import { policyCommand } from './commands/policy.js';
import { doctorCommand } from './commands/doctor.js';
import { contractCommand } from './commands/contract.js';
import { monitorCommand } from './commands/monitor.js';
import { logger, parseLogLevel } from '../utils/logger.js';

const program = new Command();

program
    .name('deliverpilot')
    .description('Delivery workflow orchestrator: contracts, codegen, tests, smoke checks, policy gates and change requests')
    .version('0.1.0')
    .option('--log-level <level>', 'debug, info, warn, error or silent')
    .hook('preAction', (command) => {
        const { logLevel } = command.opts<{ logLevel?: string }>();
        const level = parseLogLevel(logLevel);
        if (level !== undefined) logger.setLogLevel(level);
    });

program.addCommand(initCommand);
program.addCommand(runCommand);
program.addCommand(projectCommand);
program.addCommand(policyCommand);
program.addCommand(contractCommand);
program.addCommand(monitorCommand);
program.addCommand(doctorCommand);

program.parse();
