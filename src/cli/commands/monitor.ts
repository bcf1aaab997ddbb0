/**
 * `deliverpilot monitor check`: Scan application logs for errors and warnings.
 *
 * Relative paths resolve against the current directory. Exits 1 when any
 * error-severity issue is found; warnings alone exit 0.
 *
 * Dependency direction: monitor.ts → commander, chalk, monitor/analyzer, utils/validation
 * Used by: cli/index.ts
 */

import { resolve } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_MAX_LINES, analyzeLogs } from '../../core/monitor/analyzer.js';
import { ValidationError, errorMessage } from '../../core/errors.js';
import { lineLimit } from '../../utils/validation.js';
import { logger } from '../../utils/logger.js';
import { formatMonitorIssue } from '../utils/report.js';

interface CheckOptions {
    maxLines: string;
    json?: boolean;
}

function parseMaxLines(value: string): number {
    const parsed = lineLimit.safeParse(value);
    if (!parsed.success) {
        throw new ValidationError(`Invalid --max-lines "${value}": ${parsed.error.issues[0]?.message ?? 'not a number'}`);
    }
    return parsed.data;
}

const checkCommand = new Command('check')
    .description('Scan log files for errors, exceptions, timeouts and warnings')
    .argument('<logs...>', 'Log files to scan')
    .option('-n, --max-lines <count>', 'Scan only the last N lines of each file', String(DEFAULT_MAX_LINES))
    .option('--json', 'Print the result as JSON')
    .action((logs: string[], options: CheckOptions) => {
        try {
            const maxLines = parseMaxLines(options.maxLines);
            const result = analyzeLogs(
                logs.map((log) => resolve(process.cwd(), log)),
                { maxLines },
            );

            if (options.json) {
                console.log(JSON.stringify(result, null, 2));
            } else {
                for (const issue of result.issues) {
                    console.log(`  ${formatMonitorIssue(issue)}`);
                }
                console.log(result.errorCount > 0 ? chalk.red(result.summary) : chalk.green(result.summary));
            }

            process.exit(result.errorCount > 0 ? 1 : 0);
        } catch (err) {
            logger.error(errorMessage(err));
            process.exit(1);
        }
    });

export const monitorCommand = new Command('monitor').description('Log monitoring').addCommand(checkCommand);
