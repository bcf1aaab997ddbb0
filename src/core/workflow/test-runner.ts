/**
 * Test runner: executes the project's test command and classifies the result.
 *
 * Exit 0 is `passed`, any other exit is `failed`. A timeout or a command
 * that could not be started is `error`. Output is captured in every case.
 *
 * Dependency direction: test-runner.ts → workflow/exec, config/stacks, core/errors, utils
 * Used by: coordinator
 */

import type { StackProfile } from '../config/stacks.js';
import { errorMessage } from '../errors.js';
import { logger } from '../../utils/logger.js';
import { execCommand, type CommandExecutor } from './exec.js';
import { createOutcome, errorOutcome } from './outcome.js';
import { StepStatus, type StepOutcome } from './types.js';

export const DEFAULT_TEST_TIMEOUT_MS = 120_000;

export interface TestRunOptions {
    readonly workingDirectory: string;
    /** Falls back to the profile's conventional command. */
    readonly command?: string;
    readonly profile: StackProfile;
    readonly timeoutMs?: number;
    readonly exec?: CommandExecutor;
}

export function resolveTestCommand(profile: StackProfile, command?: string): string {
    return command?.trim() || profile.defaultTestCommand;
}

/**
 * Run the project's test suite. Never throws.
 */
export async function runTests(options: TestRunOptions): Promise<StepOutcome> {
    const command = resolveTestCommand(options.profile, options.command);
    const timeoutMs = options.timeoutMs ?? DEFAULT_TEST_TIMEOUT_MS;
    const exec = options.exec ?? execCommand;

    logger.info(`Running tests: ${command}`);

    try {
        const result = await exec(command, { cwd: options.workingDirectory, timeoutMs });

        if (result.timedOut) {
            const detail = `Test command timed out after ${timeoutMs}ms`;
            logger.warn(detail);
            return createOutcome({
                status: StepStatus.Error,
                command,
                exitCode: result.exitCode,
                stdout: result.stdout,
                stderr: result.stderr,
                durationMs: result.durationMs,
                detail,
            });
        }

        const passed = result.exitCode === 0;
        if (passed) {
            logger.success('Tests passed');
        } else {
            logger.warn(`Tests failed (exit code: ${result.exitCode ?? 'none'})`);
        }

        return createOutcome({
            status: passed ? StepStatus.Passed : StepStatus.Failed,
            command,
            exitCode: result.exitCode,
            stdout: result.stdout,
            stderr: result.stderr,
            durationMs: result.durationMs,
        });
    } catch (err) {
        const message = errorMessage(err);
        logger.error(`Failed to run tests: ${message}`);
        return errorOutcome(command, message);
    }
}
