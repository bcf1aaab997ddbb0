/**
 * Smoke runner: optional install step followed by a lightweight check.
 *
 * The target is picked from the runtime config (backend first, then
 * frontend; only targets that define a smoke command qualify). Install and
 * smoke each get the full timeout. The health path is exported to both
 * commands as HEALTH_PATH.
 *
 * Dependency direction: smoke-runner.ts → workflow/exec, config/types, core/errors, utils
 * Used by: coordinator
 */

import { resolve } from 'node:path';
import type { RuntimeConfig } from '../config/types.js';
import { DEFAULT_SMOKE_HEALTH_PATH, DEFAULT_SMOKE_TIMEOUT_MS } from '../config/defaults.js';
import { errorMessage } from '../errors.js';
import { logger } from '../../utils/logger.js';
import { execCommand, type CommandExecutor, type CommandResult } from './exec.js';
import { createOutcome, errorOutcome } from './outcome.js';
import { StepStatus, type StepOutcome } from './types.js';

export interface SmokeTarget {
    readonly name: 'backend' | 'frontend';
    readonly directory: string;
    readonly installCommand?: string;
    readonly smokeCommand: string;
}

export interface SmokeRunOptions {
    readonly workingDirectory: string;
    readonly runtime: RuntimeConfig;
    readonly timeoutMs?: number;
    readonly healthPath?: string;
    readonly exec?: CommandExecutor;
}

/** Identifier used as the outcome command when no target qualifies. */
export const NO_SMOKE_TARGET = 'smoke:no-target';

export function selectRuntimeTarget(runtime: RuntimeConfig): SmokeTarget | null {
    for (const name of ['backend', 'frontend'] as const) {
        const target = runtime[name];
        if (target?.smokeCommand) {
            return {
                name,
                directory: target.directory,
                installCommand: target.installCommand,
                smokeCommand: target.smokeCommand,
            };
        }
    }
    return null;
}

function fromResult(status: StepStatus, command: string, result: CommandResult, detail?: string): StepOutcome {
    return createOutcome({
        status,
        command,
        exitCode: result.exitCode,
        stdout: result.stdout,
        stderr: result.stderr,
        durationMs: result.durationMs,
        ...(detail ? { detail } : {}),
    });
}

/**
 * Run the smoke check for the selected runtime target. Never throws.
 */
export async function runSmoke(options: SmokeRunOptions): Promise<StepOutcome> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_SMOKE_TIMEOUT_MS;
    const exec = options.exec ?? execCommand;

    const target = selectRuntimeTarget(options.runtime);
    if (!target) {
        return errorOutcome(NO_SMOKE_TARGET, 'No runtime target defines a smoke command');
    }

    const cwd = resolve(options.workingDirectory, target.directory);
    const env = { HEALTH_PATH: options.healthPath ?? DEFAULT_SMOKE_HEALTH_PATH };

    if (target.installCommand) {
        const command = target.installCommand;
        logger.info(`Installing ${target.name} dependencies: ${command}`);
        try {
            const result = await exec(command, { cwd, timeoutMs, env });
            if (result.timedOut) {
                return fromResult(StepStatus.Timeout, command, result, `Install timed out after ${timeoutMs}ms`);
            }
            if (result.exitCode !== 0) {
                logger.warn(`Install failed (exit code: ${result.exitCode ?? 'none'}); smoke check not run`);
                return fromResult(StepStatus.InstallFailed, command, result);
            }
        } catch (err) {
            return errorOutcome(command, errorMessage(err));
        }
    }

    const command = target.smokeCommand;
    logger.info(`Running ${target.name} smoke check: ${command}`);

    try {
        const result = await exec(command, { cwd, timeoutMs, env });
        if (result.timedOut) {
            logger.warn(`Smoke check timed out after ${timeoutMs}ms`);
            return fromResult(StepStatus.Timeout, command, result, `Smoke check timed out after ${timeoutMs}ms`);
        }

        const passed = result.exitCode === 0;
        if (passed) {
            logger.success('Smoke check passed');
        } else {
            logger.warn(`Smoke check failed (exit code: ${result.exitCode ?? 'none'})`);
        }
        return fromResult(passed ? StepStatus.Passed : StepStatus.Failed, command, result);
    } catch (err) {
        const message = errorMessage(err);
        logger.error(`Failed to run smoke check: ${message}`);
        return errorOutcome(command, message);
    }
}
