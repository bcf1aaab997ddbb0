/**
 * StepOutcome constructors. Every outcome is frozen at creation.
 *
 * Dependency direction: outcome.ts → workflow/types
 * Used by: step runners, coordinator
 */

import { StepStatus, type StepOutcome } from './types.js';

export function createOutcome(fields: StepOutcome): StepOutcome {
    const { violations, ...rest } = fields;
    return Object.freeze(violations ? { ...rest, violations: Object.freeze([...violations]) } : rest);
}

export function skippedOutcome(command: string): StepOutcome {
    return createOutcome({
        status: StepStatus.Skipped,
        command,
        exitCode: null,
        stdout: '',
        stderr: '',
        durationMs: 0,
    });
}

export function errorOutcome(command: string, detail: string, durationMs = 0): StepOutcome {
    return createOutcome({
        status: StepStatus.Error,
        command,
        exitCode: null,
        stdout: '',
        stderr: detail,
        durationMs,
        detail,
    });
}
