/**
 * Remediation runner: asks for a fix when the test step failed.
 *
 * Only a plain `failed` test outcome qualifies; `error` outcomes (timeouts,
 * commands that never started) are not remediated. Suggester failures come
 * back as `{ success: false }` and never throw.
 *
 * Dependency direction: remediation.ts → workflow/types, core/errors, utils
 * Used by: coordinator
 */

import { errorMessage } from '../errors.js';
import { logger } from '../../utils/logger.js';
import { StepStatus, type FixSuggestion, type RemediationResult, type StepOutcome, type WorkflowRequest } from './types.js';

/** What the fix-suggestion collaborator is told about a failed test run. */
export interface TestFailure {
    readonly command: string;
    readonly exitCode: number | null;
    readonly stdout: string;
    readonly stderr: string;
    readonly changedFiles: readonly string[];
}

export interface FixSuggester {
    suggest(failure: TestFailure): Promise<FixSuggestion>;
}

export function shouldRemediate(
    request: Pick<WorkflowRequest, 'runTests' | 'runRemediation'>,
    testOutcome: StepOutcome | undefined,
): boolean {
    return request.runTests && request.runRemediation && testOutcome?.status === StepStatus.Failed;
}

export function toTestFailure(outcome: StepOutcome, changedFiles: readonly string[] = []): TestFailure {
    return {
        command: outcome.command,
        exitCode: outcome.exitCode,
        stdout: outcome.stdout,
        stderr: outcome.stderr,
        changedFiles,
    };
}

export async function runRemediation(suggester: FixSuggester, failure: TestFailure): Promise<RemediationResult> {
    logger.info(`Requesting a fix for: ${failure.command}`);

    try {
        const suggestion = await suggester.suggest(failure);
        logger.success(
            `Fix suggested (${suggestion.patches.length} patch(es)${suggestion.retryCommand ? `, retry: ${suggestion.retryCommand}` : ''})`,
        );
        return { success: true, suggestion };
    } catch (err) {
        const message = errorMessage(err);
        logger.warn(`Remediation failed: ${message}`);
        return { success: false, error: message };
    }
}
