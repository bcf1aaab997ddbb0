/**
 * Workflow status resolver.
 *
 * Pure: merges the optional checks into one terminal status. The first
 * matching rule wins, in severity order (tests, smoke, governance). A check
 * that did not run never contributes a failure, so a run with no checks
 * resolves to success.
 *
 * Dependency direction: status.ts → workflow/types
 * Used by: coordinator
 */

import { WorkflowStatus, type CheckResult } from './types.js';

export interface StatusInputs {
    readonly tests: CheckResult;
    readonly smoke: CheckResult;
    readonly governance: CheckResult;
    /** Governance only counts when a change request was requested. */
    readonly changeRequestRequested: boolean;
}

export const NOT_RUN: CheckResult = Object.freeze({ ran: false, passed: null });

function failed(check: CheckResult): boolean {
    return check.ran && check.passed !== true;
}

export function resolveWorkflowStatus(inputs: StatusInputs): WorkflowStatus {
    if (failed(inputs.tests)) return WorkflowStatus.FailedTests;
    if (failed(inputs.smoke)) return WorkflowStatus.FailedSmoke;
    if (inputs.changeRequestRequested && failed(inputs.governance)) {
        return WorkflowStatus.FailedGovernance;
    }
    return WorkflowStatus.Success;
}
