/**
 * Workflow data model: requests, step outcomes and the final report.
 *
 * Everything here is created fresh inside one coordinator run and frozen
 * before it is handed back to the caller.
 *
 * Dependency direction: types.ts → policy/evaluator (types only)
 * Used by: workflow runners, coordinator, CLI
 */

import type { PolicyViolation } from '../policy/evaluator.js';

export const WorkflowKind = {
    Feature: 'feature',
    Bugfix: 'bugfix',
} as const;

export type WorkflowKind = (typeof WorkflowKind)[keyof typeof WorkflowKind];

/** Terminal status of a completed, non-dry-run workflow. */
export const WorkflowStatus = {
    Success: 'success',
    FailedTests: 'failed_tests',
    FailedSmoke: 'failed_smoke',
    FailedGovernance: 'failed_governance',
    Error: 'error',
} as const;

export type WorkflowStatus = (typeof WorkflowStatus)[keyof typeof WorkflowStatus];

export const StepStatus = {
    Skipped: 'skipped',
    Passed: 'passed',
    Failed: 'failed',
    Error: 'error',
    Timeout: 'timeout',
    InstallFailed: 'install_failed',
} as const;

export type StepStatus = (typeof StepStatus)[keyof typeof StepStatus];

/** Outer status of a run: whether it was accepted at all. */
export type RunStatus = 'accepted' | 'rejected' | 'error';

/** Step names used as outcome keys and step log tokens. */
export const StepName = {
    ConfigLoaded: 'config_loaded',
    RepoResolved: 'repo_resolved',
    ContractValidated: 'contract_validated',
    DryRun: 'dry_run',
    Codegen: 'codegen',
    Tests: 'tests',
    Remediation: 'remediation',
    Policy: 'policy',
    ChangeRequest: 'change_request',
    Smoke: 'smoke',
    StatusResolved: 'status_resolved',
} as const;

export type StepName = (typeof StepName)[keyof typeof StepName];

export interface WorkflowRequest {
    readonly kind: WorkflowKind;
    readonly projectId: string;
    /** Path of the design contract, relative to the project's working directory. */
    readonly contractPath?: string;
    readonly dryRun: boolean;
    readonly runCodegen: boolean;
    readonly runTests: boolean;
    readonly createChangeRequest: boolean;
    readonly runSmoke: boolean;
    readonly runRemediation: boolean;
    readonly branchName?: string;
    readonly commitMessage?: string;
    readonly base?: string;
    readonly title?: string;
    readonly body?: string;
    readonly push: boolean;
    readonly smokeTimeoutMs: number;
    readonly smokeHealthPath: string;
}

export interface StepOutcome {
    readonly status: StepStatus;
    /** The command line, or an identifier for steps that run no command. */
    readonly command: string;
    readonly exitCode: number | null;
    readonly stdout: string;
    readonly stderr: string;
    readonly durationMs: number;
    /** Error text for `error` outcomes. */
    readonly detail?: string;
    readonly violations?: readonly PolicyViolation[];
}

/** Whether a check ran and, if so, whether it passed. */
export interface CheckResult {
    readonly ran: boolean;
    readonly passed: boolean | null;
}

export interface CodegenResult {
    readonly files: readonly string[];
    readonly model: string;
}

export interface FixSuggestion {
    readonly patches: readonly FilePatch[];
    readonly retryCommand: string | null;
    readonly notes: string | null;
}

export interface FilePatch {
    readonly path: string;
    readonly diff: string;
}

export type RemediationResult =
    | { readonly success: true; readonly suggestion: FixSuggestion }
    | { readonly success: false; readonly error: string };

export interface ChangeRequestSummary {
    readonly provider: string;
    readonly url: string | null;
    readonly number: number | null;
    readonly branch: string;
    readonly base: string;
    readonly title: string;
    readonly pushed: boolean;
    readonly commit: string | null;
}

export interface WorkflowReport {
    readonly workflowId: string;
    readonly kind: WorkflowKind;
    readonly projectId: string;
    readonly status: RunStatus;
    readonly message: string;
    readonly dryRun: boolean;
    /** Every step attempted, in order, including "<step> (skipped)" tokens. */
    readonly steps: readonly string[];
    readonly outcomes: Readonly<Partial<Record<StepName, StepOutcome>>>;
    readonly workflowStatus: WorkflowStatus | null;
    readonly testsPassed: boolean | null;
    readonly smokePassed: boolean | null;
    readonly governanceOk: boolean | null;
    readonly codegen: CodegenResult | null;
    readonly remediation: RemediationResult | null;
    readonly changeRequest: ChangeRequestSummary | null;
    /** Non-fatal errors recorded along the way. */
    readonly errors: readonly string[];
}
