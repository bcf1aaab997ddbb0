/**
 * Change-request step with its policy precondition.
 *
 * Sequence: confirm the working directory is a repository, check out the
 * branch, stage everything, evaluate the staged diff against policy, commit,
 * optionally push, publish. Policy violations and policy faults are recorded
 * but do not stop the change request. VCS and publisher failures end the
 * step with an `error` outcome.
 *
 * Dependency direction: change-request-step.ts → policy/evaluator, git, config/types, core/errors
 * Used by: coordinator
 */

import { basename, extname } from 'node:path';
import type { ProjectConfig } from '../config/types.js';
import { evaluatePolicy, resolvePolicyRules, type PolicyViolation } from '../policy/evaluator.js';
import { GitClient } from '../../git/client.js';
import type { ChangeRequestPublisher, VersionControl } from '../../git/types.js';
import { AppError, GitError, PolicyError, errorMessage } from '../errors.js';
import { logger } from '../../utils/logger.js';
import { createOutcome, errorOutcome } from './outcome.js';
import { StepStatus, type ChangeRequestSummary, type CheckResult, type StepOutcome, type WorkflowRequest } from './types.js';

export const POLICY_COMMAND = 'policy:staged-diff';

export interface ChangeRequestStepOptions {
    readonly vcs: VersionControl;
    readonly publisher: ChangeRequestPublisher;
    readonly config: ProjectConfig;
    readonly request: WorkflowRequest;
    readonly workingDirectory: string;
    /** Written files from codegen, listed in the default body. */
    readonly generatedFiles?: readonly string[];
}

export interface ChangeRequestStepResult {
    readonly policy: StepOutcome;
    readonly governance: CheckResult;
    readonly changeRequest: StepOutcome;
    readonly summary: ChangeRequestSummary | null;
    readonly errors: readonly string[];
}

export interface ChangeRequestMetadata {
    readonly title: string;
    readonly branch: string;
    readonly base: string;
    readonly commitMessage: string;
    readonly body: string;
}

/** Fill in whatever the request left out. */
export function resolveChangeRequestMetadata(
    request: WorkflowRequest,
    config: ProjectConfig,
    generatedFiles: readonly string[] = [],
): ChangeRequestMetadata {
    const subject = request.contractPath
        ? basename(request.contractPath, extname(request.contractPath))
        : request.kind;
    const title = request.title ?? `${request.kind}: ${subject}`;

    const body =
        request.body ??
        [
            `Automated ${request.kind} change for ${config.name}.`,
            ...(request.contractPath ? ['', `Contract: ${request.contractPath}`] : []),
            ...(generatedFiles.length > 0 ? ['', 'Files:', ...generatedFiles.map((f) => `- ${f}`)] : []),
        ].join('\n');

    return {
        title,
        branch: request.branchName ?? GitClient.toBranchName(config.workflow.branchPrefix, subject),
        base: request.base ?? config.repository.baseBranch,
        commitMessage: request.commitMessage ?? title,
        body,
    };
}

function describeViolations(violations: readonly PolicyViolation[]): string {
    return violations
        .map((v) => `[${v.severity}] ${v.ruleName}${v.filePath ? ` ${v.filePath}` : ''}: ${v.message}`)
        .join('\n');
}

interface PolicyRun {
    readonly outcome: StepOutcome;
    readonly passed: boolean;
    readonly diff: string | null;
    readonly error?: string;
}

async function evaluateStagedPolicy(vcs: VersionControl, config: ProjectConfig): Promise<PolicyRun> {
    const startedAt = Date.now();

    let diff: string;
    try {
        diff = await vcs.getDiff({ staged: true });
    } catch (err) {
        const detail = `Policy check could not read the staged diff: ${errorMessage(err)}`;
        return { outcome: errorOutcome(POLICY_COMMAND, detail, Date.now() - startedAt), passed: false, diff: null, error: detail };
    }

    try {
        const evaluation = evaluatePolicy(diff, resolvePolicyRules(config.policy), config.language);
        for (const violation of evaluation.violations) {
            const log = violation.severity === 'error' ? logger.warn : logger.info;
            log(`Policy ${violation.severity}: ${violation.message}`);
        }

        return {
            outcome: createOutcome({
                status: evaluation.ok ? StepStatus.Passed : StepStatus.Failed,
                command: POLICY_COMMAND,
                exitCode: null,
                stdout: describeViolations(evaluation.violations),
                stderr: '',
                durationMs: Date.now() - startedAt,
                violations: evaluation.violations,
            }),
            passed: evaluation.ok,
            diff,
        };
    } catch (err) {
        const failure =
            err instanceof AppError ? err : new PolicyError(`Policy evaluation failed: ${errorMessage(err)}`);
        return {
            outcome: errorOutcome(POLICY_COMMAND, failure.message, Date.now() - startedAt),
            passed: false,
            diff,
            error: failure.message,
        };
    }
}

/**
 * Run the change-request step. Never throws.
 */
export async function runChangeRequest(options: ChangeRequestStepOptions): Promise<ChangeRequestStepResult> {
    const { vcs, publisher, config, request } = options;
    const meta = resolveChangeRequestMetadata(request, config, options.generatedFiles);
    const command = `change_request:${publisher.name}`;
    const errors: string[] = [];
    const startedAt = Date.now();

    let prepared = true;
    let prepareError = '';
    try {
        if (!(await vcs.isRepo())) {
            throw new GitError(`${options.workingDirectory} is not a git repository`, { branch: meta.branch });
        }
        await vcs.checkoutBranch(meta.branch);
        await vcs.stageAll();
    } catch (err) {
        prepared = false;
        prepareError = `Change request preparation failed: ${errorMessage(err)}`;
        errors.push(prepareError);
    }

    const policy = await evaluateStagedPolicy(vcs, config);
    if (policy.error) errors.push(policy.error);
    const governance: CheckResult = { ran: true, passed: policy.passed };

    if (!prepared) {
        return {
            policy: policy.outcome,
            governance,
            changeRequest: errorOutcome(command, prepareError, Date.now() - startedAt),
            summary: null,
            errors,
        };
    }

    try {
        if (policy.diff !== null && policy.diff.trim() === '') {
            throw new GitError('No staged changes to commit', { branch: meta.branch });
        }

        const commit = await vcs.commit(meta.commitMessage);
        if (request.push) {
            await vcs.push(meta.branch, config.repository.remote);
        }

        const result = await publisher.create({
            workingDirectory: options.workingDirectory,
            branch: meta.branch,
            base: meta.base,
            title: meta.title,
            body: meta.body,
        });

        const summary: ChangeRequestSummary = Object.freeze({
            ...result,
            pushed: request.push,
            commit,
        });

        return {
            policy: policy.outcome,
            governance,
            changeRequest: createOutcome({
                status: StepStatus.Passed,
                command,
                exitCode: null,
                stdout: result.url ?? `${meta.branch} -> ${meta.base}`,
                stderr: '',
                durationMs: Date.now() - startedAt,
            }),
            summary,
            errors,
        };
    } catch (err) {
        const detail = `Change request failed: ${errorMessage(err)}`;
        logger.error(detail);
        errors.push(detail);
        return {
            policy: policy.outcome,
            governance,
            changeRequest: errorOutcome(command, detail, Date.now() - startedAt),
            summary: null,
            errors,
        };
    }
}
