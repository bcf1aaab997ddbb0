/**
 * Workflow coordinator: sequences the steps of a feature or bugfix run and
 * assembles the report.
 *
 * Feature:
 *   config_loaded → repo_resolved → contract_validated → [dry_run → accepted]
 *   → codegen? → tests? → remediation? → policy + change_request? → smoke?
 *   → status_resolved → accepted
 *
 * Bugfix:
 *   config_loaded → repo_resolved → tests? → remediation? → status_resolved → accepted
 *
 * Missing config, repository or contract reject the run. A codegen failure
 * ends it with `error`. Everything after codegen is recorded and folded
 * into the status resolver; nothing escapes `run()`.
 *
 * Dependency direction: coordinator.ts → workflow runners, config/provider, git, utils
 * Used by: CLI run command, library callers
 */

import { resolve } from 'node:path';
import type { ConfigProvider } from '../config/provider.js';
import type { ProjectConfig } from '../config/types.js';
import { getStackProfile, type StackProfile } from '../config/stacks.js';
import { errorMessage } from '../errors.js';
import { GitClient } from '../../git/client.js';
import { createPublisher } from '../../git/change-request.js';
import type { ChangeRequestPublisher, VersionControl } from '../../git/types.js';
import { parseChangedFiles } from '../policy/diff-parser.js';
import { logger } from '../../utils/logger.js';
import { runChangeRequest } from './change-request-step.js';
import { runCodegen, type CodeGenerator } from './codegen.js';
import { execCommand, type CommandExecutor } from './exec.js';
import { createOutcome, errorOutcome, skippedOutcome } from './outcome.js';
import { runRemediation, shouldRemediate, toTestFailure, type FixSuggester } from './remediation.js';
import { runSmoke } from './smoke-runner.js';
import { NOT_RUN, resolveWorkflowStatus } from './status.js';
import { runTests } from './test-runner.js';
import {
    StepName,
    StepStatus,
    WorkflowKind,
    WorkflowStatus,
    type ChangeRequestSummary,
    type CheckResult,
    type CodegenResult,
    type RemediationResult,
    type RunStatus,
    type StepOutcome,
    type WorkflowReport,
    type WorkflowRequest,
} from './types.js';

export interface CoordinatorDependencies {
    readonly configProvider: ConfigProvider;
    readonly createCodeGenerator: (config: ProjectConfig, workingDirectory: string) => CodeGenerator;
    readonly createFixSuggester: (config: ProjectConfig, workingDirectory: string) => FixSuggester;
    readonly createVersionControl?: (workingDirectory: string) => VersionControl;
    readonly createPublisher?: (config: ProjectConfig) => ChangeRequestPublisher;
    readonly exec?: CommandExecutor;
    readonly now?: () => Date;
}

interface ProjectContext {
    readonly config: ProjectConfig;
    readonly workingDirectory: string;
    readonly vcs: VersionControl;
    readonly profile: StackProfile;
}

/** `<projectId>-<UTC timestamp>`, e.g. `shop-20250102T030405006Z`. */
export function createWorkflowId(projectId: string, at: Date): string {
    return `${projectId}-${at.toISOString().replace(/[-:.]/g, '')}`;
}

function summarize(check: CheckResult): boolean | null {
    return check.ran ? check.passed : null;
}

/** Mutable bookkeeping for one run; frozen into a WorkflowReport at the end. */
class RunState {
    readonly workflowId: string;
    readonly request: WorkflowRequest;
    readonly steps: string[] = [];
    readonly outcomes: Partial<Record<StepName, StepOutcome>> = {};
    readonly errors: string[] = [];
    tests: CheckResult = NOT_RUN;
    smoke: CheckResult = NOT_RUN;
    governance: CheckResult = NOT_RUN;
    codegen: CodegenResult | null = null;
    remediation: RemediationResult | null = null;
    changeRequest: ChangeRequestSummary | null = null;

    constructor(workflowId: string, request: WorkflowRequest) {
        this.workflowId = workflowId;
        this.request = request;
    }

    mark(step: StepName, outcome?: StepOutcome): void {
        this.steps.push(step);
        if (outcome) this.outcomes[step] = outcome;
        logger.step(this.workflowId, step);
    }

    skip(step: StepName): void {
        const token = `${step} (skipped)`;
        this.steps.push(token);
        this.outcomes[step] = skippedOutcome(step);
        logger.step(this.workflowId, token);
    }

    finish(
        status: RunStatus,
        message: string,
        workflowStatus: WorkflowStatus | null,
        dryRun = false,
    ): WorkflowReport {
        return Object.freeze({
            workflowId: this.workflowId,
            kind: this.request.kind,
            projectId: this.request.projectId,
            status,
            message,
            dryRun,
            steps: Object.freeze([...this.steps]),
            outcomes: Object.freeze({ ...this.outcomes }),
            workflowStatus,
            testsPassed: summarize(this.tests),
            smokePassed: summarize(this.smoke),
            governanceOk: summarize(this.governance),
            codegen: this.codegen,
            remediation: this.remediation,
            changeRequest: this.changeRequest,
            errors: Object.freeze([...this.errors]),
        });
    }
}

type Prepared = { readonly ok: true; readonly project: ProjectContext } | { readonly ok: false; readonly report: WorkflowReport };

export class WorkflowCoordinator {
    private readonly configProvider: ConfigProvider;
    private readonly createCodeGenerator: CoordinatorDependencies['createCodeGenerator'];
    private readonly createFixSuggester: CoordinatorDependencies['createFixSuggester'];
    private readonly createVersionControl: (workingDirectory: string) => VersionControl;
    private readonly createPublisher: (config: ProjectConfig) => ChangeRequestPublisher;
    private readonly exec: CommandExecutor;
    private readonly now: () => Date;

    constructor(deps: CoordinatorDependencies) {
        this.configProvider = deps.configProvider;
        this.createCodeGenerator = deps.createCodeGenerator;
        this.createFixSuggester = deps.createFixSuggester;
        this.createVersionControl = deps.createVersionControl ?? ((dir) => new GitClient(dir));
        this.createPublisher = deps.createPublisher ?? ((config) => createPublisher(config));
        this.exec = deps.exec ?? execCommand;
        this.now = deps.now ?? (() => new Date());
    }

    /**
     * Run one workflow. Always resolves with a frozen report.
     */
    async run(request: WorkflowRequest): Promise<WorkflowReport> {
        const state = new RunState(createWorkflowId(request.projectId, this.now()), request);
        logger.header(`${request.kind} workflow ${state.workflowId}`);

        try {
            return request.kind === WorkflowKind.Bugfix
                ? await this.runBugfix(state)
                : await this.runFeature(state);
        } catch (err) {
            const message = `Workflow failed unexpectedly: ${errorMessage(err)}`;
            logger.error(message);
            state.errors.push(message);
            return state.finish('error', message, WorkflowStatus.Error);
        }
    }

    private async runFeature(state: RunState): Promise<WorkflowReport> {
        const { request } = state;

        const prepared = await this.prepare(state);
        if (!prepared.ok) return prepared.report;
        const { config, workingDirectory, vcs } = prepared.project;

        const contractPath = request.contractPath;
        if (!contractPath) {
            return this.reject(state, 'A contract path is required for feature workflows');
        }
        if (!(await vcs.exists(contractPath))) {
            return this.reject(state, `Contract not found: ${contractPath}`);
        }
        state.mark(StepName.ContractValidated);

        if (request.dryRun) {
            state.mark(StepName.DryRun);
            return state.finish('accepted', 'Validated (dry run); no steps were executed', null, true);
        }

        if (request.runCodegen) {
            const startedAt = Date.now();
            try {
                const generator = this.createCodeGenerator(config, workingDirectory);
                state.codegen = await runCodegen(vcs, generator, contractPath, config);
                state.mark(
                    StepName.Codegen,
                    createOutcome({
                        status: StepStatus.Passed,
                        command: `codegen:${state.codegen.model}`,
                        exitCode: null,
                        stdout: state.codegen.files.join('\n'),
                        stderr: '',
                        durationMs: Date.now() - startedAt,
                    }),
                );
            } catch (err) {
                const message = `Code generation failed: ${errorMessage(err)}`;
                logger.error(message);
                state.mark(StepName.Codegen, errorOutcome('codegen', message, Date.now() - startedAt));
                state.errors.push(message);
                return state.finish('error', message, WorkflowStatus.Error);
            }
        } else {
            state.skip(StepName.Codegen);
        }

        await this.testAndRemediate(state, prepared.project);

        if (request.createChangeRequest) {
            await this.changeRequest(state, prepared.project);
        } else {
            state.skip(StepName.Policy);
            state.skip(StepName.ChangeRequest);
        }

        if (request.runSmoke) {
            const outcome = await runSmoke({
                workingDirectory,
                runtime: config.runtime,
                timeoutMs: request.smokeTimeoutMs,
                healthPath: request.smokeHealthPath,
                exec: this.exec,
            });
            state.smoke = { ran: true, passed: outcome.status === StepStatus.Passed };
            if (outcome.detail) state.errors.push(`Smoke: ${outcome.detail}`);
            state.mark(StepName.Smoke, outcome);
        } else {
            state.skip(StepName.Smoke);
        }

        return this.resolve(state);
    }

    private async runBugfix(state: RunState): Promise<WorkflowReport> {
        const prepared = await this.prepare(state);
        if (!prepared.ok) return prepared.report;

        await this.testAndRemediate(state, prepared.project);
        return this.resolve(state);
    }

    /** Load config and resolve the working copy, or reject. */
    private async prepare(state: RunState): Promise<Prepared> {
        const { projectId } = state.request;

        let config: ProjectConfig;
        try {
            config = await this.configProvider.load(projectId);
        } catch (err) {
            return { ok: false, report: this.reject(state, errorMessage(err)) };
        }
        state.mark(StepName.ConfigLoaded);

        let workingDirectory: string | null;
        try {
            workingDirectory = await this.configProvider.resolveWorkingDirectory(projectId);
        } catch (err) {
            return { ok: false, report: this.reject(state, errorMessage(err)) };
        }
        if (!workingDirectory) {
            return {
                ok: false,
                report: this.reject(state, `Repository for project "${projectId}" could not be resolved`),
            };
        }
        state.mark(StepName.RepoResolved);

        return {
            ok: true,
            project: {
                config,
                workingDirectory,
                vcs: this.createVersionControl(workingDirectory),
                profile: getStackProfile(config.language),
            },
        };
    }

    private reject(state: RunState, message: string): WorkflowReport {
        logger.warn(`Workflow rejected: ${message}`);
        return state.finish('rejected', message, null);
    }

    private async testAndRemediate(state: RunState, project: ProjectContext): Promise<void> {
        const { request } = state;
        const { config, workingDirectory } = project;

        let testOutcome: StepOutcome | undefined;
        if (request.runTests) {
            const backend = config.runtime.backend;
            testOutcome = await runTests({
                workingDirectory: backend?.testCommand ? resolve(workingDirectory, backend.directory) : workingDirectory,
                command: backend?.testCommand,
                profile: project.profile,
                timeoutMs: config.workflow.testTimeoutMs,
                exec: this.exec,
            });
            state.tests = { ran: true, passed: testOutcome.status === StepStatus.Passed };
            if (testOutcome.detail) state.errors.push(`Tests: ${testOutcome.detail}`);
            state.mark(StepName.Tests, testOutcome);
        } else {
            state.skip(StepName.Tests);
        }

        if (!testOutcome || !shouldRemediate(request, testOutcome)) {
            state.skip(StepName.Remediation);
            return;
        }

        const startedAt = Date.now();
        const changedFiles = await this.changedFiles(project.vcs);
        let result: RemediationResult;
        try {
            result = await runRemediation(
                this.createFixSuggester(config, workingDirectory),
                toTestFailure(testOutcome, changedFiles),
            );
        } catch (err) {
            result = { success: false, error: errorMessage(err) };
        }
        state.remediation = result;

        if (result.success) {
            const { suggestion } = result;
            state.mark(
                StepName.Remediation,
                createOutcome({
                    status: StepStatus.Passed,
                    command: 'remediation',
                    exitCode: null,
                    stdout: [
                        `${suggestion.patches.length} patch(es)`,
                        ...(suggestion.retryCommand ? [`retry: ${suggestion.retryCommand}`] : []),
                        ...(suggestion.notes ? [suggestion.notes] : []),
                    ].join('\n'),
                    stderr: '',
                    durationMs: Date.now() - startedAt,
                }),
            );
        } else {
            state.errors.push(`Remediation: ${result.error}`);
            state.mark(StepName.Remediation, errorOutcome('remediation', result.error, Date.now() - startedAt));
        }
    }

    private async changeRequest(state: RunState, project: ProjectContext): Promise<void> {
        let result: Awaited<ReturnType<typeof runChangeRequest>>;
        try {
            result = await runChangeRequest({
                vcs: project.vcs,
                publisher: this.createPublisher(project.config),
                config: project.config,
                request: state.request,
                workingDirectory: project.workingDirectory,
                generatedFiles: state.codegen?.files,
            });
        } catch (err) {
            const message = `Change request failed: ${errorMessage(err)}`;
            state.errors.push(message);
            state.skip(StepName.Policy);
            state.mark(StepName.ChangeRequest, errorOutcome('change_request', message));
            return;
        }

        state.governance = result.governance;
        state.changeRequest = result.summary;
        state.errors.push(...result.errors);
        state.mark(StepName.Policy, result.policy);
        state.mark(StepName.ChangeRequest, result.changeRequest);
    }

    /** Files changed in the working tree, for remediation context. */
    private async changedFiles(vcs: VersionControl): Promise<string[]> {
        try {
            return parseChangedFiles(await vcs.getDiff());
        } catch (err) {
            logger.debug(`Could not list changed files: ${errorMessage(err)}`);
            return [];
        }
    }

    private resolve(state: RunState): WorkflowReport {
        const workflowStatus = resolveWorkflowStatus({
            tests: state.tests,
            smoke: state.smoke,
            governance: state.governance,
            changeRequestRequested: state.request.createChangeRequest && state.request.kind === WorkflowKind.Feature,
        });
        state.mark(StepName.StatusResolved);
        logger.info(`Workflow ${state.workflowId} resolved: ${workflowStatus}`);

        return state.finish('accepted', `Workflow completed with status ${workflowStatus}`, workflowStatus);
    }
}
