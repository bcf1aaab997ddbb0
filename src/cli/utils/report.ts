/**
 * Terminal rendering of workflow reports, policy results and log issues.
 *
 * Dependency direction: report.ts → chalk, workflow/types, policy/evaluator, monitor/analyzer
 * Used by: run, policy and monitor commands
 */

import chalk from 'chalk';
import type { MonitorIssue } from '../../core/monitor/analyzer.js';
import type { PolicyViolation } from '../../core/policy/evaluator.js';
import type { StepOutcome, StepStatus, WorkflowReport } from '../../core/workflow/types.js';

const STATUS_COLORS: Record<StepStatus, (text: string) => string> = {
    skipped: chalk.gray,
    passed: chalk.green,
    failed: chalk.red,
    error: chalk.red,
    timeout: chalk.yellow,
    install_failed: chalk.red,
};

function check(label: string, value: boolean | null): string {
    if (value === null) return chalk.gray(`${label}: not run`);
    return value ? chalk.green(`${label}: passed`) : chalk.red(`${label}: failed`);
}

function severityTag(severity: 'error' | 'warning'): string {
    return severity === 'error' ? chalk.red('error  ') : chalk.yellow('warning');
}

export function formatViolation(violation: PolicyViolation): string {
    const tag = severityTag(violation.severity);
    const where = violation.filePath ? chalk.gray(` (${violation.filePath})`) : '';
    return `${tag} ${violation.ruleName}: ${violation.message}${where}`;
}

/** One log issue: severity, code, `file:line`, then the offending line. */
export function formatMonitorIssue(issue: MonitorIssue): string {
    const location = issue.lineNumber !== null ? `${issue.filePath}:${issue.lineNumber}` : issue.filePath;
    return `${severityTag(issue.severity)} ${issue.code} ${chalk.gray(location)}: ${issue.line || issue.message}`;
}

function formatOutcome(name: string, outcome: StepOutcome): string {
    const color = STATUS_COLORS[outcome.status];
    const exit = outcome.exitCode !== null ? chalk.gray(` exit=${outcome.exitCode}`) : '';
    const duration = outcome.durationMs > 0 ? chalk.gray(` ${outcome.durationMs}ms`) : '';
    return `  ${name.padEnd(16)} ${color(outcome.status)}${exit}${duration}`;
}

/**
 * Human-readable summary of a report, one item per line.
 */
export function formatReport(report: WorkflowReport): string {
    const lines: string[] = [];
    const headline =
        report.status === 'accepted' ? chalk.green(report.status) : chalk.red(report.status);

    lines.push(chalk.bold(`Workflow ${report.workflowId}`));
    lines.push(`  ${report.kind} for ${report.projectId}: ${headline}, ${report.message}`);

    if (report.workflowStatus) {
        const color = report.workflowStatus === 'success' ? chalk.green : chalk.red;
        lines.push(`  status: ${color(report.workflowStatus)}`);
    }

    lines.push('');
    lines.push(chalk.bold('Steps'));
    lines.push(...report.steps.map((step) => chalk.gray(`  - ${step}`)));

    const outcomes = Object.entries(report.outcomes).filter(
        (entry): entry is [string, StepOutcome] => entry[1] !== undefined && entry[1].status !== 'skipped',
    );
    if (outcomes.length > 0) {
        lines.push('');
        lines.push(chalk.bold('Outcomes'));
        lines.push(...outcomes.map(([name, outcome]) => formatOutcome(name, outcome)));
    }

    lines.push('');
    lines.push(`  ${check('tests', report.testsPassed)}`);
    lines.push(`  ${check('smoke', report.smokePassed)}`);
    lines.push(`  ${check('governance', report.governanceOk)}`);

    const violations = report.outcomes.policy?.violations ?? [];
    if (violations.length > 0) {
        lines.push('');
        lines.push(chalk.bold('Policy'));
        lines.push(...violations.map((v) => `  ${formatViolation(v)}`));
    }

    if (report.remediation?.success) {
        const { suggestion } = report.remediation;
        lines.push('');
        lines.push(chalk.bold('Suggested fix'));
        for (const patch of suggestion.patches) {
            lines.push(chalk.cyan(`  patch ${patch.path || '(unknown file)'}`));
        }
        if (suggestion.retryCommand) lines.push(`  retry: ${suggestion.retryCommand}`);
        if (suggestion.notes) lines.push(`  ${suggestion.notes}`);
    }

    if (report.changeRequest) {
        lines.push('');
        lines.push(
            `  change request: ${report.changeRequest.url ?? `${report.changeRequest.branch} -> ${report.changeRequest.base}`}`,
        );
    }

    if (report.errors.length > 0) {
        lines.push('');
        lines.push(chalk.bold('Errors'));
        lines.push(...report.errors.map((e) => chalk.red(`  ${e}`)));
    }

    return lines.join('\n');
}

/** 0 only for an accepted run that succeeded (or a dry run). */
export function exitCodeFor(report: WorkflowReport): number {
    if (report.status !== 'accepted') return 1;
    return report.workflowStatus === null || report.workflowStatus === 'success' ? 0 : 1;
}
