/**
 * Log monitor: scans the tail of application log files for errors and
 * warnings.
 *
 * Each line is matched against an ordered rule list and the first rule that
 * matches classifies it, so a traceback line is not also counted as a plain
 * error line. Missing or unreadable files are reported as warnings rather
 * than thrown.
 *
 * Dependency direction: analyzer.ts → utils/fs, core/errors
 * Used by: monitor command, library callers
 */

import { errorMessage } from '../errors.js';
import { fileExists, readTextFile } from '../../utils/fs.js';

export const DEFAULT_MAX_LINES = 2000;

const MAX_LINE_LENGTH = 500;

export type IssueSeverity = 'error' | 'warning';

export interface MonitorIssue {
    readonly severity: IssueSeverity;
    readonly code: string;
    readonly message: string;
    /** The offending line, trimmed; empty for file-level issues. */
    readonly line: string;
    /** 1-based line number in the file; null for file-level issues. */
    readonly lineNumber: number | null;
    readonly filePath: string;
}

export interface MonitorResult {
    readonly issues: readonly MonitorIssue[];
    readonly errorCount: number;
    readonly warningCount: number;
    readonly summary: string;
}

export interface AnalyzeOptions {
    /** Only the last `maxLines` lines of each file are scanned. */
    readonly maxLines?: number;
}

interface LogRule {
    readonly code: string;
    readonly severity: IssueSeverity;
    readonly pattern: RegExp;
    readonly message: string;
}

const LOG_RULES: readonly LogRule[] = [
    {
        code: 'HTTP_5XX',
        severity: 'error',
        pattern: /\bHTTP\/[\d.]+"?\s+5\d\d\b|\bstatus[=:]\s*5\d\d\b/i,
        message: 'Server error response',
    },
    {
        code: 'TRACEBACK',
        severity: 'error',
        pattern: /Traceback \(most recent call last\)/,
        message: 'Stack trace',
    },
    {
        code: 'EXCEPTION',
        severity: 'error',
        pattern: /\b[A-Za-z.]*Exception\b/,
        message: 'Exception raised',
    },
    {
        code: 'ERROR_LINE',
        severity: 'error',
        pattern: /\b(?:ERROR|FATAL|CRITICAL)\b/,
        message: 'Error logged',
    },
    {
        code: 'TIMEOUT',
        severity: 'warning',
        pattern: /\btimed? ?out/i,
        message: 'Timeout',
    },
    {
        code: 'WARNING_LINE',
        severity: 'warning',
        pattern: /\bWARN(?:ING)?\b/,
        message: 'Warning logged',
    },
];

function classify(line: string): LogRule | undefined {
    return LOG_RULES.find((rule) => rule.pattern.test(line));
}

function plural(count: number, noun: string): string {
    return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

function fileIssue(filePath: string, code: string, message: string): MonitorIssue {
    return { severity: 'warning', code, message, line: '', lineNumber: null, filePath };
}

function analyzeFile(filePath: string, maxLines: number): MonitorIssue[] {
    if (!fileExists(filePath)) {
        return [fileIssue(filePath, 'FILE_NOT_FOUND', `Log file not found: ${filePath}`)];
    }

    let content: string;
    try {
        content = readTextFile(filePath);
    } catch (err) {
        return [fileIssue(filePath, 'FILE_UNREADABLE', `Could not read ${filePath}: ${errorMessage(err)}`)];
    }

    const lines = content.split(/\r?\n/);
    if (lines[lines.length - 1] === '') lines.pop();

    const offset = Math.max(0, lines.length - maxLines);
    const issues: MonitorIssue[] = [];

    lines.slice(offset).forEach((text, index) => {
        const rule = classify(text);
        if (!rule) return;

        issues.push({
            severity: rule.severity,
            code: rule.code,
            message: rule.message,
            line: text.trim().slice(0, MAX_LINE_LENGTH),
            lineNumber: offset + index + 1,
            filePath,
        });
    });

    return issues;
}

/**
 * Scan log files, in the order given.
 */
export function analyzeLogs(filePaths: readonly string[], options: AnalyzeOptions = {}): MonitorResult {
    const maxLines = Math.max(1, options.maxLines ?? DEFAULT_MAX_LINES);
    const issues = filePaths.flatMap((filePath) => analyzeFile(filePath, maxLines));

    const errorCount = issues.filter((issue) => issue.severity === 'error').length;
    const warningCount = issues.length - errorCount;

    return {
        issues,
        errorCount,
        warningCount,
        summary:
            `Found ${plural(issues.length, 'issue')} in ${plural(filePaths.length, 'file')}: ` +
            `${plural(errorCount, 'error')}, ${plural(warningCount, 'warning')}`,
    };
}
