/**
 * Tests for the governance evaluator.
 */

import { describe, it, expect } from 'vitest';
import {
    DEFAULT_POLICY_RULES,
    evaluatePolicy,
    extractAddedDependencies,
    resolvePolicyRules,
} from '../../../src/core/policy/evaluator.js';
import type { DiffSection } from '../../../src/core/policy/diff-parser.js';

/** Build a diff that adds the given lines to each file. */
function addFiles(files: Record<string, string[]>): string {
    return Object.entries(files)
        .flatMap(([path, lines]) => [
            `diff --git a/${path} b/${path}`,
            `--- a/${path}`,
            `+++ b/${path}`,
            `@@ -1,0 +1,${lines.length} @@`,
            ...lines.map((l) => `+${l}`),
        ])
        .join('\n');
}

describe('evaluatePolicy', () => {
    it('rejects a change to a secrets path with one error', () => {
        const result = evaluatePolicy(addFiles({ 'secrets/api.key': ['token'] }), DEFAULT_POLICY_RULES, 'python');

        expect(result.ok).toBe(false);
        expect(result.violations).toEqual([
            {
                ruleName: 'forbidden_paths',
                severity: 'error',
                message: 'Changes to "secrets/api.key" are forbidden (matches "**/secrets/**")',
                filePath: 'secrets/api.key',
            },
        ]);
    });

    it('matches dotfiles at the repository root', () => {
        const result = evaluatePolicy(addFiles({ '.env': ['A=1'] }), DEFAULT_POLICY_RULES, 'python');
        expect(result.violations.map((v) => v.filePath)).toEqual(['.env']);
    });

    it('warns but passes when code changes without tests', () => {
        const result = evaluatePolicy(addFiles({ 'app/service.py': ['x = 1'] }), DEFAULT_POLICY_RULES, 'python');

        expect(result.ok).toBe(true);
        expect(result.violations).toEqual([
            {
                ruleName: 'require_tests',
                severity: 'warning',
                message: '1 Python code file(s) changed without any test changes',
            },
        ]);
    });

    it('is silent when a test file accompanies the code', () => {
        const diff = addFiles({ 'app/service.py': ['x = 1'], 'tests/test_service.py': ['def test(): pass'] });
        const result = evaluatePolicy(diff, DEFAULT_POLICY_RULES, 'python');

        expect(result.ok).toBe(true);
        expect(result.violations).toEqual([]);
        expect(result.changedFiles).toEqual(['app/service.py', 'tests/test_service.py']);
    });

    it('honours a per-language test pattern override', () => {
        const rules = resolvePolicyRules({ testFilePatterns: { python: ['checks/**'] } });
        const diff = addFiles({ 'app/service.py': ['x = 1'], 'checks/service_check.py': ['pass'] });

        expect(evaluatePolicy(diff, rules, 'python').violations).toEqual([]);
    });

    it('skips the test rule when disabled', () => {
        const rules = resolvePolicyRules({ requireTestsForCode: false });
        expect(evaluatePolicy(addFiles({ 'app/a.py': ['x'] }), rules, 'python').violations).toEqual([]);
    });

    it('rejects a requirement outside the allow-list', () => {
        const rules = resolvePolicyRules({ allowedDependencies: { python: ['fastapi'] } });
        const result = evaluatePolicy(addFiles({ 'requirements.txt': ['requests==2.0'] }), rules, 'python');

        expect(result.ok).toBe(false);
        expect(result.violations).toEqual([
            {
                ruleName: 'allowed_dependencies',
                severity: 'error',
                message: 'Dependency "requests" is not in the allowed list for Python',
                filePath: 'requirements.txt',
            },
        ]);
    });

    it('accepts an allowed requirement, case-insensitively', () => {
        const rules = resolvePolicyRules({ allowedDependencies: { python: ['fastapi'] } });

        expect(evaluatePolicy(addFiles({ 'requirements.txt': ['fastapi==1.0'] }), rules, 'python').violations).toEqual([]);
        expect(evaluatePolicy(addFiles({ 'requirements.txt': ['FastAPI>=1.0'] }), rules, 'python').violations).toEqual([]);
    });

    it('ignores dependencies when no allow-list is configured', () => {
        const result = evaluatePolicy(addFiles({ 'requirements.txt': ['requests'] }), DEFAULT_POLICY_RULES, 'python');
        expect(result.violations).toEqual([]);
    });

    it('reads package.json dependency blocks', () => {
        const rules = resolvePolicyRules({
            allowedDependencies: { typescript: ['zod'] },
            requireTestsForCode: false,
        });
        const diff = [
            '--- a/package.json',
            '+++ b/package.json',
            '@@ -1,6 +1,8 @@',
            ' {',
            '   "name": "shop",',
            '   "dependencies": {',
            '+    "left-pad": "^1.3.0",',
            '+    "zod": "^3.23.8",',
            '     "other": "1.0.0"',
            '   },',
            '   "scripts": {',
            '+    "lint": "eslint ."',
            '   }',
            ' }',
        ].join('\n');

        const result = evaluatePolicy(diff, rules, 'typescript');
        expect(result.violations.map((v) => v.message)).toEqual([
            'Dependency "left-pad" is not in the allowed list for TypeScript',
        ]);
    });

    it('takes the enclosing block from the hunk heading', () => {
        const rules = resolvePolicyRules({
            allowedDependencies: { typescript: ['zod'] },
            requireTestsForCode: false,
        });
        const diff = [
            '--- a/package.json',
            '+++ b/package.json',
            '@@ -8,3 +8,4 @@   "scripts": {',
            '     "build": "tsc",',
            '+    "test": "vitest run",',
            '     "lint": "eslint ."',
            '   },',
            '@@ -20,2 +21,3 @@   "dependencies": {',
            '     "zod": "^3.23.8",',
            '+    "left-pad": "^1.3.0"',
            '   }',
        ].join('\n');

        const result = evaluatePolicy(diff, rules, 'typescript');
        expect(result.violations.map((v) => v.message)).toEqual([
            'Dependency "left-pad" is not in the allowed list for TypeScript',
        ]);
    });

    it('reports a repeated dependency once per file', () => {
        const rules = resolvePolicyRules({ allowedDependencies: { python: ['fastapi'] } });
        const diff = addFiles({ 'requirements.txt': ['requests==2.0', 'requests[socks]'] });

        expect(evaluatePolicy(diff, rules, 'python').violations).toHaveLength(1);
    });
});

describe('extractAddedDependencies', () => {
    it('parses requirement specifiers and skips comments and options', () => {
        const section: DiffSection = {
            path: 'requirements.txt',
            lines: [
                { kind: 'added', text: 'requests>=2.0 ; python_version > "3.8"' },
                { kind: 'added', text: '# pinned below' },
                { kind: 'added', text: '-r base.txt' },
                { kind: 'added', text: 'uvicorn[standard]==0.30' },
                { kind: 'context', text: 'fastapi' },
                { kind: 'removed', text: 'flask' },
            ],
        };

        expect(extractAddedDependencies(section, 'requirements')).toEqual(['requests', 'uvicorn']);
    });

    it('skips composer platform requirements', () => {
        const section: DiffSection = {
            path: 'composer.json',
            lines: [
                { kind: 'context', text: '    "require": {' },
                { kind: 'added', text: '        "php": ">=8.1",' },
                { kind: 'added', text: '        "ext-json": "*",' },
                { kind: 'added', text: '        "monolog/monolog": "^3.0"' },
                { kind: 'context', text: '    }' },
            ],
        };

        expect(extractAddedDependencies(section, 'json')).toEqual(['monolog/monolog']);
    });
});
