/**
 * Tests for unified diff parsing.
 */

import { describe, it, expect } from 'vitest';
import { parseChangedFiles, parseDiffSections, parseHeaderPath } from '../../../src/core/policy/diff-parser.js';

const TWO_FILE_DIFF = [
    'diff --git a/app/main.py b/app/main.py',
    'index 1111111..2222222 100644',
    '--- a/app/main.py',
    '+++ b/app/main.py',
    '@@ -1,2 +1,3 @@',
    ' import os',
    '-print("old")',
    '+print("new")',
    '+print("more")',
    'diff --git a/tests/test_main.py b/tests/test_main.py',
    'new file mode 100644',
    '--- /dev/null',
    '+++ b/tests/test_main.py',
    '@@ -0,0 +1 @@',
    '+def test_ok(): pass',
].join('\n');

describe('parseHeaderPath', () => {
    it('strips the a/ and b/ prefixes', () => {
        expect(parseHeaderPath('a/src/x.ts')).toBe('src/x.ts');
        expect(parseHeaderPath('b/src/x.ts')).toBe('src/x.ts');
    });

    it('returns null for the null device', () => {
        expect(parseHeaderPath('/dev/null')).toBeNull();
    });

    it('drops a tab-separated timestamp and quotes', () => {
        expect(parseHeaderPath('b/notes.txt\t2024-01-01 10:00:00')).toBe('notes.txt');
        expect(parseHeaderPath('"b/with space.txt"')).toBe('with space.txt');
    });
});

describe('parseChangedFiles', () => {
    it('lists each path once, in order of first appearance', () => {
        expect(parseChangedFiles(TWO_FILE_DIFF)).toEqual(['app/main.py', 'tests/test_main.py']);
    });

    it('is stable across repeated parses', () => {
        expect(parseChangedFiles(TWO_FILE_DIFF)).toEqual(parseChangedFiles(TWO_FILE_DIFF));
    });

    it('keeps the old path of a deleted file', () => {
        const diff = ['--- a/old.py', '+++ /dev/null', '@@ -1 +0,0 @@', '-x = 1'].join('\n');
        expect(parseChangedFiles(diff)).toEqual(['old.py']);
    });

    it('returns an empty list for text without headers', () => {
        expect(parseChangedFiles('not a diff at all')).toEqual([]);
        expect(parseChangedFiles('')).toEqual([]);
    });

    it('accepts CRLF line endings', () => {
        expect(parseChangedFiles('--- a/x.py\r\n+++ b/x.py\r\n')).toEqual(['x.py']);
    });
});

describe('parseDiffSections', () => {
    it('groups hunk lines per file', () => {
        const sections = parseDiffSections(TWO_FILE_DIFF);

        expect(sections.map((s) => s.path)).toEqual(['app/main.py', 'tests/test_main.py']);
        expect(sections[0]?.lines).toEqual([
            { kind: 'hunk', text: '' },
            { kind: 'context', text: 'import os' },
            { kind: 'removed', text: 'print("old")' },
            { kind: 'added', text: 'print("new")' },
            { kind: 'added', text: 'print("more")' },
        ]);
        expect(sections[1]?.lines).toEqual([
            { kind: 'hunk', text: '' },
            { kind: 'added', text: 'def test_ok(): pass' },
        ]);
    });

    it('produces no section for a deleted file', () => {
        const diff = ['--- a/old.py', '+++ /dev/null', '@@ -1 +0,0 @@', '-x = 1'].join('\n');
        expect(parseDiffSections(diff)).toEqual([]);
    });

    it('reads lines starting with --- or +++ inside a hunk as content', () => {
        const diff = [
            '--- a/docs/notes.md',
            '+++ b/docs/notes.md',
            '@@ -1,2 +1,3 @@ # Notes',
            ' intro',
            '---- old rule',
            '+++ new rule',
            '+--- b/fake.py',
        ].join('\n');

        const sections = parseDiffSections(diff);

        expect(sections.map((s) => s.path)).toEqual(['docs/notes.md']);
        expect(sections[0]?.lines).toEqual([
            { kind: 'hunk', text: '# Notes' },
            { kind: 'context', text: 'intro' },
            { kind: 'removed', text: '--- old rule' },
            { kind: 'added', text: '++ new rule' },
            { kind: 'added', text: '--- b/fake.py' },
        ]);
        expect(parseChangedFiles(diff)).toEqual(['docs/notes.md']);
    });

    it('resumes header parsing once a hunk is complete', () => {
        const diff = [
            '--- a/a.txt',
            '+++ b/a.txt',
            '@@ -1 +1 @@',
            '-x',
            '+y',
            '\\ No newline at end of file',
            '--- a/b.txt',
            '+++ b/b.txt',
            '@@ -0,0 +1 @@',
            '+z',
        ].join('\n');

        expect(parseChangedFiles(diff)).toEqual(['a.txt', 'b.txt']);
        expect(parseDiffSections(diff)[1]?.lines).toEqual([
            { kind: 'hunk', text: '' },
            { kind: 'added', text: 'z' },
        ]);
    });
});
