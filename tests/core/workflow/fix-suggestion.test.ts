/**
 * Tests for reading remediation answers into fix suggestions.
 */

import { describe, it, expect } from 'vitest';
import {
    fromParts,
    parseFixSuggestion,
    parseMarkedSuggestion,
    parseStructuredSuggestion,
} from '../../../src/core/workflow/fix-suggestion.js';
import { ValidationError } from '../../../src/core/errors.js';

const PATCH = ['--- a/app/main.py', '+++ b/app/main.py', '@@ -1 +1 @@', '-x = 1', '+x = 2'].join('\n');

describe('parseStructuredSuggestion', () => {
    it('reads the parts contract from a json fence', () => {
        const body = JSON.stringify({
            parts: [
                { type: 'patch', diff: PATCH },
                { type: 'retry', command: 'pytest -q' },
                { type: 'notes', text: 'Off by one.' },
            ],
        });

        expect(parseStructuredSuggestion(`Here is the fix:\n\`\`\`json\n${body}\n\`\`\``)).toEqual({
            patches: [{ path: 'app/main.py', diff: PATCH }],
            retryCommand: 'pytest -q',
            notes: 'Off by one.',
        });
    });

    it('reads a bare object surrounded by prose', () => {
        const body = JSON.stringify({ parts: [{ type: 'notes', text: 'Flaky network mock.' }] });

        expect(parseStructuredSuggestion(`Answer: ${body} Thanks.`)?.notes).toBe('Flaky network mock.');
    });

    it('returns null for JSON that does not follow the contract', () => {
        expect(parseStructuredSuggestion('{"fix": "rename it"}')).toBeNull();
        expect(parseStructuredSuggestion('{ not json }')).toBeNull();
        expect(parseStructuredSuggestion('no braces here')).toBeNull();
    });
});

describe('fromParts', () => {
    it('keeps an explicit patch path', () => {
        expect(fromParts([{ type: 'patch', path: 'lib/x.py', diff: PATCH }]).patches).toEqual([
            { path: 'lib/x.py', diff: PATCH },
        ]);
    });

    it('uses the last retry command and joins notes', () => {
        const suggestion = fromParts([
            { type: 'retry', command: 'pytest' },
            { type: 'notes', text: 'First.' },
            { type: 'retry', command: 'pytest -x' },
            { type: 'notes', text: '  ' },
            { type: 'notes', text: 'Second.' },
        ]);

        expect(suggestion.retryCommand).toBe('pytest -x');
        expect(suggestion.notes).toBe('First.\n\nSecond.');
    });

    it('returns a frozen suggestion', () => {
        const suggestion = fromParts([]);
        expect(suggestion).toEqual({ patches: [], retryCommand: null, notes: null });
        expect(Object.isFrozen(suggestion)).toBe(true);
    });
});

describe('parseMarkedSuggestion', () => {
    it('splits the text on markers', () => {
        const text = [
            'PATCH:',
            '```diff',
            PATCH,
            '```',
            'RETRY_COMMAND: `pytest -q tests/test_main.py`',
            'NOTES: The helper returned the wrong value.',
        ].join('\n');

        expect(parseMarkedSuggestion(text)).toEqual({
            patches: [{ path: 'app/main.py', diff: PATCH }],
            retryCommand: 'pytest -q tests/test_main.py',
            notes: 'The helper returned the wrong value.',
        });
    });

    it('returns null without markers', () => {
        expect(parseMarkedSuggestion('Just prose.')).toBeNull();
    });
});

describe('parseFixSuggestion', () => {
    it('falls back to the whole answer as notes', () => {
        expect(parseFixSuggestion('Check the fixture setup.')).toEqual({
            patches: [],
            retryCommand: null,
            notes: 'Check the fixture setup.',
        });
    });

    it('prefers the structured contract over markers', () => {
        const body = JSON.stringify({ parts: [{ type: 'retry', command: 'make test' }] });
        expect(parseFixSuggestion(`NOTES: ignored\n${body}`).retryCommand).toBe('make test');
    });

    it('rejects an empty answer', () => {
        expect(() => parseFixSuggestion('  \n')).toThrow(ValidationError);
        expect(() => parseFixSuggestion('')).toThrow('Fix suggestion response was empty');
    });
});
