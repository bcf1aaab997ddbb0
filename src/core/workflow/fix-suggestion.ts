/**
 * Fix suggestion contract.
 *
 * The remediation agent is asked for a JSON object of tagged parts:
 *
 *   { "parts": [
 *       { "type": "patch", "path": "app/main.py", "diff": "@@ ..." },
 *       { "type": "retry", "command": "pytest -q tests/test_main.py" },
 *       { "type": "notes", "text": "..." } ] }
 *
 * Answers that ignore the contract are read with a fallback adapter that
 * splits the text on `PATCH:`, `RETRY_COMMAND:` and `NOTES:` markers.
 *
 * Dependency direction: fix-suggestion.ts → zod, policy/diff-parser, core/errors
 * Used by: remediation agent, remediation runner
 */

import { z } from 'zod';
import { parseChangedFiles } from '../policy/diff-parser.js';
import { ValidationError } from '../errors.js';
import type { FilePatch, FixSuggestion } from './types.js';

export const fixPartSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('patch'), path: z.string().default(''), diff: z.string().min(1) }),
    z.object({ type: z.literal('retry'), command: z.string().trim().min(1) }),
    z.object({ type: z.literal('notes'), text: z.string() }),
]);

export const fixSuggestionSchema = z.object({
    parts: z.array(fixPartSchema),
});

export type FixPart = z.infer<typeof fixPartSchema>;

const MARKER = /^(PATCH|RETRY_COMMAND|NOTES):\s*(.*)$/;
const JSON_FENCE = /```(?:json)?\s*\n([\s\S]*?)```/;
const DIFF_FENCE = /^```[\w-]*\n([\s\S]*?)\n?```$/;

function patchFor(diff: string, path = ''): FilePatch {
    return { path: path || (parseChangedFiles(diff)[0] ?? ''), diff };
}

/** Fold tagged parts into a suggestion. The last retry command wins. */
export function fromParts(parts: readonly FixPart[]): FixSuggestion {
    const patches: FilePatch[] = [];
    const notes: string[] = [];
    let retryCommand: string | null = null;

    for (const part of parts) {
        switch (part.type) {
            case 'patch':
                patches.push(patchFor(part.diff, part.path));
                break;
            case 'retry':
                retryCommand = part.command;
                break;
            case 'notes':
                if (part.text.trim()) notes.push(part.text.trim());
                break;
        }
    }

    return Object.freeze({
        patches: Object.freeze(patches),
        retryCommand,
        notes: notes.length > 0 ? notes.join('\n\n') : null,
    });
}

function jsonCandidate(text: string): string | null {
    const fenced = JSON_FENCE.exec(text)?.[1];
    if (fenced?.trim().startsWith('{')) return fenced;

    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    return start !== -1 && end > start ? text.slice(start, end + 1) : null;
}

/** Parse the structured contract; null when the text does not follow it. */
export function parseStructuredSuggestion(text: string): FixSuggestion | null {
    const candidate = jsonCandidate(text);
    if (!candidate) return null;

    let value: unknown;
    try {
        value = JSON.parse(candidate);
    } catch {
        return null;
    }

    const parsed = fixSuggestionSchema.safeParse(value);
    return parsed.success ? fromParts(parsed.data.parts) : null;
}

/** Read the `PATCH:` / `RETRY_COMMAND:` / `NOTES:` layout. Null when no marker is present. */
export function parseMarkedSuggestion(text: string): FixSuggestion | null {
    const sections = new Map<string, string[]>();
    let current: string[] | null = null;

    for (const line of text.split(/\r?\n/)) {
        const marker = MARKER.exec(line.trim());
        if (marker?.[1]) {
            current = [];
            sections.set(marker[1], current);
            if (marker[2]) current.push(marker[2]);
            continue;
        }
        current?.push(line);
    }

    if (sections.size === 0) return null;

    const section = (name: string): string => (sections.get(name) ?? []).join('\n').trim();
    const parts: FixPart[] = [];

    const patch = section('PATCH');
    if (patch) {
        parts.push({ type: 'patch', path: '', diff: DIFF_FENCE.exec(patch)?.[1] ?? patch });
    }
    const retry = section('RETRY_COMMAND').replace(/^`+|`+$/g, '').trim();
    if (retry) {
        parts.push({ type: 'retry', command: retry });
    }
    const notes = section('NOTES');
    if (notes) {
        parts.push({ type: 'notes', text: notes });
    }

    return fromParts(parts);
}

/**
 * Turn a remediation answer into a suggestion: the JSON contract first, then
 * the marker layout, then the whole text as notes.
 *
 * @throws {ValidationError} if the answer is empty
 */
export function parseFixSuggestion(text: string): FixSuggestion {
    if (!text.trim()) {
        throw new ValidationError('Fix suggestion response was empty');
    }

    return (
        parseStructuredSuggestion(text) ??
        parseMarkedSuggestion(text) ??
        fromParts([{ type: 'notes', text }])
    );
}
