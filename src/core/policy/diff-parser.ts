/**
 * Unified diff parsing.
 *
 * Only file headers and hunk lines are interpreted; anything else in the
 * text is ignored, so a malformed diff simply yields fewer paths. The line
 * counts of each `@@` header are tracked so that content lines which happen
 * to start with `--- ` or `+++ ` are not taken for file headers.
 *
 * Dependency direction: diff-parser.ts → nothing (leaf module)
 * Used by: policy evaluator
 */

export const NULL_DEVICE = '/dev/null';

const HUNK_HEADER = /^@@ -\d+(?:,(\d+))? \+\d+(?:,(\d+))? @@ ?(.*)$/;

/** `hunk` marks the start of a hunk; its text is the header's trailing context. */
export type DiffLineKind = 'hunk' | 'added' | 'removed' | 'context';

export interface DiffLine {
    readonly kind: DiffLineKind;
    /** Line content without the leading marker. */
    readonly text: string;
}

/** The hunk lines that belong to one file, in diff order. */
export interface DiffSection {
    readonly path: string;
    readonly lines: readonly DiffLine[];
}

/**
 * Normalize the path part of a `---`/`+++` header: drops a trailing
 * tab-separated timestamp, surrounding quotes and the `a/`/`b/` prefix.
 * Returns null for the null device.
 */
export function parseHeaderPath(raw: string): string | null {
    let path = (raw.split('\t')[0] ?? '').trim();
    if (path.length >= 2 && path.startsWith('"') && path.endsWith('"')) {
        path = path.slice(1, -1);
    }
    if (path === NULL_DEVICE || path === '') return null;
    if (path.startsWith('a/') || path.startsWith('b/')) {
        path = path.slice(2);
    }
    return path || null;
}

type DiffEvent =
    | { readonly type: 'file'; readonly side: 'old' | 'new'; readonly path: string | null }
    | { readonly type: 'boundary' }
    | { readonly type: 'line'; readonly line: DiffLine };

function hunkCount(raw: string | undefined): number {
    return raw === undefined ? 1 : Number(raw);
}

/** Walk a diff line by line, keeping the remaining line counts of the open hunk. */
function* scanDiff(diff: string): Generator<DiffEvent> {
    let oldRemaining = 0;
    let newRemaining = 0;

    for (const line of diff.split(/\r?\n/)) {
        const marker = line[0];
        const inHunk = oldRemaining > 0 || newRemaining > 0;

        if (inHunk && (marker === '-' || marker === '+' || marker === ' ' || line === '')) {
            if (marker !== '+') oldRemaining = Math.max(0, oldRemaining - 1);
            if (marker !== '-') newRemaining = Math.max(0, newRemaining - 1);
            yield { type: 'line', line: toDiffLine(line) };
            continue;
        }
        if (inHunk && marker === '\\') continue;
        oldRemaining = 0;
        newRemaining = 0;

        if (line.startsWith('diff --git ')) {
            yield { type: 'boundary' };
            continue;
        }
        if (line.startsWith('--- ')) {
            yield { type: 'file', side: 'old', path: parseHeaderPath(line.slice(4)) };
            continue;
        }
        if (line.startsWith('+++ ')) {
            yield { type: 'file', side: 'new', path: parseHeaderPath(line.slice(4)) };
            continue;
        }

        const hunk = HUNK_HEADER.exec(line);
        if (hunk) {
            oldRemaining = hunkCount(hunk[1]);
            newRemaining = hunkCount(hunk[2]);
            yield { type: 'line', line: { kind: 'hunk', text: hunk[3] ?? '' } };
            continue;
        }

        // Lines past the counted end of a hunk are still read as content
        if (marker === '-' || marker === '+' || marker === ' ') {
            yield { type: 'line', line: toDiffLine(line) };
        }
    }
}

function toDiffLine(line: string): DiffLine {
    const marker = line[0];
    const text = line.slice(1);
    if (marker === '+') return { kind: 'added', text };
    if (marker === '-') return { kind: 'removed', text };
    return { kind: 'context', text };
}

/**
 * Extract changed file paths, unique, in order of first appearance.
 */
export function parseChangedFiles(diff: string): string[] {
    const seen = new Set<string>();

    for (const event of scanDiff(diff)) {
        if (event.type === 'file' && event.path) seen.add(event.path);
    }

    return [...seen];
}

/**
 * Split a diff into per-file sections.
 *
 * A section starts at a `+++` header and ends at the next file header
 * (`diff --git`, `---`) or the end of the text. Deleted files (`+++ /dev/null`)
 * produce no section.
 */
export function parseDiffSections(diff: string): DiffSection[] {
    const sections: DiffSection[] = [];
    let current: { path: string; lines: DiffLine[] } | null = null;

    for (const event of scanDiff(diff)) {
        if (event.type === 'boundary' || (event.type === 'file' && event.side === 'old')) {
            current = null;
        } else if (event.type === 'file') {
            current = event.path ? { path: event.path, lines: [] } : null;
            if (current) sections.push(current);
        } else if (current) {
            current.lines.push(event.line);
        }
    }

    return sections;
}
