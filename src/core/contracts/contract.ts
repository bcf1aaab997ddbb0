/**
 * Design contracts: the markdown documents a feature workflow builds from.
 *
 * A contract is written either from structured fields or from a free-text
 * idea handed to a drafter (the contract agent). Unless a path is given it
 * lands at `contracts/<slug>.md` in the project's working copy.
 *
 * Dependency direction: contract.ts → git/types, workflow/file-parser, config/types, core/errors
 * Used by: contract CLI command, contract agent
 */

import type { ProjectConfig } from '../config/types.js';
import type { VersionControl } from '../../git/types.js';
import { isSafeRelativePath } from '../workflow/file-parser.js';
import { ValidationError } from '../errors.js';
import { logger } from '../../utils/logger.js';

export const CONTRACTS_DIR = 'contracts';

const MARKDOWN_FENCE = /^```(?:markdown|md)?[ \t]*\r?\n([\s\S]*?)\r?\n?```$/;
const TITLE_HEADING = /^#[ \t]+(.+?)[ \t]*$/m;

export interface ContractFields {
    readonly name: string;
    readonly summary: string;
    readonly problem: string;
    readonly userStory: string;
    readonly notes?: string;
}

export interface ContractDraftInput {
    readonly idea: string;
    readonly config: ProjectConfig;
    /** Extra facts for the drafter, listed as `key: value`. */
    readonly context: Readonly<Record<string, string>>;
}

/** Turns an idea into contract markdown. */
export interface ContractDrafter {
    draft(input: ContractDraftInput): Promise<string>;
}

export interface WriteContractOptions {
    /** Repository-relative target; defaults to `contracts/<slug>.md`. */
    readonly path?: string;
    /** Replace an existing file. */
    readonly force?: boolean;
}

export function contractSlug(text: string): string {
    const slug = text
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '')
        .slice(0, 60)
        .replace(/-+$/, '');
    return slug || 'feature';
}

export function defaultContractPath(name: string): string {
    return `${CONTRACTS_DIR}/${contractSlug(name)}.md`;
}

function required(value: string, field: string): string {
    const trimmed = value.trim();
    if (!trimmed) {
        throw new ValidationError(`Contract field "${field}" must not be empty`, { field });
    }
    return trimmed;
}

/**
 * Render a contract from structured fields.
 *
 * @throws {ValidationError} if a required field is blank
 */
export function renderContract(fields: ContractFields): string {
    const sections = [
        `# ${required(fields.name, 'name')}`,
        `## Summary\n\n${required(fields.summary, 'summary')}`,
        `## Problem Statement\n\n${required(fields.problem, 'problem')}`,
        `## User Stories\n\n- ${required(fields.userStory, 'userStory')}`,
    ];

    const notes = fields.notes?.trim();
    if (notes) sections.push(`## Notes\n\n${notes}`);

    return `${sections.join('\n\n')}\n`;
}

/** Drop a single fence wrapped around the whole answer. */
export function stripMarkdownFence(text: string): string {
    const trimmed = text.trim();
    const match = MARKDOWN_FENCE.exec(trimmed);
    return match ? (match[1] ?? '').trim() : trimmed;
}

/** The first level-one heading of a contract, if any. */
export function contractTitle(markdown: string): string | undefined {
    return TITLE_HEADING.exec(markdown)?.[1];
}

async function writeContract(
    vcs: VersionControl,
    contractPath: string,
    content: string,
    force: boolean,
): Promise<string> {
    if (!isSafeRelativePath(contractPath)) {
        throw new ValidationError(`Unsafe contract path: ${contractPath}`, { path: contractPath });
    }
    if (!force && (await vcs.exists(contractPath))) {
        throw new ValidationError(`Contract already exists: ${contractPath}`, { path: contractPath });
    }

    await vcs.writeFile(contractPath, content.endsWith('\n') ? content : `${content}\n`);
    logger.success(`Contract written: ${contractPath}`);
    return contractPath;
}

/**
 * Write a contract rendered from structured fields.
 *
 * @returns the repository-relative contract path
 * @throws {ValidationError} for blank fields, an unsafe path or an existing file
 */
export async function createContractFromFields(
    vcs: VersionControl,
    fields: ContractFields,
    options: WriteContractOptions = {},
): Promise<string> {
    const content = renderContract(fields);
    return writeContract(vcs, options.path ?? defaultContractPath(fields.name), content, options.force ?? false);
}

/**
 * Have the drafter expand an idea into a contract and write it. The default
 * path is named after the draft's title, or the idea when it has none.
 *
 * @returns the repository-relative contract path
 * @throws {ValidationError} for an empty idea or draft, an unsafe path or an existing file
 * @throws whatever the drafter throws
 */
export async function createContractFromIdea(
    vcs: VersionControl,
    drafter: ContractDrafter,
    input: ContractDraftInput,
    options: WriteContractOptions = {},
): Promise<string> {
    const idea = input.idea.trim();
    if (!idea) {
        throw new ValidationError('A feature idea is required');
    }

    const draft = stripMarkdownFence(await drafter.draft({ ...input, idea }));
    if (!draft) {
        throw new ValidationError('The drafted contract is empty', { idea });
    }

    const contractPath = options.path ?? defaultContractPath(contractTitle(draft) ?? idea);
    return writeContract(vcs, contractPath, draft, options.force ?? false);
}
