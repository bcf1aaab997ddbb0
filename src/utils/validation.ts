/**
 * Common validators for identifiers and user input.
 *
 * Dependency direction: validation.ts → zod
 * Used by: config schemas, workflow request parsing, CLI commands
 */

import { z } from 'zod';

/** Validate that a string is a non-empty trimmed string. */
export const nonEmptyString = z.string().trim().min(1, 'Value cannot be empty');

/**
 * Project identifiers double as directory names, so they are kept to
 * path-safe characters.
 */
export const projectId = z
    .string()
    .trim()
    .min(1, 'Project id cannot be empty')
    .max(100)
    .regex(
        /^[a-zA-Z0-9][a-zA-Z0-9._-]*$/,
        'Project id must start with alphanumeric and contain only alphanumeric, dots, hyphens, or underscores',
    );

/** A Git branch name: no whitespace, no "..", no leading "-" and no trailing "/" or ".lock". */
export const branchName = z
    .string()
    .trim()
    .min(1, 'Branch name cannot be empty')
    .refine((val) => !/\s/.test(val), 'Branch name must not contain whitespace')
    .refine((val) => !val.includes('..'), 'Branch name must not contain ".."')
    .refine((val) => !val.startsWith('-'), 'Branch name must not start with "-"')
    .refine((val) => !val.endsWith('/') && !val.endsWith('.lock'), 'Branch name has an invalid ending');

/** A repository URL: https, ssh (git@host:path) or a local path. */
export const repositoryUrl = z
    .string()
    .trim()
    .min(1, 'Repository URL cannot be empty')
    .refine(
        (val) => /^(https?:\/\/|ssh:\/\/|git@|file:\/\/|\/|\.{1,2}\/)/.test(val),
        'Repository URL must be an http(s), ssh, file URL or a local path',
    );

/** A timeout in milliseconds, between one second and one hour. */
export const timeoutMs = z.number().int().min(1_000).max(3_600_000);

/** A positive line count given as text on the command line. */
export const lineLimit = z.coerce.number().int().min(1, 'Line limit must be at least 1').max(1_000_000);
