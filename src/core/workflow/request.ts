/**
 * Workflow request parsing.
 *
 * Requests arrive from the CLI or from library callers as loose objects;
 * they are validated once here and frozen. `feature_from_contract` is
 * accepted as an alias of `feature`.
 *
 * Dependency direction: request.ts → zod, utils/validation, config/defaults, core/errors
 * Used by: coordinator, CLI run command
 */

import { z } from 'zod';
import { branchName, nonEmptyString, projectId, timeoutMs } from '../../utils/validation.js';
import { DEFAULT_SMOKE_HEALTH_PATH, DEFAULT_SMOKE_TIMEOUT_MS } from '../config/defaults.js';
import { formatIssues } from '../config/manager.js';
import { ValidationError } from '../errors.js';
import type { WorkflowKind, WorkflowRequest } from './types.js';

const workflowKindSchema = z
    .enum(['feature', 'bugfix', 'feature_from_contract'])
    .transform((kind): WorkflowKind => (kind === 'feature_from_contract' ? 'feature' : kind));

export const workflowRequestSchema = z.object({
    kind: workflowKindSchema.default('feature'),
    projectId,
    contractPath: nonEmptyString.optional(),
    dryRun: z.boolean().default(true),
    runCodegen: z.boolean().default(false),
    runTests: z.boolean().default(false),
    createChangeRequest: z.boolean().default(false),
    runSmoke: z.boolean().default(false),
    runRemediation: z.boolean().default(false),
    branchName: branchName.optional(),
    commitMessage: nonEmptyString.optional(),
    base: branchName.optional(),
    title: nonEmptyString.optional(),
    body: z.string().optional(),
    push: z.boolean().default(false),
    smokeTimeoutMs: timeoutMs.default(DEFAULT_SMOKE_TIMEOUT_MS),
    smokeHealthPath: z
        .string()
        .trim()
        .startsWith('/', 'Health path must start with "/"')
        .default(DEFAULT_SMOKE_HEALTH_PATH),
});

export type WorkflowRequestInput = z.input<typeof workflowRequestSchema>;

/**
 * Validate an untrusted request and fill in defaults.
 *
 * @throws {ValidationError} listing every invalid field
 */
export function parseWorkflowRequest(input: unknown): WorkflowRequest {
    const result = workflowRequestSchema.safeParse(input);
    if (!result.success) {
        throw new ValidationError(`Invalid workflow request:\n${formatIssues(result.error.issues)}`, {
            issues: result.error.issues,
        });
    }
    return Object.freeze(result.data);
}
