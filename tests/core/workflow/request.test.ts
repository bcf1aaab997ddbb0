/**
 * Tests for workflow request parsing.
 */

import { describe, it, expect } from 'vitest';
import { parseWorkflowRequest } from '../../../src/core/workflow/request.js';
import { ValidationError } from '../../../src/core/errors.js';

describe('parseWorkflowRequest', () => {
    it('fills in defaults', () => {
        expect(parseWorkflowRequest({ projectId: 'shop' })).toEqual({
            kind: 'feature',
            projectId: 'shop',
            dryRun: true,
            runCodegen: false,
            runTests: false,
            createChangeRequest: false,
            runSmoke: false,
            runRemediation: false,
            push: false,
            smokeTimeoutMs: 60_000,
            smokeHealthPath: '/health',
        });
    });

    it('maps feature_from_contract to feature', () => {
        expect(parseWorkflowRequest({ projectId: 'shop', kind: 'feature_from_contract' }).kind).toBe('feature');
    });

    it('returns a frozen request', () => {
        expect(Object.isFrozen(parseWorkflowRequest({ projectId: 'shop', kind: 'bugfix' }))).toBe(true);
    });

    it('rejects an unknown kind', () => {
        expect(() => parseWorkflowRequest({ projectId: 'shop', kind: 'refactor' })).toThrow(ValidationError);
    });

    it('rejects a path-unsafe project id', () => {
        expect(() => parseWorkflowRequest({ projectId: '../etc' })).toThrow(/projectId/);
    });

    it('rejects a health path without a leading slash', () => {
        expect(() => parseWorkflowRequest({ projectId: 'shop', smokeHealthPath: 'health' })).toThrow(
            'Health path must start with "/"',
        );
    });

    it('rejects a smoke timeout below one second', () => {
        expect(() => parseWorkflowRequest({ projectId: 'shop', smokeTimeoutMs: 10 })).toThrow(ValidationError);
    });

    it('rejects a branch name with whitespace', () => {
        expect(() => parseWorkflowRequest({ projectId: 'shop', branchName: 'my branch' })).toThrow(
            'Branch name must not contain whitespace',
        );
    });
});
