/**
 * Tests for the workflow status resolver.
 */

import { describe, it, expect } from 'vitest';
import { NOT_RUN, resolveWorkflowStatus } from '../../../src/core/workflow/status.js';
import type { CheckResult } from '../../../src/core/workflow/types.js';

const PASSED: CheckResult = { ran: true, passed: true };
const FAILED: CheckResult = { ran: true, passed: false };
const CHECKS: readonly CheckResult[] = [NOT_RUN, PASSED, FAILED];

describe('resolveWorkflowStatus', () => {
    it('resolves a run with no checks to success', () => {
        expect(
            resolveWorkflowStatus({ tests: NOT_RUN, smoke: NOT_RUN, governance: NOT_RUN, changeRequestRequested: false }),
        ).toBe('success');
    });

    it('reports failed tests regardless of the other checks', () => {
        for (const smoke of CHECKS) {
            for (const governance of CHECKS) {
                for (const changeRequestRequested of [true, false]) {
                    expect(resolveWorkflowStatus({ tests: FAILED, smoke, governance, changeRequestRequested })).toBe(
                        'failed_tests',
                    );
                }
            }
        }
    });

    it('reports failed smoke when tests are clean', () => {
        for (const tests of [NOT_RUN, PASSED]) {
            for (const governance of CHECKS) {
                expect(
                    resolveWorkflowStatus({ tests, smoke: FAILED, governance, changeRequestRequested: true }),
                ).toBe('failed_smoke');
            }
        }
    });

    it('reports failed governance only when a change request was requested', () => {
        const inputs = { tests: PASSED, smoke: PASSED, governance: FAILED };

        expect(resolveWorkflowStatus({ ...inputs, changeRequestRequested: true })).toBe('failed_governance');
        expect(resolveWorkflowStatus({ ...inputs, changeRequestRequested: false })).toBe('success');
    });

    it('treats a check that ran without a verdict as failed', () => {
        expect(
            resolveWorkflowStatus({
                tests: { ran: true, passed: null },
                smoke: NOT_RUN,
                governance: NOT_RUN,
                changeRequestRequested: false,
            }),
        ).toBe('failed_tests');
    });

    it('ignores a passed value on a check that did not run', () => {
        expect(
            resolveWorkflowStatus({
                tests: { ran: false, passed: false },
                smoke: NOT_RUN,
                governance: NOT_RUN,
                changeRequestRequested: false,
            }),
        ).toBe('success');
    });
});
