/**
 * Remediation agent: proposes a fix for a failed test run.
 *
 * Dependency direction: remediation.ts → agents/base, prompts/library, workflow/fix-suggestion
 * Used by: agent factory
 */

import { BaseAgent } from '../base.js';
import type { AgentOptions } from '../types.js';
import { loadAgentPrompt } from '../../prompts/library.js';
import type { LLMProvider } from '../../providers/types.js';
import type { StackLanguage } from '../../core/config/stacks.js';
import { parseFixSuggestion } from '../../core/workflow/fix-suggestion.js';
import type { FixSuggester, TestFailure } from '../../core/workflow/remediation.js';
import type { FixSuggestion } from '../../core/workflow/types.js';

const EMPTY = '(empty)';

export class RemediationAgent extends BaseAgent<TestFailure> implements FixSuggester {
    private readonly projectRoot: string;
    private readonly language: StackLanguage;

    constructor(provider: LLMProvider, options: AgentOptions, projectRoot: string, language: StackLanguage) {
        super('remediation', provider, { ...options, temperature: options.temperature ?? 0.2 });
        this.projectRoot = projectRoot;
        this.language = language;
    }

    async suggest(failure: TestFailure): Promise<FixSuggestion> {
        const output = await this.execute(failure);
        return parseFixSuggestion(output.content);
    }

    protected buildSystemPrompt(): string {
        return loadAgentPrompt(this.projectRoot, 'remediation');
    }

    protected buildUserPrompt(failure: TestFailure): string {
        const lines = [
            'Test failure analysis:',
            '',
            `Command: ${failure.command}`,
            `Exit code: ${failure.exitCode ?? 'none'}`,
            `Language: ${this.language}`,
            '',
            'Standard output:',
            '---',
            failure.stdout || EMPTY,
            '---',
            '',
            'Standard error:',
            '---',
            failure.stderr || EMPTY,
            '---',
        ];

        if (failure.changedFiles.length > 0) {
            lines.push('', 'Recently changed files:', ...failure.changedFiles.map((f) => `- ${f}`));
        }

        return lines.join('\n');
    }
}
