/**
 * Contract agent: expands a one-line feature idea into a design contract.
 *
 * Dependency direction: contract.ts → agents/base, prompts/library, core/contracts
 * Used by: agent factory
 */

import { BaseAgent } from '../base.js';
import type { AgentOptions } from '../types.js';
import { loadAgentPrompt } from '../../prompts/library.js';
import type { LLMProvider } from '../../providers/types.js';
import { getStackProfile } from '../../core/config/stacks.js';
import type { ContractDraftInput, ContractDrafter } from '../../core/contracts/contract.js';

export class ContractAgent extends BaseAgent<ContractDraftInput> implements ContractDrafter {
    private readonly projectRoot: string;

    constructor(provider: LLMProvider, options: AgentOptions, projectRoot: string) {
        super('contract', provider, options);
        this.projectRoot = projectRoot;
    }

    async draft(input: ContractDraftInput): Promise<string> {
        const output = await this.execute(input);
        return output.content;
    }

    protected buildSystemPrompt(): string {
        return loadAgentPrompt(this.projectRoot, 'contract');
    }

    protected buildUserPrompt(input: ContractDraftInput): string {
        const { config } = input;
        const stack = [getStackProfile(config.language).label];
        if (config.framework !== 'none') stack.push(config.framework);

        const lines = [
            `Feature idea: ${input.idea}`,
            '',
            `Project: ${config.name}`,
            `Technology stack: ${stack.join(', ')}`,
        ];

        if (config.conventions) {
            lines.push(`Project conventions: ${config.conventions}`);
        }

        const context = Object.entries(input.context);
        if (context.length > 0) {
            lines.push('', 'Additional context:', ...context.map(([key, value]) => `- ${key}: ${value}`));
        }

        lines.push('', 'Write the complete design contract in markdown, ready for code generation.');
        return lines.join('\n');
    }
}
