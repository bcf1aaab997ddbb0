/**
 * Agent base class: shared prompt → provider → response plumbing.
 *
 * Each agent supplies its system prompt and turns its input into a user
 * prompt; the base class makes the provider call and normalizes failures
 * into ProviderError.
 *
 * Dependency direction: agents/base.ts → providers/types, core/errors, utils
 * Used by: agent implementations
 */

import type { LLMProvider, ChatMessage, ChatOptions, ChatResponse } from '../providers/types.js';
import type { AgentOptions, AgentRole } from './types.js';
import { ProviderError, errorMessage } from '../core/errors.js';
import { logger } from '../utils/logger.js';
import { AGENT_ROLE_LABELS } from './types.js';

/** Output of one agent call. */
export interface AgentOutput {
    readonly content: string;
    readonly role: AgentRole;
    /** The model that answered. */
    readonly model: string;
    readonly tokensUsed: number;
}

export abstract class BaseAgent<TInput> {
    public readonly role: AgentRole;
    protected readonly provider: LLMProvider;
    protected readonly model: string;
    protected readonly temperature: number;
    protected readonly maxTokens: number;

    constructor(role: AgentRole, provider: LLMProvider, options: AgentOptions) {
        this.role = role;
        this.provider = provider;
        this.model = options.model;
        this.temperature = options.temperature ?? 0.3;
        this.maxTokens = options.maxTokens ?? 4096;
    }

    /**
     * Run the agent once.
     *
     * @throws {ProviderError} if the LLM call fails
     */
    protected async execute(input: TInput): Promise<AgentOutput> {
        const label = AGENT_ROLE_LABELS[this.role];
        logger.info(`${label} starting...`);

        const messages: ChatMessage[] = [{ role: 'user', content: this.buildUserPrompt(input) }];
        const options: ChatOptions = {
            model: this.model,
            temperature: this.temperature,
            maxTokens: this.maxTokens,
            systemPrompt: this.buildSystemPrompt(),
        };

        let response: ChatResponse;
        try {
            response = await this.provider.chat(messages, options);
        } catch (err) {
            if (err instanceof ProviderError) throw err;
            throw new ProviderError(`${label} failed: ${errorMessage(err)}`, {
                role: this.role,
                model: this.model,
            });
        }

        logger.success(`${label} complete (${response.usage.totalTokens} tokens)`);

        return {
            content: response.content,
            role: this.role,
            model: response.model,
            tokensUsed: response.usage.totalTokens,
        };
    }

    /** The system prompt that defines this agent's role and output format. */
    protected abstract buildSystemPrompt(): string;

    protected abstract buildUserPrompt(input: TInput): string;
}
