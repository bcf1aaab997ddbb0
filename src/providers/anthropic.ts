/**
 * Anthropic provider adapter.
 *
 * Uses the Anthropic Messages API directly via fetch() with no SDK dependency.
 * Responses are validated with zod before anything reads them.
 *
 * Dependency direction: anthropic.ts → zod, providers/types.ts, core/errors.ts
 * Used by: providers/registry.ts
 */

import { z } from 'zod';
import { ProviderError, errorMessage } from '../core/errors.js';
import type { LLMProvider, ChatMessage, ChatOptions, ChatResponse, FetchLike } from './types.js';
import { logger } from '../utils/logger.js';

export interface AnthropicProviderConfig {
  readonly apiKey: string;
  readonly baseUrl?: string;
  readonly apiVersion?: string;
  readonly fetch?: FetchLike;
}

const DEFAULTS = {
  baseUrl: 'https://api.anthropic.com',
  apiVersion: '2023-06-01',
  model: 'claude-sonnet-4-20250514',
  maxTokens: 4096,
} as const;

const messagesResponseSchema = z.object({
  model: z.string().optional(),
  stop_reason: z.string().nullable().optional(),
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).default([]),
  usage: z
    .object({
      input_tokens: z.number().default(0),
      output_tokens: z.number().default(0),
    })
    .default({}),
});

type AnthropicMessage = { role: 'user' | 'assistant'; content: string };

export class AnthropicProvider implements LLMProvider {
  public readonly name = 'anthropic' as const;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly apiVersion: string;
  private readonly fetchImpl: FetchLike;

  constructor(config: AnthropicProviderConfig) {
    if (!config.apiKey) {
      throw new ProviderError('Anthropic API key is required', { provider: 'anthropic' });
    }
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl ?? DEFAULTS.baseUrl;
    this.apiVersion = config.apiVersion ?? DEFAULTS.apiVersion;
    this.fetchImpl = config.fetch ?? fetch;
  }

  async chat(messages: readonly ChatMessage[], options?: ChatOptions): Promise<ChatResponse> {
    const { systemPrompt, apiMessages } = this.prepareMessages(messages, options);
    const model = options?.model ?? DEFAULTS.model;

    const body: Record<string, unknown> = {
      model,
      max_tokens: options?.maxTokens ?? DEFAULTS.maxTokens,
      messages: apiMessages,
    };
    if (systemPrompt) {
      body['system'] = systemPrompt;
    }
    if (options?.temperature !== undefined) {
      body['temperature'] = options.temperature;
    }

    logger.debug(`Anthropic chat request: model=${model}, messages=${apiMessages.length}`);

    const parsed = messagesResponseSchema.safeParse(await this.request('/v1/messages', body));
    if (!parsed.success) {
      throw new ProviderError('Anthropic returned an unexpected response shape', {
        provider: 'anthropic',
        issues: parsed.error.issues,
      });
    }

    const response = parsed.data;
    const { input_tokens: promptTokens, output_tokens: completionTokens } = response.usage;

    return {
      content: response.content
        .filter((block) => block.type === 'text')
        .map((block) => block.text ?? '')
        .join(''),
      model: response.model ?? model,
      usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
      finishReason: response.stop_reason ?? 'unknown',
    };
  }

  async validateConnection(): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/v1/messages`, {
        method: 'POST',
        headers: this.getHeaders(),
        body: JSON.stringify({
          model: DEFAULTS.model,
          max_tokens: 1,
          messages: [{ role: 'user', content: 'ping' }],
        }),
      });

      // 400 still means the key was accepted
      return response.status === 200 || response.status === 400;
    } catch (err) {
      logger.debug(`Anthropic connection check failed: ${errorMessage(err)}`);
      return false;
    }
  }

  // ── Private helpers ──

  private getHeaders(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      'x-api-key': this.apiKey,
      'anthropic-version': this.apiVersion,
    };
  }

  private async request(path: string, body: Record<string, unknown>): Promise<unknown> {
    let response: Response;

    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers: this.getHeaders(),
        body: JSON.stringify(body),
      });
    } catch (err) {
      throw new ProviderError(`Failed to connect to Anthropic API: ${errorMessage(err)}`, {
        provider: 'anthropic',
        baseUrl: this.baseUrl,
      });
    }

    if (!response.ok) {
      const errorBody = await response.text();
      throw new ProviderError(`Anthropic API error: ${response.status} ${response.statusText}`, {
        status: response.status,
        body: errorBody,
        provider: 'anthropic',
      });
    }

    return response.json();
  }

  /** System messages are folded into the top-level system prompt. */
  private prepareMessages(
    messages: readonly ChatMessage[],
    options?: ChatOptions,
  ): { systemPrompt: string | undefined; apiMessages: AnthropicMessage[] } {
    let systemPrompt = options?.systemPrompt;
    const apiMessages: AnthropicMessage[] = [];

    for (const msg of messages) {
      if (msg.role === 'system') {
        systemPrompt = systemPrompt ? `${systemPrompt}\n\n${msg.content}` : msg.content;
      } else {
        apiMessages.push({ role: msg.role, content: msg.content });
      }
    }

    return { systemPrompt, apiMessages };
  }
}
