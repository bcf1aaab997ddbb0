/**
 * Ollama local model provider adapter.
 *
 * Connects to the Ollama HTTP API (default: http://localhost:11434).
 *
 * Dependency direction: ollama.ts → zod, providers/types.ts, core/errors.ts
 * Used by: providers/registry.ts
 */

import { z } from 'zod';
import { ProviderError, errorMessage } from '../core/errors.js';
import type { LLMProvider, ChatMessage, ChatOptions, ChatResponse, FetchLike } from './types.js';
import { logger } from '../utils/logger.js';

export interface OllamaProviderConfig {
  readonly baseUrl?: string;
  /** Per-request timeout; local models can be slow to answer. */
  readonly timeoutMs?: number;
  readonly fetch?: FetchLike;
}

const DEFAULTS = {
  baseUrl: 'http://localhost:11434',
  model: 'llama3.2:latest',
  timeoutMs: 300_000,
} as const;

const chatResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({ content: z.string().default('') }).optional(),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().default(0),
  eval_count: z.number().default(0),
});

export class OllamaProvider implements LLMProvider {
  public readonly name = 'ollama' as const;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(config?: OllamaProviderConfig) {
    this.baseUrl = config?.baseUrl ?? DEFAULTS.baseUrl;
    this.timeoutMs = config?.timeoutMs ?? DEFAULTS.timeoutMs;
    this.fetchImpl = config?.fetch ?? fetch;
  }

  async chat(messages: readonly ChatMessage[], options?: ChatOptions): Promise<ChatResponse> {
    const model = options?.model ?? DEFAULTS.model;
    const ollamaMessages = this.prepareMessages(messages, options);

    const modelOptions: Record<string, number> = {};
    if (options?.temperature !== undefined) {
      modelOptions['temperature'] = options.temperature;
    }
    if (options?.maxTokens !== undefined) {
      modelOptions['num_predict'] = options.maxTokens;
    }

    logger.debug(`Ollama chat request: model=${model}, messages=${ollamaMessages.length}`);

    const parsed = chatResponseSchema.safeParse(
      await this.request('/api/chat', {
        model,
        messages: ollamaMessages,
        stream: false,
        options: modelOptions,
      }),
    );
    if (!parsed.success) {
      throw new ProviderError('Ollama returned an unexpected response shape', {
        provider: 'ollama',
        issues: parsed.error.issues,
      });
    }

    const response = parsed.data;
    return {
      content: response.message?.content ?? '',
      model: response.model ?? model,
      usage: {
        promptTokens: response.prompt_eval_count,
        completionTokens: response.eval_count,
        totalTokens: response.prompt_eval_count + response.eval_count,
      },
      finishReason: response.done_reason ?? 'stop',
    };
  }

  async validateConnection(): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/api/tags`);
      return response.ok;
    } catch (err) {
      logger.debug(`Ollama connection check failed: ${errorMessage(err)}`);
      return false;
    }
  }

  // ── Private helpers ──

  private prepareMessages(
    messages: readonly ChatMessage[],
    options?: ChatOptions,
  ): ChatMessage[] {
    const result: ChatMessage[] = [];

    if (options?.systemPrompt) {
      result.push({ role: 'system', content: options.systemPrompt });
    }
    for (const msg of messages) {
      result.push({ role: msg.role, content: msg.content });
    }

    return result;
  }

  private async request(path: string, body: Record<string, unknown>): Promise<unknown> {
    let response: Response;

    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new ProviderError(`Failed to connect to Ollama at ${this.baseUrl}: ${errorMessage(err)}`, {
        provider: 'ollama',
        baseUrl: this.baseUrl,
      });
    }

    if (!response.ok) {
      const errorBody = await response.text();
      throw new ProviderError(`Ollama API error: ${response.status} ${response.statusText}`, {
        status: response.status,
        body: errorBody,
        provider: 'ollama',
      });
    }

    return response.json();
  }
}
