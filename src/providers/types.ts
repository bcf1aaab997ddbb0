/**
 * LLM Provider interface contract.
 *
 * The codegen and remediation agents only ever talk to an LLMProvider;
 * adapters for Anthropic and Ollama implement it over fetch().
 *
 * Dependency direction: providers/types.ts → nothing (leaf module)
 * Used by: provider implementations, registry, agents
 */

/** Supported LLM provider names. */
export type LLMProviderName = 'anthropic' | 'ollama';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
}

export interface ChatOptions {
  readonly model?: string;
  /** Sampling temperature (0.0 - 2.0). */
  readonly temperature?: number;
  readonly maxTokens?: number;
  /** System prompt (Anthropic sends it as a top-level field). */
  readonly systemPrompt?: string;
}

export interface ChatResponse {
  readonly content: string;
  /** The model that actually answered. */
  readonly model: string;
  readonly usage: TokenUsage;
  /** Provider-specific finish reason. */
  readonly finishReason: string;
}

export interface TokenUsage {
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly totalTokens: number;
}

/** The subset of fetch() the adapters use; injected in tests. */
export type FetchLike = (url: string | URL, init?: RequestInit) => Promise<Response>;

export interface LLMProvider {
  readonly name: LLMProviderName;

  /**
   * Send a chat completion request and get the full response.
   * @throws {ProviderError} on API failure, network error, or invalid response.
   */
  chat(messages: readonly ChatMessage[], options?: ChatOptions): Promise<ChatResponse>;

  /**
   * Check that the provider is reachable and authenticated.
   * Returns false instead of throwing.
   */
  validateConnection(): Promise<boolean>;
}
