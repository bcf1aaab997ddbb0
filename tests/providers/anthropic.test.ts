/**
 * Tests for the Anthropic adapter against a fake fetch.
 */

import { describe, it, expect, vi, type Mock } from 'vitest';
import { AnthropicProvider } from '../../src/providers/anthropic.js';
import { ProviderError } from '../../src/core/errors.js';
import type { FetchLike } from '../../src/providers/types.js';

function reply(status: number, body: unknown): Response {
    return new Response(typeof body === 'string' ? body : JSON.stringify(body), { status });
}

function sentBody(fetch: Mock<FetchLike>): unknown {
    const init = fetch.mock.calls[0]?.[1];
    return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}

describe('AnthropicProvider', () => {
    it('requires an API key', () => {
        expect(() => new AnthropicProvider({ apiKey: '' })).toThrow(ProviderError);
    });

    it('folds system messages into the system field and joins text blocks', async () => {
        const fetch = vi.fn<FetchLike>(async () =>
            reply(200, {
                model: 'claude-test',
                stop_reason: 'end_turn',
                content: [
                    { type: 'text', text: 'Hello' },
                    { type: 'tool_use' },
                    { type: 'text', text: ' world' },
                ],
                usage: { input_tokens: 12, output_tokens: 3 },
            }),
        );
        const provider = new AnthropicProvider({ apiKey: 'test-secret', fetch });

        const response = await provider.chat(
            [
                { role: 'system', content: 'Be brief.' },
                { role: 'user', content: 'Greet me' },
            ],
            { model: 'claude-test', systemPrompt: 'You write code.', temperature: 0.2, maxTokens: 100 },
        );

        expect(response).toEqual({
            content: 'Hello world',
            model: 'claude-test',
            usage: { promptTokens: 12, completionTokens: 3, totalTokens: 15 },
            finishReason: 'end_turn',
        });
        expect(fetch.mock.calls[0]?.[0]).toBe('https://api.anthropic.com/v1/messages');
        expect(sentBody(fetch)).toEqual({
            model: 'claude-test',
            max_tokens: 100,
            messages: [{ role: 'user', content: 'Greet me' }],
            system: 'You write code.\n\nBe brief.',
            temperature: 0.2,
        });
    });

    it('sends the key and API version headers', async () => {
        const fetch = vi.fn<FetchLike>(async () => reply(200, { content: [] }));
        const provider = new AnthropicProvider({ apiKey: 'test-secret', apiVersion: '2024-01-01', fetch });

        const response = await provider.chat([{ role: 'user', content: 'hi' }]);

        expect(fetch.mock.calls[0]?.[1]?.headers).toEqual({
            'Content-Type': 'application/json',
            'x-api-key': 'test-secret',
            'anthropic-version': '2024-01-01',
        });
        expect(response.content).toBe('');
        expect(response.finishReason).toBe('unknown');
    });

    it('raises ProviderError on an error status', async () => {
        const fetch = vi.fn<FetchLike>(async () => reply(401, 'unauthorized'));
        const provider = new AnthropicProvider({ apiKey: 'test-secret', fetch });

        await expect(provider.chat([{ role: 'user', content: 'hi' }])).rejects.toThrow('Anthropic API error: 401');
    });

    it('raises ProviderError on an unexpected shape', async () => {
        const fetch = vi.fn<FetchLike>(async () => reply(200, { content: 'not a list' }));
        const provider = new AnthropicProvider({ apiKey: 'test-secret', fetch });

        await expect(provider.chat([{ role: 'user', content: 'hi' }])).rejects.toThrow(
            'Anthropic returned an unexpected response shape',
        );
    });

    it('treats a 400 as a reachable, authenticated API', async () => {
        const ok = new AnthropicProvider({ apiKey: 'test-secret', fetch: async () => reply(400, {}) });
        const denied = new AnthropicProvider({ apiKey: 'test-secret', fetch: async () => reply(401, {}) });
        const offline = new AnthropicProvider({
            apiKey: 'test-secret',
            fetch: async () => {
                throw new Error('offline');
            },
        });

        expect(await ok.validateConnection()).toBe(true);
        expect(await denied.validateConnection()).toBe(false);
        expect(await offline.validateConnection()).toBe(false);
    });
});
