/**
 * Tests for the provider registry (factory pattern).
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createProvider, clearProviderCache, SUPPORTED_PROVIDERS } from '../../src/providers/registry.js';
import { ProviderError } from '../../src/core/errors.js';
import type { ProviderConfig } from '../../src/core/config/types.js';

const OLLAMA: ProviderConfig = {
    ollama: { baseUrl: 'http://localhost:11434' },
};

beforeEach(() => {
    clearProviderCache();
});

describe('SUPPORTED_PROVIDERS', () => {
    it('lists anthropic and ollama', () => {
        expect(SUPPORTED_PROVIDERS).toEqual(['anthropic', 'ollama']);
    });
});

describe('createProvider', () => {
    it('creates an Ollama provider with default config', () => {
        expect(createProvider('ollama', OLLAMA, {}).name).toBe('ollama');
    });

    it('creates an Anthropic provider from config', () => {
        const config: ProviderConfig = {
            anthropic: {
                apiKey: 'test-secret',
                baseUrl: 'https://api.anthropic.com',
                apiVersion: '2023-06-01',
            },
        };

        expect(createProvider('anthropic', config, {}).name).toBe('anthropic');
    });

    it('falls back to ANTHROPIC_API_KEY', () => {
        expect(createProvider('anthropic', {}, { ANTHROPIC_API_KEY: 'test-secret' }).name).toBe('anthropic');
    });

    it('throws ProviderError when no Anthropic key is available', () => {
        expect(() => createProvider('anthropic', {}, {})).toThrow(ProviderError);
        expect(() => createProvider('anthropic', {}, {})).toThrow(/ANTHROPIC_API_KEY/);
    });

    it('caches provider instances', () => {
        const first = createProvider('ollama', OLLAMA, {});
        const second = createProvider('ollama', OLLAMA, {});
        expect(first).toBe(second);
    });

    it('returns fresh instances after cache clear', () => {
        const first = createProvider('ollama', OLLAMA, {});
        clearProviderCache();
        const second = createProvider('ollama', OLLAMA, {});
        expect(first).not.toBe(second);
    });
});
