/**
 * Tests for project resolution: registered clones first, then local projects.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileConfigProvider } from '../../../src/core/config/provider.js';
import { ProjectRegistry } from '../../../src/core/config/registry.js';
import { saveProjectConfig } from '../../../src/core/config/manager.js';
import { getDefaultConfig } from '../../../src/core/config/defaults.js';
import { RepositoryCache, type CloneFn } from '../../../src/git/repository-cache.js';
import { ConfigError, GitError } from '../../../src/core/errors.js';

let home: string;
let projectsDir: string;

beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), 'deliverpilot-provider-'));
    projectsDir = join(home, 'projects');
    mkdirSync(projectsDir);
});

afterEach(() => {
    rmSync(home, { recursive: true, force: true });
});

/** Clone stand-in that writes a project config into the destination. */
const fakeClone: CloneFn = async (_url, destination) => {
    mkdirSync(destination, { recursive: true });
    saveProjectConfig(destination, getDefaultConfig('shop', 'php'));
};

describe('FileConfigProvider', () => {
    it('resolves a local project directory', async () => {
        const local = join(projectsDir, 'blog');
        mkdirSync(local);
        saveProjectConfig(local, getDefaultConfig('blog', 'typescript'));

        const registry = new ProjectRegistry(home);
        const provider = new FileConfigProvider(projectsDir, new RepositoryCache(home, registry, fakeClone));

        expect(await provider.resolveWorkingDirectory('blog')).toBe(local);
        expect((await provider.load('blog')).language).toBe('typescript');
    });

    it('clones a registered project once and loads its config', async () => {
        const registry = new ProjectRegistry(home);
        registry.register('shop', 'https://example.test/acme/shop.git');
        const clone = vi.fn<CloneFn>(fakeClone);
        const repositories = new RepositoryCache(home, registry, clone);
        const provider = new FileConfigProvider(projectsDir, repositories);

        const config = await provider.load('shop');
        await provider.resolveWorkingDirectory('shop');

        expect(config.language).toBe('php');
        expect(clone).toHaveBeenCalledTimes(1);
        expect(clone).toHaveBeenCalledWith('https://example.test/acme/shop.git', repositories.pathFor('shop'));
        expect(repositories.size).toBe(1);
    });

    it('returns null and fails to load an unknown project', async () => {
        const provider = new FileConfigProvider(projectsDir, new RepositoryCache(home, new ProjectRegistry(home), fakeClone));

        expect(await provider.resolveWorkingDirectory('ghost')).toBeNull();
        await expect(provider.load('ghost')).rejects.toThrow(ConfigError);
        await expect(provider.load('ghost')).rejects.toThrow('Project "ghost" not found');
    });
});

describe('RepositoryCache', () => {
    it('wraps a clone failure in a GitError', async () => {
        const registry = new ProjectRegistry(home);
        registry.register('shop', 'https://example.test/acme/shop.git');
        const cache = new RepositoryCache(home, registry, async () => {
            throw new Error('authentication required');
        });

        await expect(cache.resolve('shop')).rejects.toThrow(GitError);
        await expect(cache.resolve('shop')).rejects.toThrow(
            'Failed to clone https://example.test/acme/shop.git: authentication required',
        );
    });

    it('forgets a resolution and can delete the clone', async () => {
        const registry = new ProjectRegistry(home);
        registry.register('shop', '/srv/git/shop');
        const clone = vi.fn<CloneFn>(fakeClone);
        const cache = new RepositoryCache(home, registry, clone);

        await cache.resolve('shop');
        await cache.invalidate('shop', true);
        expect(cache.size).toBe(0);

        await cache.resolve('shop');
        expect(clone).toHaveBeenCalledTimes(2);
    });
});
