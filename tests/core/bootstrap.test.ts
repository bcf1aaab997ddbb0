import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { homedir, tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { createToolContext, resolveHomeDir } from '../../src/core/bootstrap.js';

const dirs: string[] = [];

afterEach(() => {
    for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
});

describe('resolveHomeDir', () => {
    it('prefers DELIVERPILOT_HOME', () => {
        expect(resolveHomeDir({ DELIVERPILOT_HOME: '/srv/deliverpilot' })).toBe(resolve('/srv/deliverpilot'));
    });

    it('defaults to the user home', () => {
        expect(resolveHomeDir({})).toBe(resolve(homedir()));
    });
});

describe('createToolContext', () => {
    it('shares one registry between the cache and the provider', async () => {
        const home = mkdtempSync(join(tmpdir(), 'deliverpilot-home-'));
        dirs.push(home);
        const context = createToolContext({ homeDir: home, clone: async () => undefined });

        context.registry.register('shop', '/srv/git/shop');

        expect(context.homeDir).toBe(home);
        expect(await context.configProvider.resolveWorkingDirectory('shop')).toBe(
            context.repositories.pathFor('shop'),
        );
        expect(await context.configProvider.resolveWorkingDirectory('blog')).toBeNull();
    });
});
