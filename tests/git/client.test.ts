/**
 * Tests for the git client's file operations and branch naming.
 * Nothing here runs git itself.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { GitClient } from '../../src/git/client.js';

describe('GitClient.toBranchName', () => {
    it('slugifies free text under the prefix', () => {
        expect(GitClient.toBranchName('deliverpilot/', 'Orders API: v2!')).toBe('deliverpilot/orders-api-v2');
    });

    it('falls back to "change" when nothing is left', () => {
        expect(GitClient.toBranchName('fix/', '***')).toBe('fix/change');
    });

    it('caps the slug at 50 characters', () => {
        expect(GitClient.toBranchName('', 'a'.repeat(80))).toBe('a'.repeat(50));
    });
});

describe('GitClient file operations', () => {
    let root: string;

    beforeEach(() => {
        root = mkdtempSync(join(tmpdir(), 'deliverpilot-git-'));
    });

    afterEach(() => {
        rmSync(root, { recursive: true, force: true });
    });

    it('writes, reads and checks files relative to the root', async () => {
        const client = new GitClient(root);

        expect(await client.exists('contracts/orders.md')).toBe(false);
        await client.writeFile('contracts/orders.md', '# Orders\n');

        expect(await client.exists('contracts/orders.md')).toBe(true);
        expect(await client.readFile('contracts/orders.md')).toBe('# Orders\n');
        expect(readFileSync(join(root, 'contracts', 'orders.md'), 'utf-8')).toBe('# Orders\n');
    });

    it('reports a missing file as a GitError', async () => {
        await expect(new GitClient(root).readFile('missing.md')).rejects.toThrow('Failed to read missing.md');
    });

    it('treats escaping paths as missing', async () => {
        expect(await new GitClient(root).exists('../etc/passwd')).toBe(false);
    });
});
