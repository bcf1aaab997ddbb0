import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { isSafeRelativePath, writeGeneratedFiles } from '../../src/core/workflow/file-parser.js';
import { GitClient } from '../../src/git/client.js';
import { GitError } from '../../src/core/errors.js';

describe('Security Tests for generated file paths', () => {
  let projectRoot: string;

  beforeEach(() => {
    projectRoot = mkdtempSync(join(tmpdir(), 'deliverpilot-security-'));
  });

  afterEach(() => {
    rmSync(projectRoot, { recursive: true, force: true });
  });

  describe('isSafeRelativePath', () => {
    it('should reject relative path traversal', () => {
      expect(isSafeRelativePath('../../../etc/passwd')).toBe(false);
      expect(isSafeRelativePath('../config.json')).toBe(false);
      expect(isSafeRelativePath('./subdir/../../../etc/passwd')).toBe(false);
      expect(isSafeRelativePath('..')).toBe(false);
    });

    it('should reject absolute and drive-letter paths', () => {
      expect(isSafeRelativePath('/etc/passwd')).toBe(false);
      expect(isSafeRelativePath('C:\\Windows\\system.ini')).toBe(false);
    });

    it('should reject empty paths and the root itself', () => {
      expect(isSafeRelativePath('')).toBe(false);
      expect(isSafeRelativePath('   ')).toBe(false);
      expect(isSafeRelativePath('.')).toBe(false);
    });

    it('should allow paths that stay inside the root', () => {
      expect(isSafeRelativePath('src/index.ts')).toBe(true);
      expect(isSafeRelativePath('subdir/../normal-file.txt')).toBe(true);
      expect(isSafeRelativePath('.github/workflows/ci.yml')).toBe(true);
    });
  });

  describe('writing through the git client', () => {
    it('should write legitimate files and skip traversal attempts', async () => {
      const summary = await writeGeneratedFiles(new GitClient(projectRoot), [
        { path: 'src/utils/helper.py', content: 'def helper(): pass\n' },
        { path: '../outside.txt', content: 'escape' },
        { path: '/tmp/absolute.txt', content: 'escape' },
      ]);

      expect(summary.written).toEqual(['src/utils/helper.py']);
      expect(summary.skipped).toEqual(['../outside.txt', '/tmp/absolute.txt']);
      expect(existsSync(join(projectRoot, 'src/utils/helper.py'))).toBe(true);
      expect(existsSync(join(projectRoot, '..', 'outside.txt'))).toBe(false);
    });

    it('should refuse direct writes that escape the repository', async () => {
      const client = new GitClient(projectRoot);

      await expect(client.writeFile('../escape.txt', 'x')).rejects.toThrow(GitError);
      await expect(client.readFile('../../etc/hostname')).rejects.toThrow('Path escapes the repository');
    });
  });
});
