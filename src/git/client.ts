/**
 * Git client: wraps simple-git for branch, commit, diff, push and file operations.
 *
 * Dependency direction: client.ts → simple-git, core/errors, utils
 * Used by: workflow coordinator (through VersionControl), repository cache
 */

import { mkdir, readFile, writeFile, access } from 'node:fs/promises';
import { dirname, resolve, sep } from 'node:path';
import { simpleGit, type SimpleGit } from 'simple-git';
import { GitError, errorMessage } from '../core/errors.js';
import { logger } from '../utils/logger.js';
import type { DiffOptions, VersionControl } from './types.js';

export class GitClient implements VersionControl {
    private readonly git: SimpleGit;
    private readonly projectRoot: string;

    constructor(projectRoot: string) {
        this.projectRoot = resolve(projectRoot);
        this.git = simpleGit(this.projectRoot);
    }

    async isRepo(): Promise<boolean> {
        try {
            return await this.git.checkIsRepo();
        } catch {
            return false;
        }
    }

    async checkoutBranch(branchName: string): Promise<void> {
        try {
            const branches = await this.git.branchLocal();
            if (branches.all.includes(branchName)) {
                await this.git.checkout(branchName);
                logger.info(`Switched to existing branch: ${branchName}`);
            } else {
                await this.git.checkoutLocalBranch(branchName);
                logger.info(`Created and switched to branch: ${branchName}`);
            }
        } catch (err) {
            throw new GitError(`Failed to check out branch "${branchName}": ${errorMessage(err)}`, {
                branch: branchName,
            });
        }
    }

    async stageAll(): Promise<void> {
        try {
            await this.git.add('.');
        } catch (err) {
            throw new GitError(`Failed to stage changes: ${errorMessage(err)}`, {
                projectRoot: this.projectRoot,
            });
        }
    }

    async getDiff(options: DiffOptions = {}): Promise<string> {
        const args: string[] = [];
        if (options.staged) args.push('--cached');
        if (options.base) args.push(options.base);

        try {
            return await this.git.diff(args);
        } catch (err) {
            throw new GitError(`Failed to get diff: ${errorMessage(err)}`, {
                projectRoot: this.projectRoot,
                args,
            });
        }
    }

    async commit(message: string): Promise<string> {
        try {
            const result = await this.git.commit(message);
            const hash = result.commit || 'unknown';
            logger.info(`Committed: ${hash} ${message}`);
            return hash;
        } catch (err) {
            throw new GitError(`Failed to commit: ${errorMessage(err)}`, { message });
        }
    }

    async push(branchName: string, remote = 'origin'): Promise<void> {
        try {
            await this.git.push(remote, branchName, ['--set-upstream']);
            logger.info(`Pushed ${branchName} to ${remote}`);
        } catch (err) {
            throw new GitError(`Failed to push "${branchName}" to ${remote}: ${errorMessage(err)}`, {
                branch: branchName,
                remote,
            });
        }
    }

    async readFile(relativePath: string): Promise<string> {
        const absolutePath = this.resolveInside(relativePath);
        try {
            return await readFile(absolutePath, 'utf-8');
        } catch (err) {
            throw new GitError(`Failed to read ${relativePath}: ${errorMessage(err)}`, { path: absolutePath });
        }
    }

    async writeFile(relativePath: string, content: string): Promise<void> {
        const absolutePath = this.resolveInside(relativePath);
        try {
            await mkdir(dirname(absolutePath), { recursive: true });
            await writeFile(absolutePath, content, 'utf-8');
        } catch (err) {
            throw new GitError(`Failed to write ${relativePath}: ${errorMessage(err)}`, { path: absolutePath });
        }
    }

    async exists(relativePath: string): Promise<boolean> {
        try {
            await access(this.resolveInside(relativePath));
            return true;
        } catch {
            return false;
        }
    }

    /**
     * Generate a safe branch name from free text (a task or contract name).
     */
    static toBranchName(prefix: string, text: string): string {
        const slug = text
            .toLowerCase()
            .replace(/[^a-z0-9]+/g, '-')
            .replace(/^-+|-+$/g, '')
            .slice(0, 50);
        return `${prefix}${slug || 'change'}`;
    }

    /** Resolve a repository-relative path, refusing anything that escapes the root. */
    private resolveInside(relativePath: string): string {
        const absolutePath = resolve(this.projectRoot, relativePath);
        if (absolutePath !== this.projectRoot && !absolutePath.startsWith(this.projectRoot + sep)) {
            throw new GitError(`Path escapes the repository: ${relativePath}`, {
                projectRoot: this.projectRoot,
                path: relativePath,
            });
        }
        return absolutePath;
    }
}
