/**
 * Change-request publishers.
 *
 * GitHubPublisher opens a pull request through the GitHub REST API using
 * fetch(); StubPublisher records the request without contacting anything and
 * is used when no GitHub repository or token is configured.
 *
 * Dependency direction: change-request.ts → git/types, core/errors, utils
 * Used by: workflow coordinator
 */

import { z } from 'zod';
import type { ProjectConfig } from '../core/config/types.js';
import { GitError, errorMessage } from '../core/errors.js';
import { logger } from '../utils/logger.js';
import type { ChangeRequestInput, ChangeRequestPublisher, ChangeRequestResult } from './types.js';

const GITHUB_API = 'https://api.github.com';

const pullRequestResponseSchema = z.object({
    number: z.number().int().optional(),
    html_url: z.string().optional(),
});

type FetchLike = (url: string | URL, init?: RequestInit) => Promise<Response>;

export interface GitHubPublisherOptions {
    readonly owner: string;
    readonly repo: string;
    readonly token: string;
    readonly apiUrl?: string;
    readonly fetch?: FetchLike;
}

export class GitHubPublisher implements ChangeRequestPublisher {
    public readonly name = 'github';
    private readonly owner: string;
    private readonly repo: string;
    private readonly token: string;
    private readonly apiUrl: string;
    private readonly fetchImpl: FetchLike;

    constructor(options: GitHubPublisherOptions) {
        if (!options.token) {
            throw new GitError('GitHub token is required to open pull requests', {
                owner: options.owner,
                repo: options.repo,
            });
        }
        this.owner = options.owner;
        this.repo = options.repo;
        this.token = options.token;
        this.apiUrl = options.apiUrl ?? GITHUB_API;
        this.fetchImpl = options.fetch ?? fetch;
    }

    async create(input: ChangeRequestInput): Promise<ChangeRequestResult> {
        let resp: Response;
        try {
            resp = await this.fetchImpl(`${this.apiUrl}/repos/${this.owner}/${this.repo}/pulls`, {
                method: 'POST',
                headers: {
                    Authorization: `Bearer ${this.token}`,
                    Accept: 'application/vnd.github+json',
                    'Content-Type': 'application/json',
                    'X-GitHub-Api-Version': '2022-11-28',
                },
                body: JSON.stringify({
                    title: input.title,
                    body: input.body,
                    head: input.branch,
                    base: input.base,
                }),
            });
        } catch (err) {
            throw new GitError(`Failed to reach GitHub: ${errorMessage(err)}`, {
                owner: this.owner,
                repo: this.repo,
            });
        }

        if (!resp.ok) {
            const body = await resp.text();
            throw new GitError(`GitHub pull request create failed ${resp.status}: ${body}`, {
                status: resp.status,
                owner: this.owner,
                repo: this.repo,
            });
        }

        const parsed = pullRequestResponseSchema.safeParse(await resp.json());
        const data: z.infer<typeof pullRequestResponseSchema> = parsed.success ? parsed.data : {};
        logger.success(`Opened pull request #${data.number ?? '?'}: ${data.html_url ?? ''}`);

        return {
            provider: this.name,
            url: data.html_url ?? null,
            number: data.number ?? null,
            branch: input.branch,
            base: input.base,
            title: input.title,
        };
    }
}

export class StubPublisher implements ChangeRequestPublisher {
    public readonly name = 'stub';

    async create(input: ChangeRequestInput): Promise<ChangeRequestResult> {
        logger.info(`Change request recorded locally (no remote configured): ${input.branch} → ${input.base}`);
        return {
            provider: this.name,
            url: null,
            number: null,
            branch: input.branch,
            base: input.base,
            title: input.title,
        };
    }
}

/**
 * Pick a publisher for a project: GitHub when the repository is configured
 * and a token is available, the stub otherwise.
 */
export function createPublisher(
    config: ProjectConfig,
    env: NodeJS.ProcessEnv = process.env,
): ChangeRequestPublisher {
    const github = config.repository.github;
    const token = env['GITHUB_TOKEN'];

    if (github && token) {
        return new GitHubPublisher({ owner: github.owner, repo: github.repo, token });
    }

    if (github) {
        logger.warn('GitHub repository configured but GITHUB_TOKEN is not set, using stub change requests');
    }
    return new StubPublisher();
}
