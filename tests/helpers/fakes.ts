/**
 * In-process stand-ins for version control and change-request publishing.
 */

import type {
    ChangeRequestInput,
    ChangeRequestPublisher,
    ChangeRequestResult,
    DiffOptions,
    VersionControl,
} from '../../src/git/types.js';
import { GitError } from '../../src/core/errors.js';

export interface FakeVcsOptions {
    files?: Record<string, string>;
    /** Returned by getDiff({ staged: true }). */
    stagedDiff?: string;
    /** Returned by getDiff() without options. */
    workingDiff?: string;
    /** Answer of isRepo(); defaults to true. */
    repo?: boolean;
    /** Method names that reject with a GitError. */
    failOn?: ReadonlyArray<keyof VersionControl>;
}

/** Working copy kept in a Map; records every call. */
export class FakeVcs implements VersionControl {
    readonly files: Map<string, string>;
    readonly calls: string[] = [];
    readonly commits: string[] = [];
    readonly pushes: Array<{ branch: string; remote?: string }> = [];
    branch = 'main';
    stagedDiff: string;
    workingDiff: string;
    private readonly repo: boolean;
    private readonly failOn: ReadonlySet<string>;

    constructor(options: FakeVcsOptions = {}) {
        this.files = new Map(Object.entries(options.files ?? {}));
        this.stagedDiff = options.stagedDiff ?? '';
        this.workingDiff = options.workingDiff ?? '';
        this.repo = options.repo ?? true;
        this.failOn = new Set(options.failOn ?? []);
    }

    private record(method: keyof VersionControl, detail = ''): void {
        this.calls.push(detail ? `${method} ${detail}` : method);
        if (this.failOn.has(method)) {
            throw new GitError(`${method} failed`);
        }
    }

    async isRepo(): Promise<boolean> {
        this.record('isRepo');
        return this.repo;
    }

    async checkoutBranch(branchName: string): Promise<void> {
        this.record('checkoutBranch', branchName);
        this.branch = branchName;
    }

    async stageAll(): Promise<void> {
        this.record('stageAll');
    }

    async getDiff(options: DiffOptions = {}): Promise<string> {
        this.record('getDiff', options.staged ? 'staged' : '');
        return options.staged ? this.stagedDiff : this.workingDiff;
    }

    async commit(message: string): Promise<string> {
        this.record('commit', message);
        this.commits.push(message);
        return `c0ffee${this.commits.length}`;
    }

    async push(branchName: string, remote?: string): Promise<void> {
        this.record('push', branchName);
        this.pushes.push({ branch: branchName, remote });
    }

    async readFile(relativePath: string): Promise<string> {
        this.record('readFile', relativePath);
        const content = this.files.get(relativePath);
        if (content === undefined) throw new GitError(`No such file: ${relativePath}`);
        return content;
    }

    async writeFile(relativePath: string, content: string): Promise<void> {
        this.record('writeFile', relativePath);
        this.files.set(relativePath, content);
    }

    async exists(relativePath: string): Promise<boolean> {
        this.record('exists', relativePath);
        return this.files.has(relativePath);
    }
}

/** Publisher that records requests and answers with a fixed number. */
export class RecordingPublisher implements ChangeRequestPublisher {
    readonly name = 'recording';
    readonly requests: ChangeRequestInput[] = [];
    private readonly error: Error | null;

    constructor(error: Error | null = null) {
        this.error = error;
    }

    async create(input: ChangeRequestInput): Promise<ChangeRequestResult> {
        this.requests.push(input);
        if (this.error) throw this.error;
        return {
            provider: this.name,
            url: `https://example.test/pull/${this.requests.length}`,
            number: this.requests.length,
            branch: input.branch,
            base: input.base,
            title: input.title,
        };
    }
}
