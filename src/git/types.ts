/**
 * Version-control and change-request contracts.
 *
 * The workflow coordinator only talks to these interfaces; GitClient and the
 * publishers in change-request.ts are the production implementations.
 *
 * Dependency direction: git/types.ts → nothing (leaf module)
 * Used by: git/client, git/change-request, workflow coordinator
 */

export interface DiffOptions {
    /** Diff the index against HEAD instead of the working tree. */
    readonly staged?: boolean;
    /** Diff against this ref (e.g. the change-request base). */
    readonly base?: string;
}

/**
 * Operations the workflow needs from a working copy. Every method rejects
 * with a GitError when the underlying operation fails.
 */
export interface VersionControl {
    isRepo(): Promise<boolean>;
    /** Switch to a branch, creating it from the current HEAD when it does not exist. */
    checkoutBranch(branchName: string): Promise<void>;
    stageAll(): Promise<void>;
    getDiff(options?: DiffOptions): Promise<string>;
    /** Commit the index. Returns the commit hash. */
    commit(message: string): Promise<string>;
    push(branchName: string, remote?: string): Promise<void>;
    readFile(relativePath: string): Promise<string>;
    writeFile(relativePath: string, content: string): Promise<void>;
    exists(relativePath: string): Promise<boolean>;
}

export interface ChangeRequestInput {
    readonly workingDirectory: string;
    readonly branch: string;
    readonly base: string;
    readonly title: string;
    readonly body: string;
}

export interface ChangeRequestResult {
    /** Provider that handled the request ("github" or "stub"). */
    readonly provider: string;
    readonly url: string | null;
    readonly number: number | null;
    readonly branch: string;
    readonly base: string;
    readonly title: string;
}

export interface ChangeRequestPublisher {
    readonly name: string;
    create(input: ChangeRequestInput): Promise<ChangeRequestResult>;
}
