/**
 * Shell command execution for the test and smoke steps.
 *
 * Commands run through the shell so configured strings like
 * `pip install -r requirements.txt && pytest -q` work as written.
 * A nonzero exit or a timeout is a result, not an exception; only a
 * process that never started throws.
 *
 * Dependency direction: exec.ts → execa, core/errors, utils/logger
 * Used by: test runner, smoke runner
 */

import { execa } from 'execa';
import { CommandError, errorMessage } from '../errors.js';
import { logger } from '../../utils/logger.js';

export interface ExecOptions {
    readonly cwd: string;
    readonly timeoutMs: number;
    /** Extra variables on top of the inherited environment. */
    readonly env?: Readonly<Record<string, string>>;
}

export interface CommandResult {
    /** Null when the process was killed before exiting (timeout). */
    readonly exitCode: number | null;
    readonly stdout: string;
    readonly stderr: string;
    readonly timedOut: boolean;
    readonly durationMs: number;
}

/** Injected into the runners so tests can script command results. */
export type CommandExecutor = (command: string, options: ExecOptions) => Promise<CommandResult>;

/** Kill a detached process group. A group that already ended is not an error. */
function killProcessGroup(pid: number | undefined): void {
    if (pid === undefined) return;
    try {
        process.kill(-pid, 'SIGKILL');
    } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ESRCH') return;
        logger.warn(`Could not stop process group ${pid}: ${errorMessage(err)}`);
    }
}

/**
 * Run a shell command with a bounded wait.
 *
 * The shell leads its own process group. On timeout the whole group is
 * killed, and once the shell exits any children it left behind are killed
 * too, so they cannot hold the output pipes open.
 *
 * @throws {CommandError} if the process could not be started
 */
export const execCommand: CommandExecutor = async (command, options) => {
    const subprocess = execa(command, {
        shell: true,
        cwd: options.cwd,
        detached: true,
        reject: false,
        env: { FORCE_COLOR: '0', ...options.env },
    });

    let timedOut = false;
    const timer = setTimeout(() => {
        timedOut = true;
        killProcessGroup(subprocess.pid);
    }, options.timeoutMs);

    subprocess.once('exit', () => {
        clearTimeout(timer);
        killProcessGroup(subprocess.pid);
    });

    const result = await subprocess;
    clearTimeout(timer);

    if (!timedOut && result.exitCode === undefined && !result.isTerminated) {
        throw new CommandError(`Failed to start "${command}": ${errorMessage(result)}`, {
            command,
            cwd: options.cwd,
        });
    }

    return {
        exitCode: timedOut ? null : (result.exitCode ?? null),
        stdout: result.stdout,
        stderr: result.stderr,
        timedOut,
        durationMs: Math.round(result.durationMs),
    };
};
