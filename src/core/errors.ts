/**
 * Core error hierarchy for deliverpilot.
 *
 * All errors extend AppError and carry a machine-readable code
 * plus optional structured context for debugging.
 *
 * Dependency direction: errors.ts → nothing (leaf module)
 * Used by: every layer in the application
 */

/** Base application error with structured metadata. */
export class AppError extends Error {
    public readonly code: string;
    public readonly context?: Record<string, unknown>;

    constructor(message: string, code: string, context?: Record<string, unknown>) {
        super(message);
        this.name = 'AppError';
        this.code = code;
        this.context = context;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

/** Raised when project config or the registry is missing, invalid, or unreadable. */
export class ConfigError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'CONFIG_ERROR', context);
        this.name = 'ConfigError';
    }
}

/** Raised when a text-generation provider call fails or cannot be reached. */
export class ProviderError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'PROVIDER_ERROR', context);
        this.name = 'ProviderError';
    }
}

/** Raised when a Git operation or change-request publication fails. */
export class GitError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'GIT_ERROR', context);
        this.name = 'GitError';
    }
}

/** Raised when a workflow precondition or step fails in a way the caller must see. */
export class WorkflowError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'WORKFLOW_ERROR', context);
        this.name = 'WorkflowError';
    }
}

/** Raised when user input fails validation. */
export class ValidationError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'VALIDATION_ERROR', context);
        this.name = 'ValidationError';
    }
}

/** Raised when a shell command could not be started at all. */
export class CommandError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'COMMAND_ERROR', context);
        this.name = 'CommandError';
    }
}

/** Raised when a policy configuration cannot be applied. */
export class PolicyError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'POLICY_ERROR', context);
        this.name = 'PolicyError';
    }
}

/** Render any thrown value as a message string. */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
