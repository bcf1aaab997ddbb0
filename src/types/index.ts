/**
 * Global shared types re-exported from a single entry point.
 *
 * Dependency direction: types/index.ts → nothing (leaf module)
 * Used by: library entry (src/index.ts) and external callers
 */

// Re-export all error types
export {
    AppError,
    ConfigError,
    ProviderError,
    GitError,
    WorkflowError,
    ValidationError,
    CommandError,
    PolicyError,
} from '../core/errors.js';

// Re-export config types
export type {
    ProjectConfig,
    ProjectConfigInput,
    RuntimeConfig,
    RuntimeTarget,
    PolicyConfig,
    LLMConfig,
    ProviderConfig,
    RegisteredProject,
} from '../core/config/types.js';

export type { StackLanguage, StackProfile } from '../core/config/stacks.js';

// Re-export workflow types
export type {
    WorkflowRequest,
    WorkflowReport,
    StepOutcome,
    CheckResult,
    FixSuggestion,
    FilePatch,
    RemediationResult,
    ChangeRequestSummary,
    RunStatus,
} from '../core/workflow/types.js';
export { WorkflowKind, WorkflowStatus, StepStatus, StepName } from '../core/workflow/types.js';

export type { PolicyViolation, PolicyRules, PolicyEvaluation, PolicyRuleName } from '../core/policy/evaluator.js';

// Re-export provider types
export type { LLMProvider, ChatMessage, ChatOptions, ChatResponse, LLMProviderName } from '../providers/types.js';

export type { VersionControl, ChangeRequestPublisher, ChangeRequestResult } from '../git/types.js';

// Re-export agent types
export type { AgentRole } from '../agents/types.js';
