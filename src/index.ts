/**
 * Library entry point.
 *
 * Dependency direction: index.ts → types, core, git
 * Used by: package.json main/types
 */

export * from './types/index.js';

export { createToolContext, resolveHomeDir, type ToolContext, type ToolContextOptions } from './core/bootstrap.js';
export { WorkflowCoordinator, createWorkflowId, type CoordinatorDependencies } from './core/workflow/coordinator.js';
export { parseWorkflowRequest, type WorkflowRequestInput } from './core/workflow/request.js';
export { resolveWorkflowStatus, NOT_RUN } from './core/workflow/status.js';
export { runTests } from './core/workflow/test-runner.js';
export { runSmoke, selectRuntimeTarget } from './core/workflow/smoke-runner.js';
export { evaluatePolicy, resolvePolicyRules, DEFAULT_POLICY_RULES } from './core/policy/evaluator.js';
export { parseChangedFiles, parseDiffSections } from './core/policy/diff-parser.js';
export { parseFixSuggestion } from './core/workflow/fix-suggestion.js';
export { analyzeLogs, type MonitorIssue, type MonitorResult } from './core/monitor/analyzer.js';
export {
    createContractFromFields,
    createContractFromIdea,
    renderContract,
    type ContractDrafter,
    type ContractFields,
} from './core/contracts/contract.js';
export { loadProjectConfig, saveProjectConfig } from './core/config/manager.js';
export { getDefaultConfig } from './core/config/defaults.js';
export { ProjectRegistry } from './core/config/registry.js';
export { FileConfigProvider, type ConfigProvider } from './core/config/provider.js';
export { GitClient } from './git/client.js';
export { GitHubPublisher, StubPublisher, createPublisher } from './git/change-request.js';
