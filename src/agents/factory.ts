/**
 * Agent factory: creates agent instances from project config.
 *
 * Wires together the provider registry, the project's llm settings and the
 * prompt library.
 *
 * Dependency direction: factory.ts → agents/roles/*, providers/registry
 * Used by: default coordinator bootstrap, contract command
 */

import type { ProjectConfig } from '../core/config/types.js';
import { createProvider } from '../providers/registry.js';
import type { AgentOptions } from './types.js';
import { CodegenAgent } from './roles/codegen.js';
import { ContractAgent } from './roles/contract.js';
import { RemediationAgent } from './roles/remediation.js';

function agentOptions(config: ProjectConfig): AgentOptions {
    return {
        model: config.llm.model,
        temperature: config.llm.temperature,
        maxTokens: config.llm.maxTokens,
    };
}

/**
 * @throws {ProviderError} if the configured provider cannot be created
 */
export function createCodegenAgent(config: ProjectConfig, projectRoot: string): CodegenAgent {
    const provider = createProvider(config.llm.provider, config.providers);
    return new CodegenAgent(provider, agentOptions(config), projectRoot);
}

/**
 * @throws {ProviderError} if the configured provider cannot be created
 */
export function createRemediationAgent(config: ProjectConfig, projectRoot: string): RemediationAgent {
    const provider = createProvider(config.llm.provider, config.providers);
    return new RemediationAgent(provider, agentOptions(config), projectRoot, config.language);
}

/**
 * @throws {ProviderError} if the configured provider cannot be created
 */
export function createContractAgent(config: ProjectConfig, projectRoot: string): ContractAgent {
    const provider = createProvider(config.llm.provider, config.providers);
    return new ContractAgent(provider, agentOptions(config), projectRoot);
}
