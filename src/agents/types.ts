/**
 * Agent role type definitions.
 *
 * Dependency direction: agents/types.ts → nothing (leaf module)
 * Used by: agent base class, prompt library, agent factory
 */

/** All supported agent roles. */
export type AgentRole = 'contract' | 'codegen' | 'remediation';

/** Display-friendly labels for each agent role. */
export const AGENT_ROLE_LABELS: Record<AgentRole, string> = {
    contract: '📝 Contract',
    codegen: '💻 Codegen',
    remediation: '🐛 Remediation',
};

export const ALL_AGENT_ROLES: readonly AgentRole[] = ['contract', 'codegen', 'remediation'] as const;

/** Model settings shared by every agent. */
export interface AgentOptions {
    readonly model: string;
    readonly temperature?: number;
    readonly maxTokens?: number;
}
