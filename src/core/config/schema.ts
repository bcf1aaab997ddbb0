/**
 * Zod schemas defining the project configuration shape.
 *
 * This is the authoritative definition of what a valid
 * `.deliverpilot/project.json` looks like. All TypeScript types are
 * inferred from these schemas via z.infer<>.
 *
 * Dependency direction: schema.ts → zod, stacks.ts, utils/validation
 * Used by: manager.ts, types.ts, registry.ts
 */

import { z } from 'zod';
import { STACK_LANGUAGES } from './stacks.js';
import { branchName, nonEmptyString, projectId, repositoryUrl, timeoutMs } from '../../utils/validation.js';

/** Default forbidden-path globs: secrets, credentials and private keys. */
export const FORBIDDEN_PATHS_DEFAULT = [
    '**/.env',
    '**/.env.*',
    '**/secrets/**',
    '**/credentials/**',
    '**/*.key',
    '**/*.pem',
    '**/*.p12',
];

export const stackLanguageSchema = z.enum(STACK_LANGUAGES);

/**
 * Schema for one runtime target (backend or frontend).
 */
export const runtimeTargetSchema = z.object({
    /** Run before the smoke command; a nonzero exit skips the smoke command. */
    installCommand: z.string().min(1).optional(),
    /** Overrides the stack profile's default test command. */
    testCommand: z.string().min(1).optional(),
    /** Lightweight executable check run after install. */
    smokeCommand: z.string().min(1).optional(),
    /** Command that starts a development server (informational, used in prompts). */
    devCommand: z.string().min(1).optional(),
    /** Directory the commands run in, relative to the working directory. */
    directory: z.string().default('.'),
});

export const runtimeConfigSchema = z.object({
    backend: runtimeTargetSchema.optional(),
    frontend: runtimeTargetSchema.optional(),
});

/**
 * Schema for the governance rules applied to a change-request diff.
 */
export const policyConfigSchema = z.object({
    /** Globs that must never appear in a diff. */
    forbiddenPaths: z.array(z.string().min(1)).default(FORBIDDEN_PATHS_DEFAULT),
    /** Warn when code changes arrive without test changes. */
    requireTestsForCode: z.boolean().default(true),
    /** Per-language allow-list; an empty or absent list disables the rule. */
    allowedDependencies: z.record(stackLanguageSchema, z.array(z.string().min(1))).default({}),
    /** Per-language override of the stack profile's test-file globs. */
    testFilePatterns: z.record(stackLanguageSchema, z.array(z.string().min(1))).default({}),
});

export const codebaseConfigSchema = z.object({
    root: z.string().default('.'),
    backendDir: z.string().default(''),
    frontendDir: z.string().default(''),
    testsDir: z.string().default('tests'),
});

/**
 * Schema for the text-generation settings used by the codegen and remediation agents.
 */
export const llmConfigSchema = z.object({
    provider: z.enum(['anthropic', 'ollama']).default('ollama'),
    model: z.string().min(1).default('llama3.2:latest'),
    /** Sampling temperature (0.0 = deterministic). */
    temperature: z.number().min(0).max(2).default(0.3),
    maxTokens: z.number().int().min(1).max(200000).default(8192),
});

export const anthropicProviderSchema = z.object({
    /** Falls back to ANTHROPIC_API_KEY when omitted. */
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url().default('https://api.anthropic.com'),
    apiVersion: z.string().default('2023-06-01'),
});

export const ollamaProviderSchema = z.object({
    baseUrl: z.string().url().default('http://localhost:11434'),
});

export const providerConfigSchema = z.object({
    anthropic: anthropicProviderSchema.optional(),
    ollama: ollamaProviderSchema.optional(),
});

export const repositoryConfigSchema = z.object({
    baseBranch: branchName.default('main'),
    remote: nonEmptyString.default('origin'),
    /** When set (and GITHUB_TOKEN is available), change requests are opened on GitHub. */
    github: z
        .object({
            owner: nonEmptyString,
            repo: nonEmptyString,
        })
        .optional(),
});

export const workflowConfigSchema = z.object({
    testTimeoutMs: timeoutMs.default(120_000),
    branchPrefix: z.string().default('deliverpilot/'),
});

/**
 * The complete project configuration schema.
 */
export const projectConfigSchema = z.object({
    /** Schema version for future migrations. */
    version: z.literal(1).default(1),
    name: projectId,
    language: stackLanguageSchema.default('python'),
    framework: z.string().default('none'),
    codebase: codebaseConfigSchema.default({}),
    runtime: runtimeConfigSchema.default({}),
    policy: policyConfigSchema.default({}),
    llm: llmConfigSchema.default({}),
    providers: providerConfigSchema.default({}),
    repository: repositoryConfigSchema.default({}),
    workflow: workflowConfigSchema.default({}),
    /** Free-form coding conventions passed to the codegen agent. */
    conventions: z.string().default('standard conventions'),
});

/**
 * Schema for one entry in the project registry.
 */
export const registeredProjectSchema = z.object({
    projectId,
    repoUrl: repositoryUrl,
    metadata: z.record(z.string(), z.unknown()).default({}),
    registeredAt: z.string().datetime(),
});

export const registryFileSchema = z.object({
    version: z.literal(1).default(1),
    projects: z.record(z.string(), registeredProjectSchema).default({}),
});
