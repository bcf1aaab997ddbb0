/**
 * TypeScript types inferred from Zod schemas.
 *
 * NEVER define config types manually: they are always derived
 * from the Zod schemas to guarantee runtime and compile-time agreement.
 *
 * Dependency direction: types.ts → schema.ts
 * Used by: every module that touches config
 */

import { z } from 'zod';
import {
    llmConfigSchema,
    policyConfigSchema,
    projectConfigSchema,
    providerConfigSchema,
    registeredProjectSchema,
    registryFileSchema,
    runtimeConfigSchema,
    runtimeTargetSchema,
} from './schema.js';

/** Complete project configuration (after defaults are applied). */
export type ProjectConfig = z.infer<typeof projectConfigSchema>;

/** Project configuration as written on disk, before defaults. */
export type ProjectConfigInput = z.input<typeof projectConfigSchema>;

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;

export type RuntimeTarget = z.infer<typeof runtimeTargetSchema>;

/** Governance rules as stored in config. */
export type PolicyConfig = z.infer<typeof policyConfigSchema>;

export type LLMConfig = z.infer<typeof llmConfigSchema>;

export type ProviderConfig = z.infer<typeof providerConfigSchema>;

export type RegisteredProject = z.infer<typeof registeredProjectSchema>;

export type RegistryFile = z.infer<typeof registryFileSchema>;
