/**
 * Codegen agent: turns a design contract into files.
 *
 * Dependency direction: codegen.ts → agents/base, prompts/library, workflow/file-parser
 * Used by: agent factory
 */

import { BaseAgent } from '../base.js';
import type { AgentOptions } from '../types.js';
import { loadAgentPrompt } from '../../prompts/library.js';
import type { LLMProvider } from '../../providers/types.js';
import { getStackProfile } from '../../core/config/stacks.js';
import { parseFiles } from '../../core/workflow/file-parser.js';
import type { CodeGenerator, CodegenInput, GeneratedCode } from '../../core/workflow/codegen.js';

export class CodegenAgent extends BaseAgent<CodegenInput> implements CodeGenerator {
    private readonly projectRoot: string;

    constructor(provider: LLMProvider, options: AgentOptions, projectRoot: string) {
        super('codegen', provider, options);
        this.projectRoot = projectRoot;
    }

    async generate(input: CodegenInput): Promise<GeneratedCode> {
        const output = await this.execute(input);
        return { files: parseFiles(output.content), model: output.model };
    }

    protected buildSystemPrompt(): string {
        return loadAgentPrompt(this.projectRoot, 'codegen');
    }

    protected buildUserPrompt(input: CodegenInput): string {
        const { config } = input;
        const { codebase, runtime } = config;
        const backend = runtime.backend;

        return [
            `Language: ${getStackProfile(config.language).label}`,
            `Framework: ${config.framework}`,
            `Codebase dirs: root=${codebase.root}, backend_dir=${codebase.backendDir}, frontend_dir=${codebase.frontendDir}, tests_dir=${codebase.testsDir}`,
            `Backend dev command: ${backend?.devCommand ?? ''}`,
            `Backend test command: ${backend?.testCommand ?? getStackProfile(config.language).defaultTestCommand}`,
            `Conventions: ${config.conventions}`,
            '',
            `## Design contract (${input.contractPath})`,
            '',
            input.contract,
            '',
            'Generate concise, production-ready code and tests aligned to the stack and directories.',
        ].join('\n');
    }
}
