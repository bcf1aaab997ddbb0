/**
 * Codegen step: reads the design contract, asks the generator for files
 * and writes them into the working copy.
 *
 * Any failure here aborts the workflow, so nothing is caught.
 *
 * Dependency direction: codegen.ts → file-parser, git/types, config/types, core/errors
 * Used by: coordinator
 */

import type { ProjectConfig } from '../config/types.js';
import type { VersionControl } from '../../git/types.js';
import { WorkflowError } from '../errors.js';
import { writeGeneratedFiles, type ParsedFile } from './file-parser.js';
import type { CodegenResult } from './types.js';

export interface CodegenInput {
    readonly contract: string;
    readonly contractPath: string;
    readonly config: ProjectConfig;
}

export interface GeneratedCode {
    readonly files: readonly ParsedFile[];
    readonly model: string;
}

export interface CodeGenerator {
    generate(input: CodegenInput): Promise<GeneratedCode>;
}

/**
 * @throws {WorkflowError} if nothing usable was generated
 * @throws whatever the generator or the working copy throws
 */
export async function runCodegen(
    vcs: VersionControl,
    generator: CodeGenerator,
    contractPath: string,
    config: ProjectConfig,
): Promise<CodegenResult> {
    const contract = await vcs.readFile(contractPath);
    const generated = await generator.generate({ contract, contractPath, config });

    const { written, skipped } = await writeGeneratedFiles(vcs, generated.files);
    if (written.length === 0) {
        throw new WorkflowError('Code generation produced no files', {
            contractPath,
            skipped,
        });
    }

    return Object.freeze({ files: Object.freeze([...written]), model: generated.model });
}
