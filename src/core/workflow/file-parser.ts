/**
 * File parser: extracts generated files from codegen output.
 *
 * The codegen agent is asked to answer in this format:
 *   FILE: path/to/file.py
 *   ```python
 *   <content>
 *   ```
 *
 * `` ```lang:path `` fences and a leading `# path` / `// path` comment inside a
 * fence are accepted as fallbacks when no FILE: block is present.
 *
 * Dependency direction: file-parser.ts → git/types, utils/logger
 * Used by: codegen step
 */

import { isAbsolute, normalize } from 'node:path';
import type { VersionControl } from '../../git/types.js';
import { logger } from '../../utils/logger.js';

/** A file extracted from agent output. */
export interface ParsedFile {
  /** Path relative to the working directory. */
  readonly path: string;
  readonly content: string;
}

export interface WriteSummary {
  readonly written: readonly string[];
  readonly skipped: readonly string[];
}

function collect(pattern: RegExp, output: string, pick: (m: RegExpExecArray) => ParsedFile | null): ParsedFile[] {
  const files: ParsedFile[] = [];
  for (const match of output.matchAll(pattern)) {
    const file = pick(match);
    if (file) files.push(file);
  }
  return files;
}

/**
 * Parse agent output into files. Later blocks for the same path replace
 * earlier ones.
 */
export function parseFiles(output: string): ParsedFile[] {
  let files = collect(/FILE:\s*(.+?)\s*\n```[\w+-]*\n([\s\S]*?)```/g, output, (m) =>
    m[1] && m[2] !== undefined ? { path: m[1].trim(), content: m[2] } : null,
  );

  if (files.length === 0) {
    files = collect(/```[\w+-]+:(.+?)\n([\s\S]*?)```/g, output, (m) =>
      m[1] && m[2] !== undefined ? { path: m[1].trim(), content: m[2] } : null,
    );
  }

  if (files.length === 0) {
    files = collect(/```[\w+-]*\n([\s\S]*?)```/g, output, (m) => {
      const content = m[1] ?? '';
      const firstLine = content.split('\n')[0]?.trim() ?? '';
      const comment = /^(?:\/\/|#)\s*([\w./-]+\.\w+)\s*$/.exec(firstLine);
      return comment?.[1] ? { path: comment[1], content } : null;
    });
  }

  if (files.length === 0) {
    logger.debug(`File parser: no file blocks found. Output preview: ${output.slice(0, 200).replace(/\n/g, '\\n')}`);
  }

  const byPath = new Map<string, ParsedFile>();
  for (const file of files) {
    byPath.set(file.path, file);
  }
  return [...byPath.values()];
}

/**
 * A path is writable when it is relative and stays inside the working
 * directory after normalization.
 */
export function isSafeRelativePath(filePath: string): boolean {
  const trimmed = filePath.trim();
  if (!trimmed || isAbsolute(trimmed) || /^[a-zA-Z]:[\\/]/.test(trimmed)) return false;

  const normalized = normalize(trimmed).replace(/\\/g, '/');
  return normalized !== '.' && normalized !== '..' && !normalized.startsWith('../');
}

/**
 * Write parsed files through the version-control working copy.
 * Unsafe paths are skipped with a warning; write failures propagate.
 */
export async function writeGeneratedFiles(vcs: VersionControl, files: readonly ParsedFile[]): Promise<WriteSummary> {
  const written: string[] = [];
  const skipped: string[] = [];

  for (const file of files) {
    if (!isSafeRelativePath(file.path)) {
      logger.warn(`Skipping file with invalid path: ${file.path}`);
      skipped.push(file.path);
      continue;
    }

    await vcs.writeFile(file.path, file.content);
    written.push(file.path);
    logger.debug(`Wrote: ${file.path}`);
  }

  if (written.length > 0) {
    logger.info(`Wrote ${written.length} file(s)`);
  }

  return { written, skipped };
}
