/**
 * File system helpers with consistent error handling.
 *
 * Dependency direction: fs.ts → node:fs, node:path, errors.ts
 * Used by: config manager, project registry, prompt library
 */

import { existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { ConfigError } from '../core/errors.js';

/**
 * Read a JSON file and parse it. The result is untyped; callers validate it.
 * @throws {ConfigError} if the file doesn't exist or contains invalid JSON.
 */
export function readJsonFile(filePath: string): unknown {
    const content = readTextFile(filePath);

    try {
        return JSON.parse(content);
    } catch (err) {
        throw new ConfigError(`Failed to parse JSON file: ${resolve(filePath)}`, {
            filePath: resolve(filePath),
            originalError: err instanceof Error ? err.message : String(err),
        });
    }
}

/**
 * Write data as pretty-printed JSON, creating parent directories if needed.
 * @throws {ConfigError} if the write fails.
 */
export function writeJsonFile(filePath: string, data: unknown): void {
    writeTextFile(filePath, JSON.stringify(data, null, 2) + '\n');
}

/**
 * Write a text file, creating parent directories if needed.
 * @throws {ConfigError} if the write fails.
 */
export function writeTextFile(filePath: string, content: string): void {
    const absolutePath = resolve(filePath);

    try {
        ensureDir(dirname(absolutePath));
        writeFileSync(absolutePath, content, 'utf-8');
    } catch (err) {
        throw new ConfigError(`Failed to write file: ${absolutePath}`, {
            filePath: absolutePath,
            originalError: err instanceof Error ? err.message : String(err),
        });
    }
}

/** Ensure a directory exists, creating it recursively if needed. */
export function ensureDir(dirPath: string): void {
    const absolutePath = resolve(dirPath);
    if (!existsSync(absolutePath)) {
        mkdirSync(absolutePath, { recursive: true });
    }
}

export function fileExists(filePath: string): boolean {
    return existsSync(resolve(filePath));
}

export function isDirectory(dirPath: string): boolean {
    const absolutePath = resolve(dirPath);
    return existsSync(absolutePath) && statSync(absolutePath).isDirectory();
}

/**
 * Read a text file and return its contents.
 * @throws {ConfigError} if the file doesn't exist.
 */
export function readTextFile(filePath: string): string {
    const absolutePath = resolve(filePath);

    if (!existsSync(absolutePath)) {
        throw new ConfigError(`File not found: ${absolutePath}`, { filePath: absolutePath });
    }

    return readFileSync(absolutePath, 'utf-8');
}
