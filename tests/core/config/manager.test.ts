/**
 * Tests for the config manager (load, save, validate).
 *
 * Uses a temp directory to simulate project configs on disk.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
    configExists,
    getConfigPath,
    loadProjectConfig,
    saveProjectConfig,
} from '../../../src/core/config/manager.js';
import { CONFIG_DIR_NAME, PROJECT_CONFIG_FILE_NAME, getDefaultConfig } from '../../../src/core/config/defaults.js';
import { ConfigError } from '../../../src/core/errors.js';

let testDir: string;

beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'deliverpilot-config-'));
});

afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
});

function writeRaw(content: string): void {
    mkdirSync(join(testDir, CONFIG_DIR_NAME), { recursive: true });
    writeFileSync(getConfigPath(testDir), content);
}

describe('configExists', () => {
    it('returns false when no config exists', () => {
        expect(configExists(testDir)).toBe(false);
    });

    it('returns true after saving config', () => {
        saveProjectConfig(testDir, getDefaultConfig('shop'));
        expect(configExists(testDir)).toBe(true);
    });
});

describe('getConfigPath', () => {
    it('returns the correct path', () => {
        expect(getConfigPath(testDir)).toBe(join(testDir, CONFIG_DIR_NAME, PROJECT_CONFIG_FILE_NAME));
    });
});

describe('loadProjectConfig', () => {
    it('round-trips a saved config', () => {
        const config = getDefaultConfig('shop', 'typescript');
        saveProjectConfig(testDir, config);

        expect(loadProjectConfig(testDir)).toEqual(config);
    });

    it('applies defaults to a partial file', () => {
        writeRaw(JSON.stringify({ name: 'shop', language: 'php' }));

        const config = loadProjectConfig(testDir);
        expect(config.language).toBe('php');
        expect(config.workflow.branchPrefix).toBe('deliverpilot/');
    });

    it('throws ConfigError when the file is missing', () => {
        expect(() => loadProjectConfig(testDir)).toThrow(ConfigError);
        expect(() => loadProjectConfig(testDir)).toThrow('Run "deliverpilot init" first');
    });

    it('lists every invalid field', () => {
        writeRaw(JSON.stringify({ name: 'shop', language: 'cobol', workflow: { testTimeoutMs: 5 } }));

        expect(() => loadProjectConfig(testDir)).toThrow(/language[\s\S]*workflow\.testTimeoutMs/);
    });

    it('throws ConfigError on malformed JSON', () => {
        writeRaw('{ not json');
        expect(() => loadProjectConfig(testDir)).toThrow(ConfigError);
    });
});

describe('saveProjectConfig', () => {
    it('refuses to write an invalid config', () => {
        const config = { ...getDefaultConfig('shop'), name: 'not valid!' };

        expect(() => saveProjectConfig(testDir, config)).toThrow('Cannot save invalid project configuration');
        expect(configExists(testDir)).toBe(false);
    });
});

describe('getDefaultConfig', () => {
    it('suggests runtime commands for the language', () => {
        expect(getDefaultConfig('web', 'javascript').runtime.backend).toEqual({
            installCommand: 'npm install',
            smokeCommand: 'npm run build',
            directory: '.',
        });
    });
});
