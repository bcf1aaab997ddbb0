/**
 * Policy evaluator: rule-based governance checks over a unified diff.
 *
 * Three rules run in order:
 * - forbidden_paths: changed files matching a deny glob (error, one per file)
 * - require_tests: code changed with no test file changed (warning)
 * - allowed_dependencies: dependency names added to a manifest that are not
 *   on the language's allow-list (error, one per name and file)
 *
 * The verdict is ok when no error-severity violation was found; warnings
 * are advisory.
 *
 * Dependency direction: evaluator.ts → minimatch, diff-parser, config/stacks, config/schema
 * Used by: workflow coordinator, CLI policy command
 */

import { minimatch } from 'minimatch';
import { parseChangedFiles, parseDiffSections, type DiffSection } from './diff-parser.js';
import { findManifest, getStackProfile, type ManifestFormat, type StackLanguage, type StackProfile } from '../config/stacks.js';
import { FORBIDDEN_PATHS_DEFAULT } from '../config/schema.js';

export type PolicyRuleName = 'forbidden_paths' | 'require_tests' | 'allowed_dependencies';

export type ViolationSeverity = 'error' | 'warning';

export interface PolicyViolation {
    readonly ruleName: PolicyRuleName;
    readonly severity: ViolationSeverity;
    readonly message: string;
    readonly filePath?: string;
}

export interface PolicyRules {
    readonly forbiddenPaths: readonly string[];
    readonly requireTestsForCode: boolean;
    /** An empty or absent list for a language disables the dependency rule. */
    readonly allowedDependencies: Readonly<Partial<Record<StackLanguage, readonly string[]>>>;
    /** Replaces the stack profile's test globs for a language. */
    readonly testFilePatterns: Readonly<Partial<Record<StackLanguage, readonly string[]>>>;
}

export interface PolicyEvaluation {
    readonly ok: boolean;
    readonly violations: readonly PolicyViolation[];
    readonly changedFiles: readonly string[];
}

export const DEFAULT_POLICY_RULES: PolicyRules = {
    forbiddenPaths: FORBIDDEN_PATHS_DEFAULT,
    requireTestsForCode: true,
    allowedDependencies: {},
    testFilePatterns: {},
};

/** Fill the gaps of a partial rule set with the defaults. */
export function resolvePolicyRules(partial: Partial<PolicyRules> = {}): PolicyRules {
    return {
        forbiddenPaths: partial.forbiddenPaths ?? DEFAULT_POLICY_RULES.forbiddenPaths,
        requireTestsForCode: partial.requireTestsForCode ?? DEFAULT_POLICY_RULES.requireTestsForCode,
        allowedDependencies: partial.allowedDependencies ?? DEFAULT_POLICY_RULES.allowedDependencies,
        testFilePatterns: partial.testFilePatterns ?? DEFAULT_POLICY_RULES.testFilePatterns,
    };
}

/**
 * Evaluate a diff against the rules for the project's language.
 */
export function evaluatePolicy(diff: string, rules: PolicyRules, language: StackLanguage): PolicyEvaluation {
    const profile = getStackProfile(language);
    const changedFiles = parseChangedFiles(diff);

    const violations: PolicyViolation[] = [
        ...checkForbiddenPaths(changedFiles, rules.forbiddenPaths),
        ...checkRequireTests(changedFiles, rules, profile),
        ...checkAllowedDependencies(diff, changedFiles, rules, profile),
    ];

    return {
        ok: !violations.some((v) => v.severity === 'error'),
        violations,
        changedFiles,
    };
}

function matchesAny(filePath: string, patterns: readonly string[]): string | undefined {
    return patterns.find((pattern) => minimatch(filePath, pattern, { dot: true }));
}

function checkForbiddenPaths(changedFiles: readonly string[], patterns: readonly string[]): PolicyViolation[] {
    const violations: PolicyViolation[] = [];

    for (const filePath of changedFiles) {
        const pattern = matchesAny(filePath, patterns);
        if (pattern) {
            violations.push({
                ruleName: 'forbidden_paths',
                severity: 'error',
                message: `Changes to "${filePath}" are forbidden (matches "${pattern}")`,
                filePath,
            });
        }
    }

    return violations;
}

function checkRequireTests(
    changedFiles: readonly string[],
    rules: PolicyRules,
    profile: StackProfile,
): PolicyViolation[] {
    if (!rules.requireTestsForCode) return [];

    const testPatterns = rules.testFilePatterns[profile.language] ?? profile.testFilePatterns;
    const testFiles = changedFiles.filter((f) => matchesAny(f, testPatterns) !== undefined);
    const codeFiles = changedFiles.filter((f) => matchesAny(f, profile.codeFilePatterns) !== undefined);

    if (codeFiles.length === 0 || testFiles.length > 0) return [];

    return [
        {
            ruleName: 'require_tests',
            severity: 'warning',
            message: `${codeFiles.length} ${profile.label} code file(s) changed without any test changes`,
        },
    ];
}

function checkAllowedDependencies(
    diff: string,
    changedFiles: readonly string[],
    rules: PolicyRules,
    profile: StackProfile,
): PolicyViolation[] {
    const allowList = rules.allowedDependencies[profile.language] ?? [];
    if (allowList.length === 0) return [];

    const normalize = (name: string): string =>
        profile.caseInsensitiveDependencies ? name.toLowerCase() : name;
    const allowed = new Set(allowList.map(normalize));
    const manifests = new Set(changedFiles.filter((f) => findManifest(profile, f) !== undefined));

    const violations: PolicyViolation[] = [];
    const reported = new Set<string>();

    for (const section of parseDiffSections(diff)) {
        if (!manifests.has(section.path)) continue;
        const manifest = findManifest(profile, section.path);
        if (!manifest) continue;

        for (const name of extractAddedDependencies(section, manifest.format)) {
            const key = `${section.path}\u0000${normalize(name)}`;
            if (allowed.has(normalize(name)) || reported.has(key)) continue;

            reported.add(key);
            violations.push({
                ruleName: 'allowed_dependencies',
                severity: 'error',
                message: `Dependency "${name}" is not in the allowed list for ${profile.label}`,
                filePath: section.path,
            });
        }
    }

    return violations;
}

// ── Dependency extraction ──

const REQUIREMENT_NAME_END = /[=<>!~;[\s@]/;

/** Blocks whose string entries are dependencies (npm and composer). */
const DEPENDENCY_BLOCKS = new Set([
    'dependencies',
    'devDependencies',
    'peerDependencies',
    'optionalDependencies',
    'require',
    'require-dev',
]);

/** Top-level manifest keys with string values that are never dependencies. */
const METADATA_KEYS = new Set([
    'name',
    'version',
    'description',
    'main',
    'module',
    'types',
    'typings',
    'type',
    'license',
    'author',
    'homepage',
    'minimum-stability',
    'packageManager',
]);

const JSON_BLOCK_OPENER = /^\s*"([^"]+)"\s*:\s*\{/;
const JSON_BLOCK_CLOSER = /^\s*\}/;
const JSON_STRING_ENTRY = /^\s*"([^"]+)"\s*:\s*"[^"]*"\s*,?\s*$/;

/**
 * Dependency names declared on the added lines of one manifest section.
 */
export function extractAddedDependencies(section: DiffSection, format: ManifestFormat): string[] {
    return format === 'requirements' ? extractRequirements(section) : extractJsonDependencies(section);
}

function extractRequirements(section: DiffSection): string[] {
    const names: string[] = [];

    for (const line of section.lines) {
        if (line.kind !== 'added') continue;

        const spec = (line.text.split('#')[0] ?? '').trim();
        if (!spec || spec.startsWith('-')) continue;

        const name = (spec.split(REQUIREMENT_NAME_END)[0] ?? '').trim();
        if (name) names.push(name);
    }

    return names;
}

function extractJsonDependencies(section: DiffSection): string[] {
    const names: string[] = [];
    let block: string | null = null;

    for (const line of section.lines) {
        if (line.kind === 'removed') continue;
        if (line.kind === 'hunk') {
            // A hunk heading such as `"scripts": {` names the block the hunk starts in
            block = JSON_BLOCK_OPENER.exec(line.text)?.[1] ?? null;
            continue;
        }

        const opener = JSON_BLOCK_OPENER.exec(line.text);
        if (opener) {
            block = opener[1] ?? null;
            continue;
        }
        if (JSON_BLOCK_CLOSER.test(line.text)) {
            block = null;
            continue;
        }
        if (line.kind !== 'added') continue;

        const entry = JSON_STRING_ENTRY.exec(line.text);
        const key = entry?.[1];
        if (!key) continue;

        // Context may not show the enclosing block; fall back to skipping known metadata keys
        const isDependency = block !== null ? DEPENDENCY_BLOCKS.has(block) : !METADATA_KEYS.has(key);
        if (isDependency && !isPlatformRequirement(key)) {
            names.push(key);
        }
    }

    return names;
}

/** Composer platform requirements ("php", "ext-json") are not packages. */
function isPlatformRequirement(key: string): boolean {
    return key === 'php' || key.startsWith('ext-') || key.startsWith('lib-');
}
