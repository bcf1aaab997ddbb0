/**
 * Stack profiles: the closed set of languages a project can declare.
 *
 * A profile carries everything that differs per language: which files count
 * as code, which count as tests, which manifests declare dependencies (and
 * how to read them), and the conventional test command. The profile is
 * resolved once when project config is loaded; nothing downstream switches
 * on language strings.
 *
 * Dependency direction: stacks.ts → nothing (leaf module)
 * Used by: config schema, policy evaluator, test runner
 */

export const STACK_LANGUAGES = ['python', 'javascript', 'typescript', 'php'] as const;

export type StackLanguage = (typeof STACK_LANGUAGES)[number];

/** How dependency names are pulled out of an added manifest line. */
export type ManifestFormat = 'requirements' | 'json';

export interface ManifestSpec {
    /** Bare file name, matched against the last path segment. */
    readonly fileName: string;
    readonly format: ManifestFormat;
}

export interface StackProfile {
    readonly language: StackLanguage;
    readonly label: string;
    readonly codeFilePatterns: readonly string[];
    readonly testFilePatterns: readonly string[];
    readonly manifests: readonly ManifestSpec[];
    readonly defaultTestCommand: string;
    /** Whether dependency names compare case-insensitively. */
    readonly caseInsensitiveDependencies: boolean;
}

const NODE_MANIFESTS: readonly ManifestSpec[] = [{ fileName: 'package.json', format: 'json' }];

const NODE_TEST_PATTERNS: readonly string[] = [
    '**/*.test.*',
    '**/*.spec.*',
    '**/__tests__/**',
    '**/tests/**',
    '**/test/**',
];

export const STACK_PROFILES: Readonly<Record<StackLanguage, StackProfile>> = {
    python: {
        language: 'python',
        label: 'Python',
        codeFilePatterns: ['**/*.py'],
        testFilePatterns: ['**/test_*.py', '**/*_test.py', '**/tests/**', '**/conftest.py'],
        manifests: [
            { fileName: 'requirements.txt', format: 'requirements' },
            { fileName: 'requirements-dev.txt', format: 'requirements' },
        ],
        defaultTestCommand: 'pytest -q',
        caseInsensitiveDependencies: true,
    },
    javascript: {
        language: 'javascript',
        label: 'JavaScript',
        codeFilePatterns: ['**/*.js', '**/*.jsx', '**/*.mjs', '**/*.cjs', '**/*.ts', '**/*.tsx'],
        testFilePatterns: NODE_TEST_PATTERNS,
        manifests: NODE_MANIFESTS,
        defaultTestCommand: 'npm test',
        caseInsensitiveDependencies: false,
    },
    typescript: {
        language: 'typescript',
        label: 'TypeScript',
        codeFilePatterns: ['**/*.ts', '**/*.tsx', '**/*.mts', '**/*.cts'],
        testFilePatterns: NODE_TEST_PATTERNS,
        manifests: NODE_MANIFESTS,
        defaultTestCommand: 'npm test',
        caseInsensitiveDependencies: false,
    },
    php: {
        language: 'php',
        label: 'PHP',
        codeFilePatterns: ['**/*.php'],
        testFilePatterns: ['**/*Test.php', '**/tests/**'],
        manifests: [{ fileName: 'composer.json', format: 'json' }],
        defaultTestCommand: 'vendor/bin/phpunit',
        caseInsensitiveDependencies: true,
    },
};

export function getStackProfile(language: StackLanguage): StackProfile {
    return STACK_PROFILES[language];
}

/** Find the manifest spec for a changed path, if its file name is one of the profile's manifests. */
export function findManifest(profile: StackProfile, filePath: string): ManifestSpec | undefined {
    const fileName = filePath.split('/').pop() ?? filePath;
    return profile.manifests.find((m) => m.fileName === fileName);
}
