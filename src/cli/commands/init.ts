/**
 * `deliverpilot init`: Interactive setup wizard.
 *
 * Walks the user through the project's stack, text-generation provider and
 * repository settings. Generates `.deliverpilot/project.json` and the
 * editable agent prompts in the current directory.
 *
 * Dependency direction: init.ts → commander, prompts, ora, chalk, config module, prompt library
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import prompts from 'prompts';
import chalk from 'chalk';
import ora from 'ora';
import { basename } from 'node:path';
import { configExists, formatIssues, getConfigPath, saveProjectConfig } from '../../core/config/manager.js';
import { getDefaultConfig } from '../../core/config/defaults.js';
import { projectConfigSchema, stackLanguageSchema } from '../../core/config/schema.js';
import { STACK_LANGUAGES, STACK_PROFILES, type StackLanguage } from '../../core/config/stacks.js';
import type { ProjectConfig } from '../../core/config/types.js';
import { SUPPORTED_PROVIDERS } from '../../providers/registry.js';
import { generateDefaultPrompts } from '../../prompts/library.js';
import { ConfigError } from '../../core/errors.js';
import { logger } from '../../utils/logger.js';

interface InitOptions {
    force?: boolean;
    yes?: boolean;
    name?: string;
    language?: string;
}

const DEFAULT_MODELS = {
    anthropic: 'claude-sonnet-4-20250514',
    ollama: 'llama3.2:latest',
} as const;

/** Project ids are lowercase slugs; derive one from the directory name. */
export function defaultProjectName(directory: string): string {
    const slug = basename(directory)
        .toLowerCase()
        .replace(/[^a-z0-9_-]+/g, '-')
        .replace(/^[-_]+|[-_]+$/g, '');
    return slug || 'project';
}

function parseLanguage(value: string | undefined): StackLanguage {
    const parsed = stackLanguageSchema.safeParse(value ?? 'python');
    if (!parsed.success) {
        throw new ConfigError(`Unsupported language "${value}". Choose one of: ${STACK_LANGUAGES.join(', ')}`);
    }
    return parsed.data;
}

export const initCommand = new Command('init')
    .description('Initialize deliverpilot in the current project')
    .option('-f, --force', 'Overwrite existing configuration')
    .option('-y, --yes', 'Accept defaults without prompting')
    .option('-n, --name <id>', 'Project id (defaults to the directory name)')
    .option('-l, --language <language>', `Project language: ${STACK_LANGUAGES.join(', ')}`)
    .action(async (options: InitOptions) => {
        const projectRoot = process.cwd();

        logger.header('deliverpilot — Project Setup');

        if (configExists(projectRoot) && !options.force) {
            if (options.yes) {
                logger.error('Configuration already exists. Use --force to overwrite.');
                process.exit(1);
            }

            const { overwrite } = await prompts({
                type: 'confirm',
                name: 'overwrite',
                message: 'Configuration already exists. Overwrite?',
                initial: false,
            });

            if (overwrite !== true) {
                logger.info('Setup cancelled.');
                return;
            }
        }

        let config: ProjectConfig | null;
        try {
            const name = options.name ?? defaultProjectName(projectRoot);
            const language = parseLanguage(options.language);
            config = options.yes ? getDefaultConfig(name, language) : await runWizard(name, language);
        } catch (err) {
            logger.error(err instanceof Error ? err.message : String(err));
            process.exit(1);
        }

        if (!config) {
            logger.info('Setup cancelled.');
            return;
        }

        const spinner = ora('Saving configuration...').start();
        saveProjectConfig(projectRoot, config);
        const created = generateDefaultPrompts(projectRoot);
        spinner.succeed(`Configuration saved to ${getConfigPath(projectRoot)}`);
        if (created.length > 0) {
            logger.info(`Wrote ${created.length} prompt file(s)`);
        }

        console.log();
        logger.success('Setup complete!');
        console.log(chalk.gray('  Next steps:'));
        console.log(chalk.gray('  1. Run "deliverpilot doctor" to verify the provider'));
        console.log(chalk.gray('  2. Run "deliverpilot policy check" to evaluate your current changes'));
        console.log(chalk.gray(`  3. Run "deliverpilot run ${config.name} --contract <file>" for a dry run`));
        console.log();
    });

/**
 * Run the interactive setup wizard. Returns null when the user aborts.
 */
async function runWizard(name: string, language: StackLanguage): Promise<ProjectConfig | null> {
    let cancelled = false;
    const onCancel = (): boolean => {
        cancelled = true;
        return false;
    };

    // ── Step 1: Project ──
    logger.info('Step 1/3: Project');
    const project = await prompts(
        [
            {
                type: 'text',
                name: 'name',
                message: 'Project id:',
                initial: name,
            },
            {
                type: 'select',
                name: 'language',
                message: 'Primary programming language:',
                choices: STACK_LANGUAGES.map((l) => ({ title: STACK_PROFILES[l].label, value: l })),
                initial: STACK_LANGUAGES.indexOf(language),
            },
            {
                type: 'text',
                name: 'framework',
                message: 'Framework (or "none"):',
                initial: 'none',
            },
        ],
        { onCancel },
    );
    if (cancelled) return null;

    const base = getDefaultConfig(
        typeof project['name'] === 'string' ? project['name'] : name,
        parseLanguage(typeof project['language'] === 'string' ? project['language'] : language),
    );

    // ── Step 2: Provider ──
    logger.info('Step 2/3: Text generation');
    const llm = await prompts(
        [
            {
                type: 'select',
                name: 'provider',
                message: 'Provider for codegen and remediation:',
                choices: SUPPORTED_PROVIDERS.map((p) => ({
                    title: p === 'anthropic' ? 'Anthropic — requires ANTHROPIC_API_KEY' : 'Ollama — local models',
                    value: p,
                })),
                initial: 1,
            },
            {
                type: 'text',
                name: 'model',
                message: 'Model:',
                initial: (prev: string) => (prev === 'anthropic' ? DEFAULT_MODELS.anthropic : DEFAULT_MODELS.ollama),
            },
        ],
        { onCancel },
    );
    if (cancelled) return null;

    // ── Step 3: Repository ──
    logger.info('Step 3/3: Repository');
    const repo = await prompts(
        [
            {
                type: 'text',
                name: 'baseBranch',
                message: 'Base branch for change requests:',
                initial: base.repository.baseBranch,
            },
            {
                type: 'text',
                name: 'github',
                message: 'GitHub repository as owner/repo (blank to skip):',
                initial: '',
            },
        ],
        { onCancel },
    );
    if (cancelled) return null;

    const [owner, repoName] = typeof repo['github'] === 'string' ? repo['github'].trim().split('/') : [];

    const result = projectConfigSchema.safeParse({
        ...base,
        framework: project['framework'],
        llm: { ...base.llm, provider: llm['provider'], model: llm['model'] },
        repository: {
            ...base.repository,
            baseBranch: repo['baseBranch'],
            github: owner && repoName ? { owner, repo: repoName } : undefined,
        },
    });

    if (!result.success) {
        throw new ConfigError(`Invalid answers:\n${formatIssues(result.error.issues)}`);
    }

    return result.data;
}
