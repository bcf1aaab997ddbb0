/**
 * `deliverpilot policy check`: Evaluate a diff against the governance rules.
 *
 * Reads the diff from a file, or from git in the current directory (staged
 * changes with `--staged`, else the working tree, optionally against `--base`).
 * Rules come from the project config when one exists, else the defaults.
 *
 * Dependency direction: policy.ts → commander, chalk, policy/evaluator, config, git
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { configExists, loadProjectConfig } from '../../core/config/manager.js';
import { stackLanguageSchema } from '../../core/config/schema.js';
import type { StackLanguage } from '../../core/config/stacks.js';
import { DEFAULT_POLICY_RULES, evaluatePolicy, resolvePolicyRules, type PolicyRules } from '../../core/policy/evaluator.js';
import { GitClient } from '../../git/client.js';
import { errorMessage } from '../../core/errors.js';
import { readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { formatViolation } from '../utils/report.js';

interface CheckOptions {
    language?: string;
    base?: string;
    staged?: boolean;
    json?: boolean;
}

function resolveRules(projectRoot: string, language: string | undefined): { rules: PolicyRules; language: StackLanguage } {
    const config = configExists(projectRoot) ? loadProjectConfig(projectRoot) : null;
    const lang = language !== undefined ? stackLanguageSchema.parse(language) : config?.language ?? 'python';
    return {
        rules: config ? resolvePolicyRules(config.policy) : DEFAULT_POLICY_RULES,
        language: lang,
    };
}

const checkCommand = new Command('check')
    .description('Check a diff for forbidden paths, missing tests and unapproved dependencies')
    .argument('[diffFile]', 'Unified diff file (defaults to the git diff of the current directory)')
    .option('-l, --language <language>', 'Override the project language')
    .option('-b, --base <ref>', 'Diff against this ref')
    .option('-s, --staged', 'Use the staged diff')
    .option('--json', 'Print the evaluation as JSON')
    .action(async (diffFile: string | undefined, options: CheckOptions) => {
        const projectRoot = process.cwd();

        try {
            const { rules, language } = resolveRules(projectRoot, options.language);
            const diff = diffFile
                ? readTextFile(diffFile)
                : await new GitClient(projectRoot).getDiff({ staged: options.staged, base: options.base });

            const evaluation = evaluatePolicy(diff, rules, language);

            if (options.json) {
                console.log(JSON.stringify(evaluation, null, 2));
            } else {
                logger.info(`${evaluation.changedFiles.length} changed file(s)`);
                for (const violation of evaluation.violations) {
                    console.log(`  ${formatViolation(violation)}`);
                }
                console.log(evaluation.ok ? chalk.green('Policy check passed') : chalk.red('Policy check failed'));
            }

            process.exit(evaluation.ok ? 0 : 1);
        } catch (err) {
            logger.error(errorMessage(err));
            process.exit(1);
        }
    });

export const policyCommand = new Command('policy').description('Governance checks').addCommand(checkCommand);
