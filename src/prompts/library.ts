/**
 * Prompt library: system prompts for the contract, codegen and remediation agents.
 *
 * `deliverpilot init` writes the defaults to `.deliverpilot/prompts/<role>.md`
 * so they can be edited per project. Agents read the file at call time and
 * fall back to the built-in text when it is missing.
 *
 * Dependency direction: prompts/library.ts → utils/fs, config/defaults, agents/types
 * Used by: agent implementations, init command
 */

import { join } from 'node:path';
import { CONFIG_DIR_NAME, PROMPTS_DIR_NAME } from '../core/config/defaults.js';
import { ensureDir, fileExists, readTextFile, writeTextFile } from '../utils/fs.js';
import { ALL_AGENT_ROLES, type AgentRole } from '../agents/types.js';
import { logger } from '../utils/logger.js';

// ── Default Prompts ──

const DEFAULT_PROMPTS: Record<AgentRole, string> = {
  contract: `# Contract Agent

You are a product designer turning a short feature idea into a design contract
that a code generation agent can implement without further questions.

## Sections (in this order):
1. Summary: one paragraph
2. Problem Statement
3. User Stories: "As a ..., I want ..., so that ..."
4. API Design: endpoints, request and response schemas, status codes
5. Data Model: entities, fields, types, constraints
6. Logging & Monitoring: log events and levels, metrics, alert thresholds
7. Security: authentication, authorization, input validation
8. Acceptance Criteria: a testable checklist
9. Tests: unit, integration and end-to-end cases
10. Implementation Notes
11. Dependencies

## Output format:
Plain markdown only, starting with a level-one heading that names the feature:

# Order Export

## Summary
...

Be specific about endpoints, data structures, error handling and test cases.
Do not wrap the answer in a code fence.
`,

  codegen: `# Codegen Agent

You are a senior software engineer generating production-quality code and tests
from a design contract.

## Rules:
- Follow the project's stack, directories and conventions exactly
- Write complete, working code. No placeholders, no "implement this later"
- Add or update tests for every behavior you introduce
- Never touch secrets, credentials or environment files
- Never add a dependency the contract does not call for

## CRITICAL — Output format:
You MUST use this EXACT format for EVERY file. Do NOT deviate.

FILE: app/example.py
\`\`\`python
def example() -> str:
    return "hello"
\`\`\`

FILE: tests/test_example.py
\`\`\`python
from app.example import example


def test_example():
    assert example() == "hello"
\`\`\`

The word FILE: followed by the path relative to the repository root MUST appear
on its own line BEFORE each code block.
`,

  remediation: `# Remediation Agent

You are a senior software engineer specializing in debugging test failures.
Analyze the failure, find the root cause (not just the symptom) and propose the
smallest change that fixes it.

## Output format:
Answer with ONE JSON object and nothing else:

\`\`\`json
{
  "parts": [
    { "type": "patch", "path": "app/main.py", "diff": "--- a/app/main.py\\n+++ b/app/main.py\\n@@ ..." },
    { "type": "retry", "command": "pytest -q tests/test_main.py" },
    { "type": "notes", "text": "What was wrong and how the patch fixes it." }
  ]
}
\`\`\`

- "patch" parts carry a unified diff; use one part per file
- include exactly one "retry" part with the command that verifies the fix
- keep "notes" brief
`,
};

// ── Public API ──

export function getPromptsDir(projectRoot: string): string {
  return join(projectRoot, CONFIG_DIR_NAME, PROMPTS_DIR_NAME);
}

export function getDefaultPrompt(role: AgentRole): string {
  return DEFAULT_PROMPTS[role];
}

/**
 * Write the default prompt files for every role.
 * Existing files are left alone so user edits survive a re-run of init.
 *
 * @returns the paths that were created
 */
export function generateDefaultPrompts(projectRoot: string): string[] {
  const promptsDir = getPromptsDir(projectRoot);
  ensureDir(promptsDir);

  const created: string[] = [];
  for (const role of ALL_AGENT_ROLES) {
    const filePath = join(promptsDir, `${role}.md`);
    if (!fileExists(filePath)) {
      writeTextFile(filePath, DEFAULT_PROMPTS[role]);
      created.push(filePath);
      logger.debug(`Created prompt: ${filePath}`);
    }
  }

  return created;
}

/**
 * Load an agent's prompt from the project's prompt files, falling back to the
 * built-in default.
 */
export function loadAgentPrompt(projectRoot: string, role: AgentRole): string {
  const filePath = join(getPromptsDir(projectRoot), `${role}.md`);
  return fileExists(filePath) ? readTextFile(filePath) : DEFAULT_PROMPTS[role];
}
