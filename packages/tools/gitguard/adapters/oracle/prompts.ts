// Prompt builders for the Gemini oracle

import type { FixRequest } from "../../domain/ports/oracle.ts";
import { INPUT_PLACEHOLDER } from "../../domain/entities/plan.ts";

const RISK_GUIDELINES = `
Risk guidelines:
- LOW: Non-destructive (status, log, branch listing).
- MEDIUM: Modifies history or working directory but recoverable (commit, checkout, reset --soft).
- HIGH: Destructive or hard to undo (reset --hard, force push, branch deletion).`;

export function planPrompt(intent: string): string {
  return `You are GitGuard, a git safety copilot.
The user's intent is: "${intent}"

Create a safe execution plan for this git operation.
${RISK_GUIDELINES}
- Ensure commands are valid and follow best practices.
- Each command must be a complete shell command run from the repository root.
- For "delete this branch", determine the current branch first, then delete it safely.
- If the plan needs a value only the user knows (a remote URL, a branch name),
  put ${INPUT_PLACEHOLDER} where it goes and set missing_info_prompt to the question to ask.
- If nothing should be run, return an empty command list and explain why in the summary.`;
}

export function fixPrompt(request: FixRequest): string {
  const history = request.history.length > 0
    ? request.history.map((cmd) => `  $ ${cmd}`).join("\n")
    : "  (none)";
  const failed = request.failedCommands.map((cmd) => `  $ ${cmd}`).join(
    "\n",
  );

  return `You are GitGuard, a git safety copilot.
The user's intent is: "${request.intent}"

These commands were attempted:
${failed}

They failed with this error:
${request.error}

Commands that already ran in this session, in order:
${history}

Propose the commands that complete the original intent from the current
repository state. Do not repeat commands that already succeeded unless they
must run again.
${RISK_GUIDELINES}
- If the fix needs a value only the user knows (a remote URL, a branch name),
  put ${INPUT_PLACEHOLDER} where it goes and set missing_info_prompt to the question to ask.
- If no safe fix exists, return an empty command list and explain why in the summary.`;
}

export function commitPrompt(diff: string): string {
  return `Write a conventional commit message for the following staged diff.
The subject is a single line of at most 72 characters ("type(scope): summary").
The body explains what changed and why, wrapped at 72 characters.

${diff}`;
}

export function auditPrompt(diff: string): string {
  return `Audit the following staged diff before it is committed.
Look for leaked secrets or credentials, obvious bugs, debugging leftovers and TODO markers.
Set passed to false when anything must be fixed before committing.
Severity is one of NONE, LOW, MEDIUM, HIGH.

${diff}`;
}

export function explainPrompt(diff: string): string {
  return `Explain the following changes in plain English for a teammate.
Give a short summary and a list of the key changes.

${diff}`;
}
