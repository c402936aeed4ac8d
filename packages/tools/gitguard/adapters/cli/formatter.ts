/**
 * CLI output formatters for gitguard commands.
 *
 * All formatX() functions transform command output objects into human-readable strings.
 * These are pure functions with no side effects.
 */

import type {
  AuditReport,
  ChangeExplanation,
  CheckpointListOutput,
  GgError,
  Plan,
  RunOutput,
} from "../../types.ts";

export function formatPlan(plan: Plan, title: string): string {
  const lines = [
    `== ${title} ==`,
    "",
    "Interpreted Action:",
    `  • ${plan.summary}`,
    "",
    `Risk Level: ${plan.risk.toUpperCase()}`,
    "",
    "Planned Commands:",
    ...plan.commands.map((cmd) => `  $ ${cmd}`),
  ];
  return lines.join("\n");
}

export function formatCheckpointList(output: CheckpointListOutput): string {
  if (output.checkpoints.length === 0) {
    return "No checkpoints";
  }

  const width = Math.max(
    ...output.checkpoints.map((cp) => cp.reference.length),
  );
  return output.checkpoints.map((cp, i) => {
    const marker = i === 0 ? "*" : " ";
    const snapshot = cp.uncommittedSnapshot
      ? `  +changes ${cp.uncommittedSnapshot.slice(0, 7)}`
      : "";
    return `${marker} ${cp.reference.padEnd(width)}  ${cp.createdAt}${snapshot}`;
  }).join("\n");
}

export function formatRunSummary(output: RunOutput): string | null {
  if (output.outcome !== "exhausted_max_attempts" &&
    output.outcome !== "exhausted_no_fix" &&
    output.outcome !== "fix_declined") {
    return null;
  }

  const lines = ["Commands run in this session:"];
  for (const cmd of output.history) {
    lines.push(`  $ ${cmd}`);
  }
  if (output.lastError) {
    lines.push(`Last failure: ${output.lastError.command}`);
    const stderr = output.lastError.stderr.trim();
    if (stderr) lines.push(`  ${stderr}`);
  }
  if (output.checkpoint && !output.rolledBack) {
    lines.push(
      `Checkpoint kept: ${output.checkpoint.reference} (restore with: gitguard rollback)`,
    );
  }
  return lines.join("\n");
}

export function formatAudit(report: AuditReport): string {
  const header = `Audit Result: ${report.severity}`;
  if (report.issues.length === 0) {
    return `${header}\n- No issues found`;
  }
  return [header, ...report.issues.map((issue) => `- ${issue}`)].join("\n");
}

export function formatExplanation(explanation: ChangeExplanation): string {
  return [
    explanation.summary,
    "",
    "Key Changes:",
    ...explanation.keyChanges.map((change) => `- ${change}`),
  ].join("\n");
}

export function formatError(error: GgError): string {
  return `Error: ${error.message}`;
}
