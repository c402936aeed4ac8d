// Plan entity - an oracle proposal for a git operation

export type RiskLevel = "low" | "medium" | "high" | "unknown";

export const RISK_LEVELS = ["low", "medium", "high", "unknown"] as const;

export function isValidRiskLevel(value: string): value is RiskLevel {
  const levels: readonly string[] = RISK_LEVELS;
  return levels.includes(value);
}

/**
 * Normalize a risk label as returned by the oracle ("LOW", "High", ...).
 * Anything outside the closed set is "unknown".
 */
export function normalizeRiskLevel(value: string): RiskLevel {
  const lowered = value.trim().toLowerCase();
  return isValidRiskLevel(lowered) ? lowered : "unknown";
}

/**
 * Immutable plan. Produced fresh per oracle call, never cached.
 */
export type Plan = {
  readonly risk: RiskLevel;
  readonly summary: string;
  readonly commands: readonly string[];
  readonly missingInputPrompt?: string;
};

/** Token the oracle puts in commands where user input must go. */
export const INPUT_PLACEHOLDER = "{INPUT}";

/**
 * Replace every placeholder occurrence in every command with the same value.
 */
export function substituteInput(
  commands: readonly string[],
  value: string,
): string[] {
  return commands.map((cmd) => cmd.split(INPUT_PLACEHOLDER).join(value));
}

/**
 * Sentinel returned when the oracle is unreachable or answered garbage.
 */
export function unavailablePlan(summary: string): Plan {
  return { risk: "unknown", summary, commands: [] };
}

// Assist responses (commit / audit / explain)

export type CommitMessage = {
  readonly subject: string;
  readonly body: string;
};

export type AuditReport = {
  readonly passed: boolean;
  readonly severity: string;
  readonly issues: readonly string[];
};

export type ChangeExplanation = {
  readonly summary: string;
  readonly keyChanges: readonly string[];
};
