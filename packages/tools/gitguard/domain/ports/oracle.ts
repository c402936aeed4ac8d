// Oracle ports - interfaces to the language model

import type {
  AuditReport,
  ChangeExplanation,
  CommitMessage,
  Plan,
} from "../entities/plan.ts";

/**
 * Everything the oracle needs to propose a fix for a failed attempt.
 */
export type FixRequest = {
  readonly intent: string;
  readonly failedCommands: readonly string[];
  readonly error: string;
  readonly history: readonly string[];
};

/**
 * Turns intents into plans. Never rejects: failures come back as a plan
 * with risk "unknown" and no commands.
 */
export interface PlanOracle {
  getPlan(intent: string): Promise<Plan>;
  getFixPlan(request: FixRequest): Promise<Plan>;
}

/**
 * Reviews diffs. Returns null when the oracle could not answer.
 */
export interface ReviewOracle {
  generateCommitMessage(diff: string): Promise<CommitMessage | null>;
  auditCode(diff: string): Promise<AuditReport | null>;
  explainChanges(diff: string): Promise<ChangeExplanation | null>;
}
