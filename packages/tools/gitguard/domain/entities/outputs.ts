// Output types returned by use cases and rendered by the CLI

import type { Checkpoint } from "./checkpoint.ts";
import type { CommandFailure } from "./execution.ts";
import type { AuditReport, ChangeExplanation, CommitMessage } from "./plan.ts";

export type RunOutcome =
  | "nothing_to_do"
  | "declined"
  | "succeeded"
  | "exhausted_no_fix"
  | "exhausted_max_attempts"
  | "fix_declined";

export interface RunOutput {
  outcome: RunOutcome;
  attempts: number;
  history: readonly string[];
  checkpoint: Checkpoint | null;
  rolledBack: boolean;
  lastError: CommandFailure | null;
}

export type RollbackStatus =
  | "no_checkpoints"
  | "invalid_ledger"
  | "cancelled"
  | "rolled_back"
  | "failed";

export interface RollbackOutput {
  status: RollbackStatus;
  checkpoint?: Checkpoint;
  snapshotRestored?: boolean;
  error?: string;
}

export interface CheckpointListOutput {
  checkpoints: readonly Checkpoint[];
}

export interface CleanOutput {
  status: "cleaned" | "cancelled" | "no_checkpoints";
  deleted: string[];
  failed: string[];
}

export type CommitOutput =
  | { status: "no_staged_changes" | "failed" }
  | { status: "cancelled" | "committed"; message: CommitMessage };

export type AuditOutput =
  | { status: "no_staged_changes" | "failed" }
  | { status: "audited"; report: AuditReport };

export type ExplainOutput =
  | { status: "no_changes" | "failed" }
  | { status: "explained"; explanation: ChangeExplanation };
