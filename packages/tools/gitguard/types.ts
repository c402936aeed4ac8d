// Gitguard types

export {
  type Checkpoint,
  CHECKPOINT_PREFIX,
  checkpointReference,
  formatCheckpointTimestamp,
  isCheckpointReference,
} from "./domain/entities/checkpoint.ts";
export { GgError, type GgErrorCode } from "./domain/entities/errors.ts";
export {
  type CancelledReason,
  type CommandFailure,
  type CommandFailureKind,
  describeFailure,
  type ExecutionResult,
  type ExhaustedReason,
  MAX_ATTEMPTS,
  type RunObserver,
  type RunState,
} from "./domain/entities/execution.ts";
export type {
  AuditOutput,
  CheckpointListOutput,
  CleanOutput,
  CommitOutput,
  ExplainOutput,
  RollbackOutput,
  RollbackStatus,
  RunOutcome,
  RunOutput,
} from "./domain/entities/outputs.ts";
export {
  type AuditReport,
  type ChangeExplanation,
  type CommitMessage,
  INPUT_PLACEHOLDER,
  isValidRiskLevel,
  normalizeRiskLevel,
  type Plan,
  RISK_LEVELS,
  type RiskLevel,
  substituteInput,
  unavailablePlan,
} from "./domain/entities/plan.ts";
