// Execution entities - command results and the run state machine

import type { Checkpoint } from "./checkpoint.ts";
import type { Plan } from "./plan.ts";

/** Number of execution attempts a run may make before it gives up. */
export const MAX_ATTEMPTS = 3;

export type CommandFailureKind = "non_zero_exit" | "spawn_error";

/**
 * Why a command list stopped. `index` is zero-based within the list.
 */
export type CommandFailure = {
  readonly kind: CommandFailureKind;
  readonly command: string;
  readonly index: number;
  readonly exitCode: number | null;
  readonly stderr: string;
};

export type ExecutionResult =
  | { readonly ok: true; readonly completed: readonly string[] }
  | {
    readonly ok: false;
    readonly failure: CommandFailure;
    readonly completed: readonly string[];
  };

/**
 * Text handed to the oracle (and shown to the user) for a failure.
 */
export function describeFailure(failure: CommandFailure): string {
  const stderr = failure.stderr.trim();
  if (stderr) return stderr;
  if (failure.exitCode === null) {
    return `Command '${failure.command}' could not be started`;
  }
  return `Command '${failure.command}' exited with code ${failure.exitCode}`;
}

export type ExhaustedReason = "max_attempts" | "no_fix";
export type CancelledReason = "nothing_to_do" | "plan_declined" | "fix_declined";

export type RunState =
  | { readonly state: "planning"; readonly intent: string }
  | { readonly state: "awaiting_confirmation"; readonly plan: Plan }
  | {
    readonly state: "executing";
    readonly attempt: number;
    readonly commands: readonly string[];
  }
  | { readonly state: "fixing"; readonly attempt: number }
  | { readonly state: "awaiting_fix_confirmation"; readonly plan: Plan }
  | { readonly state: "succeeded" }
  | { readonly state: "exhausted"; readonly reason: ExhaustedReason }
  | { readonly state: "cancelled"; readonly reason: CancelledReason }
  | {
    readonly state: "rolling_back";
    /** Checkpoint taken by this run, null when none could be taken. */
    readonly checkpoint: Checkpoint | null;
  }
  | { readonly state: "done" };

export type RunObserver = (state: RunState) => void;
