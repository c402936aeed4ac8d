// RunIntentUseCase - Plan, checkpoint, execute and retry a git operation

import type { Checkpoint } from "../entities/checkpoint.ts";
import {
  type CommandFailure,
  describeFailure,
  type ExecutionResult,
  MAX_ATTEMPTS,
  type RunObserver,
  type RunState,
} from "../entities/execution.ts";
import type {
  RollbackOutput,
  RunOutcome,
  RunOutput,
} from "../entities/outputs.ts";
import { type Plan, substituteInput } from "../entities/plan.ts";
import type { Interaction } from "../ports/interaction.ts";
import type { Logger } from "../ports/logger.ts";
import type { PlanOracle } from "../ports/oracle.ts";

export interface RunIntentInput {
  readonly intent: string;
}

export interface RunIntentDeps {
  readonly oracle: PlanOracle;
  readonly executor: {
    execute(commands: readonly string[]): Promise<ExecutionResult>;
  };
  readonly checkpoints: { execute(): Promise<Checkpoint | null> };
  readonly rollback: { execute(): Promise<RollbackOutput> };
  readonly interaction: Interaction;
  readonly logger: Logger;
  /** Called with every state the run enters, in order. */
  readonly observer?: RunObserver;
}

type AttemptsResult = {
  readonly outcome: Exclude<RunOutcome, "nothing_to_do" | "declined">;
  readonly attempts: number;
  readonly history: readonly string[];
  readonly lastError: CommandFailure | null;
};

export class RunIntentUseCase {
  constructor(private readonly deps: RunIntentDeps) {}

  async execute(input: RunIntentInput): Promise<RunOutput> {
    const { oracle, interaction, logger } = this.deps;

    this.enter({ state: "planning", intent: input.intent });
    const plan = await oracle.getPlan(input.intent);

    if (plan.commands.length === 0) {
      logger.error(`Could not determine any commands to run: ${plan.summary}`);
      this.enter({ state: "cancelled", reason: "nothing_to_do" });
      return idle("nothing_to_do");
    }

    this.enter({ state: "awaiting_confirmation", plan });
    interaction.presentPlan(plan, "Proposed Execution Plan");
    if (!(await interaction.confirm("Proceed with this plan?", false))) {
      logger.warn("Cancelled. No changes made to your repository.");
      this.enter({ state: "cancelled", reason: "plan_declined" });
      return idle("declined");
    }

    const checkpoint = await this.deps.checkpoints.execute();
    const result = await this.attempt(input.intent, plan);

    if (result.outcome === "succeeded") {
      logger.success("Success! Operation completed safely.");
      logger.info("Undo anytime with: gitguard rollback");
      return { ...result, checkpoint, rolledBack: false };
    }

    const rolledBack = await this.offerRollback(checkpoint);
    this.enter({ state: "done" });
    return { ...result, checkpoint, rolledBack };
  }

  private async attempt(intent: string, plan: Plan): Promise<AttemptsResult> {
    const { oracle, interaction, logger } = this.deps;

    let commands = plan.commands;
    let attempt = 0;
    let executions = 0;
    const history: string[] = [];

    for (;;) {
      this.enter({ state: "executing", attempt, commands });
      executions++;
      const result = await this.deps.executor.execute(commands);

      if (result.ok) {
        history.push(...commands);
        this.enter({ state: "succeeded" });
        return {
          outcome: "succeeded",
          attempts: executions,
          history,
          lastError: null,
        };
      }

      attempt++;
      const error = describeFailure(result.failure);
      logger.error(`Execution failed (Attempt ${attempt}/${MAX_ATTEMPTS}).`);
      logger.error(`Error: ${error}`);

      // Completed prefix plus the failing command; the tail never ran.
      history.push(...result.completed, result.failure.command);

      if (attempt >= MAX_ATTEMPTS) {
        logger.error("Max retries reached.");
        this.enter({ state: "exhausted", reason: "max_attempts" });
        return {
          outcome: "exhausted_max_attempts",
          attempts: executions,
          history,
          lastError: result.failure,
        };
      }

      this.enter({ state: "fixing", attempt });
      logger.info("Consulting AI for a fix...");
      const fix = await oracle.getFixPlan({
        intent,
        failedCommands: commands,
        error,
        history: [...history],
      });

      if (fix.commands.length === 0) {
        logger.error(`AI could not find a fix: ${fix.summary}`);
        this.enter({ state: "exhausted", reason: "no_fix" });
        return {
          outcome: "exhausted_no_fix",
          attempts: executions,
          history,
          lastError: result.failure,
        };
      }

      const fixPlan = await this.fillMissingInput(fix);

      this.enter({ state: "awaiting_fix_confirmation", plan: fixPlan });
      interaction.presentPlan(fixPlan, "AI Suggested Fix");
      if (!(await interaction.confirm("Apply this fix?", true))) {
        logger.warn("Fix cancelled by user.");
        this.enter({ state: "cancelled", reason: "fix_declined" });
        return {
          outcome: "fix_declined",
          attempts: executions,
          history,
          lastError: result.failure,
        };
      }

      commands = fixPlan.commands;
    }
  }

  private async fillMissingInput(plan: Plan): Promise<Plan> {
    if (!plan.missingInputPrompt) return plan;
    this.deps.logger.info(`Input Required: ${plan.missingInputPrompt}`);
    const value = await this.deps.interaction.ask("Value");
    return { ...plan, commands: substituteInput(plan.commands, value) };
  }

  private async offerRollback(checkpoint: Checkpoint | null): Promise<boolean> {
    const { interaction, logger } = this.deps;

    if (!checkpoint) {
      logger.warn("No checkpoint was created for this run.");
    }

    const accepted = await interaction.confirm(
      "Would you like to rollback to the checkpoint immediately?",
      true,
    );
    if (!accepted) return false;

    // The rollback use case names its target and asks again before resetting.
    this.enter({ state: "rolling_back", checkpoint });
    const result = await this.deps.rollback.execute();
    return result.status === "rolled_back";
  }

  private enter(state: RunState): void {
    this.deps.logger.debug(`state: ${state.state}`);
    this.deps.observer?.(state);
  }
}

function idle(outcome: "nothing_to_do" | "declined"): RunOutput {
  return {
    outcome,
    attempts: 0,
    history: [],
    checkpoint: null,
    rolledBack: false,
    lastError: null,
  };
}
