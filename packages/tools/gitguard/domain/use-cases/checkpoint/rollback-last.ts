// RollbackLastUseCase - Restore the repository to the most recent checkpoint

import type { Checkpoint } from "../../entities/checkpoint.ts";
import { GgError } from "../../entities/errors.ts";
import type { RollbackOutput } from "../../entities/outputs.ts";
import type { CheckpointStore } from "../../ports/checkpoint-store.ts";
import type { GitService } from "../../ports/git-service.ts";
import type { Interaction } from "../../ports/interaction.ts";
import type { Logger } from "../../ports/logger.ts";

export interface RollbackLastDeps {
  readonly git: GitService;
  readonly store: CheckpointStore;
  readonly interaction: Interaction;
  readonly logger: Logger;
}

export class RollbackLastUseCase {
  constructor(private readonly deps: RollbackLastDeps) {}

  async execute(): Promise<RollbackOutput> {
    const { git, store, interaction, logger } = this.deps;

    let checkpoints: readonly Checkpoint[];
    try {
      checkpoints = await store.load();
    } catch (e) {
      if (e instanceof GgError && e.code === "invalid_ledger") {
        logger.error(`Invalid checkpoint file: ${e.message}`);
        return { status: "invalid_ledger", error: e.message };
      }
      throw e;
    }

    if (checkpoints.length === 0) {
      logger.warn("No checkpoints found!");
      return { status: "no_checkpoints" };
    }

    const last = checkpoints[0];
    logger.info(
      `Rollback Target: ${last.reference} (Created: ${last.createdAt})`,
    );

    const confirmed = await interaction.confirm(
      "Are you sure you want to revert the repository state to this checkpoint?",
      false,
    );
    if (!confirmed) {
      logger.warn("Rollback cancelled.");
      return { status: "cancelled", checkpoint: last };
    }

    try {
      await git.resetHard(last.reference);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      logger.error(`Rollback failed: ${message}`);
      return { status: "failed", checkpoint: last, error: message };
    }

    let snapshotRestored = false;
    if (last.uncommittedSnapshot) {
      try {
        await git.applyStash(last.uncommittedSnapshot);
        snapshotRestored = true;
        logger.success("Uncommitted changes reapplied.");
      } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        logger.warn(
          `Could not reapply uncommitted changes (likely a conflict): ${message}`,
        );
      }
    }

    await store.popFront();

    logger.success(`Repository rolled back to ${last.reference}.`);
    return { status: "rolled_back", checkpoint: last, snapshotRestored };
  }
}
