// CleanCheckpointsUseCase - Delete checkpoint branches and forget them

import {
  CHECKPOINT_PREFIX,
  isCheckpointReference,
} from "../../entities/checkpoint.ts";
import { GgError } from "../../entities/errors.ts";
import type { CleanOutput } from "../../entities/outputs.ts";
import type { CheckpointStore } from "../../ports/checkpoint-store.ts";
import type { GitService } from "../../ports/git-service.ts";
import type { Interaction } from "../../ports/interaction.ts";
import type { Logger } from "../../ports/logger.ts";

export interface CleanCheckpointsDeps {
  readonly git: GitService;
  readonly store: CheckpointStore;
  readonly interaction: Interaction;
  readonly logger: Logger;
}

export class CleanCheckpointsUseCase {
  constructor(private readonly deps: CleanCheckpointsDeps) {}

  async execute(): Promise<CleanOutput> {
    const { git, interaction, logger } = this.deps;

    const branches = (await git.listBranches(CHECKPOINT_PREFIX)).filter(
      isCheckpointReference,
    );
    if (branches.length === 0) {
      logger.success("No checkpoints found.");
      return { status: "no_checkpoints", deleted: [], failed: [] };
    }

    logger.info("GitGuard checkpoints:");
    for (const branch of branches) {
      logger.info(`  ${branch}`);
    }

    const confirmed = await interaction.confirm(
      `Delete all ${branches.length} checkpoint branches?`,
      false,
    );
    if (!confirmed) {
      logger.warn("Cancelled.");
      return { status: "cancelled", deleted: [], failed: [] };
    }

    const deleted: string[] = [];
    const failed: string[] = [];
    for (const branch of branches) {
      try {
        await git.deleteBranch(branch);
        deleted.push(branch);
        logger.success(`Deleted ${branch}`);
      } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        failed.push(branch);
        logger.error(`Failed to delete ${branch}: ${message}`);
      }
    }

    await this.forget(deleted);

    return { status: "cleaned", deleted, failed };
  }

  private async forget(deleted: readonly string[]): Promise<void> {
    if (deleted.length === 0) return;
    const { store, logger } = this.deps;

    try {
      const checkpoints = await store.load();
      const remaining = checkpoints.filter((cp) =>
        !deleted.includes(cp.reference)
      );
      if (remaining.length !== checkpoints.length) {
        await store.save(remaining);
      }
    } catch (e) {
      if (e instanceof GgError && e.code === "invalid_ledger") {
        logger.warn(`Checkpoint ledger left untouched: ${e.message}`);
        return;
      }
      throw e;
    }
  }
}
