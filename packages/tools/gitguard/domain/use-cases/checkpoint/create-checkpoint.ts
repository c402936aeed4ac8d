// CreateCheckpointUseCase - Record a restorable snapshot before a risky run

import {
  type Checkpoint,
  checkpointReference,
  formatCheckpointTimestamp,
} from "../../entities/checkpoint.ts";
import type { CheckpointStore } from "../../ports/checkpoint-store.ts";
import type { GitService } from "../../ports/git-service.ts";
import type { Logger } from "../../ports/logger.ts";

export class CreateCheckpointUseCase {
  // References already issued by this instance
  private readonly issued = new Set<string>();

  constructor(
    private readonly git: GitService,
    private readonly store: CheckpointStore,
    private readonly logger: Logger,
    private readonly getTimestamp: () => string = () =>
      formatCheckpointTimestamp(new Date()),
  ) {}

  /**
   * Returns the recorded checkpoint, or null when none could be taken.
   * Never throws: a checkpoint is advisory and must not abort the caller.
   */
  async execute(): Promise<Checkpoint | null> {
    try {
      if (!(await this.git.hasCommits())) {
        this.logger.warn("Skipping checkpoint - no commits yet");
        return null;
      }

      const createdAt = this.getTimestamp();
      const reference = await this.nextReference(createdAt);
      await this.git.createBranch(reference);
      this.issued.add(reference);

      const checkpoint: Checkpoint = {
        reference,
        createdAt,
        uncommittedSnapshot: await this.snapshot(),
      };
      await this.store.prepend(checkpoint);

      this.logger.success(`Checkpoint created: ${reference}`);
      return checkpoint;
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      this.logger.warn(`Could not create checkpoint: ${message}`);
      return null;
    }
  }

  private async nextReference(createdAt: string): Promise<string> {
    let sequence = 1;
    let reference = checkpointReference(createdAt, sequence);
    while (
      this.issued.has(reference) || (await this.git.branchExists(reference))
    ) {
      sequence++;
      reference = checkpointReference(createdAt, sequence);
    }
    return reference;
  }

  private async snapshot(): Promise<string | null> {
    try {
      const id = await this.git.createStash();
      if (id) {
        this.logger.debug(`Saved uncommitted changes as ${id}`);
      }
      return id;
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      this.logger.warn(`Could not snapshot uncommitted changes: ${message}`);
      return null;
    }
  }
}
