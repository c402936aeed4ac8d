// ListCheckpointsUseCase - Show the checkpoint ledger

import type { CheckpointListOutput } from "../../entities/outputs.ts";
import type { CheckpointStore } from "../../ports/checkpoint-store.ts";

export class ListCheckpointsUseCase {
  constructor(private readonly store: CheckpointStore) {}

  async execute(): Promise<CheckpointListOutput> {
    return { checkpoints: await this.store.load() };
  }
}
