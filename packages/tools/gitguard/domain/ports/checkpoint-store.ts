// Checkpoint store port - persistence interface for the checkpoint ledger

import type { Checkpoint } from "../entities/checkpoint.ts";

/**
 * Ordered ledger of checkpoints, most recent first.
 */
export interface CheckpointStore {
  /** Load the ledger. Empty when none exists; throws `invalid_ledger` when unreadable. */
  load(): Promise<readonly Checkpoint[]>;

  /** Replace the whole ledger. */
  save(checkpoints: readonly Checkpoint[]): Promise<void>;

  /** Insert a checkpoint at the front of the ledger. */
  prepend(checkpoint: Checkpoint): Promise<void>;

  /** Remove and return the most recent checkpoint. Throws `no_checkpoints` when empty. */
  popFront(): Promise<Checkpoint>;
}
