/**
 * Adapter: JsonCheckpointStore
 *
 * Implements the CheckpointStore port using a JSON file, usually
 * {gitDir}/gitguard/checkpoints.json. The file holds an array of
 * checkpoint records, most recent first.
 *
 * Saves go through a temporary file renamed over the ledger, so a reader
 * sees either the old or the new content.
 *
 * Records written by earlier releases use the keys `ref`, `created` and
 * `stash`; they are read and normalized, and written back in the current
 * shape on the next save.
 *
 * Dependencies:
 *   - FileSystem (port) for file operations
 *   - zod for record validation
 */

import { dirname } from "node:path";
import { z } from "zod/mini";
import type { Checkpoint } from "../../domain/entities/checkpoint.ts";
import { GgError } from "../../domain/entities/errors.ts";
import type { CheckpointStore } from "../../domain/ports/checkpoint-store.ts";
import type { FileSystem } from "../../domain/ports/filesystem.ts";

const CheckpointRecordSchema = z.object({
  reference: z.string(),
  createdAt: z.string(),
  uncommittedSnapshot: z.optional(z.nullable(z.string())),
});

const LegacyCheckpointRecordSchema = z.object({
  ref: z.string(),
  created: z.string(),
  stash: z.optional(z.nullable(z.string())),
});

const LedgerSchema = z.array(
  z.union([CheckpointRecordSchema, LegacyCheckpointRecordSchema]),
);

type LedgerRecord = z.infer<typeof LedgerSchema>[number];

function toCheckpoint(record: LedgerRecord): Checkpoint {
  if ("reference" in record) {
    return {
      reference: record.reference,
      createdAt: record.createdAt,
      uncommittedSnapshot: record.uncommittedSnapshot ?? null,
    };
  }
  return {
    reference: record.ref,
    createdAt: record.created,
    uncommittedSnapshot: record.stash ?? null,
  };
}

let tmpCounter = 0;

export class JsonCheckpointStore implements CheckpointStore {
  constructor(
    private readonly fs: FileSystem,
    private readonly ledgerPath: string,
  ) {}

  async load(): Promise<readonly Checkpoint[]> {
    if (!(await this.fs.exists(this.ledgerPath))) {
      return [];
    }

    const content = await this.fs.readFile(this.ledgerPath);

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch {
      throw new GgError(
        "invalid_ledger",
        `Checkpoint ledger is not valid JSON: ${this.ledgerPath}`,
      );
    }

    const parsed = LedgerSchema.safeParse(data);
    if (!parsed.success) {
      throw new GgError(
        "invalid_ledger",
        `Checkpoint ledger has unexpected content: ${this.ledgerPath}`,
      );
    }

    return parsed.data.map(toCheckpoint);
  }

  async save(checkpoints: readonly Checkpoint[]): Promise<void> {
    await this.fs.ensureDir(dirname(this.ledgerPath));
    const tmpPath = `${this.ledgerPath}.${process.pid}.${++tmpCounter}.tmp`;
    const records = checkpoints.map((cp) => ({
      reference: cp.reference,
      createdAt: cp.createdAt,
      uncommittedSnapshot: cp.uncommittedSnapshot,
    }));
    await this.fs.writeFile(tmpPath, JSON.stringify(records, null, 2));
    try {
      await this.fs.rename(tmpPath, this.ledgerPath);
    } catch (e) {
      await this.fs.remove(tmpPath);
      throw e;
    }
  }

  async prepend(checkpoint: Checkpoint): Promise<void> {
    const checkpoints = await this.load();
    await this.save([checkpoint, ...checkpoints]);
  }

  async popFront(): Promise<Checkpoint> {
    const [first, ...rest] = await this.load();
    if (!first) {
      throw new GgError("no_checkpoints", "No checkpoints available");
    }
    await this.save(rest);
    return first;
  }
}
