// Checkpoint entity - a recoverable snapshot taken before a risky operation

/**
 * Immutable ledger entry.
 * `reference` names a branch that was created at HEAD and never checked out.
 * `uncommittedSnapshot` is the object id returned by `git stash create`,
 * null when the tree was clean or the snapshot could not be taken.
 */
export type Checkpoint = {
  readonly reference: string;
  readonly createdAt: string; // "YYYYMMDD_HHMMSS"
  readonly uncommittedSnapshot: string | null;
};

export const CHECKPOINT_PREFIX = "gitguard-backup-";

/**
 * Format a date as the compact local timestamp used in checkpoint names.
 */
export function formatCheckpointTimestamp(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  const hour = String(date.getHours()).padStart(2, "0");
  const minute = String(date.getMinutes()).padStart(2, "0");
  const second = String(date.getSeconds()).padStart(2, "0");
  return `${year}${month}${day}_${hour}${minute}${second}`;
}

export function checkpointReference(timestamp: string, sequence = 1): string {
  const base = `${CHECKPOINT_PREFIX}${timestamp}`;
  return sequence > 1 ? `${base}-${sequence}` : base;
}

const REFERENCE_PATTERN = new RegExp(
  `^${CHECKPOINT_PREFIX}\\d{8}_\\d{6}(-\\d+)?$`,
);

/** Whether a branch name was produced by `checkpointReference`. */
export function isCheckpointReference(name: string): boolean {
  return REFERENCE_PATTERN.test(name);
}
