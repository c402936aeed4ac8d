// Error types for gitguard domain

export type GgErrorCode =
  | "not_in_git_repo"
  | "invalid_ledger"
  | "no_checkpoints"
  | "git_error"
  | "io_error"
  | "invalid_config";

export class GgError extends Error {
  constructor(
    public readonly code: GgErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "GgError";
  }

  toJSON(): { error: string; code: GgErrorCode; message: string } {
    return {
      error: this.code,
      code: this.code,
      message: this.message,
    };
  }
}
