/**
 * Adapter: InMemoryFileSystem
 *
 * FileSystem test double. Files live in a Map keyed by absolute path;
 * directories only need to exist for `exists()`. Every write is recorded
 * and a rename can be made to fail, so the ledger's temp-file protocol
 * can be observed.
 */

import { dirname } from "node:path";
import type { FileSystem } from "../../domain/ports/filesystem.ts";
import { GgError } from "../../domain/entities/errors.ts";

export class InMemoryFileSystem implements FileSystem {
  private readonly files = new Map<string, string>();
  private readonly dirs = new Set<string>();
  private renameFailure: string | null = null;

  /** Paths passed to writeFile, in call order. */
  readonly writes: string[] = [];

  // --- Test helpers ---

  setFile(path: string, content: string): void {
    this.files.set(path, content);
  }

  getFile(path: string): string | undefined {
    return this.files.get(path);
  }

  /** Paths of the files currently stored. */
  paths(): string[] {
    return [...this.files.keys()];
  }

  /** Make every following rename reject with `message`. */
  failRename(message: string): void {
    this.renameFailure = message;
  }

  // --- FileSystem interface ---

  readFile(path: string): Promise<string> {
    const content = this.files.get(path);
    return content === undefined
      ? Promise.reject(new GgError("io_error", `File not found: ${path}`))
      : Promise.resolve(content);
  }

  writeFile(path: string, content: string): Promise<void> {
    this.writes.push(path);
    this.files.set(path, content);
    return Promise.resolve();
  }

  rename(from: string, to: string): Promise<void> {
    if (this.renameFailure !== null) {
      return Promise.reject(new GgError("io_error", this.renameFailure));
    }
    const content = this.files.get(from);
    if (content === undefined) {
      return Promise.reject(new GgError("io_error", `File not found: ${from}`));
    }
    this.files.delete(from);
    this.files.set(to, content);
    return Promise.resolve();
  }

  exists(path: string): Promise<boolean> {
    return Promise.resolve(this.files.has(path) || this.dirs.has(path));
  }

  ensureDir(path: string): Promise<void> {
    for (let dir = path; !this.dirs.has(dir); dir = dirname(dir)) {
      this.dirs.add(dir);
    }
    return Promise.resolve();
  }

  remove(path: string): Promise<void> {
    this.files.delete(path);
    return Promise.resolve();
  }
}
