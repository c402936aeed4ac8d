/**
 * Adapter: NodeFileSystem
 *
 * Concrete FileSystem implementation backed by node:fs/promises.
 * Maps runtime failures to `io_error`.
 */

import { mkdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import type { FileSystem } from "../../domain/ports/filesystem.ts";
import { GgError } from "../../domain/entities/errors.ts";

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

export class NodeFileSystem implements FileSystem {
  async readFile(path: string): Promise<string> {
    try {
      return await readFile(path, "utf8");
    } catch (e) {
      if (isNotFound(e)) {
        throw new GgError("io_error", `File not found: ${path}`);
      }
      throw new GgError("io_error", `Failed to read file: ${path}`);
    }
  }

  async writeFile(path: string, content: string): Promise<void> {
    try {
      await writeFile(path, content, "utf8");
    } catch {
      throw new GgError("io_error", `Failed to write file: ${path}`);
    }
  }

  async rename(from: string, to: string): Promise<void> {
    try {
      await rename(from, to);
    } catch {
      throw new GgError("io_error", `Failed to move ${from} to ${to}`);
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(path);
      return true;
    } catch (e) {
      if (isNotFound(e)) {
        return false;
      }
      throw e;
    }
  }

  async ensureDir(path: string): Promise<void> {
    await mkdir(path, { recursive: true });
  }

  async remove(path: string): Promise<void> {
    await rm(path, { force: true });
  }
}
