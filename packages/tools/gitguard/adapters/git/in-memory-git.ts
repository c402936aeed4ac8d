/**
 * Adapter: InMemoryGitService
 *
 * In-memory GitService implementation for testing.
 * Models HEAD, local branches, uncommitted changes and stash objects;
 * any method can be made to fail with `failOn()`.
 *
 * Dependencies: domain ports only.
 */

import { GgError } from "../../domain/entities/errors.ts";
import type { GitService } from "../../domain/ports/git-service.ts";

type GitMethod = Exclude<keyof GitService, "getRoot">;

export class InMemoryGitService implements GitService {
  /** Repository root, or null to simulate a directory outside any repo. */
  root: string | null = "/repo";
  gitDir = "/repo/.git";

  /** Commit at HEAD, or null for a repository without commits. */
  head: string | null = "c1";

  /** Description of uncommitted changes, or null for a clean tree. */
  uncommitted: string | null = null;

  staged = "";
  working = "";

  readonly branches = new Map<string, string>();
  readonly stashes = new Map<string, string>();
  readonly commits: string[] = [];

  /** Mutating calls, in order ("createBranch x", "resetHard y", ...). */
  readonly calls: string[] = [];

  private readonly failures = new Map<GitMethod, string>();

  // --- Test helpers ---

  failOn(method: GitMethod, message: string): void {
    this.failures.set(method, message);
  }

  succeedOn(method: GitMethod): void {
    this.failures.delete(method);
  }

  // --- GitService interface ---

  getRoot(_cwd: string): Promise<string | null> {
    return Promise.resolve(this.root);
  }

  getGitDir(_cwd: string): Promise<string> {
    return this.guarded("getGitDir", () => this.gitDir);
  }

  hasCommits(): Promise<boolean> {
    return this.guarded("hasCommits", () => this.head !== null);
  }

  branchExists(name: string): Promise<boolean> {
    return this.guarded("branchExists", () => this.branches.has(name));
  }

  createBranch(name: string): Promise<void> {
    return this.guarded("createBranch", () => {
      if (this.head === null) {
        throw new GgError("git_error", "Not a valid object name: 'HEAD'");
      }
      if (this.branches.has(name)) {
        throw new GgError("git_error", `a branch named '${name}' already exists`);
      }
      this.calls.push(`createBranch ${name}`);
      this.branches.set(name, this.head);
    });
  }

  deleteBranch(name: string): Promise<void> {
    return this.guarded("deleteBranch", () => {
      if (!this.branches.delete(name)) {
        throw new GgError("git_error", `branch '${name}' not found`);
      }
      this.calls.push(`deleteBranch ${name}`);
    });
  }

  listBranches(prefix: string): Promise<string[]> {
    return this.guarded(
      "listBranches",
      () => [...this.branches.keys()].filter((b) => b.startsWith(prefix)).sort(),
    );
  }

  createStash(): Promise<string | null> {
    return this.guarded("createStash", () => {
      if (this.uncommitted === null) return null;
      const id = `stash${this.stashes.size + 1}`;
      this.stashes.set(id, this.uncommitted);
      return id;
    });
  }

  applyStash(id: string): Promise<void> {
    return this.guarded("applyStash", () => {
      const changes = this.stashes.get(id);
      if (changes === undefined) {
        throw new GgError("git_error", `'${id}' is not a stash-like commit`);
      }
      this.calls.push(`applyStash ${id}`);
      this.uncommitted = changes;
    });
  }

  resetHard(reference: string): Promise<void> {
    return this.guarded("resetHard", () => {
      const commit = this.branches.get(reference);
      if (commit === undefined) {
        throw new GgError(
          "git_error",
          `ambiguous argument '${reference}': unknown revision`,
        );
      }
      this.calls.push(`resetHard ${reference}`);
      this.head = commit;
      this.uncommitted = null;
    });
  }

  stagedDiff(): Promise<string> {
    return this.guarded("stagedDiff", () => this.staged);
  }

  workingDiff(): Promise<string> {
    return this.guarded("workingDiff", () => this.working);
  }

  commit(message: string): Promise<void> {
    return this.guarded("commit", () => {
      this.calls.push("commit");
      this.commits.push(message);
      this.staged = "";
    });
  }

  private guarded<T>(method: GitMethod, fn: () => T): Promise<T> {
    const failure = this.failures.get(method);
    if (failure !== undefined) {
      return Promise.reject(new GgError("git_error", failure));
    }
    try {
      return Promise.resolve(fn());
    } catch (e) {
      return Promise.reject(e);
    }
  }
}
