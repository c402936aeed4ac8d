// Git service port - interface for git operations

/**
 * Service for interacting with the git repository the tool runs in.
 * Every method takes arguments, never a shell string.
 */
export interface GitService {
  /** Get the git root directory for a given working directory. Returns null if not in a git repo. */
  getRoot(cwd: string): Promise<string | null>;

  /** Get the absolute path of the repository metadata directory (.git). */
  getGitDir(cwd: string): Promise<string>;

  /** Whether HEAD resolves to a commit. */
  hasCommits(): Promise<boolean>;

  /** Whether a local branch with this name exists. */
  branchExists(name: string): Promise<boolean>;

  /** Create a branch at HEAD without checking it out. */
  createBranch(name: string): Promise<void>;

  /** Delete a local branch, even if unmerged. */
  deleteBranch(name: string): Promise<void>;

  /** List local branch names starting with a prefix. */
  listBranches(prefix: string): Promise<string[]>;

  /** Record tracked and staged modifications without touching the tree. Returns null when clean. */
  createStash(): Promise<string | null>;

  /** Apply a stash object on top of the working tree. */
  applyStash(id: string): Promise<void>;

  /** Force the working tree and HEAD to a reference. */
  resetHard(reference: string): Promise<void>;

  /** Diff of staged changes. */
  stagedDiff(): Promise<string>;

  /** Diff of the working tree against HEAD (or the index when there is no HEAD). */
  workingDiff(): Promise<string>;

  /** Commit staged changes with a message. */
  commit(message: string): Promise<void>;
}
