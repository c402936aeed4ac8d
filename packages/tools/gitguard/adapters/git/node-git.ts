/**
 * Adapter: NodeGitService
 *
 * Concrete GitService implementation that shells out to the git CLI
 * with argument vectors (never a shell string).
 *
 * Dependencies: node:child_process (git CLI).
 */

import { spawn } from "node:child_process";
import { GgError } from "../../domain/entities/errors.ts";
import type { GitService } from "../../domain/ports/git-service.ts";

type GitOutput = {
  readonly code: number;
  readonly stdout: string;
  readonly stderr: string;
};

function runGit(
  args: readonly string[],
  cwd: string,
  input?: string,
): Promise<GitOutput> {
  return new Promise((resolve, reject) => {
    const child = spawn("git", args, {
      cwd,
      stdio: ["pipe", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.on("error", reject);
    child.on("close", (code) => {
      resolve({ code: code ?? 1, stdout, stderr });
    });

    child.stdin.end(input ?? "");
  });
}

export class NodeGitService implements GitService {
  constructor(private readonly cwd: string = process.cwd()) {}

  async getRoot(cwd: string): Promise<string | null> {
    try {
      const { code, stdout } = await runGit(
        ["rev-parse", "--show-toplevel"],
        cwd,
      );
      if (code !== 0) {
        return null;
      }
      return stdout.trim();
    } catch {
      return null;
    }
  }

  async getGitDir(cwd: string): Promise<string> {
    const { stdout } = await this.check(
      ["rev-parse", "--absolute-git-dir"],
      cwd,
    );
    return stdout.trim();
  }

  async hasCommits(): Promise<boolean> {
    const { code } = await runGit(
      ["rev-parse", "--verify", "--quiet", "HEAD"],
      this.cwd,
    );
    return code === 0;
  }

  async branchExists(name: string): Promise<boolean> {
    const { code } = await runGit(
      ["rev-parse", "--verify", "--quiet", `refs/heads/${name}`],
      this.cwd,
    );
    return code === 0;
  }

  async createBranch(name: string): Promise<void> {
    await this.check(["branch", name]);
  }

  async deleteBranch(name: string): Promise<void> {
    await this.check(["branch", "-D", name]);
  }

  async listBranches(prefix: string): Promise<string[]> {
    const { stdout } = await this.check([
      "for-each-ref",
      "--format=%(refname:short)",
      `refs/heads/${prefix}*`,
    ]);
    return stdout.split("\n").map((line) => line.trim()).filter(Boolean);
  }

  async createStash(): Promise<string | null> {
    const { stdout } = await this.check(["stash", "create"]);
    const id = stdout.trim();
    return id || null;
  }

  async applyStash(id: string): Promise<void> {
    await this.check(["stash", "apply", id]);
  }

  async resetHard(reference: string): Promise<void> {
    await this.check(["reset", "--hard", reference]);
  }

  async stagedDiff(): Promise<string> {
    const { stdout } = await this.check(["diff", "--cached"]);
    return stdout;
  }

  async workingDiff(): Promise<string> {
    const args = (await this.hasCommits()) ? ["diff", "HEAD"] : ["diff"];
    const { stdout } = await this.check(args);
    return stdout;
  }

  async commit(message: string): Promise<void> {
    await this.check(["commit", "-F", "-"], this.cwd, message);
  }

  private async check(
    args: readonly string[],
    cwd: string = this.cwd,
    input?: string,
  ): Promise<GitOutput> {
    const output = await runGit(args, cwd, input);
    if (output.code !== 0) {
      const detail = output.stderr.trim() || `exit code ${output.code}`;
      throw new GgError("git_error", `git ${args.join(" ")} failed: ${detail}`);
    }
    return output;
  }
}
