/**
 * Adapter: NodeShellRunner
 *
 * Concrete ShellRunner implementation using node:child_process.
 * Runs plan commands through the system shell and captures their output.
 *
 * Dependencies: node:child_process.
 */

import { spawn } from "node:child_process";
import type {
  ShellOptions,
  ShellResult,
  ShellRunner,
} from "../../domain/ports/shell-runner.ts";

export class NodeShellRunner implements ShellRunner {
  run(command: string, options?: ShellOptions): Promise<ShellResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, {
        cwd: options?.cwd,
        shell: true,
        stdio: ["inherit", "pipe", "pipe"],
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
        resolve({ exitCode: code ?? 1, stdout, stderr });
      });
    });
  }
}
