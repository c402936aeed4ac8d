// ExecuteCommandsUseCase - Run plan commands in order, stopping at the first failure

import type {
  CommandFailure,
  ExecutionResult,
} from "../entities/execution.ts";
import type { Logger } from "../ports/logger.ts";
import type { ShellRunner } from "../ports/shell-runner.ts";

export interface ExecuteCommandsDeps {
  readonly shell: ShellRunner;
  readonly logger: Logger;
  readonly cwd?: string;
}

export class ExecuteCommandsUseCase {
  constructor(private readonly deps: ExecuteCommandsDeps) {}

  async execute(commands: readonly string[]): Promise<ExecutionResult> {
    const { shell, logger, cwd } = this.deps;
    const completed: string[] = [];

    for (const [index, command] of commands.entries()) {
      logger.info(`Executing: ${command}`);

      let failure: CommandFailure | null = null;
      try {
        const result = await shell.run(command, { cwd });
        if (result.stdout.trim()) {
          logger.info(result.stdout.trim());
        }
        if (result.exitCode !== 0) {
          failure = {
            kind: "non_zero_exit",
            command,
            index,
            exitCode: result.exitCode,
            stderr: result.stderr,
          };
        }
      } catch (e) {
        failure = {
          kind: "spawn_error",
          command,
          index,
          exitCode: null,
          stderr: e instanceof Error ? e.message : String(e),
        };
      }

      if (failure) {
        logger.error(`Error executing command '${command}'`);
        if (failure.stderr.trim()) {
          logger.error(failure.stderr.trim());
        }
        return { ok: false, failure, completed };
      }

      logger.success("Done");
      completed.push(command);
    }

    return { ok: true, completed };
  }
}
