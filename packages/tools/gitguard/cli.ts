import { join } from "node:path";
import { Command, CommanderError } from "commander";
import { loadConfig } from "./config.ts";
import { GgError } from "./domain/entities/errors.ts";
import type { CheckpointStore } from "./domain/ports/checkpoint-store.ts";
import type { FileSystem } from "./domain/ports/filesystem.ts";
import type { GitService } from "./domain/ports/git-service.ts";
import type { Interaction } from "./domain/ports/interaction.ts";
import type { Logger } from "./domain/ports/logger.ts";
import type { PlanOracle, ReviewOracle } from "./domain/ports/oracle.ts";
import type { ShellRunner } from "./domain/ports/shell-runner.ts";
import { AuditCodeUseCase } from "./domain/use-cases/assist/audit-code.ts";
import { CommitMessageUseCase } from "./domain/use-cases/assist/commit-message.ts";
import { ExplainChangesUseCase } from "./domain/use-cases/assist/explain-changes.ts";
import { CleanCheckpointsUseCase } from "./domain/use-cases/checkpoint/clean-checkpoints.ts";
import { CreateCheckpointUseCase } from "./domain/use-cases/checkpoint/create-checkpoint.ts";
import { ListCheckpointsUseCase } from "./domain/use-cases/checkpoint/list-checkpoints.ts";
import { RollbackLastUseCase } from "./domain/use-cases/checkpoint/rollback-last.ts";
import { ExecuteCommandsUseCase } from "./domain/use-cases/execute-commands.ts";
import { RunIntentUseCase } from "./domain/use-cases/run-intent.ts";
import {
  formatAudit,
  formatCheckpointList,
  formatError,
  formatExplanation,
  formatRunSummary,
} from "./adapters/cli/formatter.ts";
import { TerminalInteraction } from "./adapters/cli/terminal-interaction.ts";
import { NodeFileSystem } from "./adapters/filesystem/node-fs.ts";
import { NodeGitService } from "./adapters/git/node-git.ts";
import { ConsoleLogger } from "./adapters/logging/console-logger.ts";
import {
  GeminiJsonGenerator,
  GeminiOracle,
} from "./adapters/oracle/gemini-oracle.ts";
import { NodeShellRunner } from "./adapters/process/node-shell-runner.ts";
import { JsonCheckpointStore } from "./adapters/repositories/json-checkpoint-store.ts";

// ============================================================================
// Version
// ============================================================================

export const VERSION = "0.1.0";

// ============================================================================
// Constants
// ============================================================================

const LEDGER_DIR = "gitguard";
const LEDGER_FILE = "checkpoints.json";

// ============================================================================
// Wiring
// ============================================================================

/**
 * Everything a command needs from the outside world.
 */
export type CliContext = {
  readonly cwd: string;
  readonly git: GitService;
  readonly fs: FileSystem;
  readonly shell: ShellRunner;
  readonly oracle: PlanOracle & ReviewOracle;
  readonly interaction: Interaction;
  readonly logger: Logger;
  /** Releases the terminal once the command has finished. */
  readonly close: () => void;
};

export type ContextFactory = (options: { verbose: boolean }) => CliContext;

export const createDefaultContext: ContextFactory = ({ verbose }) => {
  const config = loadConfig();
  const logger = new ConsoleLogger(verbose || config.debug);
  const generator = config.apiKey
    ? new GeminiJsonGenerator({
      apiKey: config.apiKey,
      model: config.model,
      timeoutMs: config.oracleTimeoutMs,
    })
    : null;
  const cwd = process.cwd();
  const interaction = new TerminalInteraction();

  return {
    cwd,
    git: new NodeGitService(cwd),
    fs: new NodeFileSystem(),
    shell: new NodeShellRunner(),
    oracle: new GeminiOracle(generator, logger),
    interaction,
    logger,
    close: () => interaction.close(),
  };
};

type Repo = {
  readonly root: string;
  readonly store: CheckpointStore;
};

async function openRepo(ctx: CliContext): Promise<Repo> {
  const root = await ctx.git.getRoot(ctx.cwd);
  if (!root) {
    throw new GgError("not_in_git_repo", "Not a git repository.");
  }
  const gitDir = await ctx.git.getGitDir(root);
  const store = new JsonCheckpointStore(
    ctx.fs,
    join(gitDir, LEDGER_DIR, LEDGER_FILE),
  );
  return { root, store };
}

function rollbackUseCase(ctx: CliContext, repo: Repo): RollbackLastUseCase {
  return new RollbackLastUseCase({
    git: ctx.git,
    store: repo.store,
    interaction: ctx.interaction,
    logger: ctx.logger,
  });
}

// ============================================================================
// Commands
// ============================================================================

async function cmdRun(ctx: CliContext, intent: string): Promise<number> {
  const repo = await openRepo(ctx);

  ctx.logger.info(`GitGuard interpreting intent: '${intent}'`);
  const useCase = new RunIntentUseCase({
    oracle: ctx.oracle,
    executor: new ExecuteCommandsUseCase({
      shell: ctx.shell,
      logger: ctx.logger,
      cwd: repo.root,
    }),
    checkpoints: new CreateCheckpointUseCase(ctx.git, repo.store, ctx.logger),
    rollback: rollbackUseCase(ctx, repo),
    interaction: ctx.interaction,
    logger: ctx.logger,
  });

  const output = await useCase.execute({ intent });
  const summary = formatRunSummary(output);
  if (summary) {
    ctx.logger.info(summary);
  }

  switch (output.outcome) {
    case "exhausted_max_attempts":
    case "exhausted_no_fix":
    case "fix_declined":
      return 1;
    default:
      return 0;
  }
}

async function cmdRollback(ctx: CliContext): Promise<number> {
  const repo = await openRepo(ctx);
  const output = await rollbackUseCase(ctx, repo).execute();
  return output.status === "failed" ? 1 : 0;
}

async function cmdCheckpoints(ctx: CliContext, json: boolean): Promise<number> {
  const repo = await openRepo(ctx);
  const output = await new ListCheckpointsUseCase(repo.store).execute();
  ctx.logger.info(
    json ? JSON.stringify(output) : formatCheckpointList(output),
  );
  return 0;
}

async function cmdClean(ctx: CliContext): Promise<number> {
  const repo = await openRepo(ctx);
  const output = await new CleanCheckpointsUseCase({
    git: ctx.git,
    store: repo.store,
    interaction: ctx.interaction,
    logger: ctx.logger,
  }).execute();
  return output.failed.length > 0 ? 1 : 0;
}

async function cmdCommit(ctx: CliContext): Promise<number> {
  await openRepo(ctx);
  const output = await new CommitMessageUseCase({
    git: ctx.git,
    oracle: ctx.oracle,
    interaction: ctx.interaction,
    logger: ctx.logger,
  }).execute();

  switch (output.status) {
    case "no_staged_changes":
      ctx.logger.warn(
        "No staged changes found. Stage your files first (git add ...).",
      );
      return 0;
    case "failed":
      ctx.logger.error("Failed to generate message.");
      return 1;
    case "cancelled":
      ctx.logger.warn("Commit cancelled.");
      return 0;
    case "committed":
      ctx.logger.success(`Committed: ${output.message.subject}`);
      return 0;
  }
}

async function cmdAudit(ctx: CliContext): Promise<number> {
  await openRepo(ctx);
  const output = await new AuditCodeUseCase(ctx.git, ctx.oracle, ctx.logger)
    .execute();

  switch (output.status) {
    case "no_staged_changes":
      ctx.logger.warn("No staged changes to audit.");
      return 0;
    case "failed":
      ctx.logger.error("Audit failed.");
      return 1;
    case "audited":
      ctx.logger.info(formatAudit(output.report));
      if (!output.report.passed) {
        ctx.logger.error("Warning: Issues found!");
        return 1;
      }
      return 0;
  }
}

async function cmdExplain(ctx: CliContext): Promise<number> {
  await openRepo(ctx);
  const output = await new ExplainChangesUseCase(
    ctx.git,
    ctx.oracle,
    ctx.logger,
  ).execute();

  switch (output.status) {
    case "no_changes":
      ctx.logger.warn("No changes found to explain.");
      return 0;
    case "failed":
      ctx.logger.error("Failed to explain.");
      return 1;
    case "explained":
      ctx.logger.info(formatExplanation(output.explanation));
      return 0;
  }
}

// ============================================================================
// CLI with Commander
// ============================================================================

function handleError(e: unknown, json: boolean, logger: Logger | null): number {
  const report = (message: string) =>
    logger ? logger.error(message) : console.error(message);

  if (e instanceof GgError) {
    report(json ? JSON.stringify(e.toJSON()) : formatError(e));
  } else {
    const message = e instanceof Error ? e.message : String(e);
    report(`Unexpected error: ${message}`);
  }
  return 1;
}

function buildProgram(
  makeContext: ContextFactory,
  setExitCode: (code: number) => void,
): Command {
  const program = new Command()
    .name("gitguard")
    .version(VERSION)
    .description(
      "GitGuard - plan, checkpoint and roll back git operations\n\n" +
        "Core workflow:\n" +
        '  1. gitguard run "undo my last commit"   # Plan, confirm, checkpoint, execute\n' +
        "  2. gitguard rollback                    # Restore the latest checkpoint\n" +
        "  3. gitguard clean                       # Delete checkpoint branches\n\n" +
        "See 'gitguard <command> --help' for details",
    )
    .option("-v, --verbose", "Print debug output")
    .exitOverride();

  const action = (
    json: boolean,
    fn: (ctx: CliContext) => Promise<number>,
  ) =>
  async () => {
    let ctx: CliContext | null = null;
    try {
      const globals = program.opts<{ verbose?: boolean }>();
      ctx = makeContext({ verbose: globals.verbose ?? false });
      setExitCode(await fn(ctx));
    } catch (e) {
      setExitCode(handleError(e, json, ctx?.logger ?? null));
    } finally {
      ctx?.close();
    }
  };

  program
    .command("run")
    .description(
      "Interpret intent, evaluate risk, and execute git commands with safety",
    )
    .argument("<intent...>", "What do you want to do? (e.g. 'undo last commit')")
    .action((intent: string[]) =>
      action(false, (ctx) => cmdRun(ctx, intent.join(" ")))()
    );

  program
    .command("rollback")
    .description("Undo the last GitGuard operation using safety checkpoints")
    .action(action(false, cmdRollback));

  program
    .command("checkpoints")
    .description("List recorded checkpoints, most recent first")
    .option("--json", "Output as JSON")
    .action((options: { json?: boolean }) =>
      action(
        options.json ?? false,
        (ctx) => cmdCheckpoints(ctx, options.json ?? false),
      )()
    );

  program
    .command("clean")
    .description("Delete GitGuard checkpoint branches")
    .action(action(false, cmdClean));

  program
    .command("commit")
    .description("Generate a conventional commit message from staged changes")
    .action(action(false, cmdCommit));

  program
    .command("audit")
    .description("Audit staged code for secrets, bugs, and TODOs")
    .action(action(false, cmdAudit));

  program
    .command("explain")
    .description("Explain changes in plain English")
    .action(action(false, cmdExplain));

  return program;
}

/**
 * Run the CLI and return the process exit code. Never rejects.
 */
export async function main(
  args: string[],
  makeContext: ContextFactory = createDefaultContext,
): Promise<number> {
  let exitCode = 0;
  const program = buildProgram(makeContext, (code) => {
    exitCode = code;
  });

  // Show help when no arguments provided
  if (args.length === 0) {
    program.outputHelp();
    return 0;
  }

  try {
    await program.parseAsync(args, { from: "user" });
  } catch (e) {
    if (e instanceof CommanderError) {
      return e.exitCode;
    }
    return handleError(e, false, null);
  }
  return exitCode;
}
