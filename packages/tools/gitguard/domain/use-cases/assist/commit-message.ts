// CommitMessageUseCase - Commit staged changes with a generated message

import type { CommitOutput } from "../../entities/outputs.ts";
import type { GitService } from "../../ports/git-service.ts";
import type { Interaction } from "../../ports/interaction.ts";
import type { Logger } from "../../ports/logger.ts";
import type { ReviewOracle } from "../../ports/oracle.ts";

export interface CommitMessageDeps {
  readonly git: GitService;
  readonly oracle: ReviewOracle;
  readonly interaction: Interaction;
  readonly logger: Logger;
}

export class CommitMessageUseCase {
  constructor(private readonly deps: CommitMessageDeps) {}

  async execute(): Promise<CommitOutput> {
    const { git, oracle, interaction, logger } = this.deps;

    const diff = await git.stagedDiff();
    if (!diff.trim()) {
      return { status: "no_staged_changes" };
    }

    logger.info("Generating commit message...");
    const message = await oracle.generateCommitMessage(diff);
    if (!message) {
      return { status: "failed" };
    }

    logger.info(`Subject: ${message.subject}`);
    if (message.body) {
      logger.info(`Body:\n${message.body}`);
    }

    if (!(await interaction.confirm("Commit with this message?", true))) {
      return { status: "cancelled", message };
    }

    const text = message.body
      ? `${message.subject}\n\n${message.body}`
      : message.subject;
    await git.commit(text);
    return { status: "committed", message };
  }
}
