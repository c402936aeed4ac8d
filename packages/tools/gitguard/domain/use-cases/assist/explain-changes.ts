// ExplainChangesUseCase - Describe working tree changes in plain language

import type { ExplainOutput } from "../../entities/outputs.ts";
import type { GitService } from "../../ports/git-service.ts";
import type { Logger } from "../../ports/logger.ts";
import type { ReviewOracle } from "../../ports/oracle.ts";

export class ExplainChangesUseCase {
  constructor(
    private readonly git: GitService,
    private readonly oracle: ReviewOracle,
    private readonly logger: Logger,
  ) {}

  async execute(): Promise<ExplainOutput> {
    const diff = await this.git.workingDiff();
    if (!diff.trim()) {
      return { status: "no_changes" };
    }

    this.logger.info("Analyzing changes...");
    const explanation = await this.oracle.explainChanges(diff);
    return explanation
      ? { status: "explained", explanation }
      : { status: "failed" };
  }
}
