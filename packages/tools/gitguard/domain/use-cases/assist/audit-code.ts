// AuditCodeUseCase - Review staged changes for secrets, bugs and leftovers

import type { AuditOutput } from "../../entities/outputs.ts";
import type { GitService } from "../../ports/git-service.ts";
import type { Logger } from "../../ports/logger.ts";
import type { ReviewOracle } from "../../ports/oracle.ts";

export class AuditCodeUseCase {
  constructor(
    private readonly git: GitService,
    private readonly oracle: ReviewOracle,
    private readonly logger: Logger,
  ) {}

  async execute(): Promise<AuditOutput> {
    const diff = await this.git.stagedDiff();
    if (!diff.trim()) {
      return { status: "no_staged_changes" };
    }

    this.logger.info("Auditing code...");
    const report = await this.oracle.auditCode(diff);
    return report ? { status: "audited", report } : { status: "failed" };
  }
}
