import type { Logger } from "pino";
import { RunConfiguration } from "../domain/entities/run-config.entity.js";
import { RunOutcome } from "../domain/entities/run-outcome.entity.js";
import { errorMessage } from "../domain/errors.js";
import { LogAppender } from "../domain/repositories/log-store.repository.js";
import { IToolRunner } from "../domain/services/tool-runner.service.js";

export interface CleanupResult {
  ran: boolean;
  exitCode?: number;
  /** Set when cleanup ran and did not succeed; reported, never escalated. */
  warning?: string;
}

/**
 * Removes old remote object versions with `rclone cleanup`, but only after a
 * real sync that fully succeeded.
 */
export class CleanupUseCase {
  private readonly logger: Logger;

  constructor(
    private readonly runner: IToolRunner,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "cleanup" });
  }

  shouldRun(config: RunConfiguration, outcome: RunOutcome): boolean {
    return (
      config.mode === "sync" &&
      !config.dryRun &&
      outcome.status === "success" &&
      config.cleanupPath !== undefined
    );
  }

  async maybeCleanup(
    config: RunConfiguration,
    outcome: RunOutcome,
    log: LogAppender,
  ): Promise<CleanupResult> {
    const cleanupPath = config.cleanupPath;
    if (!this.shouldRun(config, outcome) || cleanupPath === undefined) {
      return { ran: false };
    }

    try {
      const result = await this.runner.cleanup(config, cleanupPath, log);
      if (result.exitCode !== 0) {
        const warning = `Cleanup of ${cleanupPath} failed with exit code ${result.exitCode}`;
        this.logger.warn({ cleanupPath, exitCode: result.exitCode }, warning);
        return { ran: true, exitCode: result.exitCode, warning };
      }
      this.logger.info({ cleanupPath }, "Remote cleanup finished");
      return { ran: true, exitCode: 0 };
    } catch (e) {
      const warning = `Cleanup of ${cleanupPath} could not run: ${errorMessage(e)}`;
      this.logger.warn({ cleanupPath, err: e }, warning);
      return { ran: true, warning };
    }
  }
}
