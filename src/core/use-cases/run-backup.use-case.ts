import type { Logger } from "pino";
import { LogRecord } from "../domain/entities/log-record.entity.js";
import {
  DeliveryResult,
  Notification,
} from "../domain/entities/notification.entity.js";
import { RunConfiguration } from "../domain/entities/run-config.entity.js";
import {
  RunOutcome,
  syntheticFailure,
} from "../domain/entities/run-outcome.entity.js";
import {
  BackupError,
  ExecutionError,
  errorMessage,
} from "../domain/errors.js";
import { EXIT_CODES, ExitCode } from "../domain/exit-codes.js";
import {
  ILogStore,
  LogAppender,
} from "../domain/repositories/log-store.repository.js";
import { classifyOutput } from "../domain/services/result-classifier.service.js";
import {
  IToolRunner,
  ToolInvocation,
} from "../domain/services/tool-runner.service.js";
import { CleanupResult, CleanupUseCase } from "./cleanup.use-case.js";
import { ReportingUseCase } from "./reporting.use-case.js";

export type RunState =
  | "init"
  | "logging"
  | "running"
  | "classifying"
  | "cleanup"
  | "pruning"
  | "reporting"
  | "done";

export interface RunReport {
  outcome: RunOutcome;
  record?: LogRecord;
  notification: Notification;
  delivery: DeliveryResult;
  cleanup?: CleanupResult;
  warnings: string[];
  /** Error that short-circuited the run to reporting, if any. */
  error?: BackupError;
  exitCode: ExitCode;
  /** States visited, in order. */
  states: RunState[];
}

export interface RunBackupDependencies {
  logStore: ILogStore;
  runner: IToolRunner;
  cleanup: CleanupUseCase;
  reporting: ReportingUseCase;
  logger: Logger;
  now?: () => Date;
}

/** Mutable state threaded through one run. */
interface RunContext {
  startedAt: Date;
  record?: LogRecord;
  appender?: LogAppender;
  invocation?: ToolInvocation;
  outcome?: RunOutcome;
  cleanup?: CleanupResult;
  lastError?: BackupError;
  warnings: string[];
  notification?: Notification;
  delivery?: DeliveryResult;
}

export function computeExitCode(
  outcome: RunOutcome,
  delivery: DeliveryResult,
  lastError?: BackupError,
): ExitCode {
  if (delivery.status === "failed") return EXIT_CODES.notificationFailed;
  if (lastError) return EXIT_CODES.executionError;
  if (outcome.status !== "success") return EXIT_CODES.toolFailure;
  return EXIT_CODES.success;
}

/**
 * One run, driven as a state machine:
 *
 *   init -> logging -> running -> classifying -> [cleanup] -> pruning -> reporting -> done
 *
 * A failure to create the log or to start rclone records the error and jumps
 * to reporting with a synthetic Failure outcome. Everything else degrades to
 * a warning, so every path ends with exactly one notification attempt.
 */
export class RunBackupUseCase {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: RunBackupDependencies) {
    this.logger = deps.logger.child({ component: "run" });
    this.now = deps.now ?? (() => new Date());
  }

  async execute(config: RunConfiguration): Promise<RunReport> {
    const ctx: RunContext = { startedAt: this.now(), warnings: [] };
    const states: RunState[] = [];
    let state: RunState = "init";

    while (state !== "done") {
      states.push(state);
      state = await this.step(state, config, ctx);
    }
    states.push("done");

    const { outcome, notification, delivery } = ctx;
    if (!outcome || !notification || !delivery) {
      // step() always reaches reporting before done.
      throw new Error("Run ended without reporting");
    }

    const exitCode = computeExitCode(outcome, delivery, ctx.lastError);
    this.logger.info(
      {
        mode: config.mode,
        status: outcome.status,
        delivery: delivery.status,
        exitCode,
      },
      "Run complete",
    );
    return {
      outcome,
      record: ctx.record,
      notification,
      delivery,
      cleanup: ctx.cleanup,
      warnings: ctx.warnings,
      error: ctx.lastError,
      exitCode,
      states,
    };
  }

  private async step(
    state: RunState,
    config: RunConfiguration,
    ctx: RunContext,
  ): Promise<RunState> {
    switch (state) {
      case "init":
        this.logger.info(
          { mode: config.mode, localDir: config.localDir, remote: config.remoteBucket },
          "Starting run",
        );
        return "logging";

      case "logging":
        try {
          ctx.record = await this.deps.logStore.createLog(
            config.mode,
            ctx.startedAt,
          );
          ctx.appender = this.deps.logStore.openAppender(ctx.record);
          return "running";
        } catch (e) {
          return this.abort(ctx, e, "Run log could not be created");
        }

      case "running": {
        const appender = ctx.appender;
        if (!appender) return this.abort(ctx, undefined, "No run log");
        try {
          ctx.invocation = await this.deps.runner.run(config, appender);
          return "classifying";
        } catch (e) {
          return this.abort(ctx, e, "rclone could not be started");
        }
      }

      case "classifying": {
        const invocation = ctx.invocation;
        if (!invocation) return this.abort(ctx, undefined, "rclone produced no result");
        ctx.outcome = classifyOutput(
          config.mode,
          invocation.exitCode,
          invocation.output,
          ctx.record,
        );
        this.logger.info(
          { status: ctx.outcome.status, exitCode: invocation.exitCode },
          "Classified rclone output",
        );
        return ctx.outcome.status === "success" &&
          this.deps.cleanup.shouldRun(config, ctx.outcome)
          ? "cleanup"
          : "pruning";
      }

      case "cleanup":
        if (ctx.outcome && ctx.appender) {
          ctx.cleanup = await this.deps.cleanup.maybeCleanup(
            config,
            ctx.outcome,
            ctx.appender,
          );
          if (ctx.cleanup.warning) ctx.warnings.push(ctx.cleanup.warning);
        }
        return "pruning";

      case "pruning":
        await this.closeLog(ctx);
        await this.pruneLogs(config, ctx);
        await this.compressLog(config, ctx);
        return "reporting";

      case "reporting": {
        await this.closeLog(ctx);
        const outcome =
          ctx.outcome ?? syntheticFailure("run ended early", ctx.record);
        ctx.outcome = outcome;
        ctx.notification = this.deps.reporting.compose(
          config,
          outcome,
          ctx.record,
          {
            startedAt: ctx.startedAt,
            finishedAt: this.now(),
            command: ctx.invocation?.command,
            warnings: ctx.warnings,
            error: ctx.lastError?.message,
          },
        );
        ctx.delivery = await this.deps.reporting.send(ctx.notification);
        return "done";
      }

      case "done":
        return "done";
    }
  }

  private abort(ctx: RunContext, e: unknown, reason: string): RunState {
    const error =
      e instanceof BackupError
        ? e
        : new ExecutionError(e === undefined ? reason : `${reason}: ${errorMessage(e)}`, {
            cause: e,
          });
    this.logger.error({ err: error }, reason);
    // The attached log should say why it has no rclone output.
    ctx.appender?.write(`${error.message}\n`);
    ctx.lastError = error;
    ctx.outcome = syntheticFailure(error.message, ctx.record);
    return "reporting";
  }

  private async closeLog(ctx: RunContext): Promise<void> {
    const appender = ctx.appender;
    if (!appender) return;
    ctx.appender = undefined;
    ctx.record = await appender.close();
    if (appender.error) {
      ctx.warnings.push(
        `Run log is incomplete, writing it failed: ${appender.error.message}`,
      );
    }
  }

  private async pruneLogs(
    config: RunConfiguration,
    ctx: RunContext,
  ): Promise<void> {
    try {
      const result = await this.deps.logStore.prune(
        config.maxLogFiles,
        ctx.record,
      );
      for (const failure of result.failures) {
        ctx.warnings.push(
          `Could not delete old log ${failure.path}: ${failure.message}`,
        );
      }
    } catch (e) {
      this.logger.warn({ err: e }, "Log pruning failed");
      ctx.warnings.push(`Log pruning failed: ${errorMessage(e)}`);
    }
  }

  private async compressLog(
    config: RunConfiguration,
    ctx: RunContext,
  ): Promise<void> {
    const record = ctx.record;
    if (!config.compressLog || !record) return;
    try {
      ctx.record = await this.deps.logStore.compress(
        record,
        config.compressFormat,
      );
    } catch (e) {
      this.logger.warn({ err: e }, "Log compression failed; attaching plain log");
      ctx.warnings.push(
        `Log compression failed, attaching the uncompressed log: ${errorMessage(e)}`,
      );
    }
  }
}
