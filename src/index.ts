#!/usr/bin/env node
/**
 * rclone backup runner - CLI
 * Commands: sync | check | cryptcheck | schedule | logs
 */

import { Command, Option, program } from "commander";
import { config as loadEnv } from "dotenv";
import {
  CliOptionsSchema,
  ScheduleOptionsSchema,
} from "./adapters/validation.js";
import {
  COMPRESS_FORMATS,
  RUN_MODES,
  RunConfiguration,
  RunMode,
} from "./core/domain/entities/run-config.entity.js";
import { STATUS_LABELS } from "./core/domain/entities/run-outcome.entity.js";
import { ConfigurationError, errorMessage } from "./core/domain/errors.js";
import { EXIT_CODES } from "./core/domain/exit-codes.js";
import { CleanupUseCase } from "./core/use-cases/cleanup.use-case.js";
import { ReportingUseCase } from "./core/use-cases/reporting.use-case.js";
import {
  RunBackupUseCase,
  RunReport,
} from "./core/use-cases/run-backup.use-case.js";
import {
  ConfigService,
  getConfigPath,
} from "./infrastructure/services/config.service.js";
import { CronManager } from "./infrastructure/services/cron-manager.service.js";
import {
  type Logger,
  createLogger,
} from "./infrastructure/services/logger.service.js";
import { NodemailerEmailService } from "./infrastructure/services/nodemailer-email.service.js";
import { RcloneRunner } from "./infrastructure/services/rclone-runner.service.js";
import { FsLogStore } from "./infrastructure/storage/fs-log-store.repository.js";
import { JsonlNotificationJournal } from "./infrastructure/storage/jsonl-notification-journal.repository.js";
import { formatDisplayTime } from "./infrastructure/utils/time.utils.js";

loadEnv();

const logger = createLogger();

// ─── Shared helpers ───────────────────────────────────────────────────────────

function createRunBackupUseCase(
  config: RunConfiguration,
  log: Logger,
): RunBackupUseCase {
  const runner = new RcloneRunner(config.rclonePath, log);
  return new RunBackupUseCase({
    logStore: new FsLogStore(config.logDir, log),
    runner,
    cleanup: new CleanupUseCase(runner, log),
    reporting: new ReportingUseCase(
      new NodemailerEmailService(config.smtp),
      new JsonlNotificationJournal(config.notificationLog, log),
      log,
    ),
    logger: log,
  });
}

function globalConfigPath(): string | undefined {
  const value: unknown = program.opts().config;
  return typeof value === "string" ? value : undefined;
}

function parseMode(value: string): RunMode {
  const mode = RUN_MODES.find((m) => m === value);
  if (!mode) {
    throw new ConfigurationError(
      `Unknown mode "${value}", expected one of: ${RUN_MODES.join(", ")}`,
    );
  }
  return mode;
}

function resolveConfig(mode: RunMode, rawOptions: unknown): RunConfiguration {
  const parsed = CliOptionsSchema.safeParse(rawOptions);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (i) => `${i.path.join(".")}: ${i.message}`,
    );
    throw new ConfigurationError(
      `Invalid options:\n  ${issues.join("\n  ")}`,
      issues,
    );
  }
  const configService = new ConfigService(getConfigPath(globalConfigPath()));
  return configService.resolve(mode, parsed.data);
}

function printReport(report: RunReport): void {
  const { outcome } = report;
  console.log(
    `${STATUS_LABELS[outcome.status]} (rclone exit code ${outcome.exitCode ?? "n/a"})`,
  );
  if (report.record) console.log(`Log file: ${report.record.path}`);
  console.log(`Notification: ${report.delivery.status}`);
  for (const warning of report.warnings) console.log(`Warning: ${warning}`);
}

/** Runs one mode and returns the process exit code. */
async function runOnce(mode: RunMode, rawOptions: unknown): Promise<number> {
  try {
    const config = resolveConfig(mode, rawOptions);
    const report = await createRunBackupUseCase(config, logger).execute(config);
    printReport(report);
    return report.exitCode;
  } catch (e) {
    if (e instanceof ConfigurationError) {
      console.error(e.message);
      return EXIT_CODES.configurationError;
    }
    throw e;
  }
}

function addRunOptions(command: Command): Command {
  return command
    .option("--local-dir <path>", "Local directory to back up")
    .option("--remote-bucket <remote>", "rclone remote, e.g. b2:my-bucket")
    .option("--transfers <n>", "Number of parallel transfers")
    .option("--exclude-from <path>", "rclone exclude file")
    .option("--email <addresses>", "Comma-separated summary recipients")
    .option("--rclone-config <path>", "rclone.conf to use")
    .option("--compress-log", "Compress the run log when finished")
    .option("--no-compress-log", "Keep the run log uncompressed")
    .addOption(
      new Option("--compress-format <format>", "Log archive format").choices(
        COMPRESS_FORMATS,
      ),
    )
    .option("--min-age <duration>", "Skip files younger than this, e.g. 30m")
    .option("--log-dir <path>", "Directory for run logs")
    .option("--max-log-files <n>", "Number of run logs to keep")
    .option("--cleanup-path <remote>", "Run rclone cleanup here after a successful sync")
    .option("--rclone-path <path>", "rclone binary");
}

program
  .name("rclone-backup-runner")
  .description("Runs rclone sync/check/cryptcheck, keeps the logs and emails a summary")
  .option("-c, --config <path>", "YAML config file");

// ─── sync | check | cryptcheck ────────────────────────────────────────────────

addRunOptions(
  program.command("sync").description("Mirror the local directory to the remote"),
)
  .option("--dry-run", "Report what would change without changing anything")
  .action(async (opts: unknown) => {
    process.exitCode = await runOnce("sync", opts);
  });

addRunOptions(
  program.command("check").description("Compare local files with the remote"),
).action(async (opts: unknown) => {
  process.exitCode = await runOnce("check", opts);
});

addRunOptions(
  program
    .command("cryptcheck")
    .description("Compare local files with an encrypted remote"),
).action(async (opts: unknown) => {
  process.exitCode = await runOnce("cryptcheck", opts);
});

// ─── schedule ─────────────────────────────────────────────────────────────────

addRunOptions(
  program
    .command("schedule")
    .argument("<mode>", `One of: ${RUN_MODES.join(", ")}`)
    .description("Run a mode on a cron schedule until interrupted"),
)
  .requiredOption("--cron <expression>", "Cron expression, e.g. \"0 3 * * *\"")
  .option("--timezone <tz>", "IANA timezone for the cron expression")
  .option("--dry-run", "Dry run each sync")
  .action(async (modeArg: string, opts: unknown) => {
    try {
      const mode = parseMode(modeArg);
      const schedule = ScheduleOptionsSchema.safeParse(opts);
      if (!schedule.success) {
        throw new ConfigurationError(
          schedule.error.issues.map((i) => i.message).join("; "),
        );
      }
      const config = resolveConfig(mode, opts);
      const useCase = createRunBackupUseCase(config, logger);
      const manager = new CronManager(async () => {
        const report = await useCase.execute(config);
        printReport(report);
        return report.exitCode;
      }, logger);

      manager.start(schedule.data.cron, schedule.data.timezone);
      await new Promise<void>((resolve) => {
        const shutdown = () => {
          manager.stop();
          resolve();
        };
        process.once("SIGINT", shutdown);
        process.once("SIGTERM", shutdown);
      });
      await manager.onIdle();
    } catch (e) {
      if (!(e instanceof ConfigurationError)) throw e;
      console.error(e.message);
      process.exitCode = EXIT_CODES.configurationError;
    }
  });

// ─── logs ─────────────────────────────────────────────────────────────────────

program
  .command("logs")
  .description("List retained run logs and recent notification attempts")
  .option("--log-dir <path>", "Directory for run logs")
  .option("-n, --limit <n>", "Notification entries to show", "20")
  .action(async (opts: { logDir?: string; limit: string }) => {
    try {
      const config = resolveConfig("sync", { logDir: opts.logDir });
      const logs = await new FsLogStore(config.logDir, logger).listLogs();
      console.log(`Run logs in ${config.logDir}: ${logs.length}`);
      for (const log of logs) {
        console.log(
          `  ${formatDisplayTime(log.createdAt)}  ${log.mode.padEnd(10)}  ${String(log.size).padStart(10)}  ${log.fileName}`,
        );
      }

      const limit = Number.parseInt(opts.limit, 10);
      const entries = new JsonlNotificationJournal(
        config.notificationLog,
        logger,
      ).read(Number.isFinite(limit) && limit > 0 ? limit : undefined);
      console.log(`Notifications (newest first): ${entries.length}`);
      for (const entry of entries) {
        const suffix = entry.error ? ` (${entry.error})` : "";
        console.log(
          `  ${entry.timestamp}  ${entry.status.padEnd(7)}  ${entry.subject}${suffix}`,
        );
      }
    } catch (e) {
      console.error(e instanceof ConfigurationError ? e.message : `Listing logs failed: ${errorMessage(e)}`);
      process.exitCode =
        e instanceof ConfigurationError
          ? EXIT_CODES.configurationError
          : EXIT_CODES.executionError;
    }
  });

program.parseAsync(process.argv).catch((e: unknown) => {
  logger.fatal({ err: e }, "Unexpected failure");
  console.error(`Unexpected failure: ${errorMessage(e)}`);
  process.exitCode = EXIT_CODES.executionError;
});
