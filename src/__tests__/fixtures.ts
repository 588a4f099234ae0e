import pino, { type Logger } from "pino";
import { LogRecord } from "../core/domain/entities/log-record.entity.js";
import { Notification } from "../core/domain/entities/notification.entity.js";
import { RunConfiguration } from "../core/domain/entities/run-config.entity.js";
import { NotificationError } from "../core/domain/errors.js";
import { LogAppender } from "../core/domain/repositories/log-store.repository.js";
import {
  INotificationJournal,
  NotificationJournalEntry,
} from "../core/domain/repositories/notification-journal.repository.js";
import { IEmailService } from "../core/domain/services/email.service.js";
import {
  IToolRunner,
  ToolInvocation,
} from "../core/domain/services/tool-runner.service.js";

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

/** Logger whose JSON lines land in `lines`. */
export function captureLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(msg: string) {
        lines.push(msg);
      },
    },
  );
  return { logger, lines };
}

export function makeConfig(
  overrides: Partial<RunConfiguration> = {},
): RunConfiguration {
  return {
    mode: "sync",
    localDir: "/mnt/data",
    remoteBucket: "b2:test-bucket",
    transfers: 8,
    excludeFrom: undefined,
    minAge: "30m",
    dryRun: false,
    logDir: "/tmp/rclone-logs",
    maxLogFiles: 120,
    compressLog: false,
    compressFormat: "gzip",
    cleanupPath: undefined,
    email: "ops@example.com",
    rcloneConfig: "/etc/rclone/rclone.conf",
    rclonePath: "rclone",
    extraFlags: [],
    notificationLog: "/tmp/rclone-logs/notifications.jsonl",
    smtp: { host: "localhost", port: 587, secure: false },
    ...overrides,
  };
}

export function makeRecord(overrides: Partial<LogRecord> = {}): LogRecord {
  return {
    path: "/tmp/rclone-logs/rclone_log_20261019T030000000Z_sync.log",
    fileName: "rclone_log_20261019T030000000Z_sync.log",
    mode: "sync",
    createdAt: new Date("2026-10-19T03:00:00.000Z"),
    compressed: false,
    size: 0,
    ...overrides,
  };
}

export class MemoryAppender implements LogAppender {
  readonly chunks: string[] = [];
  error: Error | undefined = undefined;

  constructor(readonly record: LogRecord = makeRecord()) {}

  get text(): string {
    return this.chunks.join("");
  }

  write(chunk: Buffer | string): boolean {
    this.chunks.push(chunk.toString());
    return true;
  }

  drained(): Promise<void> {
    return Promise.resolve();
  }

  close(): Promise<LogRecord> {
    return Promise.resolve(this.record);
  }
}

export class MemoryJournal implements INotificationJournal {
  readonly entries: NotificationJournalEntry[] = [];

  append(entry: Omit<NotificationJournalEntry, "timestamp">): void {
    this.entries.push({ timestamp: "2026-10-19T03:00:00.000Z", ...entry });
  }

  read(limit = 500): NotificationJournalEntry[] {
    return this.entries.slice(-limit).reverse();
  }
}

export class FakeEmailService implements IEmailService {
  readonly sent: Notification[] = [];

  constructor(private readonly failWith?: string) {}

  send(notification: Notification): Promise<string> {
    if (this.failWith) {
      return Promise.reject(new NotificationError(this.failWith));
    }
    this.sent.push(notification);
    return Promise.resolve(`<message-${this.sent.length}@test>`);
  }
}

export type FakeResult = { exitCode: number; output: string } | Error;

/** Writes canned output to the run log instead of spawning rclone. */
export class FakeRunner implements IToolRunner {
  readonly calls: string[] = [];

  constructor(
    private readonly result: FakeResult,
    private readonly cleanupResult: FakeResult = { exitCode: 0, output: "" },
  ) {}

  run(config: RunConfiguration, log: LogAppender): Promise<ToolInvocation> {
    this.calls.push(config.mode);
    return this.respond(this.result, `rclone ${config.mode}`, log);
  }

  cleanup(
    _config: RunConfiguration,
    cleanupPath: string,
    log: LogAppender,
  ): Promise<ToolInvocation> {
    this.calls.push(`cleanup ${cleanupPath}`);
    return this.respond(this.cleanupResult, `rclone cleanup ${cleanupPath}`, log);
  }

  private respond(
    result: FakeResult,
    command: string,
    log: LogAppender,
  ): Promise<ToolInvocation> {
    if (result instanceof Error) return Promise.reject(result);
    log.write(result.output);
    return Promise.resolve({ ...result, command });
  }
}
