import { WriteStream, createWriteStream } from "node:fs";
import { mkdir, readdir, rm, stat, unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "pino";
import { LogRecord } from "../../core/domain/entities/log-record.entity.js";
import {
  CompressFormat,
  RUN_MODES,
  RunMode,
} from "../../core/domain/entities/run-config.entity.js";
import { IOError, errorMessage } from "../../core/domain/errors.js";
import {
  ILogStore,
  LogAppender,
  PruneResult,
} from "../../core/domain/repositories/log-store.repository.js";
import { gzipFile, zipFile } from "../utils/compression.utils.js";
import {
  formatLogTimestamp,
  parseLogTimestamp,
} from "../utils/time.utils.js";

export const LOG_FILE_PREFIX = "rclone_log_";

/**
 * rclone_log_<UTC timestamp>_<mode>.log[.gz|.zip]. The timestamp comes first
 * and is fixed-width, so name order is chronological order.
 */
const LOG_FILE_PATTERN =
  /^rclone_log_(\d{8}T\d{9}Z)_([a-z]+)\.log(\.gz|\.zip)?$/;

const COMPRESSED_EXTENSIONS: Record<CompressFormat, string> = {
  gzip: ".gz",
  zip: ".zip",
};

export function logFileName(mode: RunMode, startedAt: Date): string {
  return `${LOG_FILE_PREFIX}${formatLogTimestamp(startedAt)}_${mode}.log`;
}

function isRunMode(value: string): value is RunMode {
  return RUN_MODES.some((m) => m === value);
}

export function parseLogFileName(
  fileName: string,
): { createdAt: Date; mode: RunMode; compressed: boolean } | undefined {
  const match = LOG_FILE_PATTERN.exec(fileName);
  if (!match) return undefined;
  const createdAt = parseLogTimestamp(match[1]);
  const mode = match[2];
  if (!createdAt || !isRunMode(mode)) return undefined;
  return { createdAt, mode, compressed: match[3] !== undefined };
}

class FsLogAppender implements LogAppender {
  private readonly stream: WriteStream;
  private writeError: Error | undefined;
  private closing: Promise<LogRecord> | undefined;

  constructor(
    readonly record: LogRecord,
    private readonly logger: Logger,
  ) {
    this.stream = createWriteStream(record.path, { flags: "a" });
    this.stream.on("error", (err) => {
      if (!this.writeError) {
        this.writeError = err;
        this.logger.warn(
          { err, path: record.path },
          "Run log write failed; remaining output is kept in memory only",
        );
      }
    });
  }

  get error(): Error | undefined {
    return this.writeError;
  }

  write(chunk: Buffer | string): boolean {
    if (this.writeError || this.closing || this.stream.destroyed) return true;
    return this.stream.write(chunk);
  }

  drained(): Promise<void> {
    if (!this.stream.writableNeedDrain || this.stream.destroyed) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      const done = () => {
        this.stream.off("drain", done);
        this.stream.off("close", done);
        resolve();
      };
      this.stream.once("drain", done);
      this.stream.once("close", done);
    });
  }

  close(): Promise<LogRecord> {
    this.closing ??= new Promise<void>((resolve) => {
      if (this.stream.closed) {
        resolve();
        return;
      }
      this.stream.once("close", () => resolve());
      this.stream.end();
    }).then(() => this.refreshSize());
    return this.closing;
  }

  private async refreshSize(): Promise<LogRecord> {
    try {
      const info = await stat(this.record.path);
      return { ...this.record, size: info.size };
    } catch (err) {
      this.logger.warn({ err, path: this.record.path }, "Cannot stat run log");
      return this.record;
    }
  }
}

export class FsLogStore implements ILogStore {
  private readonly logger: Logger;

  constructor(
    private readonly logDir: string,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "log-store" });
  }

  async createLog(mode: RunMode, startedAt: Date): Promise<LogRecord> {
    const fileName = logFileName(mode, startedAt);
    const path = join(this.logDir, fileName);
    try {
      await mkdir(this.logDir, { recursive: true });
      await writeFile(path, "", { flag: "wx" });
    } catch (e) {
      throw new IOError(`Cannot create run log ${path}: ${errorMessage(e)}`, {
        cause: e,
      });
    }
    this.logger.debug({ path }, "Created run log");
    return {
      path,
      fileName,
      mode,
      createdAt: startedAt,
      compressed: false,
      size: 0,
    };
  }

  openAppender(record: LogRecord): LogAppender {
    return new FsLogAppender(record, this.logger);
  }

  async listLogs(): Promise<LogRecord[]> {
    let names: string[];
    try {
      const entries = await readdir(this.logDir, { withFileTypes: true });
      names = entries.filter((e) => e.isFile()).map((e) => e.name);
    } catch (e) {
      if (e instanceof Error && "code" in e && e.code === "ENOENT") return [];
      throw new IOError(
        `Cannot list log directory ${this.logDir}: ${errorMessage(e)}`,
        { cause: e },
      );
    }

    const records: LogRecord[] = [];
    for (const fileName of names) {
      const parsed = parseLogFileName(fileName);
      if (!parsed) continue;
      const path = join(this.logDir, fileName);
      try {
        const info = await stat(path);
        records.push({ path, fileName, ...parsed, size: info.size });
      } catch (err) {
        this.logger.debug({ err, path }, "Log vanished while listing");
      }
    }

    return records.sort(
      (a, b) =>
        b.createdAt.getTime() - a.createdAt.getTime() ||
        b.fileName.localeCompare(a.fileName),
    );
  }

  async prune(maxCount: number, keep?: LogRecord): Promise<PruneResult> {
    const limit = Math.max(0, Math.floor(maxCount));
    const logs = await this.listLogs();
    const result: PruneResult = { deleted: [], failures: [] };

    for (const log of logs.slice(limit)) {
      if (keep && log.path === keep.path) continue;
      try {
        await unlink(log.path);
        result.deleted.push(log.path);
      } catch (e) {
        const message = errorMessage(e);
        this.logger.warn({ path: log.path, err: e }, "Could not delete old log");
        result.failures.push({ path: log.path, message });
      }
    }

    if (result.deleted.length > 0) {
      this.logger.info(
        { deleted: result.deleted.length, retained: limit },
        "Pruned old run logs",
      );
    }
    return result;
  }

  async compress(
    record: LogRecord,
    format: CompressFormat,
  ): Promise<LogRecord> {
    if (record.compressed) return record;
    const extension = COMPRESSED_EXTENSIONS[format];
    const fileName = record.fileName + extension;
    const target = record.path + extension;

    try {
      if (format === "gzip") await gzipFile(record.path, target);
      else await zipFile(record.path, target, record.fileName);
      const info = await stat(target);
      await unlink(record.path);
      this.logger.debug({ path: target, size: info.size }, "Compressed run log");
      return { ...record, path: target, fileName, compressed: true, size: info.size };
    } catch (e) {
      await this.discardPartial(target, e);
      throw new IOError(
        `Cannot compress ${record.path}: ${errorMessage(e)}`,
        { cause: e },
      );
    }
  }

  private async discardPartial(target: string, cause: unknown): Promise<void> {
    // An existing target means wx refused to overwrite; leave it alone.
    if (
      cause instanceof Error &&
      "code" in cause &&
      cause.code === "EEXIST"
    ) {
      return;
    }
    try {
      await rm(target, { force: true });
    } catch (err) {
      this.logger.warn({ err, path: target }, "Could not remove partial archive");
    }
  }
}
