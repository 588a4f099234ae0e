import { LogRecord } from "../entities/log-record.entity.js";
import { CompressFormat, RunMode } from "../entities/run-config.entity.js";

/** Write handle on the active run log. The store keeps ownership of the file. */
export interface LogAppender {
  readonly record: LogRecord;
  /** First write failure, if any. Writes after a failure are dropped. */
  readonly error: Error | undefined;
  /** False when the caller should wait for `drained()` before writing more. */
  write(chunk: Buffer | string): boolean;
  /** Resolves once buffered output has been flushed (or the log is closed). */
  drained(): Promise<void>;
  /** Flushes and closes; resolves with the record's final size. */
  close(): Promise<LogRecord>;
}

export interface PruneFailure {
  path: string;
  message: string;
}

export interface PruneResult {
  deleted: string[];
  failures: PruneFailure[];
}

export interface ILogStore {
  createLog(mode: RunMode, startedAt: Date): Promise<LogRecord>;
  openAppender(record: LogRecord): LogAppender;
  /** Newest first. */
  listLogs(): Promise<LogRecord[]>;
  prune(maxCount: number, keep?: LogRecord): Promise<PruneResult>;
  compress(record: LogRecord, format: CompressFormat): Promise<LogRecord>;
}
