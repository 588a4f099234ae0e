import { LogRecord } from "./log-record.entity.js";

export type RunStatus = "success" | "partial_failure" | "failure";

/**
 * Aggregate counters reported by rclone. `null` means rclone never printed
 * the counter, which is not the same as zero.
 */
export interface RunCounters {
  transferred: number | null;
  checked: number | null;
  errors: number | null;
  mismatched: number | null;
  deleted: number | null;
}

/** Per-file actions tallied from INFO lines in sync mode. */
export interface FileActions {
  newFiles: number;
  replacedFiles: number;
  deletedFiles: number;
}

export interface RunOutcome {
  readonly status: RunStatus;
  /** `null` when rclone never ran. */
  readonly exitCode: number | null;
  readonly counters: Readonly<RunCounters>;
  readonly fileActions?: Readonly<FileActions>;
  /** ERROR and NOTICE lines, capped. */
  readonly errorLines: readonly string[];
  /** Final rclone stats block. */
  readonly statsLines: readonly string[];
  readonly summary: string;
  readonly log?: LogRecord;
}

export const STATUS_LABELS: Record<RunStatus, string> = {
  success: "Success",
  partial_failure: "Partial failure",
  failure: "Failure",
};

export function emptyCounters(): RunCounters {
  return {
    transferred: null,
    checked: null,
    errors: null,
    mismatched: null,
    deleted: null,
  };
}

/**
 * Outcome used when rclone could not run at all, so the report still goes
 * out with a Failure status.
 */
export function syntheticFailure(reason: string, log?: LogRecord): RunOutcome {
  return {
    status: "failure",
    exitCode: null,
    counters: emptyCounters(),
    errorLines: [],
    statsLines: [],
    summary: `rclone did not run: ${reason}`,
    log,
  };
}
