import { LogRecord } from "../entities/log-record.entity.js";
import { RunMode } from "../entities/run-config.entity.js";
import {
  FileActions,
  RunCounters,
  RunOutcome,
  RunStatus,
  emptyCounters,
} from "../entities/run-outcome.entity.js";

/**
 * Reduces rclone's combined output to a RunOutcome.
 *
 * rclone has no machine-readable summary on its text output, so everything
 * here keys off the markers below. They match rclone's current log and
 * stats format and will need updating if that format changes.
 */

export type LogLevel = "ERROR" | "NOTICE" | "INFO" | "DEBUG";

export interface ParsedLine {
  raw: string;
  level?: LogLevel;
  message: string;
}

interface CounterMarker {
  prefix: string;
  counter: keyof RunCounters;
  pattern: RegExp;
}

interface MessageMarker {
  counter: keyof RunCounters;
  pattern: RegExp;
  /** Only fills the counter while nothing else has set it. */
  fallback?: boolean;
}

/** Stats block lines, matched on the start of the message. */
export const STATS_MARKERS: readonly CounterMarker[] = [
  // The byte line ("Transferred: 1.2 MiB / 1.2 MiB") has units and never matches.
  {
    prefix: "Transferred:",
    counter: "transferred",
    pattern: /^Transferred:\s+(\d+)\s*\/\s*\d+,/,
  },
  { prefix: "Checks:", counter: "checked", pattern: /^Checks:\s+(\d+)/ },
  { prefix: "Errors:", counter: "errors", pattern: /^Errors:\s+(\d+)/ },
  { prefix: "Deleted:", counter: "deleted", pattern: /^Deleted:\s+(\d+)/ },
];

const STATS_PREFIXES = [
  "Transferred:",
  "Checks:",
  "Errors:",
  "Deleted:",
  "Renamed:",
  "Server Side Copies:",
  "Server Side Moves:",
  "Elapsed time:",
];
const STATS_END_PREFIX = "Elapsed time:";

/** check / cryptcheck NOTICE summaries, matched on the end of the message. */
export const CHECK_MARKERS: readonly MessageMarker[] = [
  { counter: "mismatched", pattern: /(\d+) differences found$/ },
  { counter: "errors", pattern: /(\d+) errors while checking$/ },
  // Stats "Checks:" lines overwrite this whichever order they come in.
  { counter: "checked", pattern: /(\d+) matching files$/, fallback: true },
];

const FILE_ACTION_MARKERS: readonly [keyof FileActions, string][] = [
  ["newFiles", ": Copied (new)"],
  ["replacedFiles", ": Copied (replaced"],
  ["deletedFiles", ": Deleted"],
];

const LOG_LINE =
  /^(?:\d{4}\/\d{2}\/\d{2} \d{2}:\d{2}:\d{2}(?:\.\d+)?\s+)?(?:(ERROR|NOTICE|INFO|DEBUG)\s*:\s?)?(.*)$/;

export const MAX_ERROR_LINES = 50;

const COUNTER_LABELS: Record<keyof RunCounters, string> = {
  transferred: "Files transferred",
  checked: "Files checked",
  errors: "Errors",
  mismatched: "Differences found",
  deleted: "Deletions",
};

const SUMMARY_COUNTERS: Record<RunMode, readonly (keyof RunCounters)[]> = {
  sync: ["transferred", "checked", "deleted", "errors"],
  check: ["checked", "mismatched", "errors"],
  cryptcheck: ["checked", "mismatched", "errors"],
};

export function parseLine(raw: string): ParsedLine {
  const match = LOG_LINE.exec(raw);
  if (!match) return { raw, message: raw.trim() };
  const level = match[1];
  return {
    raw,
    level: isLogLevel(level) ? level : undefined,
    message: match[2].trim(),
  };
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return (
    value === "ERROR" ||
    value === "NOTICE" ||
    value === "INFO" ||
    value === "DEBUG"
  );
}

export function statusFromExitCode(exitCode: number | null): RunStatus {
  return exitCode === 0 ? "success" : "failure";
}

export function classifyOutput(
  mode: RunMode,
  exitCode: number | null,
  output: string,
  log?: LogRecord,
): RunOutcome {
  try {
    return extractOutcome(mode, exitCode, output, log);
  } catch {
    return {
      status: statusFromExitCode(exitCode),
      exitCode,
      counters: emptyCounters(),
      errorLines: [],
      statsLines: [],
      summary: "",
      log,
    };
  }
}

function extractOutcome(
  mode: RunMode,
  exitCode: number | null,
  output: string,
  log?: LogRecord,
): RunOutcome {
  const counters = emptyCounters();
  const fileActions: FileActions = {
    newFiles: 0,
    replacedFiles: 0,
    deletedFiles: 0,
  };
  const errorLines: string[] = [];
  let omittedErrorLines = 0;
  let hasErrorLine = false;
  let statsLines: string[] = [];
  let statsBlockClosed = false;

  for (const raw of output.split(/\r?\n/)) {
    if (!raw.trim()) continue;
    const line = parseLine(raw);

    if (line.level === "ERROR") hasErrorLine = true;
    if (line.level === "ERROR" || line.level === "NOTICE") {
      if (errorLines.length < MAX_ERROR_LINES) errorLines.push(raw.trim());
      else omittedErrorLines++;
    }

    if (STATS_PREFIXES.some((p) => line.message.startsWith(p))) {
      // rclone prints cumulative stats periodically; keep the last block.
      if (statsBlockClosed) {
        statsLines = [];
        statsBlockClosed = false;
      }
      statsLines.push(line.message);
      if (line.message.startsWith(STATS_END_PREFIX)) statsBlockClosed = true;
    }

    for (const marker of STATS_MARKERS) {
      if (!line.message.startsWith(marker.prefix)) continue;
      const m = marker.pattern.exec(line.message);
      if (m) counters[marker.counter] = Number.parseInt(m[1], 10);
    }

    if (mode !== "sync") {
      for (const marker of CHECK_MARKERS) {
        if (marker.fallback && counters[marker.counter] !== null) continue;
        const m = marker.pattern.exec(line.message);
        if (m) counters[marker.counter] = Number.parseInt(m[1], 10);
      }
    } else {
      for (const [action, marker] of FILE_ACTION_MARKERS) {
        if (line.message.includes(marker)) fileActions[action]++;
      }
    }
  }

  if (omittedErrorLines > 0) {
    errorLines.push(`... ${omittedErrorLines} more line(s) in the attached log`);
  }

  const status = decideStatus(exitCode, hasErrorLine, counters);
  return {
    status,
    exitCode,
    counters,
    fileActions: mode === "sync" ? fileActions : undefined,
    errorLines,
    statsLines,
    summary: renderSummary(
      mode,
      counters,
      mode === "sync" ? fileActions : undefined,
    ),
    log,
  };
}

function decideStatus(
  exitCode: number | null,
  hasErrorLine: boolean,
  counters: RunCounters,
): RunStatus {
  if (exitCode !== 0) return "failure";
  if (
    hasErrorLine ||
    (counters.errors ?? 0) > 0 ||
    (counters.mismatched ?? 0) > 0
  ) {
    return "partial_failure";
  }
  return "success";
}

export function formatCounter(value: number | null): string {
  return value === null ? "unknown" : String(value);
}

export function renderSummary(
  mode: RunMode,
  counters: RunCounters,
  fileActions?: FileActions,
): string {
  const lines = SUMMARY_COUNTERS[mode].map(
    (key) => `${COUNTER_LABELS[key]}: ${formatCounter(counters[key])}`,
  );
  if (fileActions) {
    lines.push(
      `New files synced: ${fileActions.newFiles}`,
      `Files replaced: ${fileActions.replacedFiles}`,
      `Files deleted: ${fileActions.deletedFiles}`,
    );
  }
  return lines.join("\n");
}
