import {
  RUN_MODES,
  RunConfiguration,
  RunMode,
} from "../../core/domain/entities/run-config.entity.js";

type FlagValue = string | number | boolean | undefined;

interface FlagSpec {
  flag: string;
  modes: readonly RunMode[];
  value: (config: RunConfiguration) => FlagValue;
}

const SYNC_ONLY: readonly RunMode[] = ["sync"];

/**
 * rclone flags per mode. check and cryptcheck transfer nothing, so the
 * transfer-only flags are limited to sync.
 */
export const RCLONE_FLAGS: readonly FlagSpec[] = [
  { flag: "--config", modes: RUN_MODES, value: (c) => c.rcloneConfig },
  { flag: "--transfers", modes: SYNC_ONLY, value: (c) => c.transfers },
  { flag: "--exclude-from", modes: RUN_MODES, value: (c) => c.excludeFrom },
  { flag: "--min-age", modes: SYNC_ONLY, value: (c) => c.minAge },
  { flag: "--dry-run", modes: SYNC_ONLY, value: (c) => c.dryRun },
  { flag: "--log-level", modes: RUN_MODES, value: () => "INFO" },
  { flag: "--stats-file-name-length", modes: RUN_MODES, value: () => 0 },
  { flag: "--fast-list", modes: RUN_MODES, value: () => true },
  { flag: "--links", modes: RUN_MODES, value: () => true },
  { flag: "--b2-hard-delete", modes: SYNC_ONLY, value: () => true },
];

export const TRANSFER_FLAGS = ["--transfers", "--min-age", "--dry-run"];

function pushFlag(args: string[], flag: string, value: FlagValue): void {
  if (value === undefined || value === false) return;
  if (value === true) {
    args.push(flag);
    return;
  }
  const text = String(value).trim();
  if (text === "") return;
  args.push(flag, text);
}

export function buildRcloneArgs(config: RunConfiguration): string[] {
  const args: string[] = [config.mode];
  for (const spec of RCLONE_FLAGS) {
    if (!spec.modes.includes(config.mode)) continue;
    pushFlag(args, spec.flag, spec.value(config));
  }
  args.push(...config.extraFlags);
  args.push(config.localDir, config.remoteBucket);
  return args;
}

export function buildCleanupArgs(
  config: RunConfiguration,
  cleanupPath: string,
): string[] {
  const args = ["cleanup", cleanupPath];
  pushFlag(args, "--config", config.rcloneConfig);
  pushFlag(args, "--log-level", "INFO");
  return args;
}

/** Shell-like rendering for logs and reports; never executed. */
export function formatCommand(bin: string, args: readonly string[]): string {
  return [bin, ...args]
    .map((a) => (a === "" || /[\s"'$`\\]/.test(a) ? JSON.stringify(a) : a))
    .join(" ");
}
