export const RUN_MODES = ["sync", "check", "cryptcheck"] as const;
export type RunMode = (typeof RUN_MODES)[number];

export const COMPRESS_FORMATS = ["gzip", "zip"] as const;
export type CompressFormat = (typeof COMPRESS_FORMATS)[number];

export interface SmtpConfig {
  /** Well-known nodemailer service name (e.g. "gmail"); wins over host/port. */
  readonly service?: string;
  readonly host: string;
  readonly port: number;
  readonly secure: boolean;
  readonly user?: string;
  readonly password?: string;
  readonly from?: string;
}

/**
 * Everything a single run needs, resolved once from defaults, the YAML
 * config file, the environment and CLI flags. Never mutated afterwards.
 */
export interface RunConfiguration {
  readonly mode: RunMode;
  readonly localDir: string;
  /** rclone remote spec, e.g. "b2:my-bucket" or "secret:/". */
  readonly remoteBucket: string;
  readonly transfers: number;
  readonly excludeFrom?: string;
  /** rclone duration such as "30m"; files younger than this are skipped. */
  readonly minAge?: string;
  /** Only honoured in sync mode. */
  readonly dryRun: boolean;
  readonly logDir: string;
  readonly maxLogFiles: number;
  readonly compressLog: boolean;
  readonly compressFormat: CompressFormat;
  /** Remote path handed to `rclone cleanup` after a successful sync. */
  readonly cleanupPath?: string;
  /** Comma-separated recipients. Unset means no email is sent. */
  readonly email?: string;
  readonly rcloneConfig?: string;
  readonly rclonePath: string;
  readonly extraFlags: readonly string[];
  readonly notificationLog: string;
  readonly smtp: SmtpConfig;
}
