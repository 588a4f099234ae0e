export type BackupErrorCode =
  | "CONFIGURATION_ERROR"
  | "EXECUTION_ERROR"
  | "IO_ERROR"
  | "NOTIFICATION_ERROR";

export abstract class BackupError extends Error {
  abstract readonly code: BackupErrorCode;
}

/** Invalid or missing setting. Raised before anything runs. */
export class ConfigurationError extends BackupError {
  readonly code = "CONFIGURATION_ERROR";

  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** rclone could not be started at all (missing binary, permission denied). */
export class ExecutionError extends BackupError {
  readonly code = "EXECUTION_ERROR";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ExecutionError";
  }
}

/** Log directory or log file operation failed. */
export class IOError extends BackupError {
  readonly code = "IO_ERROR";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "IOError";
  }
}

export class NotificationError extends BackupError {
  readonly code = "NOTIFICATION_ERROR";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "NotificationError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
