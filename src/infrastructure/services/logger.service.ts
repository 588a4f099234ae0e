import pino, { type Logger } from "pino";

export type { Logger };

/**
 * Operator log: JSON lines on stderr, so stdout stays free for the CLI's own
 * output and a scheduler captures both separately. Run logs never go here.
 */
export function createLogger(
  level: string = process.env.LOG_LEVEL ?? "info",
): Logger {
  return pino(
    { level, base: { app: "rclone-backup-runner" } },
    pino.destination(2),
  );
}
