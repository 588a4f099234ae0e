import { RunMode } from "./run-config.entity.js";

export interface LogRecord {
  readonly path: string;
  readonly fileName: string;
  readonly mode: RunMode;
  /** Parsed from the file name, not from filesystem metadata. */
  readonly createdAt: Date;
  readonly compressed: boolean;
  readonly size: number;
}
