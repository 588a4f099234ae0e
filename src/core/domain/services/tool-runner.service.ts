import { RunConfiguration } from "../entities/run-config.entity.js";
import { LogAppender } from "../repositories/log-store.repository.js";

export interface ToolInvocation {
  exitCode: number;
  output: string;
  command: string;
}

export interface IToolRunner {
  /** Runs the configured mode. Rejects with ExecutionError only if rclone cannot be spawned. */
  run(config: RunConfiguration, log: LogAppender): Promise<ToolInvocation>;
  cleanup(
    config: RunConfiguration,
    cleanupPath: string,
    log: LogAppender,
  ): Promise<ToolInvocation>;
}
