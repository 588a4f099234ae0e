import { spawn } from "node:child_process";
import type { Readable } from "node:stream";
import { StringDecoder } from "node:string_decoder";
import type { Logger } from "pino";
import { RunConfiguration } from "../../core/domain/entities/run-config.entity.js";
import { ExecutionError } from "../../core/domain/errors.js";
import { LogAppender } from "../../core/domain/repositories/log-store.repository.js";
import {
  IToolRunner,
  ToolInvocation,
} from "../../core/domain/services/tool-runner.service.js";
import {
  buildCleanupArgs,
  buildRcloneArgs,
  formatCommand,
} from "../utils/command.utils.js";

/**
 * Spawns rclone and tees its combined stdout/stderr into the run log while
 * keeping the decoded text for classification. Blocks until the process exits; there
 * is no timeout.
 */
export class RcloneRunner implements IToolRunner {
  private readonly logger: Logger;

  constructor(
    private readonly rclonePath: string,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "rclone-runner" });
  }

  run(config: RunConfiguration, log: LogAppender): Promise<ToolInvocation> {
    return this.exec(buildRcloneArgs(config), log);
  }

  cleanup(
    config: RunConfiguration,
    cleanupPath: string,
    log: LogAppender,
  ): Promise<ToolInvocation> {
    return this.exec(buildCleanupArgs(config, cleanupPath), log);
  }

  exec(args: readonly string[], log: LogAppender): Promise<ToolInvocation> {
    const command = formatCommand(this.rclonePath, args);

    return new Promise<ToolInvocation>((resolve, reject) => {
      let output = "";
      let spawned = false;

      const child = spawn(this.rclonePath, args, {
        shell: false,
        stdio: ["ignore", "pipe", "pipe"],
        env: {
          ...process.env,
          // Never block on an interactive config password prompt.
          RCLONE_ASK_PASSWORD: "false",
        },
      });

      // One decoder per pipe so a split UTF-8 sequence is never mixed
      // with the other stream. A full log buffer pauses the pipe.
      const tee = (source: Readable) => {
        const decoder = new StringDecoder("utf8");
        source.on("data", (d: Buffer) => {
          output += decoder.write(d);
          if (!log.write(d)) {
            source.pause();
            void log.drained().then(() => source.resume());
          }
        });
        source.once("end", () => {
          output += decoder.end();
        });
      };
      tee(child.stdout);
      tee(child.stderr);

      child.once("spawn", () => {
        spawned = true;
        this.logger.info({ command, pid: child.pid }, "rclone started");
      });

      child.on("error", (err) => {
        if (!spawned) {
          reject(
            new ExecutionError(
              `Cannot start ${this.rclonePath}: ${err.message}`,
              { cause: err },
            ),
          );
          return;
        }
        this.logger.warn({ err, command }, "rclone process error");
      });

      child.on("close", (code, signal) => {
        if (!spawned) return;
        const exitCode = code ?? (signal ? 1 : 0);
        this.logger.info({ command, exitCode, signal }, "rclone finished");
        resolve({ exitCode, output, command });
      });
    });
  }
}
