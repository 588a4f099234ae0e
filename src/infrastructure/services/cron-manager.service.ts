import cron, { type ScheduledTask } from "node-cron";
import PQueue from "p-queue";
import type { Logger } from "pino";
import { ConfigurationError, errorMessage } from "../../core/domain/errors.js";

export type ScheduledJob = () => Promise<number>;

export type TriggerResult =
  | { outcome: "executed"; exitCode: number }
  | { outcome: "skipped" }
  | { outcome: "failed"; error: string };

/**
 * Runs one job on a cron schedule. Ticks are serialised through a
 * concurrency-1 queue; a tick that fires while a run is active or queued
 * is skipped.
 */
export class CronManager {
  private readonly queue = new PQueue({ concurrency: 1 });
  private readonly logger: Logger;
  private task: ScheduledTask | undefined;

  constructor(
    private readonly job: ScheduledJob,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "scheduler" });
  }

  get running(): boolean {
    return this.task !== undefined;
  }

  start(expression: string, timezone?: string): void {
    if (!cron.validate(expression)) {
      throw new ConfigurationError(`Invalid cron expression: ${expression}`);
    }
    this.stop();
    this.task = cron.schedule(
      expression,
      () => {
        void this.trigger();
      },
      { timezone },
    );
    this.logger.info({ cron: expression, timezone }, "Schedule registered");
  }

  async trigger(): Promise<TriggerResult> {
    if (this.queue.size > 0 || this.queue.pending > 0) {
      this.logger.warn("Scheduled run skipped, previous run still active");
      return { outcome: "skipped" };
    }

    const startedAt = new Date().toISOString();
    this.logger.info({ startedAt }, "Scheduled run started");
    try {
      const exitCode = await this.queue.add(() => this.job(), {
        throwOnTimeout: true,
      });
      this.logger.info({ startedAt, exitCode }, "Scheduled run finished");
      return { outcome: "executed", exitCode };
    } catch (e) {
      this.logger.error({ err: e, startedAt }, "Scheduled run failed");
      return { outcome: "failed", error: errorMessage(e) };
    }
  }

  stop(): void {
    if (!this.task) return;
    this.task.stop();
    this.task = undefined;
    this.logger.info("Schedule stopped");
  }

  /** Resolves once the queue has drained. */
  onIdle(): Promise<void> {
    return this.queue.onIdle();
  }
}
