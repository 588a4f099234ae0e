import { basename } from "node:path";
import type { Logger } from "pino";
import { LogRecord } from "../domain/entities/log-record.entity.js";
import {
  DeliveryResult,
  Notification,
} from "../domain/entities/notification.entity.js";
import { RunConfiguration } from "../domain/entities/run-config.entity.js";
import {
  RunOutcome,
  RunStatus,
  STATUS_LABELS,
} from "../domain/entities/run-outcome.entity.js";
import { errorMessage } from "../domain/errors.js";
import { INotificationJournal } from "../domain/repositories/notification-journal.repository.js";
import { IEmailService } from "../domain/services/email.service.js";
import {
  formatDisplayTime,
  formatElapsed,
} from "../../infrastructure/utils/time.utils.js";

export interface ReportContext {
  startedAt: Date;
  finishedAt: Date;
  /** Command line as run; absent when rclone never started. */
  command?: string;
  warnings: readonly string[];
  /** Fatal error that cut the run short. */
  error?: string;
}

/** Subject tags, so recipients can filter on the subject alone. */
export const SUBJECT_TAGS: Record<RunStatus, string> = {
  success: "✅ SUCCESS",
  partial_failure: "⚠️ PARTIAL FAILURE",
  failure: "❌ FAILURE",
};

export class ReportingUseCase {
  private readonly logger: Logger;

  constructor(
    private readonly emailService: IEmailService,
    private readonly journal: INotificationJournal,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "reporter" });
  }

  compose(
    config: RunConfiguration,
    outcome: RunOutcome,
    record: LogRecord | undefined,
    context: ReportContext,
  ): Notification {
    const dryRun = config.mode === "sync" && config.dryRun;
    const subject =
      `${SUBJECT_TAGS[outcome.status]} rclone ${config.mode}` +
      `${dryRun ? " (dry run)" : ""} - ${formatDisplayTime(context.finishedAt)}`;

    const sections: string[] = [];
    sections.push(
      [
        `Start time: ${formatDisplayTime(context.startedAt)}`,
        `Completion time: ${formatDisplayTime(context.finishedAt)}`,
        `Elapsed time: ${formatElapsed(context.finishedAt.getTime() - context.startedAt.getTime())}`,
        `Status: ${STATUS_LABELS[outcome.status]} (exit code ${outcome.exitCode ?? "n/a"})`,
      ].join("\n"),
    );
    sections.push(`Command line: ${context.command ?? "(rclone did not start)"}`);
    if (context.error) sections.push(`Error: ${context.error}`);
    sections.push(
      `Summary of rclone ${config.mode}:\n${outcome.summary || "(no summary available)"}`,
    );
    if (outcome.statsLines.length > 0) {
      sections.push(`Rclone statistics:\n${outcome.statsLines.join("\n")}`);
    }
    if (outcome.errorLines.length > 0) {
      sections.push(`ERRORs and NOTICEs:\n${outcome.errorLines.join("\n")}`);
    }
    if (context.warnings.length > 0) {
      sections.push(
        `Warnings:\n${context.warnings.map((w) => `- ${w}`).join("\n")}`,
      );
    }
    if (record) sections.push(`Log file: ${record.path}`);

    return {
      to: config.email,
      subject,
      text: sections.join("\n\n") + "\n",
      mode: config.mode,
      status: outcome.status,
      attachment: record
        ? { filename: basename(record.path), path: record.path }
        : undefined,
    };
  }

  /** One attempt, no retry. Never throws. */
  async send(notification: Notification): Promise<DeliveryResult> {
    const base = {
      mode: notification.mode,
      recipient: notification.to,
      subject: notification.subject,
    };

    if (!notification.to) {
      this.logger.warn(
        { subject: notification.subject },
        "No recipient configured; notification not sent",
      );
      this.journal.append({ ...base, status: "skipped" });
      return { status: "skipped" };
    }

    try {
      const messageId = await this.emailService.send(notification);
      this.logger.info(
        { to: notification.to, subject: notification.subject, messageId },
        "Notification sent",
      );
      this.journal.append({ ...base, status: "sent" });
      return { status: "sent", messageId };
    } catch (e) {
      const error = errorMessage(e);
      this.logger.error(
        { to: notification.to, subject: notification.subject, err: e },
        "Notification delivery failed",
      );
      this.journal.append({ ...base, status: "failed", error });
      return { status: "failed", error };
    }
  }
}
