import {
  appendFileSync,
  existsSync,
  mkdirSync,
  readFileSync,
} from "node:fs";
import { dirname } from "node:path";
import type { Logger } from "pino";
import { RUN_MODES } from "../../core/domain/entities/run-config.entity.js";
import {
  INotificationJournal,
  NotificationJournalEntry,
} from "../../core/domain/repositories/notification-journal.repository.js";

export const JOURNAL_MAX_ENTRIES = 500;

function isJournalEntry(value: unknown): value is NotificationJournalEntry {
  if (value === null || typeof value !== "object") return false;
  const mode = "mode" in value ? value.mode : undefined;
  return (
    "timestamp" in value &&
    typeof value.timestamp === "string" &&
    RUN_MODES.some((m) => m === mode) &&
    "subject" in value &&
    typeof value.subject === "string" &&
    "status" in value &&
    (value.status === "sent" ||
      value.status === "failed" ||
      value.status === "skipped")
  );
}

/**
 * Append-only JSON-lines record of every delivery attempt. Lives outside the
 * run logs so a failed send is still recorded when the log itself is the
 * problem.
 */
export class JsonlNotificationJournal implements INotificationJournal {
  private readonly logger: Logger;

  constructor(
    private readonly journalPath: string,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "notification-journal" });
  }

  append(entry: Omit<NotificationJournalEntry, "timestamp">): void {
    try {
      const dir = dirname(this.journalPath);
      if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
      const line = JSON.stringify({
        timestamp: new Date().toISOString(),
        ...entry,
      });
      appendFileSync(this.journalPath, line + "\n", "utf-8");
    } catch (err) {
      this.logger.warn(
        { err, path: this.journalPath },
        "Could not append to notification journal",
      );
    }
  }

  read(limit = JOURNAL_MAX_ENTRIES): NotificationJournalEntry[] {
    if (!existsSync(this.journalPath)) return [];
    const entries: NotificationJournalEntry[] = [];
    const raw = readFileSync(this.journalPath, "utf-8");
    for (const line of raw.split("\n")) {
      if (!line.trim()) continue;
      try {
        const parsed: unknown = JSON.parse(line);
        if (isJournalEntry(parsed)) entries.push(parsed);
      } catch {
        this.logger.debug({ line }, "Skipping malformed journal line");
      }
    }
    return entries.slice(-limit).reverse();
  }
}
