import { DeliveryStatus } from "../entities/notification.entity.js";
import { RunMode } from "../entities/run-config.entity.js";

export interface NotificationJournalEntry {
  timestamp: string;
  mode: RunMode;
  recipient?: string;
  subject: string;
  status: DeliveryStatus;
  error?: string;
}

export interface INotificationJournal {
  append(entry: Omit<NotificationJournalEntry, "timestamp">): void;
  /** Newest first. */
  read(limit?: number): NotificationJournalEntry[];
}
