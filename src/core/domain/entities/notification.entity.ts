import { RunMode } from "./run-config.entity.js";
import { RunStatus } from "./run-outcome.entity.js";

export interface NotificationAttachment {
  filename: string;
  path: string;
}

export interface Notification {
  readonly to?: string;
  readonly subject: string;
  readonly text: string;
  readonly mode: RunMode;
  readonly status: RunStatus;
  readonly attachment?: NotificationAttachment;
}

export type DeliveryStatus = "sent" | "failed" | "skipped";

export interface DeliveryResult {
  status: DeliveryStatus;
  messageId?: string;
  error?: string;
}
