import { Notification } from "../entities/notification.entity.js";

export interface IEmailService {
  /** Resolves with the transport's message id; rejects with NotificationError. */
  send(notification: Notification): Promise<string>;
}
