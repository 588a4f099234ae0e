import nodemailer, { type Transporter } from "nodemailer";
import { Notification } from "../../core/domain/entities/notification.entity.js";
import { SmtpConfig } from "../../core/domain/entities/run-config.entity.js";
import { NotificationError, errorMessage } from "../../core/domain/errors.js";
import { IEmailService } from "../../core/domain/services/email.service.js";

export function createSmtpTransport(smtp: SmtpConfig): Transporter {
  const auth = smtp.user ? { user: smtp.user, pass: smtp.password } : undefined;
  if (smtp.service) {
    return nodemailer.createTransport({ service: smtp.service, auth });
  }
  return nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.secure,
    auth,
  });
}

export class NodemailerEmailService implements IEmailService {
  private readonly transporter: Transporter;

  constructor(
    private readonly smtp: SmtpConfig,
    transporter?: Transporter,
  ) {
    this.transporter = transporter ?? createSmtpTransport(smtp);
  }

  private get sender(): string {
    const address = this.smtp.from ?? this.smtp.user ?? "rclone-backup@localhost";
    return `"rclone backup" <${address}>`;
  }

  async send(notification: Notification): Promise<string> {
    if (!notification.to) {
      throw new NotificationError("Notification has no recipient");
    }
    try {
      const info = await this.transporter.sendMail({
        from: this.sender,
        to: notification.to,
        subject: notification.subject,
        text: notification.text,
        attachments: notification.attachment
          ? [
              {
                filename: notification.attachment.filename,
                path: notification.attachment.path,
              },
            ]
          : [],
      });
      return String(info.messageId);
    } catch (e) {
      throw new NotificationError(
        `Failed to send "${notification.subject}" to ${notification.to}: ${errorMessage(e)}`,
        { cause: e },
      );
    }
  }
}
