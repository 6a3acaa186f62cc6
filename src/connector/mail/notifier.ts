import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import { NotificationError } from '../../shared/errors.js';
import { logger } from '../../shared/logger.js';
import type { ArtifactRef } from '../../runtime/types.js';

/** The slice of a nodemailer transporter the notifier needs. */
export interface MailTransport {
  sendMail(message: SendMailOptions): Promise<unknown>;
}

export interface SmtpSettings {
  host: string;
  port: number;
  user: string;
  pass: string;
}

export function createSmtpTransport(settings: SmtpSettings): MailTransport {
  return nodemailer.createTransport({
    host: settings.host,
    port: settings.port,
    secure: settings.port === 465,
    requireTLS: settings.port !== 465,
    auth: settings.user ? { user: settings.user, pass: settings.pass } : undefined,
  });
}

export interface Notification {
  recipients: string[];
  subject: string;
  /** HTML body. */
  body: string;
  linkedReportUrl: string;
  attachments: readonly ArtifactRef[];
}

export class Notifier {
  constructor(
    private readonly transport: MailTransport,
    private readonly from: string,
  ) {}

  /** Sends exactly one message; any transport failure becomes a NotificationError. */
  async send(notification: Notification): Promise<void> {
    if (notification.recipients.length === 0) {
      throw new NotificationError('No recipients configured');
    }
    const attachments = notification.attachments
      .filter((a) => a.exists)
      .map((a) => ({ filename: a.name, path: a.path }));

    logger.info('Sending report notification', {
      to: notification.recipients,
      attachments: attachments.length,
      link: notification.linkedReportUrl,
    });

    try {
      await this.transport.sendMail({
        from: this.from,
        to: notification.recipients,
        subject: notification.subject,
        html: notification.body,
        text: `${notification.subject}\n\nReport: ${notification.linkedReportUrl}\n`,
        attachments,
      });
    } catch (err) {
      throw new NotificationError(`Failed to send report email: ${(err as Error).message}`);
    }
  }
}
