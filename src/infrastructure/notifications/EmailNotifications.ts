/**
 * allocation-core - SMTP notifications
 *
 * @module infrastructure/notifications/EmailNotifications
 */

import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';

import type { ICloseable, INotifications } from '../../application/ports';

/**
 * The subset of a nodemailer transporter used to send mail.
 */
export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<unknown>;
  close?(): void;
}

export interface EmailNotificationsOptions {
  host: string;
  port: number;
  from: string;
}

/**
 * Sends each notification as a plain-text email whose subject is the
 * message itself.
 */
export class EmailNotifications implements INotifications, ICloseable {
  private readonly transporter: MailTransport;

  constructor(
    private readonly options: EmailNotificationsOptions,
    transporter?: MailTransport,
  ) {
    this.transporter =
      transporter ?? nodemailer.createTransport({ host: options.host, port: options.port, secure: false });
  }

  async send(destination: string, message: string): Promise<void> {
    await this.transporter.sendMail({
      from: this.options.from,
      to: destination,
      subject: message,
      text: message,
    });
  }

  async close(): Promise<void> {
    this.transporter.close?.();
  }
}
