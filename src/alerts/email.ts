import nodemailer from 'nodemailer';
import type { AlertPolicy } from '../config/alertPolicy.js';
import type { EmailSettings } from '../config/types.js';
import {
  batchSubject,
  recoverySubject,
  renderBatchHtml,
  renderBatchText,
  renderRecoveryHtml,
  renderRecoveryText
} from './alertTemplates.js';
import type { NotificationSink } from './interface.js';
import type { AlertBatch, RecoveryAlert } from './types.js';

export type SmtpSettings = Extract<EmailSettings, { enabled: true }>;

export interface MailMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
  html: string;
}

/** The part of a nodemailer transporter this sink uses. */
export interface MailTransport {
  sendMail(message: MailMessage): Promise<unknown>;
}

export type TransportFactory = (settings: SmtpSettings) => MailTransport;

/** Port 465 is implicit TLS; otherwise `use_tls` requires STARTTLS. */
export const createSmtpTransport: TransportFactory = (settings) =>
  nodemailer.createTransport({
    host: settings.smtp_server,
    port: settings.smtp_port,
    secure: settings.smtp_port === 465,
    requireTLS: settings.use_tls,
    auth: { user: settings.sender_email, pass: settings.sender_password }
  });

/**
 * Sends one message per batch (critical and warning alerts together) and one
 * per recovery. The transport is rebuilt whenever a policy reload replaces
 * the SMTP settings.
 */
export class EmailNotificationSink implements NotificationSink {
  readonly name = 'email';
  private cached: { settings: SmtpSettings; transport: MailTransport } | null = null;

  constructor(private readonly createTransport: TransportFactory = createSmtpTransport) {}

  enabled(policy: AlertPolicy): boolean {
    return policy.email.enabled;
  }

  async send(batch: AlertBatch, policy: AlertPolicy): Promise<void> {
    if (!batch.hasActionable) return;
    await this.deliver(policy, batchSubject(batch), renderBatchText(batch, policy), renderBatchHtml(batch, policy));
  }

  async sendRecovery(event: RecoveryAlert, policy: AlertPolicy): Promise<void> {
    await this.deliver(
      policy,
      recoverySubject(event),
      renderRecoveryText(event, policy),
      renderRecoveryHtml(event, policy)
    );
  }

  private async deliver(policy: AlertPolicy, subject: string, text: string, html: string): Promise<void> {
    const settings = policy.email;
    if (!settings.enabled) return;
    await this.transportFor(settings).sendMail({
      from: settings.sender_email,
      to: settings.recipient_emails.join(', '),
      subject,
      text,
      html
    });
  }

  private transportFor(settings: SmtpSettings): MailTransport {
    let cached = this.cached;
    if (!cached || cached.settings !== settings) {
      cached = { settings, transport: this.createTransport(settings) };
      this.cached = cached;
    }
    return cached.transport;
  }
}
