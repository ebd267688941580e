/**
 * Email transports.
 *
 * The notifier hands complete messages to an {@link EmailTransport}. The
 * SMTP transport delivers them through nodemailer; the in-memory transport
 * records them for tests and can be told to fail for chosen recipients.
 *
 * @module notifications/emailTransport
 */

import nodemailer from 'nodemailer';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface EmailAttachment {
  /** Name shown to the recipient. */
  filename: string;
  /** File read at send time. */
  path: string;
}

export interface EmailMessage {
  from: string;
  to: string;
  subject: string;
  html: string;
  attachments: EmailAttachment[];
}

export interface EmailTransport {
  sendMail(message: EmailMessage): Promise<void>;
}

// ─── Error ───────────────────────────────────────────────────────────────────

/** Raised for a single recipient whose message could not be delivered. */
export class EmailDeliveryError extends Error {
  public readonly code = 'EMAIL_DELIVERY_ERROR';

  constructor(
    message: string,
    public readonly recipient: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'EmailDeliveryError';
  }
}

// ─── SMTP ────────────────────────────────────────────────────────────────────

export interface SmtpConfig {
  host: string;
  port: number;
  /** TLS from the first byte (port 465); otherwise STARTTLS when offered. */
  secure: boolean;
  user?: string;
  password?: string;
}

export interface SmtpTransport extends EmailTransport {
  close(): void;
}

export function createSmtpTransport(config: SmtpConfig): SmtpTransport {
  const transporter = nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: config.secure,
    auth: config.user ? { user: config.user, pass: config.password ?? '' } : undefined,
  });

  return {
    async sendMail(message: EmailMessage): Promise<void> {
      await transporter.sendMail({
        from: message.from,
        to: message.to,
        subject: message.subject,
        html: message.html,
        attachments: message.attachments.map((a) => ({ filename: a.filename, path: a.path })),
      });
    },
    close(): void {
      transporter.close();
    },
  };
}

// ─── In-Memory ───────────────────────────────────────────────────────────────

export interface InMemoryEmailTransport extends EmailTransport {
  readonly sent: EmailMessage[];
  /** Make every later message to `recipient` fail. */
  failFor(recipient: string, error?: Error): void;
}

export function createInMemoryEmailTransport(): InMemoryEmailTransport {
  const sent: EmailMessage[] = [];
  const failures = new Map<string, Error>();

  return {
    sent,
    failFor(recipient: string, error = new Error(`mailbox unavailable: ${recipient}`)): void {
      failures.set(recipient, error);
    },
    async sendMail(message: EmailMessage): Promise<void> {
      const failure = failures.get(message.to);
      if (failure) throw failure;
      sent.push({ ...message, attachments: message.attachments.map((a) => ({ ...a })) });
    },
  };
}
