/**
 * SMTP Email Client
 *
 * Provides email sending functionality via nodemailer.
 * The transport is injected so tests can use nodemailer's JSON transport.
 */

import { ok, err, type Result } from 'neverthrow';
import nodemailer from 'nodemailer';

import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * SMTP connection settings.
 */
export interface SmtpSettings {
  host: string;
  port: number;
  /** STARTTLS on submission ports, implicit TLS on 465 */
  useTls: boolean;
  username?: string | undefined;
  password?: string | undefined;
}

/**
 * Minimal view of a nodemailer transporter used by the client.
 */
export interface MailTransport {
  sendMail(message: nodemailer.SendMailOptions): Promise<{ messageId?: string }>;
  verify?(): Promise<true>;
}

/**
 * Email client configuration.
 */
export interface EmailClientConfig {
  transport: MailTransport;
  /** From address for outbound emails */
  fromAddress: string;
  /** Display name for the from address */
  fromName: string;
  logger: Logger;
}

/**
 * A bare address or a named mailbox.
 */
export type Recipient = string | { name: string; address: string };

/**
 * Parameters for sending an email.
 */
export interface SendEmailParams {
  to: Recipient | Recipient[];
  subject: string;
  html: string;
  /** Plain text alternative */
  text?: string;
}

export interface SendEmailResult {
  messageId: string;
}

/**
 * Email sending error.
 */
export interface EmailError {
  type: 'CONNECTION' | 'AUTH' | 'REJECTED' | 'UNKNOWN';
  message: string;
}

/**
 * Email sender interface (port).
 */
export interface EmailSender {
  send(params: SendEmailParams): Promise<Result<SendEmailResult, EmailError>>;
  /** Verifies the SMTP connection (and credentials when configured) */
  verify(): Promise<Result<void, EmailError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a nodemailer SMTP transport.
 */
export const createSmtpTransport = (settings: SmtpSettings): MailTransport => {
  const secure = settings.port === 465;

  return nodemailer.createTransport({
    host: settings.host,
    port: settings.port,
    secure,
    requireTLS: settings.useTls && !secure,
    ignoreTLS: !settings.useTls,
    ...(settings.username !== undefined && {
      auth: { user: settings.username, pass: settings.password ?? '' },
    }),
  });
};

/**
 * Creates an email client on top of a transport.
 */
export const makeEmailClient = (config: EmailClientConfig): EmailSender => {
  const { transport, fromAddress, fromName, logger } = config;
  const log = logger.child({ component: 'EmailClient' });

  return {
    async send(params: SendEmailParams): Promise<Result<SendEmailResult, EmailError>> {
      const { to, subject, html, text } = params;

      log.debug({ to, subject }, 'Sending email');

      try {
        const info = await transport.sendMail({
          from: { name: fromName, address: fromAddress },
          to,
          subject,
          html,
          ...(text !== undefined && { text }),
        });

        const messageId = info.messageId ?? '';
        log.info({ messageId, to }, 'Email sent successfully');

        return ok({ messageId });
      } catch (error) {
        log.error({ error, to }, 'Failed to send email');
        return err(mapCaughtError(error));
      }
    },

    async verify(): Promise<Result<void, EmailError>> {
      if (transport.verify === undefined) {
        return ok(undefined);
      }

      try {
        await transport.verify();
        return ok(undefined);
      } catch (error) {
        return err(mapCaughtError(error));
      }
    },
  };
};

/**
 * Maps caught errors to our EmailError type.
 */
export function mapCaughtError(error: unknown): EmailError {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;

    if (
      code === 'ECONNECTION' ||
      code === 'ETIMEDOUT' ||
      code === 'ESOCKET' ||
      error.message.includes('ECONNREFUSED') ||
      error.message.includes('ENOTFOUND')
    ) {
      return { type: 'CONNECTION', message: error.message };
    }

    if (code === 'EAUTH') {
      return { type: 'AUTH', message: error.message };
    }

    if (code === 'EENVELOPE' || code === 'EMESSAGE') {
      return { type: 'REJECTED', message: error.message };
    }

    return { type: 'UNKNOWN', message: error.message };
  }

  return { type: 'UNKNOWN', message: 'Unknown error occurred' };
}
