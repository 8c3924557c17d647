import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import { sanitizeForLog } from '../common/logging/sanitize';
import type { EmailSender } from './email-sender.interface';
import { EmailDeliveryError } from './mail.exceptions';

/** Port on which SMTP servers expect implicit TLS instead of STARTTLS */
const IMPLICIT_TLS_PORT = 465;

/**
 * SmtpEmailSender — delivers email through an SMTP relay via nodemailer.
 *
 * The transporter is created once on module init. When SMTP_HOST is not set
 * the sender stays unconfigured and every send fails with
 * EmailDeliveryError, which the auth flows treat as "email service
 * unavailable".
 *
 * Errors raised by the transport (nodemailer tags them with a string `code`
 * such as ECONNECTION, EAUTH or EENVELOPE) are wrapped in
 * EmailDeliveryError; anything else is rethrown unchanged.
 */
@Injectable()
export class SmtpEmailSender implements EmailSender, OnModuleInit {
  private readonly logger = new Logger(SmtpEmailSender.name);
  private transporter: Transporter | null = null;
  private readonly senderEmail: string;
  private readonly senderName: string;

  constructor(private readonly configService: ConfigService) {
    this.senderEmail = this.configService.get<string>(
      'SMTP_SENDER_EMAIL',
      'noreply@versevault.app',
    );
    this.senderName = this.configService.get<string>(
      'SMTP_SENDER_NAME',
      'VerseVault',
    );
  }

  onModuleInit(): void {
    const host = this.configService.get<string>('SMTP_HOST');

    if (!host) {
      this.logger.warn(
        'SMTP_HOST is not set; outgoing email is disabled until it is configured',
      );
      return;
    }

    const port = this.configService.get<number>('SMTP_PORT', 587);
    const user = this.configService.get<string>('SMTP_USER');
    const pass = this.configService.get<string>('SMTP_PASSWORD');

    if (!user || !pass) {
      this.logger.warn(
        'No SMTP credentials configured. Attempting anonymous connection.',
      );
    }

    this.transporter = nodemailer.createTransport({
      host,
      port,
      secure: port === IMPLICIT_TLS_PORT,
      requireTLS: port !== IMPLICIT_TLS_PORT,
      auth: user && pass ? { user, pass } : undefined,
    });

    this.logger.log(`SmtpEmailSender ready on ${host}:${port}`);
  }

  async sendEmail(to: string, subject: string, htmlBody: string): Promise<void> {
    const recipient = sanitizeForLog(to);

    if (!this.transporter) {
      throw new EmailDeliveryError('SMTP server is not configured');
    }

    this.logger.log(`Sending email to ${recipient} with subject "${subject}"`);

    try {
      await this.transporter.sendMail({
        from: { name: this.senderName, address: this.senderEmail },
        to,
        subject,
        html: htmlBody,
      });
    } catch (error) {
      if (isTransportError(error)) {
        this.logger.error(
          `Failed to send email to ${recipient}: ${error.code} ${error.message}`,
        );
        throw new EmailDeliveryError(
          `Mail transport rejected the message (${error.code})`,
          { cause: error },
        );
      }
      throw error;
    }

    this.logger.log(`Email sent to ${recipient}`);
  }
}

function isTransportError(error: unknown): error is Error & { code: string } {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string'
  );
}
