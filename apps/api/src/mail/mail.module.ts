import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EMAIL_SENDER } from './email-sender.interface';
import { SmtpEmailSender } from './smtp-email-sender.service';

/**
 * MailModule — provides the EmailSender collaborator.
 *
 * Consumers inject `@Inject(EMAIL_SENDER) emailSender: EmailSender` and never
 * see nodemailer. ConfigModule is imported here to guarantee ConfigService is
 * available to SmtpEmailSender even if consumers don't import it themselves.
 */
@Module({
  imports: [ConfigModule],
  providers: [
    SmtpEmailSender,
    { provide: EMAIL_SENDER, useExisting: SmtpEmailSender },
  ],
  exports: [EMAIL_SENDER],
})
export class MailModule {}
