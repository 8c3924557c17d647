export { MailModule } from './mail.module';
export { EMAIL_SENDER } from './email-sender.interface';
export type { EmailSender } from './email-sender.interface';
export { EmailDeliveryError } from './mail.exceptions';
