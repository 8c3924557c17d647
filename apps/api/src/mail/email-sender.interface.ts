/**
 * Injection token for the outbound email collaborator.
 *
 * String-based so tests can swap the SMTP implementation for an in-memory
 * one with `overrideProvider(EMAIL_SENDER)`.
 */
export const EMAIL_SENDER = 'EMAIL_SENDER';

/**
 * Sends a single HTML email.
 *
 * Resolves once the message has been accepted by the transport. Rejects with
 * EmailDeliveryError when the transport itself fails (connection, auth,
 * protocol); any other rejection is an unexpected fault.
 */
export interface EmailSender {
  sendEmail(to: string, subject: string, htmlBody: string): Promise<void>;
}
