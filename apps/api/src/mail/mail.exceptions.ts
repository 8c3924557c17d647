/**
 * Thrown when an email could not be handed to the mail transport:
 * SMTP not configured, connection refused, authentication rejected,
 * or the server refused the message.
 *
 * Callers treat this as an infrastructure outage, distinct from a bug.
 */
export class EmailDeliveryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EmailDeliveryError';
  }
}
