import type { EmailSender } from '../../src/mail';

export interface SentEmail {
  to: string;
  subject: string;
  html: string;
}

/** Records outgoing mail instead of sending it. */
export class InMemoryEmailSender implements EmailSender {
  readonly sent: SentEmail[] = [];

  /** Set to make every sendEmail call reject with this error. */
  failWith: Error | null = null;

  async sendEmail(to: string, subject: string, htmlBody: string): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.sent.push({ to, subject, html: htmlBody });
  }

  lastTo(to: string): SentEmail | undefined {
    return this.sent.filter((email) => email.to === to).at(-1);
  }

  reset(): void {
    this.sent.length = 0;
    this.failWith = null;
  }
}

/** Pulls the `code` query parameter out of the link in an email body. */
export function extractCode(html: string): string {
  const match = /[?;]code=([^"&]+)/.exec(html);
  if (!match) {
    throw new Error('No code link found in email body');
  }
  return decodeURIComponent(match[1]);
}
