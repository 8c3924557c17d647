export interface EmailContent {
  subject: string;
  html: string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/** `path` appended to whatever path `base` already has (e.g. a proxy prefix). */
function urlUnder(base: string, path: string): URL {
  const url = new URL(base);
  url.pathname = url.pathname.replace(/\/+$/, '') + path;
  return url;
}

/**
 * Link in the confirmation email. Points at this API's confirm-email
 * endpoint so the click confirms the address without the web client.
 */
export function buildConfirmationLink(
  apiPublicUrl: string,
  userId: string,
  code: string,
): string {
  const url = urlUnder(apiPublicUrl, '/api/auth/confirm-email');
  url.searchParams.set('userId', userId);
  url.searchParams.set('code', code);
  return url.toString();
}

/** Link in the reset email. Points at the web client's reset form. */
export function buildPasswordResetLink(
  frontendUrl: string,
  email: string,
  code: string,
): string {
  const url = urlUnder(frontendUrl, '/reset-password');
  url.searchParams.set('email', email);
  url.searchParams.set('code', code);
  return url.toString();
}

export function confirmationEmail(link: string): EmailContent {
  return {
    subject: 'Confirm your email',
    html: `
      <h2>Welcome to VerseVault!</h2>
      <p>Thank you for registering. Please confirm your email by clicking the link below:</p>
      <p><a href="${escapeHtml(link)}">Confirm Email</a></p>
      <p>If you did not register, please ignore this email.</p>`,
  };
}

export function passwordResetEmail(
  displayName: string,
  link: string,
  lifetimeHours: number,
): EmailContent {
  return {
    subject: 'Reset your password - VerseVault',
    html: `
      <h2>Password Reset Request</h2>
      <p>Hello ${escapeHtml(displayName)},</p>
      <p>We received a request to reset your password. Click the link below to create a new password:</p>
      <p><a href="${escapeHtml(link)}">Reset Password</a></p>
      <p>This link will expire in ${lifetimeHours} hours.</p>
      <p>If you did not request a password reset, please ignore this email.</p>
      <p>Best regards,<br/>The VerseVault Team</p>`,
  };
}
