/**
 * Settings consumed by the auth services, resolved once from ConfigService
 * by the AUTH_OPTIONS factory in AuthModule.
 */
export interface AuthOptions {
  jwt: {
    /** HMAC-SHA256 signing key for bearer tokens */
    secret: string;
    issuer: string;
    audience: string;
    expirationMinutes: number;
  };
  purposeTokens: {
    /** HMAC key for email-confirmation and password-reset tokens */
    secret: string;
    /** Bump when rotating `secret`; tokens from older versions stop verifying */
    keyVersion: number;
    lifetimeHours: number;
  };
  bcryptSaltRounds: number;
  requireConfirmedEmail: boolean;
  /** Base URL of this API, used in email-confirmation links */
  apiPublicUrl: string;
  /** Base URL of the web client, used in password-reset links */
  frontendUrl: string;
}
