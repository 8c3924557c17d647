import { Inject, Injectable } from '@nestjs/common';
import { createHmac, timingSafeEqual } from 'crypto';
import { AUTH_OPTIONS } from '../auth.constants';
import type { AuthOptions } from '../interfaces';
import type { UserAccount } from '../credentials/credential-store.interface';
import type { TokenPurpose } from './token-purpose';

/** `<keyVersion>.<issuedAt, base36 seconds>.<base64url HMAC-SHA256>` */
const TOKEN_PATTERN = /^(\d{1,6})\.([0-9a-z]{1,12})\.([A-Za-z0-9_-]{43})$/;

/** The parts of an account a purpose token is bound to. */
export type TokenSubject = Pick<UserAccount, 'id' | 'securityStamp'>;

/**
 * PurposeTokenService — email-confirmation and password-reset tokens.
 *
 * Nothing is stored. A token carries only its key version and issue time;
 * the MAC covers those plus the user id, the purpose and the user's current
 * security stamp. Verification recomputes the MAC, so a token stops working
 * when:
 * - the lifetime has elapsed
 * - the user's security stamp changes (every password change rotates it)
 * - it is presented for another user or another purpose
 * - the signing key version is bumped
 *
 * Tokens use only URL-safe characters.
 */
@Injectable()
export class PurposeTokenService {
  constructor(@Inject(AUTH_OPTIONS) private readonly options: AuthOptions) {}

  get lifetimeHours(): number {
    return this.options.purposeTokens.lifetimeHours;
  }

  generate(user: TokenSubject, purpose: TokenPurpose): string {
    const keyVersion = this.options.purposeTokens.keyVersion;
    const issuedAt = nowInSeconds();
    const mac = this.sign(keyVersion, issuedAt, user, purpose);

    return `${keyVersion}.${issuedAt.toString(36)}.${mac}`;
  }

  /** Never throws; any defect in the token is answered with false. */
  verify(user: TokenSubject, purpose: TokenPurpose, token: string): boolean {
    const match = TOKEN_PATTERN.exec(decodeOnce(token));
    if (!match) {
      return false;
    }

    const keyVersion = Number(match[1]);
    const issuedAt = parseInt(match[2], 36);
    const presentedMac = match[3];

    if (keyVersion !== this.options.purposeTokens.keyVersion) {
      return false;
    }

    const now = nowInSeconds();
    const lifetimeSeconds = this.options.purposeTokens.lifetimeHours * 3600;
    if (issuedAt > now || now > issuedAt + lifetimeSeconds) {
      return false;
    }

    const expectedMac = this.sign(keyVersion, issuedAt, user, purpose);
    return timingSafeEqual(Buffer.from(presentedMac), Buffer.from(expectedMac));
  }

  private sign(
    keyVersion: number,
    issuedAt: number,
    user: TokenSubject,
    purpose: TokenPurpose,
  ): string {
    return createHmac('sha256', this.options.purposeTokens.secret)
      .update(
        [keyVersion, issuedAt, user.id, purpose, user.securityStamp].join('\n'),
      )
      .digest('base64url');
  }
}

function nowInSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/** Links may arrive with the token still percent-encoded once. */
function decodeOnce(token: string): string {
  if (!token.includes('%')) {
    return token;
  }
  try {
    return decodeURIComponent(token);
  } catch {
    return token;
  }
}
