import { Inject, Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { createHmac, timingSafeEqual } from 'crypto';
import { JsonWebTokenError, TokenExpiredError } from 'jsonwebtoken';
import { AUTH_OPTIONS } from '../auth.constants';
import type { AuthOptions, JwtClaims, JwtPayload } from '../interfaces';

/** Only algorithm accepted for bearer tokens */
export const JWT_ALGORITHM = 'HS256';

export type TokenValidationError =
  | 'InvalidSignature'
  | 'Expired'
  | 'InvalidIssuer'
  | 'InvalidAudience'
  | 'Malformed';

export type TokenValidationResult =
  | { ok: true; claims: JwtClaims }
  | { ok: false; error: TokenValidationError };

/**
 * TokenIssuer — mints and validates HMAC-SHA256 bearer tokens.
 *
 * Claims: { sub, email, name, iss, aud, iat, exp }. Validation enforces
 * signature, issuer, audience and expiry. A token is accepted up to and
 * including the second of its `exp` claim and rejected from the next one.
 *
 * JwtStrategy is configured from `verifyOptions` and classifies failures
 * with `classifyJwtError`, so protected routes apply the same rules as
 * `validate`.
 */
@Injectable()
export class TokenIssuer {
  constructor(
    private readonly jwtService: JwtService,
    @Inject(AUTH_OPTIONS) private readonly options: AuthOptions,
  ) {}

  /** Default lifetime of an access token, in seconds */
  get defaultTtlSeconds(): number {
    return this.options.jwt.expirationMinutes * 60;
  }

  get verifyOptions(): {
    secret: string;
    issuer: string;
    audience: string;
    algorithms: [typeof JWT_ALGORITHM];
    clockTolerance: number;
  } {
    return {
      secret: this.options.jwt.secret,
      issuer: this.options.jwt.issuer,
      audience: this.options.jwt.audience,
      algorithms: [JWT_ALGORITHM],
      // jsonwebtoken rejects at now >= exp on a whole-second clock;
      // one second moves that to now > exp
      clockTolerance: 1,
    };
  }

  /**
   * @param ttlSeconds lifetime of the token; must be a positive integer
   * @throws RangeError for a non-positive or fractional ttl
   */
  issue(
    userId: string,
    email: string,
    displayName: string,
    ttlSeconds: number = this.defaultTtlSeconds,
  ): string {
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      throw new RangeError(
        `Token lifetime must be a positive number of seconds, got ${ttlSeconds}`,
      );
    }

    const payload: JwtPayload = { sub: userId, email, name: displayName };

    return this.jwtService.sign(payload, {
      secret: this.options.jwt.secret,
      algorithm: JWT_ALGORITHM,
      issuer: this.options.jwt.issuer,
      audience: this.options.jwt.audience,
      expiresIn: ttlSeconds,
    });
  }

  validate(token: string): TokenValidationResult {
    let decoded: Record<string, unknown>;
    try {
      decoded = this.jwtService.verify<Record<string, unknown>>(
        token,
        this.verifyOptions,
      );
    } catch (error) {
      const kind = classifyJwtError(error);
      // An altered payload can fail to decode before jsonwebtoken reaches the
      // signature; a well-formed header with a foreign MAC is still a bad signature
      if (kind === 'Malformed' && this.hasForeignSignature(token)) {
        return { ok: false, error: 'InvalidSignature' };
      }
      return { ok: false, error: kind };
    }

    if (!isJwtClaims(decoded)) {
      return { ok: false, error: 'Malformed' };
    }
    return { ok: true, claims: decoded };
  }

  private hasForeignSignature(token: string): boolean {
    const parts = token.split('.');
    if (parts.length !== 3 || !decodesToJsonObject(parts[0])) {
      return false;
    }

    const [header, payload, signature] = parts;
    const expected = Buffer.from(
      createHmac('sha256', this.options.jwt.secret)
        .update(`${header}.${payload}`)
        .digest('base64url'),
    );
    const presented = Buffer.from(signature);

    return (
      presented.length !== expected.length ||
      !timingSafeEqual(presented, expected)
    );
  }
}

function decodesToJsonObject(segment: string): boolean {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(segment, 'base64url').toString('utf8'));
  } catch {
    return false;
  }
  return typeof parsed === 'object' && parsed !== null;
}

/**
 * Maps a jsonwebtoken verification error to a validation error kind.
 * Anything unrecognised (undecodable header or payload, missing parts) is
 * `Malformed`.
 */
export function classifyJwtError(error: unknown): TokenValidationError {
  if (error instanceof TokenExpiredError) {
    return 'Expired';
  }

  if (error instanceof JsonWebTokenError) {
    if (error.message.startsWith('jwt issuer invalid')) {
      return 'InvalidIssuer';
    }
    if (error.message.startsWith('jwt audience invalid')) {
      return 'InvalidAudience';
    }
    if (
      error.message === 'invalid signature' ||
      error.message === 'invalid algorithm'
    ) {
      return 'InvalidSignature';
    }
  }

  return 'Malformed';
}

function isJwtClaims(
  value: Record<string, unknown>,
): value is Record<string, unknown> & JwtClaims {
  const { sub, email, name, iss, aud, iat, exp } = value;
  return (
    typeof sub === 'string' &&
    typeof email === 'string' &&
    typeof name === 'string' &&
    typeof iss === 'string' &&
    typeof aud === 'string' &&
    typeof iat === 'number' &&
    typeof exp === 'number' &&
    exp > iat
  );
}
