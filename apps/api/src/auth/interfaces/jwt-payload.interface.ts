/**
 * Identity claims signed into every access token.
 *
 * `sub` follows the JWT standard claim for subject identifier.
 */
export interface JwtPayload {
  /** User ID (UUID), maps to User.id */
  sub: string;

  /** User email, included for convenience; sub is the canonical identifier */
  email: string;

  /** Display name (the account's full name) */
  name: string;
}

/**
 * Full claim set of a verified access token: the identity claims plus the
 * registered claims added at signing time.
 */
export interface JwtClaims extends JwtPayload {
  iss: string;
  aud: string;
  /** Issued-at, seconds since epoch */
  iat: number;
  /** Expiry, seconds since epoch; always greater than iat */
  exp: number;
}
