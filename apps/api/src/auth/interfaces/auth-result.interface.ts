/**
 * Expected failure conditions of the auth workflows.
 *
 * These are returned, not thrown. `Unexpected` covers any collaborator fault
 * (database, mail transport bug) caught at the AuthService boundary.
 */
export type AuthFailureKind =
  | 'PasswordMismatch'
  | 'DuplicateEmail'
  | 'UserNotFound'
  | 'InvalidToken'
  | 'InvalidCredentials'
  | 'EmailNotConfirmed'
  | 'InvalidEmail'
  | 'InvalidOrExpiredToken'
  | 'EmailServiceUnavailable'
  | 'Unexpected';

export interface AuthFailure {
  kind: AuthFailureKind;
  /** Client-safe message; never contains stack traces or internal detail */
  message: string;
}

export type AuthResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: AuthFailure };

export function succeed<T>(value: T): AuthResult<T> {
  return { ok: true, value };
}

export function fail(
  kind: AuthFailureKind,
  message: string,
): { ok: false; error: AuthFailure } {
  return { ok: false, error: { kind, message } };
}
