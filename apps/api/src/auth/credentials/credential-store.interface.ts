import type { User } from '@versevault/database';

/** The persisted identity record, as seen by the auth workflows. */
export type UserAccount = Pick<
  User,
  | 'id'
  | 'email'
  | 'passwordHash'
  | 'fullName'
  | 'emailConfirmed'
  | 'securityStamp'
  | 'createdAt'
>;

export interface NewAccount {
  email: string;
  passwordHash: string;
  fullName: string;
}

export type CreateAccountOutcome =
  | { ok: true; account: UserAccount }
  | { ok: false; reason: 'DuplicateEmail' };

/**
 * Persistence for user identity records.
 *
 * Lookups resolve to `null` when no account matches. Emails are compared
 * case-insensitively. Every write touches a single row; the unique index on
 * email is the only arbiter between concurrent registrations.
 */
export interface CredentialStore {
  findByEmail(email: string): Promise<UserAccount | null>;
  findById(id: string): Promise<UserAccount | null>;
  /** Inserts an unconfirmed account with a fresh security stamp */
  create(account: NewAccount): Promise<CreateAccountOutcome>;
  /** Stores a new hash and rotates the security stamp */
  updatePassword(id: string, passwordHash: string): Promise<UserAccount | null>;
  confirmEmail(id: string): Promise<UserAccount | null>;
}

/** Canonical form of an email address for storage and lookup. */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}
