import { Inject, Injectable, Logger } from '@nestjs/common';
import * as bcrypt from 'bcrypt';
import { createHash } from 'crypto';
import { AUTH_OPTIONS } from '../auth.constants';
import type { AuthOptions } from '../interfaces';

/** Modular-crypt bcrypt hash: $2a$/$2b$/$2y$, two-digit cost, 53 chars of salt + digest */
const BCRYPT_HASH_PATTERN = /^\$2[aby]\$\d{2}\$[./A-Za-z0-9]{53}$/;

/**
 * PasswordHasher — one-way salted password hashing via bcrypt.
 *
 * - hash() generates a fresh salt per call at the configured cost
 * - bcrypt reads only 72 bytes, so the password is first reduced to its
 *   SHA-256 digest (44 base64 chars); every byte of it counts
 * - verify() uses bcrypt.compare, which compares in constant time, and
 *   answers false for anything that is not a well-formed bcrypt hash
 * - Plaintext passwords are never logged
 */
@Injectable()
export class PasswordHasher {
  private readonly logger = new Logger(PasswordHasher.name);
  private readonly saltRounds: number;

  constructor(@Inject(AUTH_OPTIONS) options: AuthOptions) {
    this.saltRounds = options.bcryptSaltRounds;
  }

  hash(plaintext: string): Promise<string> {
    return bcrypt.hash(prehash(plaintext), this.saltRounds);
  }

  async verify(plaintext: string, hash: string): Promise<boolean> {
    if (!BCRYPT_HASH_PATTERN.test(hash)) {
      this.logger.warn('Refusing to verify against a malformed password hash');
      return false;
    }

    try {
      return await bcrypt.compare(prehash(plaintext), hash);
    } catch (error) {
      this.logger.warn(
        `Password comparison failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  /**
   * Spends the same work as a real hash. Called on login for unknown emails
   * so response time does not reveal whether the account exists.
   */
  async burn(plaintext: string): Promise<void> {
    await bcrypt.hash(prehash(plaintext), this.saltRounds);
  }
}

function prehash(plaintext: string): string {
  return createHash('sha256').update(plaintext, 'utf8').digest('base64');
}
