import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { randomUUID } from 'crypto';
import { User, isUniqueViolation } from '@versevault/database';
import {
  CreateAccountOutcome,
  CredentialStore,
  NewAccount,
  UserAccount,
  normalizeEmail,
} from './credential-store.interface';

/**
 * CredentialStore backed by the TypeORM `users` repository (SQLite).
 *
 * Registration does not pre-check for the email: the insert is attempted and
 * a unique-index violation is reported as `DuplicateEmail`, so two racing
 * registrations produce exactly one account.
 */
@Injectable()
export class TypeOrmCredentialStore implements CredentialStore {
  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
  ) {}

  findByEmail(email: string): Promise<UserAccount | null> {
    return this.userRepository.findOne({
      where: { email: normalizeEmail(email) },
    });
  }

  findById(id: string): Promise<UserAccount | null> {
    return this.userRepository.findOne({ where: { id } });
  }

  async create(account: NewAccount): Promise<CreateAccountOutcome> {
    const user = this.userRepository.create({
      email: normalizeEmail(account.email),
      passwordHash: account.passwordHash,
      fullName: account.fullName,
      emailConfirmed: false,
      securityStamp: newSecurityStamp(),
    });

    try {
      const saved = await this.userRepository.save(user);
      return { ok: true, account: saved };
    } catch (error) {
      if (isUniqueViolation(error)) {
        return { ok: false, reason: 'DuplicateEmail' };
      }
      throw error;
    }
  }

  async updatePassword(
    id: string,
    passwordHash: string,
  ): Promise<UserAccount | null> {
    const user = await this.userRepository.findOne({ where: { id } });
    if (!user) {
      return null;
    }

    user.passwordHash = passwordHash;
    user.securityStamp = newSecurityStamp();
    return this.userRepository.save(user);
  }

  async confirmEmail(id: string): Promise<UserAccount | null> {
    const user = await this.userRepository.findOne({ where: { id } });
    if (!user) {
      return null;
    }

    if (!user.emailConfirmed) {
      user.emailConfirmed = true;
      return this.userRepository.save(user);
    }
    return user;
  }
}

function newSecurityStamp(): string {
  return randomUUID().replace(/-/g, '').toUpperCase();
}
