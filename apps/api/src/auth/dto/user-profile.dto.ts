import type { UserAccount } from '../credentials/credential-store.interface';

/**
 * Public user profile data. Never includes passwordHash or securityStamp.
 *
 * Uses a static factory method to enforce that we always map
 * from the account explicitly, preventing accidental data leaks.
 */
export class UserProfileDto {
  id: string;
  email: string;
  fullName: string;
  emailConfirmed: boolean;
  createdAt: Date;

  private constructor(
    id: string,
    email: string,
    fullName: string,
    emailConfirmed: boolean,
    createdAt: Date,
  ) {
    this.id = id;
    this.email = email;
    this.fullName = fullName;
    this.emailConfirmed = emailConfirmed;
    this.createdAt = createdAt;
  }

  static fromAccount(account: UserAccount): UserProfileDto {
    return new UserProfileDto(
      account.id,
      account.email,
      account.fullName,
      account.emailConfirmed,
      account.createdAt,
    );
  }
}
