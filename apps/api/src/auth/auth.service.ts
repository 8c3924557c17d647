import { Inject, Injectable, Logger } from '@nestjs/common';
import { EMAIL_SENDER, EmailDeliveryError } from '../mail';
import type { EmailSender } from '../mail';
import { sanitizeForLog } from '../common/logging/sanitize';
import { AUTH_OPTIONS, CREDENTIAL_STORE } from './auth.constants';
import { AUTH_MESSAGES } from './auth.messages';
import {
  CredentialStore,
  UserAccount,
  normalizeEmail,
} from './credentials/credential-store.interface';
import { PasswordHasher } from './hashing/password-hasher.service';
import { TokenIssuer } from './tokens/token-issuer.service';
import { PurposeTokenService } from './tokens/purpose-token.service';
import { TokenPurpose } from './tokens/token-purpose';
import {
  buildConfirmationLink,
  buildPasswordResetLink,
  confirmationEmail,
  passwordResetEmail,
} from './emails/auth-emails';
import { RegisterDto, LoginDto, ResetPasswordDto, UserProfileDto } from './dto';
import { fail, succeed } from './interfaces';
import type { AuthOptions, AuthResult, RequestUser } from './interfaces';

export interface RegisterOutcome {
  userId: string;
}

export interface LoginOutcome {
  accessToken: string;
  /** Lifetime of accessToken in seconds */
  expiresIn: number;
  userId: string;
  email: string;
}

/**
 * AuthService — orchestrates the account and credential workflows.
 *
 * Responsibilities:
 * - Registration with email confirmation
 * - Login with bearer-token issuance
 * - Forgot/validate/reset password via purpose tokens
 * - Stateless logout and profile lookup
 *
 * Every public method returns an AuthResult. Expected conditions (wrong
 * password, duplicate email, stale token) are failure values; any exception
 * from a collaborator is logged here with full detail and becomes an
 * `Unexpected` failure with a generic message.
 *
 * Security considerations:
 * - login() answers identically for an unknown email and a wrong password,
 *   and hashes anyway for unknown emails so timing matches
 * - forgotPassword() answers identically whether or not the email exists;
 *   only a mail-transport outage for an existing account is reported
 * - resetPassword() rotates the security stamp, invalidating every
 *   outstanding purpose token for the account
 * - Passwords, hashes and tokens are never logged
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @Inject(CREDENTIAL_STORE)
    private readonly credentialStore: CredentialStore,
    private readonly passwordHasher: PasswordHasher,
    private readonly tokenIssuer: TokenIssuer,
    private readonly purposeTokens: PurposeTokenService,
    @Inject(EMAIL_SENDER)
    private readonly emailSender: EmailSender,
    @Inject(AUTH_OPTIONS)
    private readonly options: AuthOptions,
  ) {}

  /**
   * Create an unconfirmed account and email a confirmation link.
   *
   * The confirmation email is dispatched in the background. The account is
   * kept even when it cannot be sent; that failure is logged only.
   */
  register(dto: RegisterDto): Promise<AuthResult<RegisterOutcome>> {
    return this.guard('registration', AUTH_MESSAGES.registrationFailed, async () => {
      if (dto.password !== dto.confirmPassword) {
        return fail('PasswordMismatch', AUTH_MESSAGES.passwordMismatch);
      }

      const email = normalizeEmail(dto.email);

      // ── Check for existing email ──────────────────────────
      const existing = await this.credentialStore.findByEmail(email);
      if (existing) {
        this.logger.warn(`Registration refused, email taken: ${sanitizeForLog(email)}`);
        return fail('DuplicateEmail', AUTH_MESSAGES.duplicateEmail(email));
      }

      // ── Hash password and create account ──────────────────
      const passwordHash = await this.passwordHasher.hash(dto.password);
      const created = await this.credentialStore.create({
        email,
        passwordHash,
        fullName: dto.fullName?.trim() || email,
      });

      // Lost a race with a concurrent registration of the same email
      if (!created.ok) {
        this.logger.warn(`Registration refused, email taken: ${sanitizeForLog(email)}`);
        return fail('DuplicateEmail', AUTH_MESSAGES.duplicateEmail(email));
      }

      const account = created.account;
      this.logger.log(`User registered: ${account.id} (${sanitizeForLog(account.email)})`);

      // ── Send confirmation email ───────────────────────────
      // Not awaited: a slow mail server must not hold the response.
      void this.sendConfirmationEmail(account);

      return succeed({ userId: account.id });
    });
  }

  /** Mark the account's email as confirmed. Confirming twice is harmless. */
  confirmEmail(userId: string, code: string): Promise<AuthResult<RegisterOutcome>> {
    return this.guard(
      'email confirmation',
      AUTH_MESSAGES.emailConfirmationError,
      async () => {
        const user = await this.credentialStore.findById(userId);
        if (!user) {
          return fail('UserNotFound', AUTH_MESSAGES.userNotFound);
        }

        if (!this.purposeTokens.verify(user, TokenPurpose.EmailConfirmation, code)) {
          this.logger.warn(`Invalid email confirmation token for user ${user.id}`);
          return fail('InvalidToken', AUTH_MESSAGES.emailConfirmationFailed);
        }

        const confirmed = await this.credentialStore.confirmEmail(user.id);
        if (!confirmed) {
          return fail('UserNotFound', AUTH_MESSAGES.userNotFound);
        }

        this.logger.log(`Email confirmed for user ${confirmed.id}`);
        return succeed({ userId: confirmed.id });
      },
    );
  }

  /**
   * Authenticate with email and password and issue a bearer token.
   *
   * Email confirmation is only required when REQUIRE_CONFIRMED_EMAIL is set.
   */
  login(dto: LoginDto): Promise<AuthResult<LoginOutcome>> {
    return this.guard('login', AUTH_MESSAGES.loginFailed, async () => {
      // ── Find user by email ────────────────────────────────
      const user = await this.credentialStore.findByEmail(dto.email);

      if (!user) {
        // Still hash to prevent timing-based user enumeration
        await this.passwordHasher.burn(dto.password);
        this.logger.warn(`Failed login attempt for ${sanitizeForLog(dto.email)}`);
        return fail('InvalidCredentials', AUTH_MESSAGES.invalidCredentials);
      }

      // ── Verify password ───────────────────────────────────
      const isPasswordValid = await this.passwordHasher.verify(
        dto.password,
        user.passwordHash,
      );

      if (!isPasswordValid) {
        this.logger.warn(`Failed login attempt for ${sanitizeForLog(dto.email)}`);
        return fail('InvalidCredentials', AUTH_MESSAGES.invalidCredentials);
      }

      if (this.options.requireConfirmedEmail && !user.emailConfirmed) {
        return fail('EmailNotConfirmed', AUTH_MESSAGES.emailNotConfirmed);
      }

      // ── Generate token ────────────────────────────────────
      const expiresIn = this.tokenIssuer.defaultTtlSeconds;
      const accessToken = this.tokenIssuer.issue(
        user.id,
        user.email,
        user.fullName,
        expiresIn,
      );

      this.logger.log(`User logged in: ${user.id} (${sanitizeForLog(user.email)})`);

      return succeed({ accessToken, expiresIn, userId: user.id, email: user.email });
    });
  }

  /**
   * Email a password-reset link if the account exists.
   *
   * Succeeds the same way for unknown emails. A mail-transport outage while
   * mailing an existing account is reported as EmailServiceUnavailable.
   */
  forgotPassword(email: string): Promise<AuthResult<null>> {
    return this.guard('forgot password', AUTH_MESSAGES.forgotPasswordFailed, async () => {
      const user = await this.credentialStore.findByEmail(email);

      if (!user) {
        this.logger.warn(
          `Forgot password request for non-existent user: ${sanitizeForLog(email)}`,
        );
        return succeed(null);
      }

      const code = this.purposeTokens.generate(user, TokenPurpose.ResetPassword);
      const link = buildPasswordResetLink(this.options.frontendUrl, user.email, code);
      const content = passwordResetEmail(
        user.fullName,
        link,
        this.purposeTokens.lifetimeHours,
      );

      try {
        await this.emailSender.sendEmail(user.email, content.subject, content.html);
      } catch (error) {
        if (error instanceof EmailDeliveryError) {
          this.logger.error(
            `Email service unavailable, reset email to ${sanitizeForLog(user.email)} not sent: ${error.message}`,
          );
          return fail('EmailServiceUnavailable', AUTH_MESSAGES.emailServiceUnavailable);
        }
        throw error;
      }

      this.logger.log(`Password reset email sent to ${sanitizeForLog(user.email)}`);
      return succeed(null);
    });
  }

  /** Read-only pre-check of a reset link, used before showing the reset form. */
  validateResetToken(email: string, code: string): Promise<AuthResult<null>> {
    return this.guard('reset token validation', AUTH_MESSAGES.tokenValidationFailed, async () => {
      const user = await this.credentialStore.findByEmail(email);
      if (!user) {
        this.logger.warn(
          `Validate reset token: user not found for ${sanitizeForLog(email)}`,
        );
        return fail('InvalidEmail', AUTH_MESSAGES.invalidEmail);
      }

      if (!this.purposeTokens.verify(user, TokenPurpose.ResetPassword, code)) {
        this.logger.warn(
          `Invalid or expired password reset token for ${sanitizeForLog(user.email)}`,
        );
        return fail('InvalidOrExpiredToken', AUTH_MESSAGES.invalidOrExpiredToken);
      }

      return succeed(null);
    });
  }

  /**
   * Replace the password using a reset token.
   *
   * Storing the new hash rotates the security stamp, so this token and every
   * other outstanding purpose token for the account stop verifying.
   */
  resetPassword(dto: ResetPasswordDto): Promise<AuthResult<RegisterOutcome>> {
    return this.guard('password reset', AUTH_MESSAGES.passwordResetFailed, async () => {
      if (dto.newPassword !== dto.confirmPassword) {
        return fail('PasswordMismatch', AUTH_MESSAGES.passwordMismatch);
      }

      const user = await this.credentialStore.findByEmail(dto.email);
      if (!user) {
        return fail('InvalidEmail', AUTH_MESSAGES.invalidEmail);
      }

      if (!this.purposeTokens.verify(user, TokenPurpose.ResetPassword, dto.token)) {
        this.logger.warn(
          `Rejected password reset with invalid token for ${sanitizeForLog(user.email)}`,
        );
        return fail('InvalidOrExpiredToken', AUTH_MESSAGES.invalidOrExpiredToken);
      }

      const passwordHash = await this.passwordHasher.hash(dto.newPassword);
      const updated = await this.credentialStore.updatePassword(user.id, passwordHash);
      if (!updated) {
        return fail('InvalidEmail', AUTH_MESSAGES.invalidEmail);
      }

      this.logger.log(`Password reset successful for ${sanitizeForLog(updated.email)}`);
      return succeed({ userId: updated.id });
    });
  }

  /**
   * Acknowledge a logout. Bearer tokens are not tracked server-side, so the
   * token stays valid until it expires; the client discards it.
   */
  logout(user: RequestUser): AuthResult<null> {
    this.logger.log(`User logged out: ${user.userId}`);
    return succeed(null);
  }

  /** Public profile of an authenticated user. */
  getProfile(userId: string): Promise<AuthResult<UserProfileDto>> {
    return this.guard('profile lookup', AUTH_MESSAGES.profileFailed, async () => {
      const user = await this.credentialStore.findById(userId);

      if (!user) {
        // JwtStrategy already checked existence; the account vanished since.
        this.logger.error(`Profile requested for non-existent user: ${userId}`);
        return fail('InvalidCredentials', AUTH_MESSAGES.invalidCredentials);
      }

      return succeed(UserProfileDto.fromAccount(user));
    });
  }

  // ── Private Helpers ───────────────────────────────────────

  /** Failures here are logged and swallowed; registration has already succeeded. */
  private async sendConfirmationEmail(account: UserAccount): Promise<void> {
    try {
      const code = this.purposeTokens.generate(account, TokenPurpose.EmailConfirmation);
      const link = buildConfirmationLink(this.options.apiPublicUrl, account.id, code);
      const content = confirmationEmail(link);

      await this.emailSender.sendEmail(account.email, content.subject, content.html);
    } catch (error) {
      this.logger.error(
        `Confirmation email to ${sanitizeForLog(account.email)} could not be sent`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }

  /**
   * Runs a workflow and turns any thrown error into an `Unexpected`
   * failure carrying the operation's generic message.
   */
  private async guard<T>(
    operation: string,
    failureMessage: string,
    run: () => Promise<AuthResult<T>>,
  ): Promise<AuthResult<T>> {
    try {
      return await run();
    } catch (error) {
      this.logger.error(
        `Unexpected error during ${operation}`,
        error instanceof Error ? error.stack : String(error),
      );
      return fail('Unexpected', failureMessage);
    }
  }
}
