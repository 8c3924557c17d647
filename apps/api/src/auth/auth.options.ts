import { ConfigService } from '@nestjs/config';
import type { AuthOptions } from './interfaces';

/**
 * Resolves AuthOptions from the validated environment.
 *
 * EnvironmentVariables already enforces the secrets and converts numbers and
 * booleans; the secret checks here only guard against the module being
 * wired without that validation.
 */
export function authOptionsFactory(config: ConfigService): AuthOptions {
  return {
    jwt: {
      secret: requireSecret(config, 'JWT_SECRET'),
      issuer: config.get<string>('JWT_ISSUER', 'VerseVaultAPI'),
      audience: config.get<string>('JWT_AUDIENCE', 'VerseVaultUsers'),
      expirationMinutes: config.get<number>('JWT_EXPIRATION_MINUTES', 60),
    },
    purposeTokens: {
      secret: requireSecret(config, 'PURPOSE_TOKEN_SECRET'),
      keyVersion: config.get<number>('PURPOSE_TOKEN_KEY_VERSION', 1),
      lifetimeHours: config.get<number>('PURPOSE_TOKEN_LIFETIME_HOURS', 24),
    },
    bcryptSaltRounds: config.get<number>('BCRYPT_SALT_ROUNDS', 12),
    requireConfirmedEmail: config.get<boolean>('REQUIRE_CONFIRMED_EMAIL', false),
    apiPublicUrl: config.get<string>('API_PUBLIC_URL', 'http://localhost:4000'),
    frontendUrl: config.get<string>('FRONTEND_URL', 'http://localhost:5173'),
  };
}

function requireSecret(config: ConfigService, key: string): string {
  const secret = config.get<string>(key);

  if (!secret) {
    throw new Error(
      `${key} is not defined in environment variables. ` +
        'The application cannot start without it.',
    );
  }

  return secret;
}
