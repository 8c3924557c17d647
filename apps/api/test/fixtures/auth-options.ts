import type { AuthOptions } from '../../src/auth/interfaces';

export const TEST_JWT_SECRET = 'test-jwt-secret-0000000000000000000000';
export const TEST_PURPOSE_SECRET = 'test-purpose-secret-000000000000000000';

/** AuthOptions for unit tests; bcrypt cost is kept at the minimum for speed. */
export function buildAuthOptions(
  overrides: Partial<AuthOptions> = {},
): AuthOptions {
  return {
    jwt: {
      secret: TEST_JWT_SECRET,
      issuer: 'VerseVaultAPI',
      audience: 'VerseVaultUsers',
      expirationMinutes: 60,
    },
    purposeTokens: {
      secret: TEST_PURPOSE_SECRET,
      keyVersion: 1,
      lifetimeHours: 24,
    },
    bcryptSaltRounds: 4,
    requireConfirmedEmail: false,
    apiPublicUrl: 'http://api.test',
    frontendUrl: 'http://app.test',
    ...overrides,
  };
}
