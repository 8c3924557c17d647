import { PurposeTokenService, TokenSubject } from './purpose-token.service';
import { TokenPurpose } from './token-purpose';
import { buildAuthOptions } from '../../../test/fixtures/auth-options';

const ISSUED_AT = new Date('2026-03-01T12:00:00.000Z').getTime();
const HOUR = 3_600_000;

function createService(
  purposeTokens: Partial<
    ReturnType<typeof buildAuthOptions>['purposeTokens']
  > = {},
): PurposeTokenService {
  const options = buildAuthOptions();
  return new PurposeTokenService({
    ...options,
    purposeTokens: { ...options.purposeTokens, ...purposeTokens },
  });
}

describe('PurposeTokenService', () => {
  const user: TokenSubject = { id: 'user-1', securityStamp: 'STAMP-A' };
  let service: PurposeTokenService;

  beforeEach(() => {
    jest.useFakeTimers({ now: ISSUED_AT });
    service = createService();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('verifies a freshly generated token for the same user and purpose', () => {
    const token = service.generate(user, TokenPurpose.ResetPassword);

    expect(service.verify(user, TokenPurpose.ResetPassword, token)).toBe(true);
  });

  it('emits tokens that survive a URL unchanged', () => {
    const token = service.generate(user, TokenPurpose.EmailConfirmation);

    expect(token).toMatch(/^[A-Za-z0-9._-]+$/);
    expect(encodeURIComponent(token)).toBe(token);
  });

  it('accepts a token that is still percent-encoded', () => {
    const token = service.generate(user, TokenPurpose.ResetPassword);
    const encoded = token.replace(/\./g, '%2E');

    expect(service.verify(user, TokenPurpose.ResetPassword, encoded)).toBe(true);
  });

  it('rejects a confirmation token replayed as a reset token', () => {
    const token = service.generate(user, TokenPurpose.EmailConfirmation);

    expect(service.verify(user, TokenPurpose.ResetPassword, token)).toBe(false);
    expect(service.verify(user, TokenPurpose.EmailConfirmation, token)).toBe(
      true,
    );
  });

  it('rejects a token presented for another user', () => {
    const token = service.generate(user, TokenPurpose.ResetPassword);
    const otherUser = { id: 'user-2', securityStamp: 'STAMP-A' };

    expect(service.verify(otherUser, TokenPurpose.ResetPassword, token)).toBe(
      false,
    );
  });

  it('rejects every earlier token once the security stamp rotates', () => {
    const reset = service.generate(user, TokenPurpose.ResetPassword);
    const confirm = service.generate(user, TokenPurpose.EmailConfirmation);
    const rotated = { ...user, securityStamp: 'STAMP-B' };

    expect(service.verify(rotated, TokenPurpose.ResetPassword, reset)).toBe(
      false,
    );
    expect(
      service.verify(rotated, TokenPurpose.EmailConfirmation, confirm),
    ).toBe(false);
  });

  it('keeps a token valid through the whole lifetime', () => {
    const token = service.generate(user, TokenPurpose.ResetPassword);

    jest.setSystemTime(ISSUED_AT + 24 * HOUR);

    expect(service.verify(user, TokenPurpose.ResetPassword, token)).toBe(true);
  });

  it('rejects a token after the lifetime has elapsed', () => {
    const token = service.generate(user, TokenPurpose.ResetPassword);

    jest.setSystemTime(ISSUED_AT + 24 * HOUR + 1_000);

    expect(service.verify(user, TokenPurpose.ResetPassword, token)).toBe(false);
  });

  it('uses the configured lifetime', () => {
    const shortLived = createService({ lifetimeHours: 1 });
    const token = shortLived.generate(user, TokenPurpose.ResetPassword);

    jest.setSystemTime(ISSUED_AT + 2 * HOUR);

    expect(shortLived.verify(user, TokenPurpose.ResetPassword, token)).toBe(
      false,
    );
  });

  it('rejects a token dated in the future', () => {
    const token = service.generate(user, TokenPurpose.ResetPassword);

    jest.setSystemTime(ISSUED_AT - 10_000);

    expect(service.verify(user, TokenPurpose.ResetPassword, token)).toBe(false);
  });

  it('rejects tokens issued under another key version', () => {
    const token = service.generate(user, TokenPurpose.ResetPassword);
    const rotated = createService({ keyVersion: 2 });

    expect(token.startsWith('1.')).toBe(true);
    expect(rotated.verify(user, TokenPurpose.ResetPassword, token)).toBe(false);
  });

  it('rejects tokens signed with another secret', () => {
    const foreign = createService({
      secret: 'another-purpose-secret-00000000000000',
    });
    const token = foreign.generate(user, TokenPurpose.ResetPassword);

    expect(service.verify(user, TokenPurpose.ResetPassword, token)).toBe(false);
  });

  it('rejects a token whose MAC was altered', () => {
    const token = service.generate(user, TokenPurpose.ResetPassword);
    const index = token.length - 5;
    const altered =
      token.slice(0, index) +
      (token[index] === 'A' ? 'B' : 'A') +
      token.slice(index + 1);

    expect(service.verify(user, TokenPurpose.ResetPassword, altered)).toBe(
      false,
    );
  });

  it('rejects a token whose issue time was moved', () => {
    const [version, issuedAt, mac] = service
      .generate(user, TokenPurpose.ResetPassword)
      .split('.');
    const earlier = (parseInt(issuedAt, 36) - 60).toString(36);

    expect(
      service.verify(
        user,
        TokenPurpose.ResetPassword,
        [version, earlier, mac].join('.'),
      ),
    ).toBe(false);
  });

  const mangled: Array<[string, (token: string) => string]> = [
    ['empty', () => ''],
    ['garbage', () => 'not-a-token'],
    ['undecodable', () => '%E0%A4%A'],
    ['truncated', (token: string) => token.slice(0, -1)],
    ['padded', (token: string) => `${token}A`],
    ['trailing junk', (token: string) => `${token}!`],
  ];

  it.each(mangled)('answers false for a %s token', (_label, mangle) => {
    const token = service.generate(user, TokenPurpose.ResetPassword);

    expect(service.verify(user, TokenPurpose.ResetPassword, mangle(token))).toBe(
      false,
    );
  });
});
