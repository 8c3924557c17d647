import { INestApplication } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { CREDENTIAL_STORE } from '../src/auth/auth.constants';
import type { CredentialStore } from '../src/auth/credentials/credential-store.interface';
import { configureApp } from '../src/app.setup';
import { EMAIL_SENDER, EmailDeliveryError } from '../src/mail';
import { InMemoryEmailSender, extractCode } from './fakes/in-memory-email-sender';
import { TEST_JWT_SECRET } from './fixtures/auth-options';

const PASSWORD = 'Pass123';

describe('Auth API (e2e)', () => {
  let app: INestApplication;
  const mailbox = new InMemoryEmailSender();

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(EMAIL_SENDER)
      .useValue(mailbox)
      .compile();

    app = configureApp(moduleRef.createNestApplication({ logger: false }));
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    mailbox.reset();
  });

  function http(): ReturnType<typeof request> {
    return request(app.getHttpServer());
  }

  async function register(email: string, password = PASSWORD): Promise<string> {
    const res = await http()
      .post('/api/auth/register')
      .send({ email, password, confirmPassword: password, fullName: 'Rumi Reader' })
      .expect(200);
    return res.body.userId;
  }

  async function login(email: string, password = PASSWORD): Promise<string> {
    const res = await http()
      .post('/api/auth/login')
      .send({ email, password })
      .expect(200);
    return res.body.accessToken;
  }

  function lastCodeSentTo(email: string): string {
    const sent = mailbox.lastTo(email);
    if (!sent) {
      throw new Error(`No email was sent to ${email}`);
    }
    return extractCode(sent.html);
  }

  it('GET /health reports the database as up', async () => {
    const res = await http().get('/health').expect(200);

    expect(res.body.status).toBe('ok');
    expect(res.body.info).toEqual({ database: { status: 'up' } });
  });

  it('register → login → forgot → reset → old password rejected → new password accepted', async () => {
    const email = 'scenario@example.com';

    const registered = await http()
      .post('/api/auth/register')
      .send({ email, password: PASSWORD, confirmPassword: PASSWORD, fullName: 'Hafez' })
      .expect(200);
    expect(registered.body).toEqual({
      success: true,
      message: 'Registration successful. Please check your email to confirm your account.',
      userId: expect.any(String),
    });

    const loggedIn = await http()
      .post('/api/auth/login')
      .send({ email, password: PASSWORD })
      .expect(200);
    expect(loggedIn.body).toEqual({
      success: true,
      message: 'Login successful.',
      accessToken: expect.any(String),
      tokenType: 'Bearer',
      expiresIn: 3600,
      userId: registered.body.userId,
      email,
    });

    await http()
      .post('/api/auth/forgot-password')
      .send({ email })
      .expect(200, {
        success: true,
        message:
          'If an account with that email exists, you will receive a password reset email shortly.',
      });
    const code = lastCodeSentTo(email);

    await http()
      .post('/api/auth/reset-password')
      .send({ email, token: code, newPassword: 'NewPass1', confirmPassword: 'NewPass1' })
      .expect(200, {
        success: true,
        message:
          'Your password has been reset successfully. You can now log in with your new password.',
      });

    await http()
      .post('/api/auth/login')
      .send({ email, password: PASSWORD })
      .expect(401, { success: false, message: 'Invalid email or password.' });

    await login(email, 'NewPass1');

    await http()
      .post('/api/auth/reset-password')
      .send({ email, token: code, newPassword: 'Other12', confirmPassword: 'Other12' })
      .expect(400, {
        success: false,
        message: 'Password reset link is invalid or has expired. Please request a new one.',
      });
  });

  describe('POST /api/auth/register', () => {
    it('rejects a duplicate email in any case', async () => {
      await register('duplicate@example.com');

      await http()
        .post('/api/auth/register')
        .send({
          email: 'Duplicate@Example.com',
          password: PASSWORD,
          confirmPassword: PASSWORD,
        })
        .expect(400, {
          success: false,
          message: "Registration failed: Email 'duplicate@example.com' is already taken.",
        });
    });

    it('answers DuplicateEmail when the database index catches a racing insert', async () => {
      await register('race@example.com');
      const store = app.get<CredentialStore>(CREDENTIAL_STORE);
      // Both registrations pass the lookup; only the unique index tells them apart
      const lookup = jest.spyOn(store, 'findByEmail').mockResolvedValueOnce(null);

      await http()
        .post('/api/auth/register')
        .send({ email: 'Race@Example.com', password: PASSWORD, confirmPassword: PASSWORD })
        .expect(400, {
          success: false,
          message: "Registration failed: Email 'race@example.com' is already taken.",
        });

      lookup.mockRestore();
      await login('race@example.com');
    });

    it('rejects mismatched passwords', async () => {
      await http()
        .post('/api/auth/register')
        .send({ email: 'mismatch@example.com', password: PASSWORD, confirmPassword: 'Pass124' })
        .expect(400, { success: false, message: 'Passwords do not match.' });
    });

    it('rejects a password shorter than six characters', async () => {
      await http()
        .post('/api/auth/register')
        .send({ email: 'short@example.com', password: 'abc', confirmPassword: 'abc' })
        .expect(400, {
          success: false,
          message: 'Password must be at least 6 characters long',
        });
    });

    it('rejects unknown fields', async () => {
      await http()
        .post('/api/auth/register')
        .send({
          email: 'extra@example.com',
          password: PASSWORD,
          confirmPassword: PASSWORD,
          role: 'admin',
        })
        .expect(400, { success: false, message: 'property role should not exist' });
    });
  });

  describe('GET /api/auth/confirm-email', () => {
    it('confirms with the emailed code', async () => {
      const email = 'confirm@example.com';
      const userId = await register(email);
      const code = lastCodeSentTo(email);

      await http()
        .get('/api/auth/confirm-email')
        .query({ userId, code })
        .expect(200, {
          success: true,
          message: 'Email confirmed successfully. You can now log in.',
        });

      const token = await login(email);
      const me = await http()
        .get('/api/auth/me')
        .set('Authorization', `Bearer ${token}`)
        .expect(200);
      expect(me.body.emailConfirmed).toBe(true);
    });

    it('answers 404 for an unknown user', async () => {
      await http()
        .get('/api/auth/confirm-email')
        .query({ userId: 'no-such-user', code: 'whatever' })
        .expect(404, { success: false, message: 'User not found.' });
    });

    it('answers 400 for a code that does not verify', async () => {
      const userId = await register('badcode@example.com');

      await http()
        .get('/api/auth/confirm-email')
        .query({ userId, code: 'not-a-code' })
        .expect(400, { success: false, message: 'Email confirmation failed.' });
    });
  });

  describe('POST /api/auth/login', () => {
    it('answers an unknown email exactly like a wrong password', async () => {
      await register('known@example.com');

      const unknown = await http()
        .post('/api/auth/login')
        .send({ email: 'unknown@example.com', password: PASSWORD })
        .expect(401);
      const wrong = await http()
        .post('/api/auth/login')
        .send({ email: 'known@example.com', password: 'Pass124' })
        .expect(401);

      expect(unknown.body).toEqual({ success: false, message: 'Invalid email or password.' });
      expect(wrong.body).toEqual(unknown.body);
    });

    it('rejects a malformed email before any lookup', async () => {
      await http()
        .post('/api/auth/login')
        .send({ email: 'not-an-email', password: PASSWORD })
        .expect(400, { success: false, message: 'Please provide a valid email address' });
    });

    it('rejects an empty password', async () => {
      await http()
        .post('/api/auth/login')
        .send({ email: 'known@example.com', password: '' })
        .expect(400, { success: false, message: 'Password is required' });
    });
  });

  describe('GET /api/auth/me', () => {
    it('requires a bearer token', async () => {
      await http()
        .get('/api/auth/me')
        .expect(401, { success: false, message: 'Authentication token is missing' });
    });

    it('returns the profile without secrets', async () => {
      const email = 'profile@example.com';
      const userId = await register(email);
      const token = await login(email);

      const res = await http()
        .get('/api/auth/me')
        .set('Authorization', `Bearer ${token}`)
        .expect(200);

      expect(res.body).toEqual({
        id: userId,
        email,
        fullName: 'Rumi Reader',
        emailConfirmed: false,
        createdAt: expect.any(String),
      });
    });

    it('rejects a token minted for another audience', async () => {
      const userId = await register('audience@example.com');
      const foreign = new JwtService().sign(
        { sub: userId, email: 'audience@example.com', name: 'Rumi Reader' },
        {
          secret: TEST_JWT_SECRET,
          issuer: 'VerseVaultAPI',
          audience: 'SomeOtherApp',
          expiresIn: 60,
        },
      );

      await http()
        .get('/api/auth/me')
        .set('Authorization', `Bearer ${foreign}`)
        .expect(401, { success: false, message: 'Invalid authentication token' });
    });
  });

  describe('POST /api/auth/logout', () => {
    it('acknowledges; the token stays usable until it expires', async () => {
      const email = 'logout@example.com';
      await register(email);
      const token = await login(email);

      await http()
        .post('/api/auth/logout')
        .set('Authorization', `Bearer ${token}`)
        .expect(200, { success: true, message: 'Logged out successfully.' });

      await http().get('/api/auth/me').set('Authorization', `Bearer ${token}`).expect(200);
    });

    it('requires a bearer token', async () => {
      await http().post('/api/auth/logout').expect(401);
    });
  });

  describe('POST /api/auth/forgot-password', () => {
    it('answers an unknown email like a known one and sends nothing', async () => {
      await http()
        .post('/api/auth/forgot-password')
        .send({ email: 'ghost@example.com' })
        .expect(200, {
          success: true,
          message:
            'If an account with that email exists, you will receive a password reset email shortly.',
        });

      expect(mailbox.sent).toHaveLength(0);
    });

    it('answers 503 when the mail transport is down', async () => {
      const email = 'outage@example.com';
      await register(email);
      mailbox.failWith = new EmailDeliveryError('SMTP server is not configured');

      await http()
        .post('/api/auth/forgot-password')
        .send({ email })
        .expect(503, {
          success: false,
          message: 'Email service is currently unavailable. Please try again in a few minutes.',
        });
    });
  });

  describe('GET /api/auth/validate-reset-token', () => {
    it('accepts a fresh reset code', async () => {
      const email = 'validate@example.com';
      await register(email);
      await http().post('/api/auth/forgot-password').send({ email }).expect(200);

      await http()
        .get('/api/auth/validate-reset-token')
        .query({ email, code: lastCodeSentTo(email) })
        .expect(200, { success: true, message: 'Token is valid.' });
    });

    it('rejects the confirmation code', async () => {
      const email = 'wrongpurpose@example.com';
      await register(email);

      await http()
        .get('/api/auth/validate-reset-token')
        .query({ email, code: lastCodeSentTo(email) })
        .expect(400, {
          success: false,
          message: 'Password reset link is invalid or has expired. Please request a new one.',
        });
    });

    it('answers 400 for an unknown email', async () => {
      await http()
        .get('/api/auth/validate-reset-token')
        .query({ email: 'ghost@example.com', code: 'x' })
        .expect(400, { success: false, message: 'Invalid email address.' });
    });
  });
});
