// Applied before each e2e suite loads AppModule, whose ConfigModule
// validates the environment at import time.
process.env.NODE_ENV = 'test';
process.env.DATABASE_PATH = ':memory:';
process.env.JWT_SECRET = 'test-jwt-secret-0000000000000000000000';
process.env.PURPOSE_TOKEN_SECRET = 'test-purpose-secret-000000000000000000';
process.env.BCRYPT_SALT_ROUNDS = '4';
process.env.API_PUBLIC_URL = 'http://api.test';
process.env.FRONTEND_URL = 'http://app.test';
delete process.env.SMTP_HOST;
