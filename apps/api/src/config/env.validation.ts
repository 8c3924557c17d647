import { plainToInstance, Transform, Type } from 'class-transformer';
import {
  IsBoolean,
  IsEmail,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  MinLength,
  validateSync,
} from 'class-validator';

const NODE_ENVIRONMENTS = ['development', 'production', 'test'] as const;

/** Env booleans arrive as strings; anything but "true" is false. */
const toBoolean = ({ value }: { value: unknown }): boolean =>
  value === true || value === 'true';

/**
 * Environment schema for the API process.
 *
 * Passed to ConfigModule.forRoot({ validate }) so a missing secret or a
 * malformed number stops the app at startup instead of on first request.
 * Defaults live on the class; ConfigService.get() returns the converted
 * values (numbers as numbers, booleans as booleans).
 */
export class EnvironmentVariables {
  @IsIn(NODE_ENVIRONMENTS)
  NODE_ENV: (typeof NODE_ENVIRONMENTS)[number] = 'development';

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT = 4000;

  @IsString()
  CORS_ORIGIN = 'http://localhost:5173';

  // ── Database ────────────────────────────────────────────
  @IsString()
  @IsNotEmpty()
  DATABASE_PATH = 'versevault.db';

  @Transform(toBoolean)
  @IsBoolean()
  DATABASE_LOGGING = false;

  // ── Bearer tokens ───────────────────────────────────────
  @IsString()
  @MinLength(32, { message: 'JWT_SECRET must be at least 32 characters long' })
  JWT_SECRET!: string;

  @IsString()
  @IsNotEmpty()
  JWT_ISSUER = 'VerseVaultAPI';

  @IsString()
  @IsNotEmpty()
  JWT_AUDIENCE = 'VerseVaultUsers';

  @Type(() => Number)
  @IsInt()
  @Min(1)
  JWT_EXPIRATION_MINUTES = 60;

  // ── Purpose tokens (email confirmation, password reset) ─
  @IsString()
  @MinLength(32, {
    message: 'PURPOSE_TOKEN_SECRET must be at least 32 characters long',
  })
  PURPOSE_TOKEN_SECRET!: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  PURPOSE_TOKEN_KEY_VERSION = 1;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  PURPOSE_TOKEN_LIFETIME_HOURS = 24;

  // ── Accounts ────────────────────────────────────────────
  @Type(() => Number)
  @IsInt()
  @Min(4)
  @Max(31)
  BCRYPT_SALT_ROUNDS = 12;

  @Transform(toBoolean)
  @IsBoolean()
  REQUIRE_CONFIRMED_EMAIL = false;

  // ── Links embedded in emails ────────────────────────────
  @IsUrl({ require_tld: false })
  API_PUBLIC_URL = 'http://localhost:4000';

  @IsUrl({ require_tld: false })
  FRONTEND_URL = 'http://localhost:5173';

  // ── SMTP ────────────────────────────────────────────────
  @IsOptional()
  @IsString()
  SMTP_HOST?: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  SMTP_PORT = 587;

  @IsOptional()
  @IsString()
  SMTP_USER?: string;

  @IsOptional()
  @IsString()
  SMTP_PASSWORD?: string;

  @IsEmail()
  SMTP_SENDER_EMAIL = 'noreply@versevault.app';

  @IsString()
  @IsNotEmpty()
  SMTP_SENDER_NAME = 'VerseVault';
}

/**
 * Validates and converts the raw environment.
 *
 * @throws Error listing every failed constraint
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}
