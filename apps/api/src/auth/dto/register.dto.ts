import {
  IsEmail,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  MinLength,
} from 'class-validator';

/**
 * DTO for user registration.
 *
 * Validated by the global ValidationPipe (whitelist + forbidNonWhitelisted).
 * Password constraints: 6–128 chars, no complexity classes. Whether the two
 * passwords match is checked by AuthService so the mismatch is reported
 * with its own message.
 */
export class RegisterDto {
  @IsEmail({}, { message: 'Please provide a valid email address' })
  @IsNotEmpty({ message: 'Email is required' })
  email!: string;

  @IsString()
  @MinLength(6, { message: 'Password must be at least 6 characters long' })
  @MaxLength(128, { message: 'Password must be at most 128 characters long' })
  password!: string;

  @IsString()
  @IsNotEmpty({ message: 'Password confirmation is required' })
  confirmPassword!: string;

  /** Defaults to the email address when omitted or blank */
  @IsOptional()
  @IsString()
  @MaxLength(255, { message: 'Full name must be at most 255 characters long' })
  fullName?: string;
}
