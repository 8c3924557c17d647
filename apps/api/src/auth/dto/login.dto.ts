import { IsEmail, IsNotEmpty, IsString } from 'class-validator';

/**
 * Body of POST /api/auth/login. Shape checks only: a well-formed email and a
 * non-empty password. Whether they match an account is decided by
 * AuthService, and every mismatch gets the same 401.
 */
export class LoginDto {
  @IsEmail({}, { message: 'Please provide a valid email address' })
  @IsNotEmpty({ message: 'Email is required' })
  email!: string;

  @IsString()
  @IsNotEmpty({ message: 'Password is required' })
  password!: string;
}
