import { IsNotEmpty, IsString } from 'class-validator';

/**
 * Query strings of the links sent by email.
 *
 * Only presence is checked here: an unknown id or a malformed code is a
 * workflow outcome (404 / 400 with the workflow's message), not a
 * validation error.
 */
export class ConfirmEmailQueryDto {
  @IsString()
  @IsNotEmpty({ message: 'userId is required' })
  userId!: string;

  @IsString()
  @IsNotEmpty({ message: 'code is required' })
  code!: string;
}

export class ValidateResetTokenQueryDto {
  @IsString()
  @IsNotEmpty({ message: 'email is required' })
  email!: string;

  @IsString()
  @IsNotEmpty({ message: 'code is required' })
  code!: string;
}
