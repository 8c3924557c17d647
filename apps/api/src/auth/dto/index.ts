export { RegisterDto } from './register.dto';
export { LoginDto } from './login.dto';
export { ForgotPasswordDto } from './forgot-password.dto';
export { ResetPasswordDto } from './reset-password.dto';
export { ConfirmEmailQueryDto, ValidateResetTokenQueryDto } from './auth-query.dto';
export {
  MessageResponseDto,
  RegisterResponseDto,
  LoginResponseDto,
} from './auth-response.dto';
export { UserProfileDto } from './user-profile.dto';
