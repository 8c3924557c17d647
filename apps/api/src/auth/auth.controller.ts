import {
  Controller,
  Post,
  Get,
  Body,
  Query,
  UseGuards,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { AuthService } from './auth.service';
import { AUTH_MESSAGES } from './auth.messages';
import {
  RegisterDto,
  LoginDto,
  ForgotPasswordDto,
  ResetPasswordDto,
  ConfirmEmailQueryDto,
  ValidateResetTokenQueryDto,
  MessageResponseDto,
  RegisterResponseDto,
  LoginResponseDto,
  UserProfileDto,
} from './dto';
import { unwrapAuthResult } from './exceptions';
import { JwtAuthGuard } from './guards';
import { CurrentUser } from './decorators';
import type { RequestUser } from './interfaces';

/**
 * AuthController — REST endpoints for accounts and credentials.
 *
 * Routes (under the global `api` prefix):
 * - POST /auth/register             → Create an account, email a confirmation link
 * - GET  /auth/confirm-email        → Target of the confirmation link
 * - POST /auth/login                → Authenticate and receive a bearer token
 * - POST /auth/forgot-password      → Email a password-reset link
 * - GET  /auth/validate-reset-token → Check a reset link before showing the form
 * - POST /auth/reset-password       → Set a new password with a reset code
 * - POST /auth/logout               → Acknowledge logout (protected)
 * - GET  /auth/me                   → Current user profile (protected)
 *
 * AuthService returns results; failures become HTTP exceptions here via
 * unwrapAuthResult.
 */
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  /**
   * @throws 400 on validation failure, password mismatch or duplicate email
   */
  @Post('register')
  @HttpCode(HttpStatus.OK)
  async register(@Body() dto: RegisterDto): Promise<RegisterResponseDto> {
    const { userId } = unwrapAuthResult(await this.authService.register(dto));
    return new RegisterResponseDto(AUTH_MESSAGES.registered, userId);
  }

  /**
   * @throws 404 for an unknown user id, 400 for a code that does not verify
   */
  @Get('confirm-email')
  async confirmEmail(
    @Query() query: ConfirmEmailQueryDto,
  ): Promise<MessageResponseDto> {
    unwrapAuthResult(await this.authService.confirmEmail(query.userId, query.code));
    return new MessageResponseDto(AUTH_MESSAGES.emailConfirmed);
  }

  /**
   * @throws 401 if credentials are invalid (or the email is unconfirmed
   *   while REQUIRE_CONFIRMED_EMAIL is on)
   */
  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(@Body() dto: LoginDto): Promise<LoginResponseDto> {
    const login = unwrapAuthResult(await this.authService.login(dto));
    return new LoginResponseDto(AUTH_MESSAGES.loggedIn, login);
  }

  /**
   * Same answer whether or not the email is registered.
   *
   * @throws 503 if the reset email could not be handed to the mail server
   */
  @Post('forgot-password')
  @HttpCode(HttpStatus.OK)
  async forgotPassword(@Body() dto: ForgotPasswordDto): Promise<MessageResponseDto> {
    unwrapAuthResult(await this.authService.forgotPassword(dto.email));
    return new MessageResponseDto(AUTH_MESSAGES.passwordResetRequested);
  }

  @Get('validate-reset-token')
  async validateResetToken(
    @Query() query: ValidateResetTokenQueryDto,
  ): Promise<MessageResponseDto> {
    unwrapAuthResult(
      await this.authService.validateResetToken(query.email, query.code),
    );
    return new MessageResponseDto(AUTH_MESSAGES.tokenValid);
  }

  /**
   * @throws 400 on password mismatch, unknown email or a stale/expired code
   */
  @Post('reset-password')
  @HttpCode(HttpStatus.OK)
  async resetPassword(@Body() dto: ResetPasswordDto): Promise<MessageResponseDto> {
    unwrapAuthResult(await this.authService.resetPassword(dto));
    return new MessageResponseDto(AUTH_MESSAGES.passwordReset);
  }

  @Post('logout')
  @HttpCode(HttpStatus.OK)
  @UseGuards(JwtAuthGuard)
  logout(@CurrentUser() user: RequestUser): MessageResponseDto {
    unwrapAuthResult(this.authService.logout(user));
    return new MessageResponseDto(AUTH_MESSAGES.loggedOut);
  }

  /**
   * @throws 401 Unauthorized if token is missing/invalid/expired
   */
  @Get('me')
  @UseGuards(JwtAuthGuard)
  async getProfile(@CurrentUser() user: RequestUser): Promise<UserProfileDto> {
    return unwrapAuthResult(await this.authService.getProfile(user.userId));
  }
}
