import { Injectable, UnauthorizedException, Logger } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { classifyJwtError } from '../tokens/token-issuer.service';

/** passport-jwt reports a request without a bearer token with this message */
const MISSING_TOKEN_MESSAGE = 'No auth token';

/**
 * JWT Authentication Guard — protects routes that require authentication.
 *
 * Usage:
 * ```ts
 * @UseGuards(JwtAuthGuard)
 * @Get('me')
 * getProfile(@CurrentUser() user: RequestUser) { ... }
 * ```
 *
 * Overrides handleRequest to turn Passport's failure info into one of a few
 * fixed messages, classified the same way TokenIssuer.validate classifies.
 */
@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  private readonly logger = new Logger(JwtAuthGuard.name);

  handleRequest<TUser>(
    err: Error | null,
    user: TUser | false,
    info: Error | undefined,
  ): TUser {
    if (err) {
      this.logger.warn(`JWT auth error: ${err.message}`);
      throw err instanceof UnauthorizedException
        ? err
        : new UnauthorizedException('Authentication failed');
    }

    if (!user) {
      const message = getFailureMessage(info);
      this.logger.debug(`JWT auth rejected: ${message}`);
      throw new UnauthorizedException(message);
    }

    return user;
  }
}

/**
 * Cases:
 * - No token provided → "Authentication token is missing"
 * - Token expired → "Authentication token has expired"
 * - Anything else (signature, issuer, audience, malformed) → "Invalid authentication token"
 */
export function getFailureMessage(info: Error | undefined): string {
  if (!info || info.message === MISSING_TOKEN_MESSAGE) {
    return 'Authentication token is missing';
  }

  if (classifyJwtError(info) === 'Expired') {
    return 'Authentication token has expired';
  }

  return 'Invalid authentication token';
}
