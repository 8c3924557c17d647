import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { AuthenticatedRequest, RequestUser } from '../interfaces';

/**
 * Injects the account attached to the request by JwtStrategy.
 *
 * Only meaningful behind JwtAuthGuard:
 * ```ts
 * @Post('logout')
 * @UseGuards(JwtAuthGuard)
 * logout(@CurrentUser() user: RequestUser): MessageResponseDto { ... }
 * ```
 */
export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): RequestUser =>
    ctx.switchToHttp().getRequest<AuthenticatedRequest>().user,
);
