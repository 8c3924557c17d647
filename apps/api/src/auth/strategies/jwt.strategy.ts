import { Inject, Injectable, UnauthorizedException, Logger } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { Strategy, ExtractJwt } from 'passport-jwt';
import { CREDENTIAL_STORE } from '../auth.constants';
import type { CredentialStore } from '../credentials/credential-store.interface';
import { TokenIssuer } from '../tokens/token-issuer.service';
import type { JwtClaims, RequestUser } from '../interfaces';

/**
 * JWT Strategy — validates Bearer tokens on protected routes.
 *
 * Flow:
 * 1. Passport extracts JWT from Authorization header
 * 2. passport-jwt verifies signature, issuer, audience and expiry using
 *    TokenIssuer.verifyOptions (HS256 only, valid through the exp second)
 * 3. validate() is called with the decoded claims
 * 4. We verify the account still exists
 * 5. Returns RequestUser which is attached to request.user
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  private readonly logger = new Logger(JwtStrategy.name);

  constructor(
    tokenIssuer: TokenIssuer,
    @Inject(CREDENTIAL_STORE)
    private readonly credentialStore: CredentialStore,
  ) {
    const { secret, issuer, audience, algorithms, clockTolerance } =
      tokenIssuer.verifyOptions;

    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: secret,
      issuer,
      audience,
      algorithms,
      jsonWebTokenOptions: { clockTolerance },
    });
  }

  /**
   * Called after the token is verified.
   * Must return the user data to be attached to request.user,
   * or throw to reject the request.
   */
  async validate(payload: JwtClaims): Promise<RequestUser> {
    const account = await this.credentialStore.findById(payload.sub);

    if (!account) {
      this.logger.warn(`JWT validation failed: user ${payload.sub} not found`);
      throw new UnauthorizedException('User no longer exists');
    }

    return {
      userId: account.id,
      email: account.email,
      name: account.fullName,
    };
  }
}
