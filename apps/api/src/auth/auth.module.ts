import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { ConfigService } from '@nestjs/config';
import { DatabaseModule } from '@versevault/database';
import { MailModule } from '../mail';
import { AUTH_OPTIONS, CREDENTIAL_STORE } from './auth.constants';
import { authOptionsFactory } from './auth.options';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { TypeOrmCredentialStore } from './credentials/typeorm-credential-store';
import { PasswordHasher } from './hashing/password-hasher.service';
import { TokenIssuer } from './tokens/token-issuer.service';
import { PurposeTokenService } from './tokens/purpose-token.service';
import { JwtStrategy } from './strategies';

/**
 * AuthModule — accounts, credentials and bearer-token authentication.
 *
 * Provides:
 * - Registration, email confirmation and password reset workflows
 * - Bearer-token issuance (TokenIssuer) and verification (JwtStrategy)
 * - REST endpoints under /auth
 *
 * Collaborators are bound to injection tokens (CREDENTIAL_STORE,
 * EMAIL_SENDER, AUTH_OPTIONS) so tests can swap them with overrideProvider.
 */
@Module({
  imports: [
    // User repository for TypeOrmCredentialStore
    DatabaseModule.forFeature(),

    // Passport with JWT as default strategy
    PassportModule.register({ defaultStrategy: 'jwt' }),

    // Keys and claims are passed per call by TokenIssuer
    JwtModule.register({}),

    MailModule,
  ],
  controllers: [AuthController],
  providers: [
    {
      provide: AUTH_OPTIONS,
      inject: [ConfigService],
      useFactory: authOptionsFactory,
    },
    { provide: CREDENTIAL_STORE, useClass: TypeOrmCredentialStore },
    PasswordHasher,
    TokenIssuer,
    PurposeTokenService,
    AuthService,
    JwtStrategy,
  ],
  exports: [AuthService, TokenIssuer, PassportModule],
})
export class AuthModule {}
