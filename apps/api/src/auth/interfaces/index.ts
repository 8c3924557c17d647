export type { JwtPayload, JwtClaims } from './jwt-payload.interface';
export type {
  RequestUser,
  AuthenticatedRequest,
} from './authenticated-request.interface';
export type { AuthOptions } from './auth-options.interface';
export type {
  AuthFailure,
  AuthFailureKind,
  AuthResult,
} from './auth-result.interface';
export { succeed, fail } from './auth-result.interface';
