import type { Request } from 'express';

/** The signed-in reader, rebuilt from bearer-token claims on every request. */
export interface RequestUser {
  /** `sub` claim */
  userId: string;
  email: string;
  /** Display name at the time the token was issued */
  name: string;
}

/** A request that has passed JwtAuthGuard; `user` is always set. */
export interface AuthenticatedRequest extends Request {
  user: RequestUser;
}
