import type { HttpException } from '@nestjs/common';
import type { AuthFailure, AuthFailureKind, AuthResult } from '../interfaces';
import {
  AuthOperationFailedException,
  DuplicateEmailException,
  EmailNotConfirmedException,
  EmailServiceUnavailableException,
  InvalidCredentialsException,
  InvalidEmailException,
  InvalidOrExpiredTokenException,
  InvalidTokenException,
  PasswordMismatchException,
  UserNotFoundException,
} from './auth.exceptions';

const EXCEPTION_BY_KIND: Record<AuthFailureKind, new (message: string) => HttpException> = {
  PasswordMismatch: PasswordMismatchException,
  DuplicateEmail: DuplicateEmailException,
  UserNotFound: UserNotFoundException,
  InvalidToken: InvalidTokenException,
  InvalidCredentials: InvalidCredentialsException,
  EmailNotConfirmed: EmailNotConfirmedException,
  InvalidEmail: InvalidEmailException,
  InvalidOrExpiredToken: InvalidOrExpiredTokenException,
  EmailServiceUnavailable: EmailServiceUnavailableException,
  Unexpected: AuthOperationFailedException,
};

export function toHttpException(failure: AuthFailure): HttpException {
  const ExceptionType = EXCEPTION_BY_KIND[failure.kind];
  return new ExceptionType(failure.message);
}

/**
 * Returns the success value, or throws the HTTP exception for the failure.
 * Used by controllers, the only place auth failures become exceptions.
 */
export function unwrapAuthResult<T>(result: AuthResult<T>): T {
  if (!result.ok) {
    throw toHttpException(result.error);
  }
  return result.value;
}
