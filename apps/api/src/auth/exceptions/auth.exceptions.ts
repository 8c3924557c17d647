import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * HTTP exceptions for auth workflow failures.
 *
 * Each carries the `{ success: false, message }` body the API answers with;
 * HttpExceptionFilter renders it unchanged. Messages come from AuthService
 * and are already client-safe.
 */
abstract class AuthHttpException extends HttpException {
  protected constructor(message: string, status: HttpStatus) {
    super({ success: false, message }, status);
  }
}

/** HTTP 400: password and confirmation differ. */
export class PasswordMismatchException extends AuthHttpException {
  constructor(message: string) {
    super(message, HttpStatus.BAD_REQUEST);
  }
}

/** HTTP 400: the email is already registered. */
export class DuplicateEmailException extends AuthHttpException {
  constructor(message: string) {
    super(message, HttpStatus.BAD_REQUEST);
  }
}

/** HTTP 404: no account with the id from a confirmation link. */
export class UserNotFoundException extends AuthHttpException {
  constructor(message: string) {
    super(message, HttpStatus.NOT_FOUND);
  }
}

/** HTTP 400: the email confirmation code did not verify. */
export class InvalidTokenException extends AuthHttpException {
  constructor(message: string) {
    super(message, HttpStatus.BAD_REQUEST);
  }
}

/**
 * HTTP 401: wrong email or password.
 *
 * Intentionally vague message to prevent user enumeration attacks.
 */
export class InvalidCredentialsException extends AuthHttpException {
  constructor(message: string) {
    super(message, HttpStatus.UNAUTHORIZED);
  }
}

/** HTTP 401: login refused until the email is confirmed. */
export class EmailNotConfirmedException extends AuthHttpException {
  constructor(message: string) {
    super(message, HttpStatus.UNAUTHORIZED);
  }
}

/** HTTP 400: no account for the email in a reset request. */
export class InvalidEmailException extends AuthHttpException {
  constructor(message: string) {
    super(message, HttpStatus.BAD_REQUEST);
  }
}

/** HTTP 400: the reset code is stale, forged or expired. */
export class InvalidOrExpiredTokenException extends AuthHttpException {
  constructor(message: string) {
    super(message, HttpStatus.BAD_REQUEST);
  }
}

/** HTTP 503: the mail transport refused or is not configured. */
export class EmailServiceUnavailableException extends AuthHttpException {
  constructor(message: string) {
    super(message, HttpStatus.SERVICE_UNAVAILABLE);
  }
}

/** HTTP 500: a collaborator failed; detail was logged by AuthService. */
export class AuthOperationFailedException extends AuthHttpException {
  constructor(message: string) {
    super(message, HttpStatus.INTERNAL_SERVER_ERROR);
  }
}
