/** Envelope shared by every successful auth response. */
export class MessageResponseDto {
  readonly success = true as const;
  message: string;

  constructor(message: string) {
    this.message = message;
  }
}

export class RegisterResponseDto extends MessageResponseDto {
  userId: string;

  constructor(message: string, userId: string) {
    super(message);
    this.userId = userId;
  }
}

/**
 * Response shape for a successful login.
 *
 * Carries the OAuth2 token fields (tokenType, expiresIn) next to the
 * account identifiers.
 */
export class LoginResponseDto extends MessageResponseDto {
  accessToken: string;
  tokenType: 'Bearer';
  expiresIn: number;
  userId: string;
  email: string;

  constructor(
    message: string,
    login: { accessToken: string; expiresIn: number; userId: string; email: string },
  ) {
    super(message);
    this.accessToken = login.accessToken;
    this.tokenType = 'Bearer';
    this.expiresIn = login.expiresIn;
    this.userId = login.userId;
    this.email = login.email;
  }
}
