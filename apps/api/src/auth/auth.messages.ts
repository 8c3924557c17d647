/**
 * Client-facing messages of the auth endpoints.
 *
 * Failure texts are deliberately uninformative where a difference would let
 * a caller tell whether an account exists.
 */
export const AUTH_MESSAGES = {
  passwordMismatch: 'Passwords do not match.',
  duplicateEmail: (email: string): string =>
    `Registration failed: Email '${email}' is already taken.`,
  registered:
    'Registration successful. Please check your email to confirm your account.',
  registrationFailed: 'An error occurred during registration.',

  userNotFound: 'User not found.',
  emailConfirmationFailed: 'Email confirmation failed.',
  emailConfirmed: 'Email confirmed successfully. You can now log in.',
  emailConfirmationError: 'An error occurred during email confirmation.',

  invalidCredentials: 'Invalid email or password.',
  emailNotConfirmed: 'Please confirm your email before logging in.',
  loggedIn: 'Login successful.',
  loginFailed: 'An error occurred during login.',

  passwordResetRequested:
    'If an account with that email exists, you will receive a password reset email shortly.',
  emailServiceUnavailable:
    'Email service is currently unavailable. Please try again in a few minutes.',
  forgotPasswordFailed:
    'An error occurred while processing your request. Please try again later.',

  invalidEmail: 'Invalid email address.',
  invalidOrExpiredToken:
    'Password reset link is invalid or has expired. Please request a new one.',
  tokenValid: 'Token is valid.',
  tokenValidationFailed: 'Error validating token.',

  passwordReset:
    'Your password has been reset successfully. You can now log in with your new password.',
  passwordResetFailed: 'An error occurred during password reset.',

  loggedOut: 'Logged out successfully.',
  profileFailed: 'An error occurred while loading the profile.',
} as const;
