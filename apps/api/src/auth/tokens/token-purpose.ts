/** Operations a purpose token can authorise. */
export const TokenPurpose = {
  EmailConfirmation: 'EmailConfirmation',
  ResetPassword: 'ResetPassword',
} as const;

export type TokenPurpose = (typeof TokenPurpose)[keyof typeof TokenPurpose];
