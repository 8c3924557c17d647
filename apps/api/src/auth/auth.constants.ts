/**
 * Injection tokens for the auth module.
 *
 * String-based so tests can provide in-memory stand-ins (a Map-backed
 * credential store, hand-built options) without touching the ORM.
 */
export const CREDENTIAL_STORE = 'CREDENTIAL_STORE';
export const AUTH_OPTIONS = 'AUTH_OPTIONS';
