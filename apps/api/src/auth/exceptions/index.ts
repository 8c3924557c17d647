export * from './auth.exceptions';
export { toHttpException, unwrapAuthResult } from './auth-failure.mapper';
