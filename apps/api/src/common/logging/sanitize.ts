/**
 * Strips CR/LF from user-supplied values before they are interpolated into
 * log lines, so a crafted email address cannot forge extra log entries.
 */
export function sanitizeForLog(value: string | null | undefined): string {
  return (value ?? '').replace(/[\r\n]/g, '');
}
