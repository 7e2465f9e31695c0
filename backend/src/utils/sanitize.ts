const URL_CREDENTIALS_REGEX = /(https?:\/\/[^:/@\s]+:)([^@\s]+)(@)/g;
const PASSWORD_FIELD_REGEX = /(["']password["']\s*:\s*["'])([^"']*)(["'])/g;
const MASK = '********';

/** Masks credentials before a string reaches a log line or an outcome message. */
export function sanitizeLogData(data: unknown): string {
  if (data === null || data === undefined) return '';
  const text = typeof data === 'string' ? data : String(data);
  return text
    .replace(URL_CREDENTIALS_REGEX, `$1${MASK}$3`)
    .replace(PASSWORD_FIELD_REGEX, `$1${MASK}$3`);
}

export function maskPassword(password: string | undefined): string | null {
  return password ? MASK : null;
}
