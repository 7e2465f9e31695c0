export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stringField(record: Record<string, unknown>, key: string, fallback: string): string {
  const value = record[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return fallback;
}

/** Error-shaped check; `instanceof Error` is false for errors from another realm. */
export function isErrorLike(value: unknown): value is Record<string, unknown> & { message: string } {
  return isRecord(value) && typeof value.message === 'string';
}
