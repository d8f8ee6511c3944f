/**
 * Coerces a database timestamp (a `Date` from pg, or already a string) to an ISO string.
 */
export function coerceTimestamp(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }

  if (typeof value === 'string') {
    return value;
  }

  return String(value);
}
