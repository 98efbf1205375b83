/**
 * Timestamp formatting for the legacy request signature
 */

/**
 * Format date as YYYY-MM-DDTHH:mm:ssZ (UTC, whole seconds)
 *
 * @example
 * ```typescript
 * formatTimestamp(new Date(Date.UTC(1989, 0, 9, 12, 12, 12, 500))); // '1989-01-09T12:12:12Z'
 * ```
 */
export function formatTimestamp(date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  const hours = String(date.getUTCHours()).padStart(2, '0');
  const minutes = String(date.getUTCMinutes()).padStart(2, '0');
  const seconds = String(date.getUTCSeconds()).padStart(2, '0');
  return `${year}-${month}-${day}T${hours}:${minutes}:${seconds}Z`;
}

/**
 * Parse a YYYY-MM-DDTHH:mm:ssZ timestamp back to a Date
 *
 * @throws Error if the string is not in that format
 */
export function parseTimestamp(timestamp: string): Date {
  const match = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/.exec(timestamp);
  if (!match) {
    throw new Error(`Invalid timestamp: ${timestamp}`);
  }
  const [, year, month, day, hours, minutes, seconds] = match.map((part) => parseInt(part, 10));
  return new Date(
    Date.UTC(year ?? 0, (month ?? 1) - 1, day ?? 1, hours ?? 0, minutes ?? 0, seconds ?? 0)
  );
}
