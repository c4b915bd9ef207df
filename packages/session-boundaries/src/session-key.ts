/**
 * Session keys decide which bars belong to the same trading session.
 *
 * @packageDocumentation
 */

/**
 * Maps a bar timestamp to the identifier of its session.
 */
export type SessionKeyFn = (dateTime: Date) => string;

/**
 * Formats a Date to YYYY-MM-DD using UTC fields.
 *
 * Callers whose sessions do not align with UTC days convert their timestamps
 * or pass their own key function.
 *
 * @example
 * ```typescript
 * utcSessionKey(new Date('2024-03-04T20:59:00Z')); // '2024-03-04'
 * ```
 */
export function utcSessionKey(dateTime: Date): string {
  const year = dateTime.getUTCFullYear();
  const month = String(dateTime.getUTCMonth() + 1).padStart(2, '0');
  const day = String(dateTime.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}
