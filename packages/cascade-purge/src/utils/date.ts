/**
 * Date encoding utilities for consistent storage.
 *
 * Contract: All timestamps are stored as ISO 8601 strings in UTC
 * with milliseconds, so they sort correctly as strings.
 */

/**
 * Returns the current timestamp as an ISO string.
 */
export function nowIso(): string {
  return new Date().toISOString();
}

/**
 * Milliseconds from `from` until `iso`; 0 when it has passed or is unset.
 */
export function msUntil(iso: string | undefined, from: Date = new Date()): number {
  if (iso === undefined) return 0;
  return Math.max(0, Date.parse(iso) - from.getTime());
}

/**
 * Returns the ISO timestamp `delayMs` milliseconds after `from`.
 */
export function isoAfter(delayMs: number, from: Date = new Date()): string {
  return new Date(from.getTime() + delayMs).toISOString();
}
