/**
 * Timestamp helpers for provenance comparison
 *
 * Stored timestamps come from many writers over many years; some carry no
 * UTC offset. Offset-less values are read as UTC.
 */

const OFFSET_SUFFIX = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;
const HAS_TIME = /T\d{2}/;

/**
 * Parse an ISO 8601 timestamp. Returns null for missing or unparseable input.
 */
export function parseTimestamp(raw: string | null | undefined): Date | null {
  if (raw === null || raw === undefined) return null;
  const trimmed = raw.trim();
  if (trimmed === '') return null;

  const normalized = HAS_TIME.test(trimmed) && !OFFSET_SUFFIX.test(trimmed)
    ? `${trimmed}Z`
    : trimmed;
  const parsed = new Date(normalized);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Serialize a Date the way provenance files store it
 */
export function toIsoTimestamp(date: Date): string {
  return date.toISOString();
}
