/**
 * Field Normalizers
 *
 * Canonicalize candidate values before merge. A value that cannot be mapped to
 * an accepted form is rejected with `invalid_<field>` and never reaches the
 * merge engine. Null and placeholder values pass through untouched so the
 * merge engine reports them with its own reasons.
 */

import { z } from 'zod';
import type { FieldValue, PrimaryDomain, TimeNeeded } from '@museum-curation/types';
import { loadDataFile } from '../core/utils/data-files.js';
import { isPlaceholder } from '../provenance/merge-engine.js';

// ============================================================================
// Types
// ============================================================================

export type NormalizationResult =
  | { readonly ok: true; readonly value: FieldValue }
  | { readonly ok: false; readonly reason: `invalid_${string}` };

type Normalizer = (value: string | number | boolean) => FieldValue | undefined;

// ============================================================================
// Enumerations
// ============================================================================

export const TIME_NEEDED_VALUES: readonly TimeNeeded[] = [
  'Quick stop (<1 hr)',
  'Half day',
  'Full day',
];

const TIME_NEEDED_SYNONYMS: Readonly<Record<string, TimeNeeded>> = {
  'quick stop (<1 hr)': 'Quick stop (<1 hr)',
  'quick stop': 'Quick stop (<1 hr)',
  'quick stop (1-2 hours)': 'Quick stop (<1 hr)',
  '1-2 hours': 'Quick stop (<1 hr)',
  '<1 hr': 'Quick stop (<1 hr)',
  'half day': 'Half day',
  'half-day': 'Half day',
  'half day (2-4 hours)': 'Half day',
  '2-4 hours': 'Half day',
  'full day': 'Full day',
  'full-day': 'Full day',
  'full day (4+ hours)': 'Full day',
  '4+ hours': 'Full day',
};

export const PRIMARY_DOMAINS: readonly PrimaryDomain[] = [
  'Art',
  'History',
  'Science',
  'Culture',
  'Specialty',
  'Mixed',
];

const museumTypesSchema = z.object({
  scoreable: z.array(z.string()),
  aliases: z.record(z.string()),
});

export type MuseumTypeTable = z.infer<typeof museumTypesSchema>;

export function loadMuseumTypes(): MuseumTypeTable {
  return loadDataFile('museum-types.json', museumTypesSchema);
}

// ============================================================================
// Individual normalizers
// ============================================================================

export function normalizeWebsite(raw: string): string | undefined {
  let url = raw.trim();
  if (url === '' || /\s/.test(url)) return undefined;
  if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(url)) {
    url = `https://${url}`;
  }
  url = url.replace(/\/+$/, '');

  try {
    const parsed = new URL(url);
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return undefined;
    if (!parsed.hostname.includes('.')) return undefined;
  } catch {
    return undefined;
  }
  return url;
}

export function normalizeTimeNeeded(raw: string): TimeNeeded | undefined {
  return TIME_NEEDED_SYNONYMS[raw.trim().toLowerCase()];
}

export function normalizePrimaryDomain(raw: string): PrimaryDomain | undefined {
  const key = raw.trim().toLowerCase();
  return PRIMARY_DOMAINS.find((domain) => domain.toLowerCase() === key);
}

/**
 * Map a free-text museum type onto the canonical vocabulary. Unknown types
 * are kept (trimmed) rather than discarded.
 */
export function normalizeMuseumType(raw: string, table: MuseumTypeTable = loadMuseumTypes()): string {
  const trimmed = raw.trim();
  const key = trimmed.toLowerCase();
  const direct = table.aliases[key];
  if (direct !== undefined) return direct;

  // Longest alias first so "art center" wins over "art"
  const partial = Object.keys(table.aliases)
    .sort((a, b) => b.length - a.length || a.localeCompare(b))
    .find((alias) => key.includes(alias));
  return partial !== undefined ? table.aliases[partial] ?? trimmed : trimmed;
}

export function isScoreableType(museumType: string, table: MuseumTypeTable = loadMuseumTypes()): boolean {
  return table.scoreable.includes(normalizeMuseumType(museumType, table));
}

function integerInRange(min: number, max: number): Normalizer {
  return (value) => {
    const numeric = typeof value === 'string' && value.trim() !== '' ? Number(value.trim()) : value;
    if (typeof numeric !== 'number' || !Number.isInteger(numeric)) return undefined;
    return numeric >= min && numeric <= max ? numeric : undefined;
  };
}

function finiteInRange(min: number, max: number): Normalizer {
  return (value) => {
    const numeric = typeof value === 'string' && value.trim() !== '' ? Number(value.trim()) : value;
    if (typeof numeric !== 'number' || !Number.isFinite(numeric)) return undefined;
    return numeric >= min && numeric <= max ? numeric : undefined;
  };
}

function stringOnly(transform: (raw: string) => FieldValue | undefined): Normalizer {
  return (value) => (typeof value === 'string' ? transform(value) : undefined);
}

const trimmedOrAsIs: Normalizer = (value) => (typeof value === 'string' ? value.trim() : value);

const NORMALIZERS: Readonly<Record<string, Normalizer>> = {
  website: stringOnly(normalizeWebsite),
  time_needed: stringOnly(normalizeTimeNeeded),
  primary_domain: stringOnly(normalizePrimaryDomain),
  museum_type: stringOnly((raw) => normalizeMuseumType(raw)),
  reputation: integerInRange(0, 3),
  collection_tier: integerInRange(0, 3),
  city_tier: integerInRange(1, 3),
  impressionist_strength: integerInRange(0, 5),
  modern_contemporary_strength: integerInRange(0, 5),
  historical_context_score: integerInRange(0, 5),
  nearby_record_count: integerInRange(0, Number.MAX_SAFE_INTEGER),
  latitude: finiteInRange(-90, 90),
  longitude: finiteInRange(-180, 180),
};

// ============================================================================
// Entry point
// ============================================================================

/**
 * Normalize a candidate value for `field`.
 */
export function normalizeField(field: string, value: FieldValue): NormalizationResult {
  if (value === null || isPlaceholder(value)) {
    return { ok: true, value };
  }

  const normalizer = NORMALIZERS[field] ?? trimmedOrAsIs;
  const normalized = normalizer(value);
  if (normalized === undefined) {
    return { ok: false, reason: `invalid_${field}` };
  }
  return { ok: true, value: normalized };
}
