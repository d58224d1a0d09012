/**
 * Field Normalizer Tests
 */

import { describe, it, expect } from 'vitest';
import {
  isScoreableType,
  normalizeField,
  normalizeMuseumType,
  normalizeTimeNeeded,
  normalizeWebsite,
} from '../../../curation/normalizers.js';

describe('normalizeWebsite', () => {
  it('should add a scheme and drop trailing slashes', () => {
    expect(normalizeWebsite('example-museum.org/')).toBe('https://example-museum.org');
    expect(normalizeWebsite(' http://example-museum.org/visit// ')).toBe(
      'http://example-museum.org/visit'
    );
  });

  it('should reject hosts without a dot, other schemes and embedded spaces', () => {
    expect(normalizeWebsite('localhost')).toBeUndefined();
    expect(normalizeWebsite('ftp://example-museum.org')).toBeUndefined();
    expect(normalizeWebsite('example museum.org')).toBeUndefined();
  });
});

describe('normalizeTimeNeeded', () => {
  it('should map synonyms onto the three buckets', () => {
    expect(normalizeTimeNeeded('Half-Day')).toBe('Half day');
    expect(normalizeTimeNeeded('4+ hours')).toBe('Full day');
    expect(normalizeTimeNeeded('quick stop')).toBe('Quick stop (<1 hr)');
    expect(normalizeTimeNeeded('a week')).toBeUndefined();
  });
});

describe('normalizeMuseumType', () => {
  it('should map aliases case-insensitively', () => {
    expect(normalizeMuseumType('Art Museum')).toBe('Art Museum');
    expect(normalizeMuseumType('kids museum')).toBe('Children\'s Museum');
  });

  it('should prefer the longest matching alias', () => {
    expect(normalizeMuseumType('Regional Art Center')).toBe('Art Center');
  });

  it('should keep unknown types trimmed', () => {
    expect(normalizeMuseumType('  Puppet Theatre ')).toBe('Puppet Theatre');
  });

  it('should recognize scoreable art types', () => {
    expect(isScoreableType('contemporary art')).toBe(true);
    expect(isScoreableType('history museum')).toBe(false);
  });
});

describe('normalizeField', () => {
  it('should pass null and placeholders through', () => {
    expect(normalizeField('reputation', null)).toEqual({ ok: true, value: null });
    expect(normalizeField('website', 'TBD')).toEqual({ ok: true, value: 'TBD' });
  });

  it('should canonicalize domains', () => {
    expect(normalizeField('primary_domain', 'science')).toEqual({ ok: true, value: 'Science' });
    expect(normalizeField('primary_domain', 'Botany')).toEqual({
      ok: false,
      reason: 'invalid_primary_domain',
    });
  });

  it('should range-check scores and tiers', () => {
    expect(normalizeField('reputation', '2')).toEqual({ ok: true, value: 2 });
    expect(normalizeField('reputation', 4)).toEqual({ ok: false, reason: 'invalid_reputation' });
    expect(normalizeField('city_tier', 0)).toEqual({ ok: false, reason: 'invalid_city_tier' });
    expect(normalizeField('impressionist_strength', 5)).toEqual({ ok: true, value: 5 });
    expect(normalizeField('impressionist_strength', 4.5)).toEqual({
      ok: false,
      reason: 'invalid_impressionist_strength',
    });
  });

  it('should range-check coordinates', () => {
    expect(normalizeField('latitude', 45.52)).toEqual({ ok: true, value: 45.52 });
    expect(normalizeField('longitude', -190)).toEqual({ ok: false, reason: 'invalid_longitude' });
  });

  it('should trim free-text fields', () => {
    expect(normalizeField('museum_name', '  Portland Art Museum ')).toEqual({
      ok: true,
      value: 'Portland Art Museum',
    });
    expect(normalizeField('notes', true)).toEqual({ ok: true, value: true });
  });

  it('should reject a non-string value for a text-only field', () => {
    expect(normalizeField('time_needed', 3)).toEqual({ ok: false, reason: 'invalid_time_needed' });
  });
});
