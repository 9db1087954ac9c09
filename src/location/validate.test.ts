import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors.js';
import { SPRINGFIELD } from '../testing/fixtures.js';
import { normalizePostalCode, validateLocation } from './validate.js';

function issuesOf(input: unknown): string[] {
  try {
    validateLocation(input);
  } catch (err) {
    if (err instanceof ValidationError) return err.issues;
    throw err;
  }
  throw new Error('expected a ValidationError');
}

describe('validateLocation', () => {
  it('derives the growing season when it is omitted', () => {
    const { growing_season_days: _omitted, ...input } = SPRINGFIELD;
    expect(validateLocation(input)).toEqual(SPRINGFIELD);
  });

  it('normalizes postal codes and zones', () => {
    const loc = validateLocation({ ...SPRINGFIELD, postal_code: 'k1a0b1', usda_zone: '5B' });
    expect(loc.postal_code).toBe('K1A 0B1');
    expect(loc.usda_zone).toBe('5b');
  });

  it('requires the last frost to come before the first frost', () => {
    expect(issuesOf({ ...SPRINGFIELD, last_frost_date: '2025-10-20', growing_season_days: undefined }))
      .toEqual(['first_frost_date: last_frost_date must be before first_frost_date']);
  });

  it('rejects a growing season that disagrees with the frost dates', () => {
    expect(issuesOf({ ...SPRINGFIELD, growing_season_days: 150 }))
      .toEqual(['growing_season_days: must equal the 153 days between frost dates']);
  });

  it('rejects impossible calendar dates', () => {
    expect(issuesOf({ ...SPRINGFIELD, last_frost_date: '2025-02-30' }))
      .toEqual(['last_frost_date: must be a YYYY-MM-DD calendar date']);
  });

  it('rejects unknown postal codes and climates', () => {
    expect(() => validateLocation({ ...SPRINGFIELD, postal_code: '1234' })).toThrow(ValidationError);
    expect(() => validateLocation({ ...SPRINGFIELD, climate_type: 'alpine' })).toThrow(/Invalid location/);
  });
});

describe('normalizePostalCode', () => {
  it('accepts US ZIP and ZIP+4', () => {
    expect(normalizePostalCode(' 62701 ')).toBe('62701');
    expect(normalizePostalCode('62701-1234')).toBe('62701-1234');
    expect(normalizePostalCode('ABCDE')).toBeNull();
  });
});
