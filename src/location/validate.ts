import { z } from 'zod';
import { ValidationError } from '../errors.js';
import { formatIssues } from '../plants/schema.js';
import { daysBetween, isIsoDate } from '../schedule/dates.js';
import { CLIMATE_TYPES, type LocationProfile } from './types.js';

const US_ZIP = /^\d{5}(?:-\d{4})?$/;
const CA_POSTAL = /^([A-Z]\d[A-Z])\s?(\d[A-Z]\d)$/;
const ZONE = /^\d{1,2}[ab]?(?:-\d{1,2}[ab]?)?$/;

export function normalizePostalCode(raw: string): string | null {
  const value = raw.trim().toUpperCase();
  if (US_ZIP.test(value)) return value;
  const ca = CA_POSTAL.exec(value);
  if (ca) return `${ca[1]} ${ca[2]}`;
  return null;
}

const isoDateSchema = z.string().refine(isIsoDate, { message: 'must be a YYYY-MM-DD calendar date' });

export const locationInputSchema = z.object({
  postal_code: z.string().transform((value, ctx) => {
    const normalized = normalizePostalCode(value);
    if (!normalized) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a US ZIP or Canadian postal code' });
      return z.NEVER;
    }
    return normalized;
  }),
  city: z.string().trim().min(1),
  region: z.string().trim().min(1),
  usda_zone: z.string().trim().toLowerCase().regex(ZONE, 'must look like "6b" or "6a-7a"'),
  last_frost_date: isoDateSchema,
  first_frost_date: isoDateSchema,
  growing_season_days: z.number().int().positive().optional(),
  climate_type: z.enum(CLIMATE_TYPES),
}).superRefine((loc, ctx) => {
  if (!isIsoDate(loc.last_frost_date) || !isIsoDate(loc.first_frost_date)) return;
  const season = daysBetween(loc.last_frost_date, loc.first_frost_date);
  if (season <= 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['first_frost_date'],
      message: 'last_frost_date must be before first_frost_date',
    });
    return;
  }
  if (loc.growing_season_days !== undefined && loc.growing_season_days !== season) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['growing_season_days'],
      message: `must equal the ${season} days between frost dates`,
    });
  }
});

/**
 * Checks a location before it is used for planning. The growing season is
 * derived from the frost dates when omitted.
 */
export function validateLocation(input: unknown): LocationProfile {
  const result = locationInputSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Invalid location', formatIssues(result.error));
  }
  const loc = result.data;
  return {
    ...loc,
    growing_season_days: daysBetween(loc.last_frost_date, loc.first_frost_date),
  };
}
