import type { IsoDate } from '../schedule/dates.js';

export const CLIMATE_TYPES = ['arctic', 'cold', 'temperate', 'warm', 'subtropical', 'tropical', 'arid'] as const;
export type ClimateType = typeof CLIMATE_TYPES[number];

/** Resolved climate and frost data for a garden's location. */
export interface LocationProfile {
  postal_code: string;
  city: string;
  region: string;
  /** Hardiness zone or range, e.g. "6b" or "6a-7a". */
  usda_zone: string;
  last_frost_date: IsoDate;
  first_frost_date: IsoDate;
  growing_season_days: number;
  climate_type: ClimateType;
}


/**
 * Geocoding and frost-date lookup. Provided by the surrounding application;
 * implementations resolve a postal code or return null when it is unknown.
 */
export interface LocationProvider {
  lookup(postalCode: string): Promise<LocationProfile | null>;
}
