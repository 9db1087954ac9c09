import type { LocationProfile } from '../location/types.js';
import type { PlantingSchedule } from '../plans/types.js';
import type { PlantRecord, StartMethod } from '../plants/types.js';
import { addDays } from './dates.js';

export const INDOOR_START_WEEKS_BEFORE_FROST = 6;
export const TRANSPLANT_WEEKS_AFTER_FROST = 2;
/** Plants maturing at least this slowly get a head start indoors. */
export const INDOOR_START_MIN_DAYS = 70;
export const SUCCESSION_ROUNDS = 3;
export const DEFAULT_HARVEST_SPREAD_DAYS = 30;

export function startMethodFor(record: PlantRecord): StartMethod {
  if (record.start_method) return record.start_method;
  if (record.category === 'root' || record.category === 'legume') return 'direct';
  return record.days_to_harvest >= INDOOR_START_MIN_DAYS ? 'indoor' : 'direct';
}

export function supportsSuccession(record: PlantRecord): boolean {
  return record.succession_interval_days !== null && record.succession_interval_days > 0;
}

export function harvestSpreadDays(record: PlantRecord): number {
  return record.succession_interval_days !== null && record.succession_interval_days > 0
    ? record.succession_interval_days * SUCCESSION_ROUNDS
    : DEFAULT_HARVEST_SPREAD_DAYS;
}

/**
 * Derives planting dates from the last frost date. Pure: the same record and
 * location always give the same schedule. Harvest windows are not clipped to
 * the first frost and may run into the following year.
 */
export function computeSchedule(record: PlantRecord, location: LocationProfile): PlantingSchedule {
  const lastFrost = location.last_frost_date;

  let startIndoors: string | null = null;
  let transplant: string | null = null;
  let directSow: string | null = null;

  if (startMethodFor(record) === 'indoor') {
    startIndoors = addDays(lastFrost, -INDOOR_START_WEEKS_BEFORE_FROST * 7);
    transplant = addDays(lastFrost, TRANSPLANT_WEEKS_AFTER_FROST * 7);
  } else {
    directSow = addDays(lastFrost, record.sow_offset_days ?? 0);
  }

  const reference = transplant ?? directSow ?? lastFrost;
  const harvestStart = addDays(reference, record.days_to_harvest);

  return {
    plant_name: record.name,
    start_indoors_date: startIndoors,
    direct_sow_date: directSow,
    transplant_date: transplant,
    harvest_start_date: harvestStart,
    harvest_end_date: addDays(harvestStart, harvestSpreadDays(record)),
    succession_interval_days: supportsSuccession(record) ? record.succession_interval_days : null,
  };
}

/** The date harvest timing counts from: transplant when started indoors, else sowing. */
export function plantingReferenceDate(schedule: PlantingSchedule): string | null {
  return schedule.transplant_date ?? schedule.direct_sow_date;
}
