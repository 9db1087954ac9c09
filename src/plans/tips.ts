import type { ClimateType, LocationProfile } from '../location/types.js';
import { displayName, type PlantRecord } from '../plants/types.js';
import { yearOf } from '../schedule/dates.js';
import type { ExperienceLevel, PlantingSchedule } from './types.js';

const CLIMATE_TIPS: Record<ClimateType, string> = {
  arctic: 'Use cold frames and row covers to stretch a very short season',
  cold: 'Warm beds with black plastic for two weeks before planting out',
  temperate: 'Plan a second round of cool-season crops for late summer sowing',
  warm: 'Give heat-sensitive crops afternoon shade during the hottest weeks',
  subtropical: 'Grow cool-season crops through the mild winter months',
  tropical: 'Plant on raised mounds so heavy rains drain away from roots',
  arid: 'Use drip irrigation and thick mulch to cut water loss',
};

const EXPERIENCE_TIPS: Record<ExperienceLevel, string[]> = {
  beginner: [
    'Start with a soil test to understand your garden\'s needs',
    'Water deeply but less frequently to encourage strong root growth',
  ],
  intermediate: [
    'Rotate plant families between beds each year to limit soil-borne disease',
  ],
  advanced: [
    'Keep a garden journal of sowing dates and yields to fine-tune timing for your site',
  ],
};

export interface PlantTipInput {
  record: PlantRecord;
  schedule: PlantingSchedule;
}

function plantTips({ record, schedule }: PlantTipInput, location: LocationProfile): string[] {
  const plant = displayName(record.name);
  const tips: string[] = [];

  if (schedule.start_indoors_date) {
    tips.push(`Start ${plant} indoors on ${schedule.start_indoors_date}, six weeks before your last frost`);
  }
  if (schedule.succession_interval_days) {
    tips.push(`Sow ${plant} every ${schedule.succession_interval_days} days for a steady harvest`);
  }
  if (record.days_to_harvest > location.growing_season_days) {
    tips.push(
      `${plant} needs about ${record.days_to_harvest} days to mature but your frost-free season is ` +
      `${location.growing_season_days} days; choose early varieties or protect plants in autumn`,
    );
  }
  const endYear = yearOf(schedule.harvest_end_date);
  if (endYear > yearOf(location.last_frost_date)) {
    tips.push(`${plant} harvest runs into ${endYear}; plan winter protection or treat it as a multi-season crop`);
  }
  return tips;
}

/**
 * Short advisory strings for the plan, de-duplicated by exact text and kept
 * in first-seen order: per-plant tips, then location, then experience level.
 */
export function buildGeneralTips(
  plants: PlantTipInput[],
  location: LocationProfile,
  experienceLevel: ExperienceLevel,
): string[] {
  const tips = [
    ...plants.flatMap(p => plantTips(p, location)),
    `Consider your hardiness zone (${location.usda_zone}) when choosing varieties`,
    CLIMATE_TIPS[location.climate_type],
    ...EXPERIENCE_TIPS[experienceLevel],
  ];
  return [...new Set(tips)];
}
