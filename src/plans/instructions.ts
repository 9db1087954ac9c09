import { z } from 'zod';
import type { LocationProfile } from '../location/types.js';
import { displayName, type PlantRecord } from '../plants/types.js';
import { startMethodFor, supportsSuccession } from '../schedule/calculator.js';
import type { ExperienceLevel, GrowingInstructionSet, PlantingSchedule } from './types.js';

const WATERING: Record<PlantRecord['water_requirement'], string> = {
  low: 'Water deeply every 7-10 days and let the top 2 inches of soil dry between waterings',
  moderate: 'Give about 1 inch of water per week, more during hot, dry spells',
  high: 'Keep soil evenly moist with 1.5-2 inches of water per week; do not let it dry out',
};

const SUN_SITING: Record<PlantRecord['sun_requirement'], string> = {
  'full sun': 'at least 6-8 hours of direct sun',
  'partial shade': '3-6 hours of sun, ideally with afternoon shade',
  shade: 'bright shade with under 3 hours of direct sun',
};

const CATEGORY_PESTS: Record<PlantRecord['category'], string> = {
  vegetable: 'aphids, flea beetles and caterpillars',
  fruit: 'fruit flies, birds and fungal leaf spot',
  herb: 'aphids and spider mites',
  flower: 'aphids, thrips and powdery mildew',
  root: 'root maggots, wireworms and carrot rust fly',
  legume: 'bean beetles, aphids and slugs on seedlings',
};

const CATEGORY_STORAGE: Record<PlantRecord['category'], string> = {
  vegetable: 'Refrigerate most harvests within a few hours of picking',
  fruit: 'Store ripe fruit cool and use soon, or freeze for later',
  herb: 'Keep cut stems in water or dry bundles in a dark, airy place',
  flower: 'Cut in the cool of the morning and put stems straight into water',
  root: 'Trim tops and store roots cool and humid, such as a cellar or crisper drawer',
  legume: 'Eat fresh pods quickly or let seeds dry fully on the plant for storage',
};

function experienceNote(level: ExperienceLevel, plant: string): string {
  switch (level) {
    case 'beginner':
      return `Start with two or three ${plant} plants and note what works this season`;
    case 'intermediate':
      return `Keep notes on ${plant} varieties and yields to compare next season`;
    case 'advanced':
      return `Trial a second ${plant} variety side by side to compare performance in your microclimate`;
  }
}

/**
 * Deterministic instructions built from the record's attributes and the
 * location; used on its own or as the fallback for generated instructions.
 */
export function buildTemplateInstructions(
  record: PlantRecord,
  schedule: PlantingSchedule,
  location: LocationProfile,
  experienceLevel: ExperienceLevel,
): GrowingInstructionSet {
  const plant = displayName(record.name);
  const ph = `${record.soil_ph_range.low.toFixed(1)}-${record.soil_ph_range.high.toFixed(1)}`;
  const indoor = startMethodFor(record) === 'indoor';

  const planting = indoor
    ? [
        `Start ${plant} seeds indoors on ${schedule.start_indoors_date}, ${record.planting_depth_inches} inch deep in seed-starting mix`,
        `Harden off seedlings for a week, then transplant on ${schedule.transplant_date}`,
        `Set plants ${record.spacing_inches} inches apart`,
      ]
    : [
        `Sow ${plant} directly on ${schedule.direct_sow_date}, ${record.planting_depth_inches} inch deep`,
        `Thin seedlings to ${record.spacing_inches} inches apart once they have true leaves`,
      ];
  if (supportsSuccession(record)) {
    planting.push(`Sow again every ${record.succession_interval_days} days for a continuous harvest`);
  }

  return {
    plant_name: record.name,
    source: 'template',
    preparation: [
      `Choose a spot with ${SUN_SITING[record.sun_requirement]}`,
      `Adjust soil to pH ${ph} and work in 2-3 inches of compost`,
      `Plan for hardiness zone ${location.usda_zone}: last frost is expected around ${location.last_frost_date}`,
    ],
    planting,
    care: [
      WATERING[record.water_requirement],
      'Mulch with 2-3 inches of organic matter once the soil has warmed',
      experienceNote(experienceLevel, plant),
    ],
    pest_management: [
      `Check ${plant} weekly for ${CATEGORY_PESTS[record.category]}`,
      `Use row covers or hand-picking before reaching for sprays in a ${location.climate_type} climate`,
    ],
    harvest: [
      `Expect the first ${plant} harvest from ${schedule.harvest_start_date}, about ${record.days_to_harvest} days after planting out`,
      `Keep picking through ${schedule.harvest_end_date}; regular harvests encourage more production`,
    ],
    storage: [CATEGORY_STORAGE[record.category]],
  };
}

const stepsSchema = z.array(z.string().trim().min(1)).min(1);

const generatedInstructionsSchema = z.object({
  preparation: stepsSchema,
  planting: stepsSchema,
  care: stepsSchema,
  pest_management: stepsSchema,
  harvest: stepsSchema,
  storage: stepsSchema,
});

/** Returns null when the generated payload is missing any section. */
export function parseGeneratedInstructions(plantName: string, raw: unknown): GrowingInstructionSet | null {
  const result = generatedInstructionsSchema.safeParse(raw);
  if (!result.success) return null;
  return { plant_name: plantName, source: 'generated', ...result.data };
}
