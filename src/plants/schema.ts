import { z } from 'zod';
import { GenerationMalformedError } from '../errors.js';
import {
  PLANT_CATEGORIES,
  SUN_REQUIREMENTS,
  WATER_REQUIREMENTS,
  normalizeName,
  normalizeNameList,
  type PlantCategory,
  type PlantRecord,
  type SunRequirement,
  type WaterRequirement,
} from './types.js';

/** Upper bounds that keep schedule dates within a few years of the frost dates. */
export const MAX_DAYS_TO_HARVEST = 3650;
export const MAX_SOW_OFFSET_DAYS = 365;
export const MAX_SUCCESSION_INTERVAL_DAYS = 365;

const START_METHODS = ['indoor', 'direct'] as const;
const PLANT_HEIGHTS = ['short', 'medium', 'tall'] as const;

const phRangeSchema = z.object({
  low: z.number().positive().max(14),
  high: z.number().positive().max(14),
}).refine(range => range.low <= range.high, { message: 'soil pH low must not exceed high' });

const nameListSchema = z.array(z.string()).default([]).transform(normalizeNameList);

/** A curated catalog entry; strict, since the dataset is under our control. */
export const catalogEntrySchema = z.object({
  name: z.string().trim().min(1),
  scientific_name: z.string().nullable().default(null),
  category: z.enum(PLANT_CATEGORIES),
  days_to_harvest: z.number().int().positive().max(MAX_DAYS_TO_HARVEST),
  spacing_inches: z.number().positive(),
  planting_depth_inches: z.number().positive(),
  sun_requirement: z.enum(SUN_REQUIREMENTS),
  water_requirement: z.enum(WATER_REQUIREMENTS),
  soil_ph_range: phRangeSchema,
  companion_plants: nameListSchema,
  avoid_planting_with: nameListSchema,
  start_method: z.enum(START_METHODS).nullable().default(null),
  sow_offset_days: z.number().int().min(-MAX_SOW_OFFSET_DAYS).max(MAX_SOW_OFFSET_DAYS).nullable().default(null),
  succession_interval_days: z.number().int().positive().max(MAX_SUCCESSION_INTERVAL_DAYS).nullable().default(null),
  height: z.enum(PLANT_HEIGHTS).nullable().default(null),
});

export type CatalogEntry = z.infer<typeof catalogEntrySchema>;

function lowerString(value: unknown): unknown {
  return typeof value === 'string' ? value.trim().toLowerCase() : value;
}

function toNumber(value: unknown): unknown {
  if (typeof value === 'string') return parseFloat(value);
  return value;
}

export function coerceCategory(value: unknown): PlantCategory {
  const raw = lowerString(value);
  if (typeof raw !== 'string') return 'vegetable';
  const singular = raw.endsWith('s') ? raw.slice(0, -1) : raw;
  const match = PLANT_CATEGORIES.find(c => c === raw || c === singular);
  if (match) return match;
  if (raw.includes('root') || raw.includes('tuber')) return 'root';
  if (raw.includes('bean') || raw.includes('pea') || raw.includes('legume')) return 'legume';
  return 'vegetable';
}

export function coerceSun(value: unknown): SunRequirement | undefined {
  const raw = lowerString(value);
  if (typeof raw !== 'string') return undefined;
  if (raw.includes('full')) return 'full sun';
  if (raw.includes('part')) return 'partial shade';
  if (raw.includes('shade')) return 'shade';
  if (raw === 'sun') return 'full sun';
  return undefined;
}

export function coerceWater(value: unknown): WaterRequirement | undefined {
  const raw = lowerString(value);
  if (typeof raw !== 'string') return undefined;
  if (raw.includes('low') || raw.includes('drought') || raw.includes('minimal')) return 'low';
  if (raw.includes('high') || raw.includes('heavy') || raw.includes('frequent')) return 'high';
  if (raw.includes('moderate') || raw.includes('medium') || raw.includes('average') || raw.includes('regular')) {
    return 'moderate';
  }
  return undefined;
}

export function coercePhRange(value: unknown): unknown {
  if (typeof value === 'string') {
    const numbers = value.match(/\d+(?:\.\d+)?/g);
    if (!numbers) return value;
    if (numbers.length === 1) {
      const single = parseFloat(numbers[0]);
      return { low: single, high: single };
    }
    return { low: parseFloat(numbers[0]), high: parseFloat(numbers[1]) };
  }
  if (Array.isArray(value) && value.length === 2) {
    return { low: toNumber(value[0]), high: toNumber(value[1]) };
  }
  if (value !== null && typeof value === 'object') {
    const range = Object.fromEntries(Object.entries(value));
    return { low: toNumber(range.low ?? range.min), high: toNumber(range.high ?? range.max) };
  }
  return value;
}

function coerceNameList(value: unknown): unknown {
  if (value === null || value === undefined) return [];
  if (typeof value === 'string') return value.split(',');
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === 'string');
  return value;
}

function nullableString(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed === '' || trimmed.toLowerCase() === 'null' ? null : trimmed;
}

const positiveNumber = z.preprocess(toNumber, z.number().finite().positive());

/** Generated payloads are semi-structured; coerce what can be coerced, reject the rest. */
const generatedPlantSchema = z.object({
  scientific_name: z.unknown().transform(nullableString),
  category: z.unknown().transform(coerceCategory),
  days_to_harvest: positiveNumber
    .transform(n => Math.max(1, Math.round(n)))
    .pipe(z.number().max(MAX_DAYS_TO_HARVEST)),
  spacing_inches: positiveNumber,
  planting_depth_inches: positiveNumber,
  sun_requirement: z.preprocess(coerceSun, z.enum(SUN_REQUIREMENTS)),
  water_requirement: z.preprocess(coerceWater, z.enum(WATER_REQUIREMENTS)),
  soil_ph_range: z.preprocess(coercePhRange, phRangeSchema),
  companion_plants: z.preprocess(coerceNameList, nameListSchema),
  avoid_planting_with: z.preprocess(coerceNameList, nameListSchema),
  start_method: z.preprocess(lowerString, z.enum(START_METHODS)).nullable().catch(null),
  sow_offset_days: z.preprocess(toNumber, z.number().int().min(-MAX_SOW_OFFSET_DAYS).max(MAX_SOW_OFFSET_DAYS))
    .nullable()
    .catch(null),
  succession_interval_days: z.preprocess(toNumber, z.number().int().positive().max(MAX_SUCCESSION_INTERVAL_DAYS))
    .nullable()
    .catch(null),
  height: z.preprocess(lowerString, z.enum(PLANT_HEIGHTS)).nullable().catch(null),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || 'value'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validates a generator payload and turns it into a record whose identity is
 * the requested name, whatever name the generator echoed back.
 */
export function parseGeneratedRecord(requestedName: string, raw: unknown): PlantRecord {
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new GenerationMalformedError('expected a JSON object');
  }
  const result = generatedPlantSchema.safeParse(raw);
  if (!result.success) {
    throw new GenerationMalformedError(describeIssues(result.error));
  }
  return {
    name: normalizeName(requestedName),
    ...result.data,
    provenance: 'generated',
  };
}

export function catalogEntryToRecord(entry: CatalogEntry): PlantRecord {
  return {
    ...entry,
    name: normalizeName(entry.name),
    provenance: 'catalog',
  };
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || 'value'}: ${issue.message}`);
}
