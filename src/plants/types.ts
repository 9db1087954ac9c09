export const PLANT_CATEGORIES = ['vegetable', 'fruit', 'herb', 'flower', 'root', 'legume'] as const;
export type PlantCategory = typeof PLANT_CATEGORIES[number];

export const SUN_REQUIREMENTS = ['full sun', 'partial shade', 'shade'] as const;
export type SunRequirement = typeof SUN_REQUIREMENTS[number];

export const WATER_REQUIREMENTS = ['low', 'moderate', 'high'] as const;
export type WaterRequirement = typeof WATER_REQUIREMENTS[number];

export type StartMethod = 'indoor' | 'direct';
export type PlantHeight = 'short' | 'medium' | 'tall';

export type Provenance = 'catalog' | 'cache' | 'generated';

export interface SoilPhRange {
  low: number;
  high: number;
}

export interface PlantRecord {
  name: string;
  scientific_name: string | null;
  category: PlantCategory;
  days_to_harvest: number;
  spacing_inches: number;
  planting_depth_inches: number;
  sun_requirement: SunRequirement;
  water_requirement: WaterRequirement;
  soil_ph_range: SoilPhRange;
  companion_plants: string[];
  avoid_planting_with: string[];
  start_method: StartMethod | null;
  sow_offset_days: number | null;
  succession_interval_days: number | null;
  height: PlantHeight | null;
  provenance: Provenance;
}

export type AbsentReason =
  | 'not_found'
  | 'generation_disabled'
  | 'timeout'
  | 'malformed'
  | 'generation_error'
  | 'unavailable';

/** Outcome of a tiered lookup; the tag names the tier that answered. */
export type ResolveOutcome =
  | { kind: 'catalog'; record: PlantRecord }
  | { kind: 'cached'; record: PlantRecord }
  | { kind: 'generated'; record: PlantRecord }
  | { kind: 'absent'; name: string; reason: AbsentReason };

export type ResolvedOutcome = Exclude<ResolveOutcome, { kind: 'absent' }>;

export function isResolved(outcome: ResolveOutcome): outcome is ResolvedOutcome {
  return outcome.kind !== 'absent';
}

export function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

export function displayName(name: string): string {
  return name.replace(/\b\p{L}/gu, ch => ch.toUpperCase());
}

/** Lowercases, trims and de-duplicates a name list, keeping first occurrences. */
export function normalizeNameList(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const name of names) {
    const key = normalizeName(name);
    if (key === '' || seen.has(key)) continue;
    seen.add(key);
    result.push(key);
  }
  return result;
}
