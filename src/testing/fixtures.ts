import type { LocationProfile } from '../location/types.js';
import type { DescribePlantOptions, GenerationClient, InstructionContext } from '../plants/generation.js';
import type { CacheStats, CacheWriteMeta, PersistentCache } from '../plants/cache.js';
import { PersistenceError } from '../errors.js';
import type { PlantRecord } from '../plants/types.js';

/** Springfield, IL: last frost 2025-05-10, first frost 2025-10-10. */
export const SPRINGFIELD: LocationProfile = {
  postal_code: '62701',
  city: 'Springfield',
  region: 'IL',
  usda_zone: '6a',
  last_frost_date: '2025-05-10',
  first_frost_date: '2025-10-10',
  growing_season_days: 153,
  climate_type: 'temperate',
};

export function makeRecord(overrides: Partial<PlantRecord> & { name: string }): PlantRecord {
  return {
    scientific_name: null,
    category: 'vegetable',
    days_to_harvest: 60,
    spacing_inches: 12,
    planting_depth_inches: 0.5,
    sun_requirement: 'full sun',
    water_requirement: 'moderate',
    soil_ph_range: { low: 6, high: 7 },
    companion_plants: [],
    avoid_planting_with: [],
    start_method: null,
    sow_offset_days: null,
    succession_interval_days: null,
    height: null,
    provenance: 'catalog',
    ...overrides,
  };
}

export const TOMATO_ENTRY = {
  name: 'Tomato',
  scientific_name: 'Solanum lycopersicum',
  category: 'fruit',
  days_to_harvest: 75,
  spacing_inches: 24,
  planting_depth_inches: 0.25,
  sun_requirement: 'full sun',
  water_requirement: 'moderate',
  soil_ph_range: { low: 6.2, high: 6.8 },
  companion_plants: ['basil'],
  avoid_planting_with: ['potato'],
  start_method: 'indoor',
  height: 'tall',
};

/** A well-formed generator reply, as a model would send it. */
export function generatedPayload(name: string): Record<string, unknown> {
  return {
    name,
    scientific_name: 'Ocimum basilicum',
    category: 'herb',
    days_to_harvest: 60,
    spacing_inches: 12,
    planting_depth_inches: 0.25,
    sun_requirement: 'full sun',
    water_requirement: 'moderate',
    soil_ph_range: '6.0-7.5',
    companion_plants: ['tomato', 'pepper'],
    avoid_planting_with: [],
    start_method: 'indoor',
    succession_interval_days: null,
    height: 'short',
  };
}

export type DescribeImpl = (name: string, options: DescribePlantOptions) => Promise<unknown>;
export type InstructionsImpl = (record: PlantRecord, context: InstructionContext) => Promise<unknown>;

export class FakeGenerator implements GenerationClient {
  readonly model = 'fake-model';
  readonly describeCalls: string[] = [];
  readonly instructionCalls: string[] = [];

  constructor(
    public describeImpl: DescribeImpl = async name => generatedPayload(name),
    public instructionsImpl: InstructionsImpl = async () => ({}),
  ) {}

  describePlant(name: string, options: DescribePlantOptions): Promise<unknown> {
    this.describeCalls.push(name);
    return this.describeImpl(name, options);
  }

  writeInstructions(record: PlantRecord, _location: LocationProfile, context: InstructionContext): Promise<unknown> {
    this.instructionCalls.push(record.name);
    return this.instructionsImpl(record, context);
  }
}

/** Never settles. */
export function hang<T>(): Promise<T> {
  return new Promise<T>(() => {});
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

/** A cache whose backing store is down. */
export class FailingCache implements PersistentCache {
  async get(name: string): Promise<PlantRecord | null> {
    throw new PersistenceError(`Failed to read cached plant "${name}"`, new Error('disk I/O error'));
  }

  async put(record: PlantRecord, _meta: CacheWriteMeta): Promise<void> {
    throw new PersistenceError(`Failed to cache plant "${record.name}"`, new Error('disk I/O error'));
  }

  async search(): Promise<PlantRecord[]> {
    throw new PersistenceError('Failed to search cached plants', new Error('disk I/O error'));
  }

  async stats(): Promise<CacheStats> {
    throw new PersistenceError('Failed to read plant cache statistics', new Error('disk I/O error'));
  }
}

/** A cache whose reads never come back. */
export class HangingCache implements PersistentCache {
  get(): Promise<PlantRecord | null> {
    return hang();
  }

  async put(): Promise<void> {}

  async search(): Promise<PlantRecord[]> {
    return [];
  }

  async stats(): Promise<CacheStats> {
    return { total: 0, generated: 0, most_used: [] };
  }
}
