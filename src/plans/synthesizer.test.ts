import { beforeEach, describe, expect, it, vi } from 'vitest';
import { openDatabase } from '../db/connection.js';
import { runMigrations } from '../db/migrate.js';
import { GenerationFailedError, PlanNotFoundError, ValidationError } from '../errors.js';
import { SqlitePlantCache } from '../plants/cache.js';
import { parseCatalog, type CatalogStore } from '../plants/catalog.js';
import type { PersistentCache } from '../plants/cache.js';
import { PlantResolver } from '../plants/resolver.js';
import {
  FailingCache,
  FakeGenerator,
  generatedPayload,
  hang,
  HangingCache,
  SPRINGFIELD,
  TOMATO_ENTRY,
} from '../testing/fixtures.js';
import { SqlitePlanStore } from './store.js';
import { PlanSynthesizer, type PlanSynthesizerOptions } from './synthesizer.js';

const LETTUCE_ENTRY = {
  ...TOMATO_ENTRY,
  name: 'Lettuce',
  category: 'vegetable',
  days_to_harvest: 45,
  spacing_inches: 8,
  sun_requirement: 'partial shade',
  companion_plants: [],
  avoid_planting_with: [],
  start_method: 'direct',
  sow_offset_days: -14,
  succession_interval_days: 14,
  height: 'short',
};

describe('PlanSynthesizer', () => {
  let catalog: CatalogStore;
  let cache: SqlitePlantCache;
  let store: SqlitePlanStore;
  let generator: FakeGenerator;
  let ids: string[];

  beforeEach(() => {
    const db = openDatabase(':memory:');
    runMigrations(db);
    catalog = parseCatalog([TOMATO_ENTRY, LETTUCE_ENTRY]);
    cache = new SqlitePlantCache(db);
    store = new SqlitePlanStore(db);
    generator = new FakeGenerator();
    ids = ['plan-1', 'plan-2', 'plan-3'];
  });

  function build(overrides: Partial<PlanSynthesizerOptions> = {}, planCache: PersistentCache = cache) {
    const resolver = new PlantResolver({ catalog, cache: planCache, generator, generationTimeoutMs: 20 });
    const synthesizer = new PlanSynthesizer({
      resolver,
      store,
      maxPlants: 3,
      generationTimeoutMs: 20,
      deadlineMultiplier: 3,
      now: () => new Date('2025-01-15T12:00:00.000Z'),
      newId: () => ids.shift() ?? 'plan-x',
      ...overrides,
    });
    return { resolver, synthesizer };
  }

  it('builds, freezes and stores a plan from catalog plants', async () => {
    const { synthesizer } = build();
    const result = await synthesizer.synthesize(SPRINGFIELD, ['Tomato', 'Lettuce']);

    expect(result.requested).toEqual(['tomato', 'lettuce']);
    expect(result.resolved).toEqual(['tomato', 'lettuce']);
    expect(result.unresolved).toEqual([]);

    const { plan } = result;
    expect(plan.id).toBe('plan-1');
    expect(plan.created_at).toBe('2025-01-15T12:00:00.000Z');
    expect(plan.garden_size).toBe('medium');
    expect(plan.experience_level).toBe('beginner');
    expect(plan.schedules.map(s => s.plant_name)).toEqual(['tomato', 'lettuce']);
    expect(plan.schedules[0].transplant_date).toBe('2025-05-24');
    expect(plan.schedules[1].direct_sow_date).toBe('2025-04-26');
    expect(plan.instructions.map(i => i.source)).toEqual(['template', 'template']);
    expect(plan.layout.groupings.map(g => g.name)).toEqual(['Full Sun Bed', 'Partial Shade Bed']);

    expect(Object.isFrozen(plan)).toBe(true);
    expect(Object.isFrozen(plan.plants[0])).toBe(true);
    expect(plan.plants[0]).not.toBe(catalog.get('tomato'));
    expect(await synthesizer.getPlan('plan-1')).toEqual(plan);
  });

  it('collapses duplicate names before resolving', async () => {
    const { resolver, synthesizer } = build();
    const resolve = vi.spyOn(resolver, 'resolve');

    const result = await synthesizer.synthesize(SPRINGFIELD, ['Tomato', 'tomato', ' TOMATO ']);

    expect(result.plan.plant_names).toEqual(['tomato']);
    expect(result.plan.schedules).toHaveLength(1);
    expect(resolve).toHaveBeenCalledTimes(1);
  });

  it('rejects oversized and empty requests before any lookup', async () => {
    const { resolver, synthesizer } = build();
    const resolve = vi.spyOn(resolver, 'resolve');

    await expect(synthesizer.synthesize(SPRINGFIELD, ['tomato', 'lettuce', 'okra', 'kale']))
      .rejects.toThrow('Maximum 3 plants allowed per garden plan: received 4 distinct plants');
    await expect(synthesizer.synthesize(SPRINGFIELD, [' ', ''])).rejects.toThrow(ValidationError);
    await expect(synthesizer.synthesize({ ...SPRINGFIELD, usda_zone: 'zone six' }, ['tomato']))
      .rejects.toThrow(ValidationError);
    expect(resolve).not.toHaveBeenCalled();
  });

  it('leaves out a plant whose generation times out', async () => {
    generator.describeImpl = () => hang();
    const { synthesizer } = build();

    const result = await synthesizer.synthesize(SPRINGFIELD, ['Tomato', 'Basil', 'Lettuce']);

    expect(result.resolved).toEqual(['tomato', 'lettuce']);
    expect(result.unresolved).toEqual(['basil']);
    expect(result.plan.requested_plants).toEqual(['tomato', 'basil', 'lettuce']);
    expect(result.plan.plants.map(p => p.name)).toEqual(['tomato', 'lettuce']);
    expect(result.plan.schedules.map(s => s.plant_name)).toEqual(['tomato', 'lettuce']);
  });

  it('includes generated plants when allowed and skips them otherwise', async () => {
    const { synthesizer } = build();

    const withoutGeneration = await synthesizer.synthesize(SPRINGFIELD, ['tomato', 'basil'], { includeGenerated: false });
    expect(withoutGeneration.unresolved).toEqual(['basil']);
    expect(generator.describeCalls).toEqual([]);

    const withGeneration = await synthesizer.synthesize(SPRINGFIELD, ['tomato', 'basil']);
    expect(withGeneration.resolved).toEqual(['tomato', 'basil']);
    expect(withGeneration.plan.plants[1].provenance).toBe('generated');
  });

  it('fails when nothing resolves', async () => {
    generator.describeImpl = async () => null;
    const { synthesizer } = build();

    await expect(synthesizer.synthesize(SPRINGFIELD, ['snozzberry'])).rejects.toThrow(GenerationFailedError);
    await expect(synthesizer.synthesize(SPRINGFIELD, ['okra'], { includeGenerated: false }))
      .rejects.toThrow('No plant information could be retrieved for: okra');
    expect(ids).toEqual(['plan-1', 'plan-2', 'plan-3']);
  });

  it('gives up on slow lookups at the overall deadline', async () => {
    const { synthesizer } = build({}, new HangingCache());

    const result = await synthesizer.synthesize(SPRINGFIELD, ['tomato', 'okra']);

    expect(result.resolved).toEqual(['tomato']);
    expect(result.unresolved).toEqual(['okra']);
  });

  it('treats an unavailable cache as a per-plant miss', async () => {
    const { synthesizer } = build({}, new FailingCache());

    const result = await synthesizer.synthesize(SPRINGFIELD, ['okra', 'tomato']);

    expect(result.resolved).toEqual(['tomato']);
    expect(result.unresolved).toEqual(['okra']);
  });

  it('uses generated instructions when complete and templates otherwise', async () => {
    generator.instructionsImpl = async record => record.name === 'tomato'
      ? {
          preparation: ['Add compost'],
          planting: ['Plant deep'],
          care: ['Stake early'],
          pest_management: ['Watch for hornworms'],
          harvest: ['Pick when red'],
          storage: ['Keep on the counter'],
        }
      : { preparation: ['Loosen soil'] };
    const { synthesizer } = build({ instructionWriter: generator });

    const { plan } = await synthesizer.synthesize(SPRINGFIELD, ['tomato', 'lettuce'], {
      gardenSize: 'small',
      experienceLevel: 'advanced',
    });

    expect(plan.instructions.map(i => [i.plant_name, i.source])).toEqual([
      ['tomato', 'generated'],
      ['lettuce', 'template'],
    ]);
    expect(plan.instructions[0].care).toEqual(['Stake early']);
    expect(generator.instructionCalls).toEqual(['tomato', 'lettuce']);
  });

  it('regenerates under a new id and keeps the original', async () => {
    generator.describeImpl = async name => generatedPayload(name);
    const { synthesizer } = build();
    const first = await synthesizer.synthesize(SPRINGFIELD, ['tomato', 'okra'], { gardenSize: 'large' });

    const second = await synthesizer.regenerate('plan-1');

    expect(second.plan.id).toBe('plan-2');
    expect(second.plan.requested_plants).toEqual(['tomato', 'okra']);
    expect(second.plan.garden_size).toBe('large');
    expect(second.plan.plants[1].provenance).toBe('cache');
    expect(await synthesizer.getPlan('plan-1')).toEqual(first.plan);
  });

  it('regenerates without generation when the original plan had it off', async () => {
    const { synthesizer } = build();
    const first = await synthesizer.synthesize(SPRINGFIELD, ['tomato', 'okra'], { includeGenerated: false });
    expect(first.plan.include_generated).toBe(false);

    const second = await synthesizer.regenerate(first.plan.id);

    expect(second.plan.include_generated).toBe(false);
    expect(second.unresolved).toEqual(['okra']);
    expect(generator.describeCalls).toEqual([]);

    const widened = await synthesizer.regenerate(first.plan.id, { includeGenerated: true });
    expect(widened.resolved).toEqual(['tomato', 'okra']);
  });

  it('leaves out a generated plant with an implausible maturity time', async () => {
    generator.describeImpl = async name => ({ ...generatedPayload(name), days_to_harvest: 1e9 });
    const { synthesizer } = build();

    const result = await synthesizer.synthesize(SPRINGFIELD, ['tomato', 'okra']);

    expect(result.resolved).toEqual(['tomato']);
    expect(result.unresolved).toEqual(['okra']);
    expect(await cache.get('okra')).toBeNull();
  });

  it('checks a request without generating or storing anything', async () => {
    const { synthesizer } = build();
    const shortSeason = { ...SPRINGFIELD, first_frost_date: '2025-08-28', growing_season_days: 110 };

    const check = await synthesizer.checkRequest(shortSeason, ['Tomato', 'okra']);

    expect(check.valid).toBe(true);
    expect(check.location.growing_season_days).toBe(110);
    expect(check.available_plants).toEqual(['tomato']);
    expect(check.unavailable_plants).toEqual([{ name: 'okra', reason: 'generation_disabled' }]);
    expect(check.warnings).toEqual([
      'Short growing season (110 days): consider cold-hardy varieties',
      'Plant data will be generated for: okra',
    ]);
    expect(check.suggestions).toEqual([]);
    expect(generator.describeCalls).toEqual([]);
    expect(await store.get('plan-1')).toBeNull();
  });

  it('suggests a smaller selection for large or beginner requests', async () => {
    const { synthesizer } = build({ maxPlants: 12 });
    const names = Array.from({ length: 11 }, (_, i) => `plant ${i}`);

    const beginner = await synthesizer.checkRequest(SPRINGFIELD, names, { includeGenerated: false });
    expect(beginner.valid).toBe(false);
    expect(beginner.warnings).toEqual([]);
    expect(beginner.suggestions).toEqual([
      'Large plant selection: consider garden size and maintenance requirements',
      'Consider starting with fewer plants for your first garden',
    ]);

    const advanced = await synthesizer.checkRequest(SPRINGFIELD, names.slice(0, 6), {
      includeGenerated: false,
      experienceLevel: 'advanced',
    });
    expect(advanced.suggestions).toEqual([]);
  });

  it('rejects an empty request when checking', async () => {
    const { synthesizer } = build();
    await expect(synthesizer.checkRequest(SPRINGFIELD, ['  '])).rejects.toBeInstanceOf(ValidationError);
  });

  it('reports unknown plan ids', async () => {
    const { synthesizer } = build();
    await expect(synthesizer.getPlan('missing')).rejects.toThrow(PlanNotFoundError);
    await expect(synthesizer.regenerate('missing')).rejects.toThrow('Garden plan not found: missing');
  });
});
