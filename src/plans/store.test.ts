import { beforeEach, describe, expect, it } from 'vitest';
import { openDatabase } from '../db/connection.js';
import { runMigrations } from '../db/migrate.js';
import { PersistenceError } from '../errors.js';
import { SPRINGFIELD } from '../testing/fixtures.js';
import { SqlitePlanStore } from './store.js';
import type { GardenPlan } from './types.js';

const plan: GardenPlan = {
  id: 'plan-1',
  created_at: '2025-01-15T12:00:00.000Z',
  location: SPRINGFIELD,
  garden_size: 'medium',
  experience_level: 'beginner',
  include_generated: true,
  requested_plants: ['okra'],
  plant_names: [],
  plants: [],
  schedules: [],
  instructions: [],
  layout: {
    garden_dimensions: 'About 10 x 12 ft',
    groupings: [],
    spacing_guide: {},
    companion_notes: [],
    layout_tips: [],
  },
  general_tips: [],
};

describe('SqlitePlanStore', () => {
  let store: SqlitePlanStore;

  beforeEach(() => {
    const db = openDatabase(':memory:');
    runMigrations(db);
    store = new SqlitePlanStore(db);
  });

  it('returns saved plans by id', async () => {
    await store.save(plan);
    expect(await store.get('plan-1')).toEqual(plan);
    expect(await store.get('plan-2')).toBeNull();
  });

  it('never overwrites a stored plan', async () => {
    await store.save(plan);
    await expect(store.save({ ...plan, general_tips: ['changed'] })).rejects.toThrow(PersistenceError);
    expect((await store.get('plan-1'))?.general_tips).toEqual([]);
  });
});
