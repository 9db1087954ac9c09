import type { Db } from '../db/connection.js';
import { PersistenceError } from '../errors.js';
import type { GardenPlan } from './types.js';

/** Insert-only store of immutable plan documents keyed by plan id. */
export interface PlanStore {
  save(plan: GardenPlan): Promise<void>;
  get(id: string): Promise<GardenPlan | null>;
}

interface GardenPlanRow {
  id: string;
  created_at: string;
  postal_code: string;
  document: string;
}

export class SqlitePlanStore implements PlanStore {
  constructor(private readonly db: Db) {}

  async save(plan: GardenPlan): Promise<void> {
    try {
      this.db.prepare(
        'INSERT INTO garden_plan (id, created_at, postal_code, document) VALUES (?, ?, ?, ?)'
      ).run(plan.id, plan.created_at, plan.location.postal_code, JSON.stringify(plan));
    } catch (err) {
      throw new PersistenceError(`Failed to save garden plan ${plan.id}`, err);
    }
  }

  async get(id: string): Promise<GardenPlan | null> {
    let row: GardenPlanRow | undefined;
    try {
      row = this.db.prepare('SELECT * FROM garden_plan WHERE id = ?').get(id) as GardenPlanRow | undefined;
    } catch (err) {
      throw new PersistenceError(`Failed to read garden plan ${id}`, err);
    }
    if (!row) return null;
    const plan: GardenPlan = JSON.parse(row.document);
    return plan;
  }
}
