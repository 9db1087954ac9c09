import type { Db } from '../db/connection.js';
import { PersistenceError } from '../errors.js';
import { coerceCategory, coerceSun, coerceWater } from './schema.js';
import { normalizeName, type PlantHeight, type PlantRecord, type StartMethod } from './types.js';

export interface CacheWriteMeta {
  /** Where the record came from originally. */
  source: 'generated' | 'cache';
  /** Generator model name, when the record was generated. */
  model?: string | null;
}

export interface CacheStats {
  total: number;
  generated: number;
  most_used: Array<{ name: string; usage_count: number }>;
}

/**
 * Durable store of previously resolved records keyed by normalized name.
 * Entries never expire; writes are last-writer-wins upserts.
 */
export interface PersistentCache {
  get(name: string): Promise<PlantRecord | null>;
  put(record: PlantRecord, meta: CacheWriteMeta): Promise<void>;
  search(fragment: string, limit: number): Promise<PlantRecord[]>;
  stats(): Promise<CacheStats>;
}

interface PlantCacheRow {
  name: string;
  scientific_name: string | null;
  category: string;
  days_to_harvest: number;
  spacing_inches: number;
  planting_depth_inches: number;
  sun_requirement: string;
  water_requirement: string;
  soil_ph_low: number;
  soil_ph_high: number;
  companion_plants: string;
  avoid_planting_with: string;
  start_method: string | null;
  sow_offset_days: number | null;
  succession_interval_days: number | null;
  height: string | null;
  source: string;
  model: string | null;
  usage_count: number;
  created_at: string;
  updated_at: string;
}

function parseNameList(json: string): string[] {
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === 'string') : [];
}

function parseStartMethod(value: string | null): StartMethod | null {
  return value === 'indoor' || value === 'direct' ? value : null;
}

function parseHeight(value: string | null): PlantHeight | null {
  return value === 'short' || value === 'medium' || value === 'tall' ? value : null;
}

function deserialize(row: PlantCacheRow): PlantRecord {
  return {
    name: row.name,
    scientific_name: row.scientific_name,
    category: coerceCategory(row.category),
    days_to_harvest: row.days_to_harvest,
    spacing_inches: row.spacing_inches,
    planting_depth_inches: row.planting_depth_inches,
    sun_requirement: coerceSun(row.sun_requirement) ?? 'full sun',
    water_requirement: coerceWater(row.water_requirement) ?? 'moderate',
    soil_ph_range: { low: row.soil_ph_low, high: row.soil_ph_high },
    companion_plants: parseNameList(row.companion_plants),
    avoid_planting_with: parseNameList(row.avoid_planting_with),
    start_method: parseStartMethod(row.start_method),
    sow_offset_days: row.sow_offset_days,
    succession_interval_days: row.succession_interval_days,
    height: parseHeight(row.height),
    provenance: 'cache',
  };
}

function escapeLike(fragment: string): string {
  return fragment.replace(/[\\%_]/g, ch => `\\${ch}`);
}

export class SqlitePlantCache implements PersistentCache {
  constructor(private readonly db: Db) {}

  async get(name: string): Promise<PlantRecord | null> {
    const key = normalizeName(name);
    try {
      const row = this.db.prepare('SELECT * FROM plant_cache WHERE name = ?').get(key) as PlantCacheRow | undefined;
      if (!row) return null;
      this.db.prepare('UPDATE plant_cache SET usage_count = usage_count + 1 WHERE name = ?').run(key);
      return deserialize(row);
    } catch (err) {
      throw new PersistenceError(`Failed to read cached plant "${key}"`, err);
    }
  }

  async put(record: PlantRecord, meta: CacheWriteMeta): Promise<void> {
    const key = normalizeName(record.name);
    try {
      this.db.prepare(`
        INSERT INTO plant_cache (
          name, scientific_name, category, days_to_harvest, spacing_inches, planting_depth_inches,
          sun_requirement, water_requirement, soil_ph_low, soil_ph_high, companion_plants,
          avoid_planting_with, start_method, sow_offset_days, succession_interval_days, height,
          source, model, usage_count
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 1)
        ON CONFLICT(name) DO UPDATE SET
          scientific_name = excluded.scientific_name,
          category = excluded.category,
          days_to_harvest = excluded.days_to_harvest,
          spacing_inches = excluded.spacing_inches,
          planting_depth_inches = excluded.planting_depth_inches,
          sun_requirement = excluded.sun_requirement,
          water_requirement = excluded.water_requirement,
          soil_ph_low = excluded.soil_ph_low,
          soil_ph_high = excluded.soil_ph_high,
          companion_plants = excluded.companion_plants,
          avoid_planting_with = excluded.avoid_planting_with,
          start_method = excluded.start_method,
          sow_offset_days = excluded.sow_offset_days,
          succession_interval_days = excluded.succession_interval_days,
          height = excluded.height,
          source = excluded.source,
          model = excluded.model,
          updated_at = datetime('now')
      `).run(
        key,
        record.scientific_name,
        record.category,
        record.days_to_harvest,
        record.spacing_inches,
        record.planting_depth_inches,
        record.sun_requirement,
        record.water_requirement,
        record.soil_ph_range.low,
        record.soil_ph_range.high,
        JSON.stringify(record.companion_plants),
        JSON.stringify(record.avoid_planting_with),
        record.start_method,
        record.sow_offset_days,
        record.succession_interval_days,
        record.height,
        meta.source,
        meta.model ?? null,
      );
    } catch (err) {
      throw new PersistenceError(`Failed to cache plant "${key}"`, err);
    }
  }

  async search(fragment: string, limit: number): Promise<PlantRecord[]> {
    const key = normalizeName(fragment);
    if (key === '') return [];
    try {
      const escaped = escapeLike(key);
      // Exact, then prefix, then substring matches, so a limit never drops a closer match
      const rows = this.db.prepare(`
        SELECT * FROM plant_cache
        WHERE name LIKE ? ESCAPE '\\'
        ORDER BY name = ? DESC, name LIKE ? ESCAPE '\\' DESC, usage_count DESC, name
        LIMIT ?
      `).all(`%${escaped}%`, key, `${escaped}%`, limit) as PlantCacheRow[];
      return rows.map(deserialize);
    } catch (err) {
      throw new PersistenceError(`Failed to search cached plants for "${key}"`, err);
    }
  }

  async stats(): Promise<CacheStats> {
    try {
      const counts = this.db.prepare(
        "SELECT COUNT(*) AS total, COALESCE(SUM(CASE WHEN source = 'generated' THEN 1 ELSE 0 END), 0) AS generated FROM plant_cache"
      ).get() as { total: number; generated: number };
      const mostUsed = this.db.prepare(
        'SELECT name, usage_count FROM plant_cache ORDER BY usage_count DESC, name LIMIT 5'
      ).all() as Array<{ name: string; usage_count: number }>;
      return { total: counts.total, generated: counts.generated, most_used: mostUsed };
    } catch (err) {
      throw new PersistenceError('Failed to read plant cache statistics', err);
    }
  }
}
