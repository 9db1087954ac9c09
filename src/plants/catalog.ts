import fs from 'node:fs';
import { z } from 'zod';
import { ValidationError } from '../errors.js';
import { deepFreeze } from '../utils/freeze.js';
import { catalogEntrySchema, catalogEntryToRecord, formatIssues } from './schema.js';
import { normalizeName, type PlantCategory, type PlantRecord } from './types.js';

/**
 * Read-only, in-memory curated dataset. Lookups never suspend.
 */
export class CatalogStore {
  private readonly records = new Map<string, PlantRecord>();

  constructor(records: Iterable<PlantRecord>) {
    for (const record of records) {
      this.records.set(record.name, deepFreeze(structuredClone(record)));
    }
  }

  get size(): number {
    return this.records.size;
  }

  get(name: string): PlantRecord | undefined {
    return this.records.get(normalizeName(name));
  }

  has(name: string): boolean {
    return this.records.has(normalizeName(name));
  }

  list(category?: PlantCategory): PlantRecord[] {
    const all = [...this.records.values()];
    const filtered = category ? all.filter(r => r.category === category) : all;
    return filtered.sort((a, b) => a.name.localeCompare(b.name));
  }

  categories(): PlantCategory[] {
    return [...new Set([...this.records.values()].map(r => r.category))].sort();
  }
}

export function parseCatalog(data: unknown): CatalogStore {
  const parsed = z.array(z.unknown()).safeParse(data);
  if (!parsed.success) {
    throw new ValidationError('Plant catalog must be a JSON array');
  }

  const records: PlantRecord[] = [];
  const seen = new Set<string>();
  parsed.data.forEach((entry, index) => {
    const result = catalogEntrySchema.safeParse(entry);
    if (!result.success) {
      throw new ValidationError(`Invalid catalog entry #${index}`, formatIssues(result.error));
    }
    const record = catalogEntryToRecord(result.data);
    if (seen.has(record.name)) {
      throw new ValidationError(`Duplicate catalog entry "${record.name}"`);
    }
    seen.add(record.name);
    records.push(record);
  });
  return new CatalogStore(records);
}

export function loadCatalog(catalogPath: string): CatalogStore {
  const raw = fs.readFileSync(catalogPath, 'utf-8');
  const catalog = parseCatalog(JSON.parse(raw));
  console.log(`Loaded ${catalog.size} plants from ${catalogPath}`);
  return catalog;
}
