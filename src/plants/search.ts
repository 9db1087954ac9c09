import { PersistenceError } from '../errors.js';
import type { PersistentCache } from './cache.js';
import type { CatalogStore } from './catalog.js';
import type { PlantResolver } from './resolver.js';
import { isResolved, normalizeName, type PlantRecord, type Provenance } from './types.js';

export type MatchKind = 'exact' | 'prefix' | 'substring' | 'generated';

export interface SearchHit {
  record: PlantRecord;
  provenance: Provenance;
  match: MatchKind;
  elapsed_ms: number;
}

export interface SearchIndexOptions {
  catalog: CatalogStore;
  cache: PersistentCache;
  /** Without a resolver, search never falls back to generation. */
  resolver?: PlantResolver;
  defaultLimit: number;
}

export const MAX_SEARCH_LIMIT = 50;
// The cache returns exact and prefix matches ahead of substring ones, so the cap only trims substrings
const CACHE_CANDIDATES = 200;

const MATCH_RANK: Record<MatchKind, number> = { exact: 0, prefix: 1, substring: 2, generated: 3 };
const TIER_RANK: Record<Provenance, number> = { catalog: 0, cache: 1, generated: 2 };

function classify(name: string, query: string): MatchKind | null {
  if (name === query) return 'exact';
  if (name.startsWith(query)) return 'prefix';
  if (name.includes(query)) return 'substring';
  return null;
}

/**
 * Ranked name lookup over the catalog and cache tiers: exact, then prefix,
 * then substring; ties go catalog first, then alphabetical.
 */
export class SearchIndex {
  private readonly catalog: CatalogStore;
  private readonly cache: PersistentCache;
  private readonly resolver: PlantResolver | undefined;
  private readonly defaultLimit: number;

  constructor(options: SearchIndexOptions) {
    this.catalog = options.catalog;
    this.cache = options.cache;
    this.resolver = options.resolver;
    this.defaultLimit = options.defaultLimit;
  }

  async search(query: string, includeGenerated: boolean, limit?: number): Promise<SearchHit[]> {
    const started = performance.now();
    const needle = normalizeName(query);
    if (needle === '') return [];
    const max = Math.min(Math.max(Math.floor(limit ?? this.defaultLimit), 1), MAX_SEARCH_LIMIT);

    const candidates: Array<{ record: PlantRecord; match: MatchKind }> = [];
    const seen = new Set<string>();
    for (const record of this.catalog.list()) {
      const match = classify(record.name, needle);
      if (!match) continue;
      candidates.push({ record, match });
      seen.add(record.name);
    }
    let cacheDown = false;
    let cached: PlantRecord[] = [];
    try {
      cached = await this.cache.search(needle, CACHE_CANDIDATES);
    } catch (err) {
      if (!(err instanceof PersistenceError)) throw err;
      console.warn(`Plant cache unavailable, searching the catalog only: ${err.message}`);
      cacheDown = true;
    }
    for (const record of cached) {
      if (seen.has(record.name)) continue;
      const match = classify(record.name, needle);
      if (!match) continue;
      candidates.push({ record, match });
      seen.add(record.name);
    }

    if (candidates.length > 0) {
      candidates.sort((a, b) =>
        MATCH_RANK[a.match] - MATCH_RANK[b.match]
        || TIER_RANK[a.record.provenance] - TIER_RANK[b.record.provenance]
        || a.record.name.localeCompare(b.record.name));
      const elapsed = Math.round(performance.now() - started);
      return candidates.slice(0, max).map(({ record, match }) => ({
        record,
        provenance: record.provenance,
        match,
        elapsed_ms: elapsed,
      }));
    }

    // Generation needs the cache to store its result
    if (!includeGenerated || !this.resolver || cacheDown) return [];

    const outcome = await this.resolver.resolve(needle, true);
    if (!isResolved(outcome)) return [];
    return [{
      record: outcome.record,
      provenance: outcome.record.provenance,
      match: 'generated',
      elapsed_ms: Math.round(performance.now() - started),
    }];
  }
}
