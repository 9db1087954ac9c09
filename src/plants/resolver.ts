import { GenerationMalformedError, GenerationTimeoutError } from '../errors.js';
import type { PersistentCache } from './cache.js';
import type { CatalogStore } from './catalog.js';
import { withTimeout, type GenerationClient } from './generation.js';
import { InFlightRegistry } from './in-flight.js';
import { parseGeneratedRecord } from './schema.js';
import { normalizeName, type PlantRecord, type ResolveOutcome } from './types.js';

export interface PlantResolverOptions {
  catalog: CatalogStore;
  cache: PersistentCache;
  generator: GenerationClient;
  generationTimeoutMs: number;
  /** Pass one registry to several resolvers to coalesce generation across them. */
  inFlight?: InFlightRegistry<ResolveOutcome>;
}

export interface ResolveOptions {
  hint?: string;
}

/**
 * Three-tier plant lookup: curated catalog, then durable cache, then on-demand
 * generation. Generation is coalesced per normalized name, and failures are
 * never cached, so the next call retries.
 */
export class PlantResolver {
  private readonly catalog: CatalogStore;
  private readonly cache: PersistentCache;
  private readonly generator: GenerationClient;
  private readonly generationTimeoutMs: number;
  private readonly inFlight: InFlightRegistry<ResolveOutcome>;

  constructor(options: PlantResolverOptions) {
    this.catalog = options.catalog;
    this.cache = options.cache;
    this.generator = options.generator;
    this.generationTimeoutMs = options.generationTimeoutMs;
    this.inFlight = options.inFlight ?? new InFlightRegistry<ResolveOutcome>();
  }

  async resolve(name: string, allowGeneration: boolean, options: ResolveOptions = {}): Promise<ResolveOutcome> {
    const key = normalizeName(name);
    if (key === '') {
      return { kind: 'absent', name: key, reason: 'not_found' };
    }

    const fromCatalog = this.catalog.get(key);
    if (fromCatalog) {
      return { kind: 'catalog', record: fromCatalog };
    }

    const fromCache = await this.cache.get(key);
    if (fromCache) {
      return { kind: 'cached', record: fromCache };
    }

    if (!allowGeneration) {
      return { kind: 'absent', name: key, reason: 'generation_disabled' };
    }

    return this.inFlight.run(key, () => this.generate(key, options.hint));
  }

  /** Resolves several names concurrently; outcomes follow input order. */
  resolveMany(names: readonly string[], allowGeneration: boolean): Promise<ResolveOutcome[]> {
    return Promise.all(names.map(name => this.resolve(name, allowGeneration)));
  }

  private async generate(key: string, hint?: string): Promise<ResolveOutcome> {
    console.log(`Generating plant data for "${key}"`);
    let raw: unknown;
    try {
      raw = await withTimeout(signal => this.generator.describePlant(key, { hint, signal }), this.generationTimeoutMs);
    } catch (err) {
      if (err instanceof GenerationTimeoutError) {
        console.warn(`Generation timed out for "${key}" after ${err.timeoutMs}ms`);
        return { kind: 'absent', name: key, reason: 'timeout' };
      }
      if (err instanceof GenerationMalformedError) {
        console.warn(`Generation returned malformed data for "${key}": ${err.message}`);
        return { kind: 'absent', name: key, reason: 'malformed' };
      }
      console.warn(`Generation failed for "${key}":`, err);
      return { kind: 'absent', name: key, reason: 'generation_error' };
    }

    if (raw === null) {
      console.warn(`Generator does not recognise "${key}"`);
      return { kind: 'absent', name: key, reason: 'not_found' };
    }

    let record: PlantRecord;
    try {
      record = parseGeneratedRecord(key, raw);
    } catch (err) {
      if (err instanceof GenerationMalformedError) {
        console.warn(`Generation returned malformed data for "${key}": ${err.message}`);
        return { kind: 'absent', name: key, reason: 'malformed' };
      }
      throw err;
    }

    // Stored before the in-flight entry is released, so a caller arriving
    // after release finds it in the cache tier.
    await this.cache.put(record, { source: 'generated', model: this.generator.model });
    console.log(`Generated and cached plant data for "${key}"`);
    return { kind: 'generated', record };
  }
}
