import 'dotenv/config'

import { config } from './config.js';
import { openDatabase } from './db/connection.js';
import { runMigrations } from './db/migrate.js';
import { createApp } from './app.js';
import { createLlmAdapter } from './llm/adapter.js';
import { SqlitePlantCache } from './plants/cache.js';
import { loadCatalog } from './plants/catalog.js';
import { LlmGenerationClient } from './plants/generation.js';
import { PlantResolver } from './plants/resolver.js';
import { SearchIndex } from './plants/search.js';
import { SqlitePlanStore } from './plans/store.js';
import { PlanSynthesizer } from './plans/synthesizer.js';

function main() {
  // 1. Initialize database + run migrations
  const db = openDatabase(config.databasePath);
  runMigrations(db);
  console.log('Database initialized');

  // 2. Load the curated catalog (fatal if it does not validate)
  const catalog = loadCatalog(config.catalogPath);

  // 3. Wire the lookup tiers
  const generator = new LlmGenerationClient(createLlmAdapter(config.llm));
  console.log(`Plant generation via ${config.llm.provider} (${generator.model})`);
  const cache = new SqlitePlantCache(db);
  const resolver = new PlantResolver({
    catalog,
    cache,
    generator,
    generationTimeoutMs: config.generation.timeoutMs,
  });
  const search = new SearchIndex({
    catalog,
    cache,
    resolver,
    defaultLimit: config.search.defaultLimit,
  });
  const synthesizer = new PlanSynthesizer({
    resolver,
    store: new SqlitePlanStore(db),
    maxPlants: config.plans.maxPlants,
    generationTimeoutMs: config.generation.timeoutMs,
    deadlineMultiplier: config.plans.deadlineMultiplier,
    instructionWriter: config.generation.enrichInstructions ? generator : undefined,
  });

  // 4. Create Express app
  const app = createApp({ catalog, cache, resolver, search, synthesizer });

  // 5. Listen
  app.listen(config.port, () => {
    console.log(`Garden planner running on port ${config.port}`);
  });
}

main();
