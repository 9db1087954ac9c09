import type { LlmProvider } from './llm/types.js';

const LLM_PROVIDERS: readonly LlmProvider[] = ['openai', 'openai-compatible', 'anthropic', 'google'];

function requireEnv(name: string): string {
  const val = process.env[name];
  if (!val) throw new Error(`Missing required env var: ${name}`);
  return val;
}

function positiveNumberEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const val = Number(raw);
  if (!Number.isFinite(val) || val <= 0) {
    throw new Error(`Env var ${name} must be a positive number, got "${raw}"`);
  }
  return val;
}

function booleanEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (!raw) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(raw.toLowerCase());
}

function parseProvider(raw: string): LlmProvider {
  const provider = LLM_PROVIDERS.find(p => p === raw);
  if (!provider) {
    throw new Error(`Unknown LLM provider: ${raw} (expected one of ${LLM_PROVIDERS.join(', ')})`);
  }
  return provider;
}

function loadConfig() {
  return {
    port: parseInt(process.env.PORT || '3000', 10),
    databasePath: process.env.DATABASE_PATH || './data/garden.db',
    catalogPath: process.env.CATALOG_PATH || './data/plants.json',

    llm: {
      provider: parseProvider(requireEnv('LLM_PROVIDER')),
      apiKey: requireEnv('LLM_API_KEY'),
      model: requireEnv('LLM_MODEL'),
      baseUrl: process.env.LLM_BASE_URL || undefined,
    },

    generation: {
      timeoutMs: positiveNumberEnv('GENERATION_TIMEOUT_MS', 30_000),
      enrichInstructions: booleanEnv('ENRICH_INSTRUCTIONS', false),
    },

    plans: {
      maxPlants: Math.floor(positiveNumberEnv('MAX_PLANTS_PER_PLAN', 20)),
      deadlineMultiplier: positiveNumberEnv('PLAN_DEADLINE_MULTIPLIER', 3),
    },

    search: {
      defaultLimit: Math.floor(positiveNumberEnv('SEARCH_LIMIT', 20)),
    },
  };
}

export type Config = ReturnType<typeof loadConfig>;
export const config = loadConfig();
