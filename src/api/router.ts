import { Router, Request, Response } from 'express';
import { z } from 'zod';
import {
  GenerationFailedError,
  PersistenceError,
  PlanNotFoundError,
  ValidationError,
} from '../errors.js';
import { validateLocation } from '../location/validate.js';
import { EXPERIENCE_LEVELS, GARDEN_SIZES } from '../plans/types.js';
import type { PlanSynthesizer } from '../plans/synthesizer.js';
import type { PersistentCache } from '../plants/cache.js';
import type { CatalogStore } from '../plants/catalog.js';
import type { PlantResolver } from '../plants/resolver.js';
import { formatIssues } from '../plants/schema.js';
import type { SearchIndex } from '../plants/search.js';
import { isResolved, PLANT_CATEGORIES, type AbsentReason, type PlantRecord } from '../plants/types.js';

export interface ApiDependencies {
  catalog: CatalogStore;
  cache: PersistentCache;
  resolver: PlantResolver;
  search: SearchIndex;
  synthesizer: PlanSynthesizer;
}

const queryFlag = z.enum(['true', 'false', '1', '0']).optional();

function flag(value: z.infer<typeof queryFlag>, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  return value === 'true' || value === '1';
}

const listQuerySchema = z.object({
  category: z.enum(PLANT_CATEGORIES).optional(),
});

const searchQuerySchema = z.object({
  q: z.string().default(''),
  include_generated: queryFlag,
  limit: z.coerce.number().int().positive().optional(),
});

const resolveQuerySchema = z.object({
  allow_generation: queryFlag,
  hint: z.string().max(100).optional(),
});

export const MAX_BATCH_SIZE = 20;

const batchSchema = z.object({
  plants: z.array(z.string())
    .min(1, 'Plant names list cannot be empty')
    .max(MAX_BATCH_SIZE, `Maximum ${MAX_BATCH_SIZE} plants per batch request`),
  allow_generation: z.boolean().optional(),
});

const planOptionsSchema = z.object({
  garden_size: z.enum(GARDEN_SIZES).optional(),
  experience_level: z.enum(EXPERIENCE_LEVELS).optional(),
  include_generated: z.boolean().optional(),
});

const createPlanSchema = planOptionsSchema.extend({
  location: z.unknown(),
  plants: z.array(z.string()).min(1, 'At least one plant must be selected'),
});

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, what: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(`Invalid ${what}`, formatIssues(result.error));
  }
  return result.data;
}

function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof ValidationError) {
    res.status(400).json({ error: error.message, issues: error.issues });
    return;
  }
  if (error instanceof PlanNotFoundError) {
    res.status(404).json({ error: error.message });
    return;
  }
  if (error instanceof GenerationFailedError) {
    res.status(422).json({ error: error.message });
    return;
  }
  console.error(`${context} error:`, error);
  if (error instanceof PersistenceError) {
    res.status(503).json({ error: 'Plant storage is unavailable' });
    return;
  }
  res.status(500).json({ error: `Failed to ${context.toLowerCase()}` });
}

export function createApiRouter(deps: ApiDependencies): Router {
  const router = Router();

  // ==========================================================================
  // Plant endpoints
  // ==========================================================================

  /**
   * GET /api/plants
   * Curated catalog, optionally filtered by category
   */
  router.get('/plants', (req: Request, res: Response) => {
    try {
      const { category } = parseOrThrow(listQuerySchema, req.query, 'query');
      const plants = deps.catalog.list(category);
      res.json({ plants, total_count: plants.length, source: 'catalog' });
    } catch (error) {
      sendError(res, error, 'List plants');
    }
  });

  router.get('/plants/categories', (_req: Request, res: Response) => {
    res.json({ categories: deps.catalog.categories() });
  });

  /**
   * GET /api/plants/search?q=tom&include_generated=false&limit=10
   */
  router.get('/plants/search', async (req: Request, res: Response) => {
    try {
      const query = parseOrThrow(searchQuerySchema, req.query, 'query');
      const results = await deps.search.search(query.q, flag(query.include_generated, false), query.limit);
      res.json({ query: query.q, results, total_results: results.length });
    } catch (error) {
      sendError(res, error, 'Search plants');
    }
  });

  router.get('/plants/stats', async (_req: Request, res: Response) => {
    try {
      res.json({ catalog_plants: deps.catalog.size, cache: await deps.cache.stats() });
    } catch (error) {
      sendError(res, error, 'Read plant stats');
    }
  });

  /**
   * POST /api/plants/batch
   * Body: { plants, allow_generation? }; answers with whichever plants resolve
   */
  router.post('/plants/batch', async (req: Request, res: Response) => {
    try {
      const body = parseOrThrow(batchSchema, req.body, 'batch request');
      const outcomes = await deps.resolver.resolveMany(body.plants, body.allow_generation ?? true);
      const plants: PlantRecord[] = [];
      const notFound: Array<{ name: string; reason: AbsentReason }> = [];
      for (const outcome of outcomes) {
        if (isResolved(outcome)) {
          plants.push(outcome.record);
        } else {
          notFound.push({ name: outcome.name, reason: outcome.reason });
        }
      }
      res.json({ plants, not_found: notFound, total_count: plants.length });
    } catch (error) {
      sendError(res, error, 'Resolve plant batch');
    }
  });

  /**
   * GET /api/plants/:name
   * Tiered lookup; 404 when the plant resolves through no tier
   */
  router.get('/plants/:name', async (req: Request, res: Response) => {
    try {
      const query = parseOrThrow(resolveQuerySchema, req.query, 'query');
      const outcome = await deps.resolver.resolve(
        req.params.name,
        flag(query.allow_generation, true),
        { hint: query.hint },
      );
      if (outcome.kind === 'absent') {
        res.status(404).json({ error: `Plant not found: ${outcome.name}`, reason: outcome.reason });
        return;
      }
      res.json({ plant: outcome.record, provenance: outcome.record.provenance });
    } catch (error) {
      sendError(res, error, 'Resolve plant');
    }
  });

  // ==========================================================================
  // Garden plan endpoints
  // ==========================================================================

  /**
   * POST /api/garden-plans
   * Body: { location, plants, garden_size?, experience_level?, include_generated? }
   */
  router.post('/garden-plans', async (req: Request, res: Response) => {
    try {
      const body = parseOrThrow(createPlanSchema, req.body, 'garden plan request');
      const location = validateLocation(body.location);
      const result = await deps.synthesizer.synthesize(location, body.plants, {
        includeGenerated: body.include_generated,
        gardenSize: body.garden_size,
        experienceLevel: body.experience_level,
      });
      res.status(201).json(result);
    } catch (error) {
      sendError(res, error, 'Create garden plan');
    }
  });

  /**
   * POST /api/garden-plans/validate
   * Same body as plan creation; reports what a plan would contain
   */
  router.post('/garden-plans/validate', async (req: Request, res: Response) => {
    try {
      const body = parseOrThrow(createPlanSchema, req.body, 'garden plan request');
      const check = await deps.synthesizer.checkRequest(body.location, body.plants, {
        includeGenerated: body.include_generated,
        gardenSize: body.garden_size,
        experienceLevel: body.experience_level,
      });
      res.json(check);
    } catch (error) {
      sendError(res, error, 'Validate garden plan');
    }
  });

  router.get('/garden-plans/:id', async (req: Request, res: Response) => {
    try {
      res.json({ plan: await deps.synthesizer.getPlan(req.params.id) });
    } catch (error) {
      sendError(res, error, 'Fetch garden plan');
    }
  });

  /**
   * POST /api/garden-plans/:id/regenerate
   * New plan (new id) from a stored plan's location and plant list
   */
  router.post('/garden-plans/:id/regenerate', async (req: Request, res: Response) => {
    try {
      const options = parseOrThrow(planOptionsSchema, req.body ?? {}, 'regenerate options');
      const result = await deps.synthesizer.regenerate(req.params.id, {
        includeGenerated: options.include_generated,
        gardenSize: options.garden_size,
        experienceLevel: options.experience_level,
      });
      res.status(201).json(result);
    } catch (error) {
      sendError(res, error, 'Regenerate garden plan');
    }
  });

  return router;
}
