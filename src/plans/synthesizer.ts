import { v4 as uuid } from 'uuid';
import { GenerationFailedError, PersistenceError, PlanNotFoundError, ValidationError } from '../errors.js';
import type { LocationProfile } from '../location/types.js';
import { validateLocation } from '../location/validate.js';
import { withTimeout, type GenerationClient } from '../plants/generation.js';
import type { PlantResolver } from '../plants/resolver.js';
import { isResolved, normalizeNameList, type PlantRecord, type ResolveOutcome } from '../plants/types.js';
import { computeSchedule } from '../schedule/calculator.js';
import { deepFreeze } from '../utils/freeze.js';
import { buildTemplateInstructions, parseGeneratedInstructions } from './instructions.js';
import { buildLayout } from './layout.js';
import type { PlanStore } from './store.js';
import { buildGeneralTips } from './tips.js';
import type {
  ExperienceLevel,
  GardenPlan,
  GardenSize,
  GrowingInstructionSet,
  PlanRequestCheck,
  PlantingSchedule,
  SynthesisResult,
  SynthesizeOptions,
} from './types.js';

const SHORT_SEASON_DAYS = 120;
const LARGE_SELECTION = 10;
const BEGINNER_SELECTION = 5;

export interface PlanSynthesizerOptions {
  resolver: PlantResolver;
  store: PlanStore;
  maxPlants: number;
  generationTimeoutMs: number;
  /** Overall resolution bound, as a multiple of the per-plant generation timeout. */
  deadlineMultiplier: number;
  /** Enables best-effort generated instructions; template instructions otherwise. */
  instructionWriter?: GenerationClient;
  now?: () => Date;
  newId?: () => string;
}

export class PlanSynthesizer {
  private readonly resolver: PlantResolver;
  private readonly store: PlanStore;
  private readonly maxPlants: number;
  private readonly generationTimeoutMs: number;
  private readonly deadlineMs: number;
  private readonly instructionWriter: GenerationClient | undefined;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(options: PlanSynthesizerOptions) {
    this.resolver = options.resolver;
    this.store = options.store;
    this.maxPlants = options.maxPlants;
    this.generationTimeoutMs = options.generationTimeoutMs;
    this.deadlineMs = options.generationTimeoutMs * options.deadlineMultiplier;
    this.instructionWriter = options.instructionWriter;
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? (() => uuid());
  }

  /**
   * Builds and persists a new plan. Plants that resolve through no tier are
   * left out; the call fails only when none resolve.
   */
  async synthesize(
    locationInput: LocationProfile,
    requestedNames: readonly string[],
    options: SynthesizeOptions = {},
  ): Promise<SynthesisResult> {
    const location = validateLocation(locationInput);
    const requested = this.checkNames(requestedNames);

    const includeGenerated = options.includeGenerated ?? true;
    const gardenSize: GardenSize = options.gardenSize ?? 'medium';
    const experienceLevel: ExperienceLevel = options.experienceLevel ?? 'beginner';

    console.log(`Creating garden plan for ${requested.length} plants in ${location.postal_code}`);
    const outcomes = await this.resolveWithinDeadline(requested, includeGenerated);

    const records: PlantRecord[] = [];
    const unresolved: string[] = [];
    outcomes.forEach((outcome, i) => {
      if (isResolved(outcome)) {
        records.push(structuredClone(outcome.record));
      } else {
        unresolved.push(requested[i]);
      }
    });

    if (records.length === 0) {
      throw new GenerationFailedError(requested);
    }
    if (unresolved.length > 0) {
      console.warn(`Leaving unresolved plants out of the plan: ${unresolved.join(', ')}`);
    }

    const schedules = records.map(record => computeSchedule(record, location));
    const instructions = await this.buildInstructions(records, schedules, location, gardenSize, experienceLevel);

    const plan: GardenPlan = deepFreeze({
      id: this.newId(),
      created_at: this.now().toISOString(),
      location,
      garden_size: gardenSize,
      experience_level: experienceLevel,
      include_generated: includeGenerated,
      requested_plants: requested,
      plant_names: records.map(r => r.name),
      plants: records,
      schedules,
      instructions,
      layout: buildLayout(records, gardenSize),
      general_tips: buildGeneralTips(
        records.map((record, i) => ({ record, schedule: schedules[i] })),
        location,
        experienceLevel,
      ),
    });

    await this.store.save(plan);
    console.log(`Garden plan ${plan.id} created with ${records.length} plants`);

    return {
      plan,
      requested,
      resolved: plan.plant_names,
      unresolved,
    };
  }

  /**
   * Synthesizes a fresh plan from a stored plan's location and request. The
   * stored plan is left untouched and the new one gets its own id.
   */
  async regenerate(planId: string, options: SynthesizeOptions = {}): Promise<SynthesisResult> {
    const previous = await this.getPlan(planId);
    return this.synthesize(previous.location, previous.requested_plants, {
      includeGenerated: options.includeGenerated ?? previous.include_generated,
      gardenSize: options.gardenSize ?? previous.garden_size,
      experienceLevel: options.experienceLevel ?? previous.experience_level,
    });
  }

  /**
   * Checks a plan request against the catalog and cache without generating
   * or storing anything.
   */
  async checkRequest(
    locationInput: unknown,
    requestedNames: readonly string[],
    options: SynthesizeOptions = {},
  ): Promise<PlanRequestCheck> {
    const location = validateLocation(locationInput);
    const requested = this.checkNames(requestedNames);
    const experienceLevel = options.experienceLevel ?? 'beginner';

    const outcomes = await this.resolveWithinDeadline(requested, false);
    const available: string[] = [];
    const unavailable: PlanRequestCheck['unavailable_plants'] = [];
    for (const outcome of outcomes) {
      if (isResolved(outcome)) {
        available.push(outcome.record.name);
      } else {
        unavailable.push({ name: outcome.name, reason: outcome.reason });
      }
    }

    const warnings: string[] = [];
    if (location.growing_season_days < SHORT_SEASON_DAYS) {
      warnings.push(`Short growing season (${location.growing_season_days} days): consider cold-hardy varieties`);
    }
    if (unavailable.length > 0 && (options.includeGenerated ?? true)) {
      warnings.push(`Plant data will be generated for: ${unavailable.map(u => u.name).join(', ')}`);
    }

    const suggestions: string[] = [];
    if (requested.length > LARGE_SELECTION) {
      suggestions.push('Large plant selection: consider garden size and maintenance requirements');
    }
    if (experienceLevel === 'beginner' && requested.length > BEGINNER_SELECTION) {
      suggestions.push('Consider starting with fewer plants for your first garden');
    }

    return {
      valid: available.length > 0,
      location,
      available_plants: available,
      unavailable_plants: unavailable,
      warnings,
      suggestions,
    };
  }

  async getPlan(planId: string): Promise<GardenPlan> {
    const plan = await this.store.get(planId);
    if (!plan) throw new PlanNotFoundError(planId);
    return plan;
  }

  private checkNames(requestedNames: readonly string[]): string[] {
    const requested = normalizeNameList(requestedNames);
    if (requested.length === 0) {
      throw new ValidationError('At least one plant must be selected');
    }
    if (requested.length > this.maxPlants) {
      throw new ValidationError(
        `Maximum ${this.maxPlants} plants allowed per garden plan`,
        [`received ${requested.length} distinct plants`],
      );
    }
    return requested;
  }

  private async resolveWithinDeadline(names: string[], includeGenerated: boolean): Promise<ResolveOutcome[]> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'deadline'>(resolve => {
      timer = setTimeout(() => resolve('deadline'), this.deadlineMs);
    });

    try {
      return await Promise.all(names.map(async (name): Promise<ResolveOutcome> => {
        const outcome = await Promise.race([this.resolveOne(name, includeGenerated), deadline]);
        if (outcome === 'deadline') {
          console.warn(`Plan deadline of ${this.deadlineMs}ms reached before "${name}" resolved`);
          return { kind: 'absent', name, reason: 'timeout' };
        }
        return outcome;
      }));
    } finally {
      clearTimeout(timer);
    }
  }

  private async resolveOne(name: string, includeGenerated: boolean): Promise<ResolveOutcome> {
    try {
      return await this.resolver.resolve(name, includeGenerated);
    } catch (err) {
      if (err instanceof PersistenceError) {
        console.warn(`Plant store unavailable while resolving "${name}": ${err.message}`);
        return { kind: 'absent', name, reason: 'unavailable' };
      }
      throw err;
    }
  }

  private async buildInstructions(
    records: PlantRecord[],
    schedules: PlantingSchedule[],
    location: LocationProfile,
    gardenSize: GardenSize,
    experienceLevel: ExperienceLevel,
  ): Promise<GrowingInstructionSet[]> {
    const templates = records.map((record, i) => buildTemplateInstructions(record, schedules[i], location, experienceLevel));
    const writer = this.instructionWriter;
    if (!writer) return templates;

    return Promise.all(records.map(async (record, i) => {
      try {
        const raw = await withTimeout(
          signal => writer.writeInstructions(record, location, { gardenSize, experienceLevel, signal }),
          this.generationTimeoutMs,
        );
        const generated = parseGeneratedInstructions(record.name, raw);
        if (generated) return generated;
        console.warn(`Generated instructions for "${record.name}" were incomplete, using template`);
      } catch (err) {
        console.warn(`Instruction generation failed for "${record.name}", using template:`, err);
      }
      return templates[i];
    }));
  }
}
