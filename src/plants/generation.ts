import { GenerationTimeoutError } from '../errors.js';
import type { LlmAdapter } from '../llm/types.js';
import { parseJsonReply } from '../llm/response-parser.js';
import type { LocationProfile } from '../location/types.js';
import type { ExperienceLevel, GardenSize } from '../plans/types.js';
import { SUN_REQUIREMENTS, WATER_REQUIREMENTS, displayName, type PlantRecord } from './types.js';

export interface DescribePlantOptions {
  /** Extra context for ambiguous names, e.g. "herb" or "fruit tree". */
  hint?: string;
  signal: AbortSignal;
}

export interface InstructionContext {
  gardenSize: GardenSize;
  experienceLevel: ExperienceLevel;
  signal: AbortSignal;
}

/**
 * External text-generation collaborator. Replies are semi-structured and
 * validated by the caller; `describePlant` resolves to `null` when the
 * generator does not recognise the plant.
 */
export interface GenerationClient {
  readonly model: string | null;
  describePlant(name: string, options: DescribePlantOptions): Promise<unknown>;
  writeInstructions(record: PlantRecord, location: LocationProfile, context: InstructionContext): Promise<unknown>;
}

/**
 * Runs `task` with an abort signal that fires after `timeoutMs`. The returned
 * promise rejects with GenerationTimeoutError at expiry and a late result is
 * discarded.
 */
export function withTimeout<T>(task: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      controller.abort();
      reject(new GenerationTimeoutError(timeoutMs));
    }, timeoutMs);

    task(controller.signal).then(
      value => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

const SYSTEM_PROMPT = 'You are an expert gardener and botanist. Provide accurate, structured plant growing information. Respond with JSON only.';

export function buildPlantPrompt(name: string, hint?: string): string {
  return `Provide growing information for the plant: "${name}"${hint ? ` (${hint})` : ''}.

Respond with ONLY a JSON object with this structure:
{
  "name": "${name}",
  "scientific_name": "Scientific name if known, or null",
  "category": "vegetable, fruit, herb, flower, root, or legume",
  "days_to_harvest": 60,
  "spacing_inches": 12,
  "planting_depth_inches": 0.5,
  "sun_requirement": "${SUN_REQUIREMENTS.join(', ')}",
  "water_requirement": "${WATER_REQUIREMENTS.join(', ')}",
  "soil_ph_range": "6.0-7.0",
  "companion_plants": ["plant1", "plant2"],
  "avoid_planting_with": ["plant1"],
  "start_method": "indoor or direct",
  "succession_interval_days": null,
  "height": "short, medium, or tall"
}

Requirements:
- Use realistic values based on standard gardening practice
- Include 3-5 companion plants that actually grow well together
- succession_interval_days is the gap between repeat sowings, or null if the plant is not sown in succession
- If the plant does not exist or you are unsure, respond with null`;
}

export function buildInstructionsPrompt(
  record: PlantRecord,
  location: LocationProfile,
  context: Pick<InstructionContext, 'gardenSize' | 'experienceLevel'>,
): string {
  const plant = displayName(record.name);
  return `Write growing instructions for ${plant} in ${location.city}, ${location.region}.

Plant: ${plant}${record.scientific_name ? ` (${record.scientific_name})` : ''}, ${record.category}
Days to harvest: ${record.days_to_harvest}; spacing ${record.spacing_inches} in; depth ${record.planting_depth_inches} in
Sun: ${record.sun_requirement}; water: ${record.water_requirement}; soil pH ${record.soil_ph_range.low}-${record.soil_ph_range.high}
USDA zone ${location.usda_zone}, ${location.climate_type} climate, last frost ${location.last_frost_date}, first frost ${location.first_frost_date}
Gardener: ${context.experienceLevel}, ${context.gardenSize} garden

Respond with ONLY a JSON object with these keys, each an array of 2-4 short, specific steps:
"preparation", "planting", "care", "pest_management", "harvest", "storage"`;
}

export class LlmGenerationClient implements GenerationClient {
  constructor(private readonly llm: LlmAdapter) {}

  get model(): string {
    return this.llm.model;
  }

  async describePlant(name: string, options: DescribePlantOptions): Promise<unknown> {
    const response = await this.llm.chat([
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: buildPlantPrompt(name, options.hint) },
    ], { signal: options.signal, temperature: 0.3, json: true });
    return parseJsonReply(response.content);
  }

  async writeInstructions(record: PlantRecord, location: LocationProfile, context: InstructionContext): Promise<unknown> {
    const response = await this.llm.chat([
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: buildInstructionsPrompt(record, location, context) },
    ], { signal: context.signal, temperature: 0.3, json: true });
    return parseJsonReply(response.content);
  }
}
