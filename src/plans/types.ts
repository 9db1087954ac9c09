import type { LocationProfile } from '../location/types.js';
import type { AbsentReason, PlantRecord } from '../plants/types.js';
import type { IsoDate } from '../schedule/dates.js';

export const GARDEN_SIZES = ['small', 'medium', 'large'] as const;
export type GardenSize = typeof GARDEN_SIZES[number];

export const EXPERIENCE_LEVELS = ['beginner', 'intermediate', 'advanced'] as const;
export type ExperienceLevel = typeof EXPERIENCE_LEVELS[number];

export interface PlantingSchedule {
  plant_name: string;
  start_indoors_date: IsoDate | null;
  direct_sow_date: IsoDate | null;
  transplant_date: IsoDate | null;
  harvest_start_date: IsoDate;
  harvest_end_date: IsoDate;
  succession_interval_days: number | null;
}

export interface GrowingInstructionSet {
  plant_name: string;
  source: 'template' | 'generated';
  preparation: string[];
  planting: string[];
  care: string[];
  pest_management: string[];
  harvest: string[];
  storage: string[];
}

export interface PlantGrouping {
  name: string;
  plants: string[];
  notes: string;
}

export interface LayoutRecommendation {
  garden_dimensions: string;
  groupings: PlantGrouping[];
  spacing_guide: Record<string, string>;
  companion_notes: string[];
  layout_tips: string[];
}

export interface GardenPlan {
  id: string;
  created_at: string;
  location: LocationProfile;
  garden_size: GardenSize;
  experience_level: ExperienceLevel;
  /** Whether plants missing from the catalog and cache could be generated. */
  include_generated: boolean;
  /** De-duplicated normalized names as requested, including any that did not resolve. */
  requested_plants: string[];
  /** Resolved names in request order. */
  plant_names: string[];
  plants: PlantRecord[];
  schedules: PlantingSchedule[];
  instructions: GrowingInstructionSet[];
  layout: LayoutRecommendation;
  general_tips: string[];
}

export interface SynthesizeOptions {
  includeGenerated?: boolean;
  gardenSize?: GardenSize;
  experienceLevel?: ExperienceLevel;
}

export interface SynthesisResult {
  plan: GardenPlan;
  requested: string[];
  resolved: string[];
  unresolved: string[];
}

/** Pre-flight check of a plan request; nothing is generated or stored. */
export interface PlanRequestCheck {
  valid: boolean;
  location: LocationProfile;
  available_plants: string[];
  unavailable_plants: Array<{ name: string; reason: AbsentReason }>;
  warnings: string[];
  suggestions: string[];
}
