import { displayName, type PlantHeight, type PlantRecord, type SunRequirement } from '../plants/types.js';
import type { GardenSize, LayoutRecommendation, PlantGrouping } from './types.js';

const GARDEN_DIMENSIONS: Record<GardenSize, string> = {
  small: 'About 4 x 8 ft: one raised bed or a group of large containers',
  medium: 'About 10 x 12 ft: two or three beds with paths between',
  large: 'About 20 x 30 ft: in-ground rows or several beds',
};

const SUN_GROUPS: Array<{ sun: SunRequirement; name: string }> = [
  { sun: 'full sun', name: 'Full Sun Bed' },
  { sun: 'partial shade', name: 'Partial Shade Bed' },
  { sun: 'shade', name: 'Shade Bed' },
];

const HEIGHT_ORDER: Record<PlantHeight, number> = { tall: 0, medium: 1, short: 2 };

/** Height from the record, or a guess from spacing when the record has none. */
export function heightOf(record: PlantRecord): PlantHeight {
  if (record.height) return record.height;
  if (record.spacing_inches >= 24) return 'tall';
  if (record.spacing_inches <= 6) return 'short';
  return 'medium';
}

function names(records: PlantRecord[]): string {
  return records.map(r => displayName(r.name)).join(', ');
}

function groupNotes(members: PlantRecord[]): string {
  const tall = members.filter(r => heightOf(r) === 'tall');
  const rest = members.filter(r => heightOf(r) !== 'tall');
  if (tall.length > 0 && rest.length > 0) {
    return `Place ${names(tall)} along the north edge so they do not shade ${names(rest)}.`;
  }
  if (tall.length > 0) {
    return `Give ${names(tall)} sturdy supports and room to spread.`;
  }
  return `Arrange ${names(members)} in blocks rather than single rows to save space.`;
}

function mentions(a: PlantRecord, b: PlantRecord, list: 'companion_plants' | 'avoid_planting_with'): boolean {
  return a[list].includes(b.name) || b[list].includes(a.name);
}

/**
 * Advisory grouping by sun exposure and height. Spacing and pairing notes are
 * prose for the gardener, not a computed bed layout.
 */
export function buildLayout(records: PlantRecord[], gardenSize: GardenSize): LayoutRecommendation {
  const groupings: PlantGrouping[] = [];
  for (const { sun, name } of SUN_GROUPS) {
    const members = records
      .filter(r => r.sun_requirement === sun)
      .map((record, index) => ({ record, index }))
      .sort((a, b) => HEIGHT_ORDER[heightOf(a.record)] - HEIGHT_ORDER[heightOf(b.record)] || a.index - b.index)
      .map(entry => entry.record);
    if (members.length === 0) continue;
    groupings.push({ name, plants: members.map(r => r.name), notes: groupNotes(members) });
  }

  const spacingGuide: Record<string, string> = {};
  for (const record of records) {
    const rowSpacing = Math.round(record.spacing_inches * 1.5);
    spacingGuide[record.name] = `${record.spacing_inches} inches apart, ${rowSpacing} inches between rows`;
  }

  const companionNotes: string[] = [];
  for (let i = 0; i < records.length; i++) {
    for (let j = i + 1; j < records.length; j++) {
      const a = records[i];
      const b = records[j];
      const [first, second] = [displayName(a.name), displayName(b.name)];
      if (mentions(a, b, 'avoid_planting_with')) {
        companionNotes.push(`Keep ${first} and ${second} in separate beds`);
      } else if (mentions(a, b, 'companion_plants')) {
        companionNotes.push(`Plant ${first} near ${second}; they grow well together`);
      }
    }
  }

  const layoutTips = ['Run rows north to south so every plant gets even light'];
  if (gardenSize === 'small') {
    layoutTips.push('Grow vining and tall crops up trellises to make the most of a small space');
  } else {
    layoutTips.push('Leave 18-24 inch paths between beds so you can reach every plant without stepping on soil');
  }

  return {
    garden_dimensions: GARDEN_DIMENSIONS[gardenSize],
    groupings,
    spacing_guide: spacingGuide,
    companion_notes: companionNotes,
    layout_tips: layoutTips,
  };
}
