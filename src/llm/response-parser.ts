import { GenerationMalformedError } from '../errors.js';

/**
 * Extracts the JSON value from a model reply, tolerating Markdown code fences
 * and prose around a single top-level object or array.
 */
export function parseJsonReply(raw: string): unknown {
  let jsonStr = raw.trim();
  const fenceMatch = jsonStr.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenceMatch) {
    jsonStr = fenceMatch[1].trim();
  }

  if (jsonStr === '') {
    throw new GenerationMalformedError('empty reply');
  }

  try {
    return JSON.parse(jsonStr);
  } catch {
    // Fall through to the first balanced-looking object or array in the text
  }

  const start = jsonStr.search(/[[{]/);
  const end = Math.max(jsonStr.lastIndexOf('}'), jsonStr.lastIndexOf(']'));
  if (start !== -1 && end > start) {
    try {
      return JSON.parse(jsonStr.slice(start, end + 1));
    } catch {
      // reported below
    }
  }

  throw new GenerationMalformedError(`reply is not valid JSON: ${jsonStr.slice(0, 80)}`);
}
