/**
 * Loose JSON extraction from model replies.
 *
 * Models wrap JSON in markdown fences or add a sentence before it; this
 * strips the fence, then falls back to the outermost object/array.
 */

import { err, ok, type Result } from '../shared/result.js';

function tryParse(text: string): Result<unknown> {
  try {
    return ok(JSON.parse(text));
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

export function extractJson(text: string): Result<unknown> {
  let candidate = text.trim();
  const fenceMatch = candidate.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenceMatch) {
    candidate = fenceMatch[1].trim();
  }

  const direct = tryParse(candidate);
  if (direct.ok) return direct;

  const start = candidate.search(/[[{]/);
  const end = Math.max(candidate.lastIndexOf('}'), candidate.lastIndexOf(']'));
  if (start !== -1 && end > start) {
    const sliced = tryParse(candidate.slice(start, end + 1));
    if (sliced.ok) return sliced;
  }

  const preview = candidate.length > 200 ? `${candidate.slice(0, 200)}...` : candidate;
  return err(new Error(`Response is not valid JSON: ${preview}`));
}
