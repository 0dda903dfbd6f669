/**
 * Validation of backend payloads.
 *
 * A payload is valid only if it contains one JSON object with non-empty
 * string `symbol`, `phrase`, `color` and `reasoning` fields, and `color`
 * matches #rrggbb. Extra keys are ignored. Nothing is coerced: a payload that
 * fails any check is rejected as a whole.
 */

import type { Artifact } from '../types/generation.types';

const HEX_COLOR_REGEX = /^#[0-9a-f]{6}$/i;
const THINK_BLOCK_REGEX = /<think>[\s\S]*?<\/think>/gi;
const REQUIRED_FIELDS = ['symbol', 'phrase', 'color', 'reasoning'] as const;

export type ArtifactParseResult =
  | { valid: true; artifact: Artifact }
  | { valid: false; reason: string };

export function isHexColor(value: unknown): value is string {
  return typeof value === 'string' && HEX_COLOR_REGEX.test(value);
}

/**
 * Extracts the outermost `{...}` span after dropping reasoning blocks that
 * some models print before their answer.
 */
export function extractJsonObject(payload: string): string | null {
  const cleaned = payload.replace(THINK_BLOCK_REGEX, '');
  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return null;
  }
  return cleaned.substring(start, end + 1);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses raw backend text into an Artifact.
 *
 * @example
 * ```typescript
 * parseArtifactPayload('{"symbol":"∞","phrase":"x","color":"#1a2b3c","reasoning":"y"}');
 * // { valid: true, artifact: { symbol: '∞', phrase: 'x', color: '#1a2b3c', reasoning: 'y' } }
 *
 * parseArtifactPayload('{"symbol":"∞","phrase":"x","color":"not-a-color","reasoning":"y"}');
 * // { valid: false, reason: 'color must match #rrggbb (got "not-a-color")' }
 * ```
 */
export function parseArtifactPayload(payload: string): ArtifactParseResult {
  const json = extractJsonObject(payload);
  if (json === null) {
    return { valid: false, reason: 'payload contains no JSON object' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return {
      valid: false,
      reason: `payload is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  if (!isRecord(parsed)) {
    return { valid: false, reason: 'payload is not a JSON object' };
  }

  for (const field of REQUIRED_FIELDS) {
    const value = parsed[field];
    if (typeof value !== 'string' || value.trim().length === 0) {
      return { valid: false, reason: `${field} must be a non-empty string` };
    }
  }

  const { symbol, phrase, color, reasoning } = parsed;
  if (
    typeof symbol !== 'string' ||
    typeof phrase !== 'string' ||
    typeof reasoning !== 'string'
  ) {
    return { valid: false, reason: 'artifact fields must be strings' };
  }
  if (!isHexColor(color)) {
    return {
      valid: false,
      reason: `color must match #rrggbb (got ${JSON.stringify(color)})`,
    };
  }

  return {
    valid: true,
    artifact: Object.freeze({
      symbol: symbol.trim(),
      phrase: phrase.trim(),
      color,
      reasoning: reasoning.trim(),
    }),
  };
}
