/**
 * Policy-driven normalization of schema documents
 * @module canonicalize
 */

import type { JsonObject, JsonValue, NormalizePolicy } from './types.js';

export function IsJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Maps whose keys are field or definition names rather than schema keywords
 */
const NAMED_MAPS = new Set(['properties', 'patternProperties', 'definitions', '$defs']);

/**
 * Order strings by Unicode code point
 */
export function CompareCodePoints(left: string, right: string): number {
  return Buffer.compare(Buffer.from(left, 'utf8'), Buffer.from(right, 'utf8'));
}

/**
 * Text used to order list elements once collapsed
 */
function CoerceToString(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function NormalizeValue(value: JsonValue, policy: NormalizePolicy): JsonValue {
  if (Array.isArray(value)) {
    return value.map((item) => NormalizeValue(item, policy));
  }

  if (IsJsonObject(value)) {
    return NormalizeSchema(value, policy);
  }

  return value;
}

function NormalizeNamedMap(map: JsonObject, policy: NormalizePolicy): JsonObject {
  const output: JsonObject = {};

  for (const [name, entry] of Object.entries(map)) {
    output[name] = NormalizeValue(entry, policy);
  }

  return output;
}

/**
 * Normalize a schema document so that variation the policy ignores disappears.
 *
 * - `dropDescriptions` removes every string `description` entry.
 * - `sortRequired` sorts `required` lists whose first element is a string.
 * - `sortLists` collapses every other non-empty list into its sorted string forms,
 *   after normalizing the elements. Nested structure inside those elements only
 *   survives as text.
 *
 * Values under a `default` keyword are kept exactly as they are. Entries of
 * `properties`, `patternProperties`, `definitions` and `$defs` are named schemas, so
 * a field called `default` is normalized like any other. The input is not mutated.
 *
 * @param document - Schema document
 * @param policy - Normalization policy
 * @returns New normalized document
 *
 * @example
 * ```typescript
 * NormalizeSchema(
 *   { description: 'A user', required: ['name', 'id'], anyOf: [{ type: 'string' }, { type: 'integer' }] },
 *   { sortRequired: true, dropDescriptions: true, sortLists: true },
 * );
 * // { required: ['id', 'name'], anyOf: ['{"type":"integer"}', '{"type":"string"}'] }
 * ```
 */
export function NormalizeSchema(document: JsonObject, policy: NormalizePolicy): JsonObject {
  const output: JsonObject = {};

  for (const [key, entry] of Object.entries(document)) {
    if (key === 'default') {
      output[key] = entry;
      continue;
    }

    if (NAMED_MAPS.has(key) && IsJsonObject(entry)) {
      output[key] = NormalizeNamedMap(entry, policy);
      continue;
    }

    if (policy.dropDescriptions && key === 'description' && typeof entry === 'string') {
      continue;
    }

    let current = entry;
    if (Array.isArray(entry) && entry.length > 0) {
      if (policy.sortRequired && key === 'required' && typeof entry[0] === 'string') {
        current = entry.map(CoerceToString).sort(CompareCodePoints);
      } else if (policy.sortLists) {
        const nested: NormalizePolicy = { ...policy, sortRequired: false };
        current = entry.map((item) => CoerceToString(NormalizeValue(item, nested))).sort(CompareCodePoints);
      }
    }

    output[key] = NormalizeValue(current, policy);
  }

  return output;
}
