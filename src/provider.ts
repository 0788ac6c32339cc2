/**
 * Default schema provider built on zod-to-json-schema
 * @module provider
 */

import { zodToJsonSchema } from 'zod-to-json-schema';
import { IsJsonObject } from './canonicalize.js';
import type {
  AliasMap,
  JsonObject,
  JsonValue,
  ModelDefAny,
  SchemaAliasing,
  SchemaMode,
  SchemaProvider,
} from './types.js';

/**
 * Sanitize generator output into plain JSON
 */
function Sanitize(value: unknown): JsonValue {
  if (value === null) {
    return null;
  }

  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => Sanitize(item));
  }

  if (typeof value === 'object') {
    const output: JsonObject = {};

    for (const [key, entry] of Object.entries(value)) {
      if (entry === undefined || typeof entry === 'function') {
        continue;
      }

      output[key] = Sanitize(entry);
    }

    return output;
  }

  return String(value);
}

/**
 * Alias of each field for one schema mode
 */
export function AliasesForMode(aliases: AliasMap, mode: SchemaMode): Map<string, string> {
  const resolved = new Map<string, string>();

  for (const [field, alias] of Object.entries(aliases)) {
    const name = typeof alias === 'string' ? alias : alias[mode];
    if (name !== undefined) {
      resolved.set(field, name);
    }
  }

  return resolved;
}

/**
 * Rename root `properties` keys and `required` entries to their aliases
 */
export function ApplyAliases(document: JsonObject, aliases: Map<string, string>): JsonObject {
  if (aliases.size === 0) {
    return document;
  }

  const output: JsonObject = {};

  for (const [key, entry] of Object.entries(document)) {
    if (key === 'properties' && IsJsonObject(entry)) {
      const properties: JsonObject = {};
      for (const [field, property] of Object.entries(entry)) {
        properties[aliases.get(field) ?? field] = property;
      }
      output[key] = properties;
    } else if (key === 'required' && Array.isArray(entry)) {
      output[key] = entry.map((field) => (typeof field === 'string' ? aliases.get(field) ?? field : field));
    } else {
      output[key] = entry;
    }
  }

  return output;
}

/**
 * Create a provider generating JSON Schema from each model's zod schema.
 *
 * Validation mode describes pipeline inputs and transform inputs; serialization mode
 * describes pipeline outputs. A model's `schemaModeOverride` replaces the requested mode.
 * Aliases apply to the model's own fields.
 *
 * @example
 * ```typescript
 * const provider = CreateZodSchemaProvider();
 * provider.Generate(User, 'validation', 'byAlias');
 * ```
 */
export function CreateZodSchemaProvider(): SchemaProvider {
  function Generate(model: ModelDefAny, requested: SchemaMode, aliasing: SchemaAliasing): JsonObject {
    const mode = model.schemaModeOverride ?? requested;
    const jsonSchema = zodToJsonSchema(model.schema, {
      target: 'jsonSchema7',
      pipeStrategy: mode === 'validation' ? 'input' : 'output',
      effectStrategy: mode === 'validation' ? 'input' : 'any',
    });

    const document = Sanitize(jsonSchema);
    if (!IsJsonObject(document)) {
      throw new TypeError(`Schema of model "${model.name}" is not a JSON object`);
    }

    return aliasing === 'byAlias' ? ApplyAliases(document, AliasesForMode(model.aliases, mode)) : document;
  }

  return { Generate };
}
