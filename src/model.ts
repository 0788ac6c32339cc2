/**
 * Model definitions: the identities hashes are cached under
 * @module model
 */

import { z } from 'zod';
import { DEFAULT_IDENTITY_CONFIG, FormatIssues, ResolveIdentityConfig } from './config.js';
import { CreateDomainError } from './error.js';
import type {
  AliasMap,
  AnyZodObject,
  IdentityConfig,
  ModelDef,
  ModelOptions,
  SchemaMode,
} from './types.js';

const ModelOptionsSchema = z.object({
  filename: z.string().min(1).optional(),
  aliases: z
    .record(
      z.union([
        z.string().min(1),
        z
          .object({
            serialization: z.string().min(1).optional(),
            validation: z.string().min(1).optional(),
          })
          .strict(),
      ]),
    )
    .optional(),
  schemaModeOverride: z.enum(['serialization', 'validation']).optional(),
  identity: z.record(z.unknown()).optional(),
});

/**
 * Settings a definition passes on to its extensions
 */
type Inherited = {
  identity: Readonly<IdentityConfig>;
  aliases: AliasMap;
  schemaModeOverride?: SchemaMode;
};

function CreateModelDef<Name extends string, Schema extends AnyZodObject>(
  name: Name,
  schema: Schema,
  inherited: Inherited,
  options: ModelOptions,
): ModelDef<Name, Schema> {
  if (name.length === 0) {
    throw CreateDomainError('config', 'CONFIG_INVALID', 'Model name must not be empty');
  }

  const checked = ModelOptionsSchema.safeParse(options);
  if (!checked.success) {
    const issues = FormatIssues(checked.error);
    throw CreateDomainError('config', 'CONFIG_INVALID', `Invalid options for model "${name}": ${issues.join('; ')}`, {
      details: { model: name, issues },
    });
  }

  const identity = ResolveIdentityConfig(name, inherited.identity, options.identity);
  const aliases: AliasMap = Object.freeze({ ...inherited.aliases, ...options.aliases });
  const schemaModeOverride = options.schemaModeOverride ?? inherited.schemaModeOverride;

  return Object.freeze({
    name,
    schema,
    identity,
    aliases,
    ...(options.filename !== undefined ? { filename: options.filename } : {}),
    ...(schemaModeOverride !== undefined ? { schemaModeOverride } : {}),
  });
}

/**
 * Define a model
 *
 * Every call creates a new identity, even for an identical name and schema.
 *
 * @param name - Model name
 * @param schema - Zod object schema of the model's fields
 * @param options - Declaring file, aliases, schema mode override and identity options
 * @returns Frozen model definition
 *
 * @example
 * ```typescript
 * const User = DefineModel(
 *   'User',
 *   z.object({ id: z.string(), displayName: z.string().describe('Shown in the UI') }),
 *   {
 *     filename: import.meta.url,
 *     aliases: { displayName: 'display_name' },
 *     identity: { trackDescriptions: true },
 *   },
 * );
 * ```
 */
export function DefineModel<Name extends string, Schema extends AnyZodObject>(
  name: Name,
  schema: Schema,
  options: ModelOptions = {},
): ModelDef<Name, Schema> {
  return CreateModelDef(name, schema, { identity: DEFAULT_IDENTITY_CONFIG, aliases: {} }, options);
}

/**
 * Define a model derived from another one
 *
 * Identity options and aliases are merged field by field over the base's resolved
 * values; the schema mode override is inherited unless set. The declaring file is not.
 * The new model never shares cached hashes with its base.
 *
 * @param base - Model to derive from
 * @param name - Model name
 * @param build - Builds the new schema from the base schema
 * @param options - Options merged over the base's
 *
 * @example
 * ```typescript
 * const Admin = ExtendModel(User, 'Admin', (schema) => schema.extend({ level: z.number().int() }), {
 *   filename: import.meta.url,
 * });
 * ```
 */
export function ExtendModel<BaseSchema extends AnyZodObject, Name extends string, Schema extends AnyZodObject>(
  base: ModelDef<string, BaseSchema>,
  name: Name,
  build: (schema: BaseSchema) => Schema,
  options: ModelOptions = {},
): ModelDef<Name, Schema> {
  return CreateModelDef(
    name,
    build(base.schema),
    {
      identity: base.identity,
      aliases: base.aliases,
      ...(base.schemaModeOverride !== undefined ? { schemaModeOverride: base.schemaModeOverride } : {}),
    },
    options,
  );
}
