/**
 * Core type definitions for schema-identity
 * @module types
 */

import type { z } from 'zod';

/**
 * JSON-compatible value type
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

/**
 * JSON object node, keys kept in insertion order
 */
export type JsonObject = { [key: string]: JsonValue };

/**
 * Any Zod object schema usable as a model shape
 */
export type AnyZodObject = z.AnyZodObject;

/**
 * Schema generation modes
 * - `serialization`: the shape a model is written as
 * - `validation`: the shape a model accepts as input
 */
export type SchemaMode = 'serialization' | 'validation';

/**
 * Field naming used when generating a schema
 */
export type SchemaAliasing = 'byAlias' | 'byName';

/**
 * Alias for a single field. A string applies to both modes.
 */
export type FieldAlias = string | { serialization?: string; validation?: string };

/**
 * Map of field names to their aliases
 */
export type AliasMap = Readonly<Record<string, FieldAlias>>;

/**
 * One-way function from bytes to a printable digest
 */
export type HashFunction = (bytes: Uint8Array) => string;

/**
 * Digest truncation length
 */
export type HashLimit = number | 'unbounded';

/**
 * Hash tracking configuration resolved for a model definition
 */
export type IdentityConfig = {
  /** Include descriptions in the hash */
  trackDescriptions: boolean;
  /** Field declaration order affects the hash */
  trackFieldOrder: boolean;
  /** Order inside unions, enums and other lists affects the hash */
  trackTypeOrder: boolean;
  /** Arbitrary JSON-serializable data folded into the hash */
  trackedExtraData?: unknown;
  /** Characters kept from the start of the digest */
  hashLimitLength: HashLimit;
  /** Trailing path segments of the declaring file kept in the qualified name */
  trackedFilepathParts: number;
  /** Digest function */
  hashFunction: HashFunction;
  /** Include the validation-mode schema */
  trackValidationMode: boolean;
};

/**
 * Overrides accepted when defining a model
 */
export type IdentityOptions = Partial<IdentityConfig>;

/**
 * Options for defining a model
 */
export type ModelOptions = {
  /** Declaring file, as a path or a `file://` URL (e.g. `import.meta.url`) */
  filename?: string;
  /** Field aliases */
  aliases?: AliasMap;
  /** Forces every generated schema into one mode */
  schemaModeOverride?: SchemaMode;
  /** Hash tracking overrides */
  identity?: IdentityOptions;
};

/**
 * Model definition. The object itself is the model's identity.
 *
 * @template Name - Model name
 * @template Schema - Zod object schema
 */
export type ModelDef<Name extends string, Schema extends AnyZodObject> = {
  /** Model name */
  readonly name: Name;
  /** Zod object schema */
  readonly schema: Schema;
  /** Resolved hash tracking configuration */
  readonly identity: Readonly<IdentityConfig>;
  /** Declaring file */
  readonly filename?: string;
  /** Field aliases */
  readonly aliases: AliasMap;
  /** Schema mode override */
  readonly schemaModeOverride?: SchemaMode;
};

/**
 * Any model definition (convenience type)
 */
export type ModelDefAny = ModelDef<string, AnyZodObject>;

/**
 * Normalization policy for schema documents
 */
export type NormalizePolicy = {
  /** Sort `required` lists of strings */
  sortRequired: boolean;
  /** Drop string `description` entries */
  dropDescriptions: boolean;
  /** Collapse every other list into a sorted list of strings */
  sortLists: boolean;
};

/**
 * Schemas folded into the hash input
 */
export type HashInputSchemas = {
  ser_by_alias: JsonObject;
  ser_by_name: JsonObject;
  val_by_alias?: JsonObject;
};

/**
 * Value handed to the serializer and then to the hash function
 */
export type HashInputEnvelope = {
  /** Qualified model name */
  name: string;
  /** Normalized schemas */
  schemas: HashInputSchemas;
  /** Tracked extra data, `null` when none */
  extra_data: unknown;
};

/**
 * Produces schema documents for a model
 */
export type SchemaProvider = {
  Generate: (model: ModelDefAny, mode: SchemaMode, aliasing: SchemaAliasing) => JsonObject;
};

/**
 * Produces the qualified name of a model
 */
export type FullnameResolver = {
  Resolve: (model: ModelDefAny, keepPathParts: number) => string;
};

/**
 * Tracking settings recorded in a report
 */
export type HashSettings = {
  trackDescriptions: boolean;
  trackFieldOrder: boolean;
  trackTypeOrder: boolean;
  trackedFilepathParts: number;
  trackValidationMode: boolean;
};

/**
 * Identifying information about a model's schema
 */
export type IdentityReport = {
  /** Qualified model name */
  fullname: string;
  /** ISO timestamp of report creation */
  createdAt: string;
  /** Identity hash */
  hash: string;
  /** Settings the hash was computed with */
  hashSettings: HashSettings;
};

/**
 * Diagnostic severity
 */
export type DiagnosticLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Diagnostic event names emitted by a registry
 */
export type DiagnosticName =
  | 'identity.hash.created'
  | 'identity.hash.rebuilt'
  | 'identity.hash.failed'
  | 'identity.report.created';

/**
 * Structured diagnostic event
 */
export type DiagnosticEvent = {
  /** Event name */
  name: DiagnosticName;
  /** ISO timestamp */
  ts: string;
  /** Severity */
  level: DiagnosticLevel;
  /** Model name */
  model: string;
  /** Event data */
  payload: Record<string, unknown>;
};

/**
 * Sink function for processing diagnostic events
 */
export type Sink<T = DiagnosticEvent> = (event: T) => void | Promise<void>;

/**
 * Memory sink with captured events for testing
 */
export type MemorySink = Sink<DiagnosticEvent> & {
  events: DiagnosticEvent[];
};

/**
 * Identity registry with per-identity hash and report caches
 */
export type IdentityRegistry = {
  /** Cached hash, created on first access */
  Hash: (model: ModelDefAny) => string;
  /** Evict and recreate one model's entries */
  Rebuild: (model: ModelDefAny) => string;
  /** Cached report, created on first access */
  Report: (model: ModelDefAny) => IdentityReport;
  /** Exact bytes handed to the hash function */
  InputData: (model: ModelDefAny) => Uint8Array;
  /** Qualified model name */
  Fullname: (model: ModelDefAny) => string;
  /** Whether a hash is cached for the model */
  Has: (model: ModelDefAny) => boolean;
  /** Whether a stored hash matches the model's current hash */
  Matches: (model: ModelDefAny, hash: string) => boolean;
  /** Copy of a record carrying the model's hash */
  Stamp: <Value extends object>(model: ModelDefAny, record: Value) => Value & { schemaHash: string };
};

/**
 * Options for creating an identity registry
 */
export type IdentityRegistryOptions = {
  /** Schema provider */
  provider?: SchemaProvider;
  /** Qualified name resolver */
  resolver?: FullnameResolver;
  /** Sinks receiving diagnostic events */
  sinks?: Sink<DiagnosticEvent>[];
  /** Clock, in epoch milliseconds */
  now?: () => number;
};

/**
 * Stable error codes
 */
export type ErrorCode =
  | 'CONFIG_CONFLICT'
  | 'CONFIG_INVALID'
  | 'SERIALIZATION_FAILED'
  | 'REPORT_INVALID';

/**
 * Error domains
 */
export type ErrorDomain = 'config' | 'serializer' | 'report';

/**
 * Error context for structured errors
 */
export type ErrorContext = {
  /** Error message */
  message: string;
  /** Error code */
  code: ErrorCode;
  /** Error domain */
  domain: ErrorDomain;
  /** Why the error occurred */
  reason?: string;
  /** How to fix the error */
  resolution?: string;
  /** Additional structured details */
  details?: Record<string, unknown>;
  /** Original error cause */
  cause?: unknown;
};
