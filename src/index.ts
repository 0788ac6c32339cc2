/**
 * @packageDocumentation
 *
 * # schema-identity
 *
 * Short, deterministic fingerprints for the structural schema of a model.
 *
 * ## Features
 *
 * - **Schema identity hash**: a truncated digest of a model's normalized JSON Schema
 * - **Tunable sensitivity**: choose whether descriptions, field order, union order and
 *   validation-mode differences change the hash
 * - **Identity-keyed caching**: computed once per model definition, never shared with
 *   a base or derived model
 * - **Reports**: qualified name, hash and the settings it was computed with
 * - **Diagnostics**: structured events delivered to pluggable sinks
 *
 * ## Quick Start
 *
 * ```typescript
 * import { z } from 'zod';
 * import { Identity, Model } from 'schema-identity';
 *
 * const User = Model.Define(
 *   'User',
 *   z.object({ id: z.string(), email: z.string().email() }),
 *   { filename: import.meta.url },
 * );
 *
 * const row = Identity.Stamp(User, { id: 'u_1', email: 'user@example.com' });
 * // { id: 'u_1', email: 'user@example.com', schemaHash: '…12 hex chars…' }
 *
 * // later, possibly after a deploy
 * Identity.Matches(User, row.schemaHash);
 * ```
 *
 * @module
 */

import { NormalizeSchema, IsJsonObject } from './canonicalize.js';
import { CreateNormalizePolicy, DEFAULT_IDENTITY_CONFIG, ValidateModelConfig } from './config.js';
import { ComputeDigest, HashMd5Hex, TruncateDigest } from './digest.js';
import {
  ConfigConflictError,
  CreateDomainError,
  IdentityError,
  SerializationError,
} from './error.js';
import { CreatePathFullnameResolver, GetQualifiedName } from './fullname.js';
import { DefineModel, ExtendModel } from './model.js';
import { CreateZodSchemaProvider } from './provider.js';
import {
  CreateIdentityRegistry,
  GetDefaultRegistry,
  GetFullname,
  GetHashInputData,
  GetIdentityHash,
  GetIdentityReport,
  MatchesIdentity,
  RebuildIdentityHash,
  StampIdentity,
} from './registry.js';
import { ParseReport } from './report.js';
import { SerializeEnvelope } from './serialize.js';
import {
  CreateEnvironmentSink,
  CreateMemorySink,
  CreateStructuredSink,
  CreateVisualSink,
} from './sinks.js';

export class Model {
  static Define: typeof DefineModel = DefineModel;
  static Extend: typeof ExtendModel = ExtendModel;
  static Defaults: typeof DEFAULT_IDENTITY_CONFIG = DEFAULT_IDENTITY_CONFIG;
}

export class Identity {
  static Hash: typeof GetIdentityHash = GetIdentityHash;
  static Rebuild: typeof RebuildIdentityHash = RebuildIdentityHash;
  static Report: typeof GetIdentityReport = GetIdentityReport;
  static InputData: typeof GetHashInputData = GetHashInputData;
  static Fullname: typeof GetFullname = GetFullname;
  static Matches: typeof MatchesIdentity = MatchesIdentity;
  static Stamp: typeof StampIdentity = StampIdentity;
  static ParseReport: typeof ParseReport = ParseReport;
  static Registry: typeof CreateIdentityRegistry = CreateIdentityRegistry;
  static Default: typeof GetDefaultRegistry = GetDefaultRegistry;
}

export class Canonical {
  static Normalize: typeof NormalizeSchema = NormalizeSchema;
  static Policy: typeof CreateNormalizePolicy = CreateNormalizePolicy;
  static Serialize: typeof SerializeEnvelope = SerializeEnvelope;
  static Validate: typeof ValidateModelConfig = ValidateModelConfig;
  static IsObject: typeof IsJsonObject = IsJsonObject;
}

export class Digest {
  static Md5Hex: typeof HashMd5Hex = HashMd5Hex;
  static Truncate: typeof TruncateDigest = TruncateDigest;
  static Compute: typeof ComputeDigest = ComputeDigest;
}

export class Provider {
  static Zod: typeof CreateZodSchemaProvider = CreateZodSchemaProvider;
  static PathFullname: typeof CreatePathFullnameResolver = CreatePathFullnameResolver;
  static QualifiedName: typeof GetQualifiedName = GetQualifiedName;
}

export class Sink {
  static Memory: typeof CreateMemorySink = CreateMemorySink;
  static Visual: typeof CreateVisualSink = CreateVisualSink;
  static Structured: typeof CreateStructuredSink = CreateStructuredSink;
  static Environment: typeof CreateEnvironmentSink = CreateEnvironmentSink;
}

export class Error {
  static Identity: typeof IdentityError = IdentityError;
  static ConfigConflict: typeof ConfigConflictError = ConfigConflictError;
  static Serialization: typeof SerializationError = SerializationError;
  static Domain: typeof CreateDomainError = CreateDomainError;
}

export { IdentityError, ConfigConflictError, SerializationError } from './error.js';

export type {
  AliasMap,
  AnyZodObject,
  DiagnosticEvent,
  DiagnosticLevel,
  DiagnosticName,
  ErrorCode,
  ErrorContext,
  ErrorDomain,
  FieldAlias,
  FullnameResolver,
  HashFunction,
  HashInputEnvelope,
  HashInputSchemas,
  HashLimit,
  HashSettings,
  IdentityConfig,
  IdentityOptions,
  IdentityRegistry,
  IdentityRegistryOptions,
  IdentityReport,
  JsonObject,
  JsonValue,
  MemorySink,
  ModelDef,
  ModelDefAny,
  ModelOptions,
  NormalizePolicy,
  SchemaAliasing,
  SchemaMode,
  SchemaProvider,
  Sink as SinkType,
} from './types.js';

export type { SerializeOptions } from './serialize.js';
