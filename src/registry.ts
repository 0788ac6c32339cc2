/**
 * Identity registry: per-model cache of hashes and reports
 * @module registry
 */

import { CreateNormalizePolicy, ValidateModelConfig } from './config.js';
import { NormalizeSchema } from './canonicalize.js';
import { ComputeDigest } from './digest.js';
import { IdentityError } from './error.js';
import { CreatePathFullnameResolver } from './fullname.js';
import { CreateZodSchemaProvider } from './provider.js';
import { CreateIdentityReport } from './report.js';
import { SerializeEnvelope } from './serialize.js';
import { DispatchToSinks } from './sinks.js';
import type {
  DiagnosticLevel,
  DiagnosticName,
  HashInputEnvelope,
  HashInputSchemas,
  IdentityRegistry,
  IdentityRegistryOptions,
  IdentityReport,
  ModelDefAny,
} from './types.js';

/**
 * Create an identity registry
 *
 * Hashes and reports are cached under the model definition object itself, so a model
 * derived from another never sees its base's entries. Failures leave both caches
 * untouched; `Rebuild` only replaces a model's entries once the new hash exists.
 *
 * @param options - Schema provider, fullname resolver, diagnostic sinks and clock
 * @returns Registry
 *
 * @example
 * ```typescript
 * const registry = CreateIdentityRegistry({ sinks: [Sink.Environment()] });
 *
 * const hash = registry.Hash(User);
 * // e.g. '5d41402abc4b'
 * registry.Report(User).hashSettings.trackValidationMode;
 * // true
 * ```
 */
export function CreateIdentityRegistry(options: IdentityRegistryOptions = {}): IdentityRegistry {
  const provider = options.provider ?? CreateZodSchemaProvider();
  const resolver = options.resolver ?? CreatePathFullnameResolver();
  const sinks = options.sinks ?? [];
  const now = options.now ?? Date.now;

  const hashes = new Map<ModelDefAny, string>();
  const reports = new Map<ModelDefAny, IdentityReport>();

  function Emit(
    name: DiagnosticName,
    level: DiagnosticLevel,
    model: ModelDefAny,
    payload: Record<string, unknown>,
  ): void {
    if (sinks.length === 0) {
      return;
    }

    DispatchToSinks(sinks, {
      name,
      ts: new Date(now()).toISOString(),
      level,
      model: model.name,
      payload,
    });
  }

  function Fullname(model: ModelDefAny): string {
    return resolver.Resolve(model, model.identity.trackedFilepathParts);
  }

  function InputData(model: ModelDefAny): Uint8Array {
    ValidateModelConfig(model);

    const config = model.identity;
    const schemas: HashInputSchemas = {
      ser_by_alias: provider.Generate(model, 'serialization', 'byAlias'),
      ser_by_name: provider.Generate(model, 'serialization', 'byName'),
    };
    if (config.trackValidationMode) {
      schemas.val_by_alias = provider.Generate(model, 'validation', 'byAlias');
    }

    const policy = CreateNormalizePolicy(config);
    const normalized: HashInputSchemas = {
      ser_by_alias: NormalizeSchema(schemas.ser_by_alias, policy),
      ser_by_name: NormalizeSchema(schemas.ser_by_name, policy),
      ...(schemas.val_by_alias !== undefined
        ? { val_by_alias: NormalizeSchema(schemas.val_by_alias, policy) }
        : {}),
    };

    const envelope: HashInputEnvelope = {
      name: Fullname(model),
      schemas: normalized,
      extra_data: config.trackedExtraData ?? null,
    };

    return SerializeEnvelope(envelope, { sortKeys: !config.trackFieldOrder });
  }

  function CreateHash(model: ModelDefAny): string {
    const startedAt = now();
    let hash: string;
    try {
      hash = ComputeDigest(InputData(model), model.identity.hashFunction, model.identity.hashLimitLength);
    } catch (error) {
      Emit('identity.hash.failed', 'error', model, {
        code: error instanceof IdentityError ? error.code : 'UNKNOWN_ERROR',
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    Emit('identity.hash.created', 'debug', model, { hash, durationMs: now() - startedAt });
    return hash;
  }

  function Hash(model: ModelDefAny): string {
    const cached = hashes.get(model);
    if (cached !== undefined) {
      return cached;
    }

    const hash = CreateHash(model);
    hashes.set(model, hash);
    return hash;
  }

  function Rebuild(model: ModelDefAny): string {
    const previous = hashes.get(model);
    const hash = CreateHash(model);
    reports.delete(model);
    hashes.set(model, hash);

    Emit('identity.hash.rebuilt', 'info', model, {
      hash,
      previous: previous ?? null,
      changed: previous !== undefined && previous !== hash,
    });
    return hash;
  }

  function Report(model: ModelDefAny): IdentityReport {
    const cached = reports.get(model);
    if (cached !== undefined) {
      return cached;
    }

    const report = CreateIdentityReport(Fullname(model), Hash(model), model.identity, now());
    reports.set(model, report);
    Emit('identity.report.created', 'debug', model, { fullname: report.fullname, hash: report.hash });
    return report;
  }

  function Stamp<Value extends object>(model: ModelDefAny, record: Value): Value & { schemaHash: string } {
    const existing: unknown = 'schemaHash' in record ? record.schemaHash : undefined;
    if (typeof existing === 'string' && existing.length > 0) {
      return { ...record, schemaHash: existing };
    }

    return { ...record, schemaHash: Hash(model) };
  }

  return {
    Hash,
    Rebuild,
    Report,
    InputData,
    Fullname,
    Has: (model) => hashes.has(model),
    Matches: (model, hash) => Hash(model) === hash,
    Stamp,
  };
}

let defaultRegistry: IdentityRegistry | undefined;

/**
 * Process-wide registry used by the `Identity` shortcuts
 */
export function GetDefaultRegistry(): IdentityRegistry {
  defaultRegistry ??= CreateIdentityRegistry();
  return defaultRegistry;
}

/**
 * Cached identity hash of a model in the process-wide registry
 */
export function GetIdentityHash(model: ModelDefAny): string {
  return GetDefaultRegistry().Hash(model);
}

/**
 * Recompute one model's hash in the process-wide registry
 *
 * Only needed after mutating a model's schema at runtime.
 */
export function RebuildIdentityHash(model: ModelDefAny): string {
  return GetDefaultRegistry().Rebuild(model);
}

/**
 * Cached identity report of a model in the process-wide registry
 */
export function GetIdentityReport(model: ModelDefAny): IdentityReport {
  return GetDefaultRegistry().Report(model);
}

/**
 * Exact bytes hashed for a model, for debugging
 *
 * @example
 * ```typescript
 * JSON.parse(new TextDecoder().decode(GetHashInputData(User))).schemas.ser_by_name;
 * ```
 */
export function GetHashInputData(model: ModelDefAny): Uint8Array {
  return GetDefaultRegistry().InputData(model);
}

/**
 * Qualified name of a model
 */
export function GetFullname(model: ModelDefAny): string {
  return GetDefaultRegistry().Fullname(model);
}

/**
 * Whether a stored hash was produced by the model's current schema
 */
export function MatchesIdentity(model: ModelDefAny, hash: string): boolean {
  return GetDefaultRegistry().Matches(model, hash);
}

/**
 * Copy of a record carrying its model's hash as `schemaHash`
 *
 * A record that already has a non-empty `schemaHash` keeps it.
 */
export function StampIdentity<Value extends object>(
  model: ModelDefAny,
  record: Value,
): Value & { schemaHash: string } {
  return GetDefaultRegistry().Stamp(model, record);
}
