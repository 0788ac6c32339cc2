/**
 * Hash tracking configuration: defaults, validation and derived policies
 * @module config
 */

import { z } from 'zod';
import { ConfigConflictError, CreateDomainError } from './error.js';
import { HashMd5Hex } from './digest.js';
import type {
  HashFunction,
  HashSettings,
  IdentityConfig,
  IdentityOptions,
  ModelDefAny,
  NormalizePolicy,
} from './types.js';

/**
 * Configuration every model starts from
 */
export const DEFAULT_IDENTITY_CONFIG: Readonly<IdentityConfig> = Object.freeze({
  trackDescriptions: false,
  trackFieldOrder: false,
  trackTypeOrder: false,
  trackedExtraData: undefined,
  hashLimitLength: 12,
  trackedFilepathParts: 2,
  hashFunction: HashMd5Hex,
  trackValidationMode: true,
});

const IdentityConfigSchema = z
  .object({
    trackDescriptions: z.boolean(),
    trackFieldOrder: z.boolean(),
    trackTypeOrder: z.boolean(),
    trackedExtraData: z.unknown(),
    hashLimitLength: z.union([z.number().int().nonnegative(), z.literal('unbounded')]),
    trackedFilepathParts: z.number().int().nonnegative(),
    hashFunction: z.custom<HashFunction>((value) => typeof value === 'function', {
      message: 'Expected a function',
    }),
    trackValidationMode: z.boolean(),
  })
  .strict();

/**
 * One line per zod issue, prefixed with its path
 */
export function FormatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Merge identity overrides over a base configuration and validate the result.
 *
 * Fields left out of `overrides` keep the base's value. The result is frozen.
 *
 * @param model - Model name, used in error messages
 * @param base - Configuration inherited from the base model, or the defaults
 * @param overrides - Overrides declared on the model
 * @throws IdentityError with code `CONFIG_INVALID` when a value has the wrong shape
 */
export function ResolveIdentityConfig(
  model: string,
  base: Readonly<IdentityConfig>,
  overrides: IdentityOptions = {},
): Readonly<IdentityConfig> {
  const parsed = IdentityConfigSchema.safeParse({ ...base, ...overrides });
  if (!parsed.success) {
    const issues = FormatIssues(parsed.error);
    throw CreateDomainError('config', 'CONFIG_INVALID', `Invalid identity options for model "${model}": ${issues.join('; ')}`, {
      reason: 'An identity option has an unsupported value',
      resolution: 'Check the option types: flags are booleans, lengths are non-negative integers',
      details: { model, issues },
    });
  }

  const config: IdentityConfig = parsed.data;
  return Object.freeze(config);
}

/**
 * Ensure a model's schema settings can honour its tracking settings.
 *
 * @throws ConfigConflictError when a schema-mode override is combined with validation-mode tracking
 */
export function ValidateModelConfig(model: ModelDefAny): void {
  if (model.schemaModeOverride !== undefined && model.identity.trackValidationMode) {
    throw new ConfigConflictError(model.name, model.schemaModeOverride);
  }
}

/**
 * Derive the normalization policy from tracking settings
 */
export function CreateNormalizePolicy(config: Readonly<IdentityConfig>): NormalizePolicy {
  return {
    sortRequired: !config.trackFieldOrder,
    dropDescriptions: !config.trackDescriptions,
    sortLists: !config.trackTypeOrder,
  };
}

/**
 * Snapshot of the settings recorded in reports
 */
export function CreateHashSettings(config: Readonly<IdentityConfig>): HashSettings {
  return {
    trackDescriptions: config.trackDescriptions,
    trackFieldOrder: config.trackFieldOrder,
    trackTypeOrder: config.trackTypeOrder,
    trackedFilepathParts: config.trackedFilepathParts,
    trackValidationMode: config.trackValidationMode,
  };
}
