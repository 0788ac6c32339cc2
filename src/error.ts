/**
 * Structured errors with stable codes and domains
 * @module error
 */

import type { ErrorCode, ErrorContext, ErrorDomain } from './types.js';

/**
 * Structured error class with a stable code and domain
 *
 * @example
 * ```typescript
 * try {
 *   Identity.Hash(model);
 * } catch (err) {
 *   if (err instanceof IdentityError && err.code === 'CONFIG_CONFLICT') {
 *     console.error(err.resolution);
 *   }
 * }
 * ```
 */
export class IdentityError extends Error {
  /** Error code */
  readonly code: ErrorCode;
  /** Error domain */
  readonly domain: ErrorDomain;
  /** Why the error occurred */
  readonly reason?: string;
  /** How to fix it */
  readonly resolution?: string;
  /** Additional structured details */
  readonly details?: Record<string, unknown>;
  /** Original error cause */
  override readonly cause?: unknown;
  /** Timestamp when error was created */
  readonly timestamp: number;
  /** Additional context */
  readonly context: Record<string, unknown>;

  constructor(context: ErrorContext) {
    super(context.message, context.cause !== undefined ? { cause: context.cause } : undefined);
    this.name = 'IdentityError';
    this.code = context.code;
    this.domain = context.domain;
    if (context.reason !== undefined) {
      this.reason = context.reason;
    }
    if (context.resolution !== undefined) {
      this.resolution = context.resolution;
    }
    if (context.details !== undefined) {
      this.details = context.details;
    }
    if (context.cause !== undefined) {
      this.cause = context.cause;
    }
    this.timestamp = Date.now();
    this.context = {};
  }

  /**
   * Add context data to the error
   * @param key - Context key
   * @param value - Context value
   * @returns this for chaining
   */
  WithContext(key: string, value: unknown): this {
    this.context[key] = value;
    return this;
  }

  /**
   * Convert error to JSON
   * @returns Plain object representation
   */
  ToJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      domain: this.domain,
      reason: this.reason,
      resolution: this.resolution,
      details: this.details,
      timestamp: this.timestamp,
      context: this.context,
    };
  }

  /**
   * JSON serialization hook
   */
  toJSON(): Record<string, unknown> {
    return this.ToJSON();
  }
}

/**
 * Raised when a model's schema-mode override makes validation-mode tracking impossible.
 */
export class ConfigConflictError extends IdentityError {
  /** Name of the offending model */
  readonly model: string;

  constructor(model: string, override: string) {
    super({
      message: `Model "${model}" sets schemaModeOverride="${override}", but validation-mode tracking needs both schema modes`,
      code: 'CONFIG_CONFLICT',
      domain: 'config',
      reason: 'A schema-mode override prevents generating the serialization and validation schemas separately',
      resolution: 'Remove schemaModeOverride (recommended) or set identity.trackValidationMode to false',
      details: { model, override },
    });
    this.name = 'ConfigConflictError';
    this.model = model;
  }
}

/**
 * Raised when the hash input of a model cannot be encoded.
 */
export class SerializationError extends IdentityError {
  /** Qualified name of the model */
  readonly fullname: string;

  constructor(fullname: string, cause: unknown) {
    const detail = cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);
    super({
      message: `The schema data for "${fullname}" failed JSON serialization, so its identity hash can't be computed. Error: ${detail}`,
      code: 'SERIALIZATION_FAILED',
      domain: 'serializer',
      reason: 'The hash input contains a value with no JSON representation',
      resolution: 'Keep trackedExtraData and schema output to plain JSON values',
      details: { fullname },
      cause,
    });
    this.name = 'SerializationError';
    this.fullname = fullname;
  }
}

/**
 * Create a typed error for a specific domain and code.
 *
 * @example
 * ```typescript
 * throw CreateDomainError('config', 'CONFIG_INVALID', 'hashLimitLength must be a non-negative integer');
 * ```
 */
export function CreateDomainError(
  domain: ErrorDomain,
  code: ErrorCode,
  message: string,
  options: Omit<ErrorContext, 'message' | 'code' | 'domain'> = {},
): IdentityError {
  return new IdentityError({
    message,
    code,
    domain,
    ...options,
  });
}
