/**
 * Deterministic serialization of hash input envelopes
 * @module serialize
 */

import { CompareCodePoints } from './canonicalize.js';
import { SerializationError } from './error.js';
import type { HashInputEnvelope } from './types.js';

/**
 * Options for serializing an envelope
 */
export type SerializeOptions = {
  /** Emit map keys sorted at every level instead of in insertion order */
  sortKeys: boolean;
};

function HasToJson(value: object): value is { toJSON: () => unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

function IsPlainObject(value: object): boolean {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Compact JSON text of a value, failing on anything JSON cannot represent
 */
function Encode(value: unknown, sortKeys: boolean, path: string, seen: WeakSet<object>): string {
  if (value === null) {
    return 'null';
  }

  if (typeof value === 'string' || typeof value === 'boolean') {
    return JSON.stringify(value);
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new TypeError(`Non-finite number ${String(value)} at ${path}`);
    }
    return JSON.stringify(value);
  }

  if (typeof value !== 'object') {
    throw new TypeError(`Type ${typeof value} at ${path} is not JSON serializable`);
  }

  if (seen.has(value)) {
    throw new TypeError(`Circular reference at ${path}`);
  }

  seen.add(value);
  try {
    if (Array.isArray(value)) {
      const items = value.map((item: unknown, index) => {
        if (item === undefined) {
          throw new TypeError(`Undefined list element at ${path}[${index}]`);
        }
        return Encode(item, sortKeys, `${path}[${index}]`, seen);
      });
      return `[${items.join(',')}]`;
    }

    if (HasToJson(value)) {
      return Encode(value.toJSON(), sortKeys, path, seen);
    }

    if (!IsPlainObject(value)) {
      throw new TypeError(`Instance of ${value.constructor.name} at ${path} is not JSON serializable`);
    }

    const entries: [string, unknown][] = Object.entries(value);
    if (sortKeys) {
      entries.sort(([left], [right]) => CompareCodePoints(left, right));
    }

    const members = entries
      .filter(([, entry]) => entry !== undefined)
      .map(([key, entry]) => `${JSON.stringify(key)}:${Encode(entry, sortKeys, `${path}.${key}`, seen)}`);
    return `{${members.join(',')}}`;
  } finally {
    seen.delete(value);
  }
}

/**
 * Serialize an envelope to UTF-8 JSON bytes.
 *
 * With `sortKeys` keys are ordered by code point, so the output is identical for
 * logically identical envelopes whatever order their maps were built in. Without it, keys keep insertion order,
 * so field declaration order reaches the hash.
 *
 * @throws SerializationError carrying the envelope name and the underlying cause
 *
 * @example
 * ```typescript
 * const bytes = SerializeEnvelope(
 *   { name: 'models.user.User', schemas: { ser_by_alias: {}, ser_by_name: {} }, extra_data: null },
 *   { sortKeys: true },
 * );
 * JSON.parse(new TextDecoder().decode(bytes)).name;
 * // 'models.user.User'
 * ```
 */
export function SerializeEnvelope(envelope: HashInputEnvelope, options: SerializeOptions): Uint8Array {
  let text: string;
  try {
    text = Encode(envelope, options.sortKeys, '$', new WeakSet<object>());
  } catch (error) {
    throw new SerializationError(envelope.name, error);
  }

  return Buffer.from(text, 'utf8');
}
