import { describe, expect, it } from 'vitest';
import { Canonical, SerializationError } from '../src/index.js';
import type { HashInputEnvelope } from '../src/index.js';
import { DecodeText } from './identity-test-helpers.js';

function Envelope(extra: unknown): HashInputEnvelope {
  return {
    name: 'models.order.Order',
    schemas: { ser_by_alias: {}, ser_by_name: {} },
    extra_data: extra,
  };
}

function CaptureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('Serialize', function SerializeSuite() {
  it('sorts keys at every level when asked', function SortsKeys() {
    const envelope: HashInputEnvelope = {
      name: 'M',
      schemas: { ser_by_name: { b: 1, a: { d: true, c: null } }, ser_by_alias: {} },
      extra_data: null,
    };

    expect(DecodeText(Canonical.Serialize(envelope, { sortKeys: true }))).toBe(
      '{"extra_data":null,"name":"M","schemas":{"ser_by_alias":{},"ser_by_name":{"a":{"c":null,"d":true},"b":1}}}',
    );
  });

  it('keeps insertion order otherwise', function KeepsInsertionOrder() {
    const envelope: HashInputEnvelope = {
      name: 'M',
      schemas: { ser_by_name: { b: 1, a: 2 }, ser_by_alias: {} },
      extra_data: null,
    };

    expect(DecodeText(Canonical.Serialize(envelope, { sortKeys: false }))).toBe(
      '{"name":"M","schemas":{"ser_by_name":{"b":1,"a":2},"ser_by_alias":{}},"extra_data":null}',
    );
  });

  it('produces identical bytes for envelopes built in different orders', function ProducesIdenticalBytes() {
    const first: HashInputEnvelope = {
      name: 'M',
      schemas: { ser_by_alias: { x: 1, y: [1, 2] }, ser_by_name: {} },
      extra_data: { flag: true, label: 'v1' },
    };
    const second: HashInputEnvelope = {
      extra_data: { label: 'v1', flag: true },
      schemas: { ser_by_name: {}, ser_by_alias: { y: [1, 2], x: 1 } },
      name: 'M',
    };

    expect(Canonical.Serialize(first, { sortKeys: true })).toEqual(
      Canonical.Serialize(second, { sortKeys: true }),
    );
    expect(Canonical.Serialize(first, { sortKeys: false })).not.toEqual(
      Canonical.Serialize(second, { sortKeys: false }),
    );
  });

  it('sorts keys by code point', function SortsKeysByCodePoint() {
    const extra = { '\u{1F600}': 2, '\uFF61': 1 };

    expect(DecodeText(Canonical.Serialize(Envelope(extra), { sortKeys: true }))).toBe(
      '{"extra_data":{"\uFF61":1,"\u{1F600}":2},"name":"models.order.Order","schemas":{"ser_by_alias":{},"ser_by_name":{}}}',
    );
  });

  it('encodes text as UTF-8', function EncodesUtf8() {
    const bytes = Canonical.Serialize(Envelope('é'), { sortKeys: true });

    expect(DecodeText(bytes)).toBe(
      '{"extra_data":"é","name":"models.order.Order","schemas":{"ser_by_alias":{},"ser_by_name":{}}}',
    );
    expect(bytes.length).toBe(DecodeText(bytes).length + 1);
  });

  it('skips undefined object entries and uses toJSON', function SkipsUndefinedAndUsesToJson() {
    const extra = { missing: undefined, at: new Date(0) };

    expect(DecodeText(Canonical.Serialize(Envelope(extra), { sortKeys: false }))).toBe(
      '{"name":"models.order.Order","schemas":{"ser_by_alias":{},"ser_by_name":{}},"extra_data":{"at":"1970-01-01T00:00:00.000Z"}}',
    );
  });

  it('fails on values JSON cannot represent', function FailsOnUnrepresentableValues() {
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    const values: unknown[] = [
      10n,
      () => 'x',
      Symbol('x'),
      Number.NaN,
      Number.POSITIVE_INFINITY,
      [1, undefined],
      new Map([['a', 1]]),
      circular,
    ];

    for (const value of values) {
      const error = CaptureError(() => Canonical.Serialize(Envelope(value), { sortKeys: true }));
      expect(error).toBeInstanceOf(SerializationError);
      expect(error).toMatchObject({
        code: 'SERIALIZATION_FAILED',
        domain: 'serializer',
        fullname: 'models.order.Order',
      });
    }
  });

  it('carries the underlying cause', function CarriesCause() {
    const error = CaptureError(() => Canonical.Serialize(Envelope({ big: 1n }), { sortKeys: true }));

    expect(error).toBeInstanceOf(SerializationError);
    if (!(error instanceof SerializationError)) return;
    expect(error.cause).toBeInstanceOf(TypeError);
    expect(error.message).toBe(
      'The schema data for "models.order.Order" failed JSON serialization, so its identity hash can\'t be computed. Error: TypeError: Type bigint at $.extra_data.big is not JSON serializable',
    );
  });

  it('allows the same object twice when it is not circular', function AllowsSharedObjects() {
    const shared = { a: 1 };

    expect(DecodeText(Canonical.Serialize(Envelope([shared, shared]), { sortKeys: true }))).toBe(
      '{"extra_data":[{"a":1},{"a":1}],"name":"models.order.Order","schemas":{"ser_by_alias":{},"ser_by_name":{}}}',
    );
  });
});
