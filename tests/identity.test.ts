import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ConfigConflictError, Identity, Model } from '../src/index.js';
import type { AnyZodObject, IdentityOptions, JsonObject, ModelDefAny, ModelOptions } from '../src/index.js';

const tracked: IdentityOptions = {
  trackDescriptions: true,
  trackFieldOrder: true,
  trackTypeOrder: true,
  hashLimitLength: 12,
  trackedFilepathParts: 2,
  trackValidationMode: true,
};

function Define(schema: AnyZodObject, identity: IdentityOptions = {}, options: ModelOptions = {}) {
  return Model.Define('M', schema, { ...options, identity: { ...tracked, ...identity } });
}

/**
 * Hashes of two models, each in a fresh registry
 */
function HashPair(first: ModelDefAny, second: ModelDefAny): [string, string] {
  return [Identity.Registry().Hash(first), Identity.Registry().Hash(second)];
}

describe('Identity', function IdentitySuite() {
  it('returns the same hash on every call', function IsIdempotent() {
    const model = Define(z.object({ id: z.string(), tags: z.array(z.string()) }));
    const registry = Identity.Registry();

    const hash = registry.Hash(model);

    expect(registry.Hash(model)).toBe(hash);
    expect(Identity.Registry().Hash(model)).toBe(hash);
    expect(registry.InputData(model)).toEqual(registry.InputData(model));
  });

  it('never lets a base hash leak into an extension', function IsolatesExtensions() {
    const registry = Identity.Registry();
    const base = Define(z.object({ id: z.string() }));
    const extended = Model.Extend(base, 'M', (schema) => schema.extend({ label: z.string() }));

    const baseHash = registry.Hash(base);
    const extendedHash = registry.Hash(extended);

    expect(extendedHash).not.toBe(baseHash);
    expect(registry.Hash(base)).toBe(baseHash);
    expect(Identity.Registry().Hash(extended)).toBe(extendedHash);
  });

  it('follows descriptions only when tracked', function TracksDescriptions() {
    const described = z.object({ id: z.string().describe('Primary key') });
    const plain = z.object({ id: z.string() });

    const [trackedFirst, trackedSecond] = HashPair(Define(described), Define(plain));
    const [ignoredFirst, ignoredSecond] = HashPair(
      Define(described, { trackDescriptions: false }),
      Define(plain, { trackDescriptions: false }),
    );

    expect(trackedFirst).not.toBe(trackedSecond);
    expect(ignoredFirst).toBe(ignoredSecond);
  });

  it('follows field order only when tracked', function TracksFieldOrder() {
    const forward = z.object({ a: z.string(), b: z.number() });
    const backward = z.object({ b: z.number(), a: z.string() });

    const [trackedFirst, trackedSecond] = HashPair(Define(forward), Define(backward));
    const [ignoredFirst, ignoredSecond] = HashPair(
      Define(forward, { trackFieldOrder: false }),
      Define(backward, { trackFieldOrder: false }),
    );

    expect(trackedFirst).not.toBe(trackedSecond);
    expect(ignoredFirst).toBe(ignoredSecond);
  });

  it('follows union member order only when tracked', function TracksUnionOrder() {
    const forward = z.object({ value: z.union([z.number().int(), z.null(), z.literal('5'), z.number()]) });
    const backward = z.object({ value: z.union([z.literal('5'), z.number(), z.null(), z.number().int()]) });

    const [trackedFirst, trackedSecond] = HashPair(Define(forward), Define(backward));
    const [ignoredFirst, ignoredSecond] = HashPair(
      Define(forward, { trackTypeOrder: false }),
      Define(backward, { trackTypeOrder: false }),
    );

    expect(trackedFirst).not.toBe(trackedSecond);
    expect(ignoredFirst).toBe(ignoredSecond);
  });

  it('follows enum order nested in arrays only when tracked', function TracksNestedEnumOrder() {
    const forward = z.object({ levels: z.array(z.union([z.literal(2), z.literal(1)])) });
    const backward = z.object({ levels: z.array(z.union([z.literal(1), z.literal(2)])) });

    const [trackedFirst, trackedSecond] = HashPair(Define(forward), Define(backward));
    const [ignoredFirst, ignoredSecond] = HashPair(
      Define(forward, { trackTypeOrder: false }),
      Define(backward, { trackTypeOrder: false }),
    );

    expect(trackedFirst).not.toBe(trackedSecond);
    expect(ignoredFirst).toBe(ignoredSecond);
  });

  it('follows reordered nested constants only when tracked', function TracksNestedConstants() {
    const documents = new Map<ModelDefAny, JsonObject>();
    const provider = {
      Generate: (model: ModelDefAny): JsonObject => documents.get(model) ?? {},
    };
    const first = Define(z.object({}), { trackTypeOrder: false });
    const second = Define(z.object({}), { trackTypeOrder: false });
    documents.set(first, { anyOf: [{ const: { a: [{ b: [2, 1] }, 1] } }, { type: 'integer' }, { type: 'null' }] });
    documents.set(second, { anyOf: [{ type: 'null' }, { const: { a: [1, { b: [1, 2] }] } }, { type: 'integer' }] });
    const trackedFirst = Define(z.object({}));
    const trackedSecond = Define(z.object({}));
    documents.set(trackedFirst, documents.get(first) ?? {});
    documents.set(trackedSecond, documents.get(second) ?? {});

    const registry = Identity.Registry({ provider });

    expect(registry.Hash(first)).toBe(registry.Hash(second));
    expect(registry.Hash(trackedFirst)).not.toBe(registry.Hash(trackedSecond));
  });

  it('always distinguishes list defaults', function DistinguishesDefaults() {
    const ascending = z.object({ ranks: z.array(z.number()).nullable().default([1, 2, 3]) });
    const descending = z.object({ ranks: z.array(z.number()).nullable().default([3, 2, 1]) });

    const [first, second] = HashPair(
      Define(ascending, { trackTypeOrder: false, trackFieldOrder: false, trackDescriptions: false }),
      Define(descending, { trackTypeOrder: false, trackFieldOrder: false, trackDescriptions: false }),
    );

    expect(first).not.toBe(second);
  });

  it('follows validation-only aliases only when tracked', function TracksValidationAliases() {
    const schema = z.object({ a: z.string() });

    const [trackedFirst, trackedSecond] = HashPair(
      Define(schema, {}, { aliases: { a: { validation: 'A' } } }),
      Define(schema),
    );
    const [ignoredFirst, ignoredSecond] = HashPair(
      Define(schema, { trackValidationMode: false }, { aliases: { a: { validation: 'A' } } }),
      Define(schema, { trackValidationMode: false }),
    );

    expect(trackedFirst).not.toBe(trackedSecond);
    expect(ignoredFirst).toBe(ignoredSecond);
  });

  it('follows pipeline input types only when validation mode is tracked', function TracksPipelineInputs() {
    const piped = z.object({ value: z.union([z.number(), z.string()]).pipe(z.string()) });
    const plain = z.object({ value: z.string() });

    const [trackedFirst, trackedSecond] = HashPair(Define(piped), Define(plain));
    const [ignoredFirst, ignoredSecond] = HashPair(
      Define(piped, { trackValidationMode: false }),
      Define(plain, { trackValidationMode: false }),
    );

    expect(trackedFirst).not.toBe(trackedSecond);
    expect(ignoredFirst).toBe(ignoredSecond);
  });

  it('mixes extra data into the hash', function MixesExtraData() {
    const schema = z.object({ id: z.string() });

    const hashes = [undefined, ['a', 'b'], ['foo', 'bar']].map((trackedExtraData) =>
      Identity.Registry().Hash(Define(schema, { trackedExtraData })),
    );
    const [forward, backward] = HashPair(
      Define(schema, { trackTypeOrder: false, trackedExtraData: ['a', 'b'] }),
      Define(schema, { trackTypeOrder: false, trackedExtraData: ['b', 'a'] }),
    );

    expect(new Set(hashes).size).toBe(3);
    expect(forward).not.toBe(backward);
  });

  it('normalizes a field named default like any other field', function NormalizesFieldNamedDefault() {
    const firstText = z.object({ default: z.string().describe('first') });
    const secondText = z.object({ default: z.string().describe('second') });
    const forward = z.object({ default: z.union([z.string(), z.number()]) });
    const backward = z.object({ default: z.union([z.number(), z.string()]) });

    const [firstIgnored, secondIgnored] = HashPair(
      Define(firstText, { trackDescriptions: false }),
      Define(secondText, { trackDescriptions: false }),
    );
    const [forwardIgnored, backwardIgnored] = HashPair(
      Define(forward, { trackTypeOrder: false }),
      Define(backward, { trackTypeOrder: false }),
    );
    const [forwardTracked, backwardTracked] = HashPair(Define(forward), Define(backward));

    expect(firstIgnored).toBe(secondIgnored);
    expect(forwardIgnored).toBe(backwardIgnored);
    expect(forwardTracked).not.toBe(backwardTracked);
  });

  it('truncates to the configured length', function TruncatesHashes() {
    const schema = z.object({ id: z.string() });
    const registry = Identity.Registry();

    const five = registry.Hash(Define(schema, { hashLimitLength: 5 }));
    const full = registry.Hash(Define(schema, { hashLimitLength: 'unbounded' }));
    const empty = registry.Hash(Define(schema, { hashLimitLength: 0 }));
    const large = registry.Hash(Define(schema, { hashLimitLength: 1000 }));

    expect(five).toHaveLength(5);
    expect(full).toMatch(/^[0-9a-f]{32}$/);
    expect(empty).toBe('');
    expect(large).toBe(full);
    expect(full.startsWith(five)).toBe(true);
  });

  it('qualifies names with trailing path parts', function QualifiesNames() {
    const registry = Identity.Registry();
    const schema = z.object({});
    const filename = '/srv/app/models/catalog.ts';

    const names = [0, 1, 2, 1000].map((trackedFilepathParts, index) =>
      registry.Report(
        Model.Define(`M${index}`, schema, { filename, identity: { ...tracked, trackedFilepathParts } }),
      ).fullname,
    );

    expect(names).toEqual(['M0', 'catalog.M1', 'models.catalog.M2', 'srv.app.models.catalog.M3']);
  });

  it('rejects conflicting configuration and keeps working for other models', function RejectsConflicts() {
    const registry = Identity.Registry();
    const schema = z.object({ id: z.string() });
    const conflicting = Define(schema, {}, { schemaModeOverride: 'serialization' });
    const relaxed = Define(schema, { trackValidationMode: false }, { schemaModeOverride: 'serialization' });

    expect(() => registry.Hash(conflicting)).toThrowError(ConfigConflictError);
    expect(registry.Has(conflicting)).toBe(false);
    expect(registry.Hash(relaxed)).toHaveLength(12);
    expect(registry.Has(relaxed)).toBe(true);
  });
});
