import { describe, it, expect } from 'vitest';

import { flattenAllOf } from '../transitive-flattener.js';
import { valueToRaw } from '../../codegen/schema-document-emitter.js';
import { inline, reference } from '../../types/schema.js';
import { createTestContext, schema } from './helpers.js';

const ref = (name: string) => reference(`#/components/schemas/${name}`);

const root = {
  components: {
    schemas: {
      Leaf: { type: 'object', properties: { leaf: { type: 'string' } } },
      Mid: {
        allOf: [
          { $ref: '#/components/schemas/Leaf' },
          { properties: { mid: { type: 'integer' } } },
        ],
      },
      Base: { properties: { id: { type: 'integer' } }, required: ['id'] },
      Named: {
        allOf: [
          { $ref: '#/components/schemas/Base' },
          { properties: { name: { type: 'string' } } },
        ],
      },
      Self: { allOf: [{ $ref: '#/components/schemas/Self' }] },
      PingA: { allOf: [{ $ref: '#/components/schemas/PingB' }] },
      PingB: { allOf: [{ $ref: '#/components/schemas/PingA' }] },
    },
  },
};

const shared = {
  components: {
    schemas: {
      Outer: { allOf: [{ $ref: '#/components/schemas/Mid' }] },
      Mid: {
        allOf: [
          { $ref: '#/components/schemas/Leaf' },
          { properties: { mid: { type: 'integer' } } },
        ],
      },
      Leaf: { type: 'object', properties: { remote: { type: 'string' } } },
    },
  },
};

describe('flattenAllOf', () => {
  it('collapses nested compositions into one value', () => {
    const { context } = createTestContext(root);
    const flattened = flattenAllOf(
      [ref('Mid'), inline(schema({ properties: { top: { type: 'boolean' } } }))],
      context
    ).unwrap();

    expect(flattened.allOf).toBeUndefined();
    expect(valueToRaw(flattened)).toEqual({
      type: 'object',
      properties: {
        leaf: { type: 'string' },
        mid: { type: 'integer' },
        top: { type: 'boolean' },
      },
    });
  });

  it('flattens the composition of a lone member', () => {
    const { context } = createTestContext(root);
    const flattened = flattenAllOf([ref('Mid')], context).unwrap();

    expect(flattened.allOf).toBeUndefined();
    expect(flattened.properties?.keys()).toEqual(['leaf', 'mid']);
  });

  it('records each flattened level', () => {
    const { context, collector } = createTestContext(root);
    flattenAllOf(
      [ref('Mid'), inline(schema({ properties: { top: { type: 'boolean' } } }))],
      context
    ).unwrap();

    expect(collector.entries.map((entry) => entry.details)).toEqual([
      { members: 2, depth: 2 },
      { members: 2, depth: 1 },
    ]);
  });

  it('allows the same schema to appear in sibling compositions', () => {
    const { context, collector } = createTestContext(root);
    const flattened = flattenAllOf([ref('Base'), ref('Named')], context).unwrap();

    expect(valueToRaw(flattened)).toEqual({
      required: ['id', 'id'],
      properties: { id: { type: 'integer' }, name: { type: 'string' } },
    });
    expect(
      collector.entries.filter((entry) => entry.code === 'PROPERTY_OVERRIDDEN')
    ).toEqual([
      {
        code: 'PROPERTY_OVERRIDDEN',
        path: 'Test',
        details: { property: 'id', allOf: true },
      },
    ]);
  });

  it('resolves nested members inside their own document', () => {
    const { context, collector } = createTestContext(root, {
      'shared.json': shared,
    });
    const flattened = flattenAllOf(
      [
        reference('shared.json#/components/schemas/Outer'),
        inline(schema({ required: ['mid'] })),
      ],
      context
    ).unwrap();

    expect(valueToRaw(flattened)).toEqual({
      type: 'object',
      required: ['mid'],
      properties: { remote: { type: 'string' }, mid: { type: 'integer' } },
    });
    expect(
      collector.entries
        .filter((entry) => entry.code === 'EXTERNAL_REF_PROPAGATED')
        .map((entry) => entry.details?.ref)
    ).toEqual([
      'shared.json#/components/schemas/Outer',
      'shared.json#/components/schemas/Mid',
    ]);
  });

  it('rejects an empty list', () => {
    const { context } = createTestContext(root);
    const result = flattenAllOf([], context);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.kind).toBe('EmptyComposition');
    }
  });

  it('rejects a schema composing itself', () => {
    const { context } = createTestContext(root);
    const result = flattenAllOf([ref('Self')], context);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.kind).toBe('AllOfMergeFailed');
      expect(result.error.rootKind).toBe('CircularComposition');
    }
  });

  it('rejects mutually recursive compositions', () => {
    const { context } = createTestContext(root);
    const result = flattenAllOf([ref('PingA')], context);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.rootKind).toBe('CircularComposition');
    }
  });

  it('stops at the configured depth', () => {
    const { context } = createTestContext(root, {}, 1);
    const result = flattenAllOf([ref('Mid')], context);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.rootKind).toBe('CompositionDepthExceeded');
      expect(result.error.message).toBe(
        'error merging schemas for AllOf: allOf nesting exceeds 1 levels'
      );
    }
  });

  it('wraps member resolution failures', () => {
    const { context } = createTestContext(root);
    const result = flattenAllOf([ref('Leaf'), ref('Absent')], context);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.kind).toBe('AllOfMergeFailed');
      expect(result.error.stage).toBe('flatten');
      expect(result.error.message).toBe(
        'error merging schemas for AllOf: reference #/components/schemas/Absent does not resolve to a schema'
      );
      expect(result.error.rootKind).toBe('MissingSchemaValue');
    }
  });

  it('wraps merge conflicts between members', () => {
    const { context } = createTestContext(root);
    const result = flattenAllOf(
      [inline(schema({ default: 1 })), inline(schema({ default: 2 }))],
      context
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe(
        'error merging schemas for AllOf: merging two sets of defaults is undefined'
      );
      expect(result.error.rootKind).toBe('UndefinedDefaultMerge');
    }
  });
});
