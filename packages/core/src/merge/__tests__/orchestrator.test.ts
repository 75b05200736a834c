/**
 * allOf orchestration: strategy selection, folding, generator hand-off
 */

import { describe, it, expect } from 'vitest';
import { MergeOrchestrator } from '../orchestrator.js';
import {
  SchemaDocumentEmitter,
  type RawSchema,
} from '../../codegen/schema-document-emitter.js';
import type { TypeGenerator } from '../../codegen/types.js';
import { DocumentStore } from '../../resolver/document-store.js';
import {
  ConfigError,
  SchemaMergeError,
  type SchemaFoldError,
} from '../../types/errors.js';
import type { MergeOptions } from '../../types/options.js';
import { type Result, ok } from '../../types/result.js';
import { inline, reference, type SchemaSource } from '../../types/schema.js';
import { schema } from './helpers.js';

class RecordingGenerator implements TypeGenerator<string> {
  readonly calls: Array<{ source: SchemaSource; path: readonly string[] }> =
    [];

  generate(
    source: SchemaSource,
    path: readonly string[]
  ): Result<string, SchemaFoldError> {
    this.calls.push({ source, path });
    return ok(path.join('.'));
  }

  intersect(
    members: readonly string[],
    path: readonly string[]
  ): Result<string, SchemaFoldError> {
    return ok(`${members.join(' & ')} => ${path.join('.')}`);
  }
}

const root = {
  components: {
    schemas: {
      Named: {
        type: 'object',
        properties: { name: { type: 'string' } },
        required: ['name'],
      },
      Aged: {
        type: 'object',
        properties: { age: { type: 'integer' } },
      },
      Text: { type: 'string' },
      Count: { type: 'integer' },
      Composite: {
        allOf: [
          { $ref: '#/components/schemas/Named' },
          { $ref: '#/components/schemas/Aged' },
        ],
      },
    },
  },
};

const common = {
  components: {
    schemas: {
      Pet: {
        type: 'object',
        properties: { owner: { $ref: '#/components/schemas/Owner' } },
      },
      Outer: { allOf: [{ $ref: '#/components/schemas/Mid' }] },
      Mid: {
        allOf: [
          { $ref: '#/components/schemas/Pet' },
          { properties: { id: { type: 'integer' } } },
        ],
      },
    },
  },
};

const ref = (name: string) => reference(`#/components/schemas/${name}`);

function createOrchestrator(options?: MergeOptions): {
  orchestrator: MergeOrchestrator<string>;
  generator: RecordingGenerator;
} {
  const generator = new RecordingGenerator();
  const orchestrator = new MergeOrchestrator({
    resolver: new DocumentStore(root, { documents: { 'common.json': common } }),
    generator,
    options,
  });
  return { orchestrator, generator };
}

function documentOrchestrator(
  options?: MergeOptions
): MergeOrchestrator<RawSchema> {
  return new MergeOrchestrator({
    resolver: new DocumentStore(root, { documents: { 'common.json': common } }),
    generator: new SchemaDocumentEmitter(),
    options,
  });
}

describe('MergeOrchestrator', () => {
  it('rejects an empty allOf', () => {
    const { orchestrator, generator } = createOrchestrator();
    const result = orchestrator.mergeAllOf([], ['Pet']);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(SchemaMergeError);
      expect(result.error.message).toBe('allOf requires at least one schema');
    }
    expect(generator.calls).toEqual([]);
  });

  it('hands a single source to the generator unchanged', () => {
    const { orchestrator, generator } = createOrchestrator();
    const result = orchestrator.mergeAllOf([ref('Named')], ['Pet']);

    expect(result.unwrap()).toBe('Pet');
    expect(generator.calls).toEqual([{ source: ref('Named'), path: ['Pet'] }]);
    expect(orchestrator.diagnostics).toEqual([
      { code: 'SINGLE_SOURCE_PASSTHROUGH', path: 'Pet', details: undefined },
    ]);
  });

  it('merges several sources into one inline schema', () => {
    const orchestrator = documentOrchestrator();
    const result = orchestrator.mergeAllOf(
      [ref('Named'), ref('Aged'), inline(schema({ description: 'A pet' }))],
      ['Pet']
    );

    expect(result.unwrap()).toEqual({
      type: 'object',
      description: 'A pet',
      required: ['name'],
      properties: { name: { type: 'string' }, age: { type: 'integer' } },
    });
  });

  it('forwards the naming path to the generator', () => {
    const { orchestrator, generator } = createOrchestrator();
    orchestrator.mergeAllOf([ref('Named'), ref('Aged')], ['Pets', 'Item']);

    expect(generator.calls).toHaveLength(1);
    expect(generator.calls[0]?.path).toEqual(['Pets', 'Item']);
    expect(generator.calls[0]?.source.kind).toBe('inline');
  });

  it('flattens members carrying their own allOf', () => {
    const orchestrator = documentOrchestrator();
    const result = orchestrator.mergeAllOf(
      [ref('Composite'), inline(schema({ required: ['age'] }))],
      ['Pet']
    );

    expect(result.unwrap()).toEqual({
      type: 'object',
      required: ['name', 'age'],
      properties: { name: { type: 'string' }, age: { type: 'integer' } },
    });
  });

  it('wraps merge conflicts and skips generation', () => {
    const { orchestrator, generator } = createOrchestrator();
    const result = orchestrator.mergeAllOf([ref('Text'), ref('Count')], ['Pet']);

    expect(result.isErr()).toBe(true);
    if (result.isErr() && result.error instanceof SchemaMergeError) {
      expect(result.error.kind).toBe('AllOfMergeFailed');
      expect(result.error.stage).toBe('orchestrate');
      expect(result.error.message).toBe(
        'error merging schemas for AllOf: can not merge incompatible types'
      );
      expect(result.error.rootKind).toBe('IncompatibleTypes');
      expect(result.error.context?.path).toEqual(['Pet']);
    }
    expect(generator.calls).toEqual([]);
  });

  it('returns resolution failures as they are', () => {
    const { orchestrator } = createOrchestrator();
    const result = orchestrator.mergeAllOf([ref('Named'), ref('Missing')], ['Pet']);

    expect(result.isErr()).toBe(true);
    if (result.isErr() && result.error instanceof SchemaMergeError) {
      expect(result.error.kind).toBe('MissingSchemaValue');
    }
  });

  it('propagates references of external members', () => {
    const orchestrator = documentOrchestrator();
    const result = orchestrator.mergeAllOf(
      [
        reference('common.json#/components/schemas/Pet'),
        inline(schema({ required: ['owner'] })),
      ],
      ['Pet']
    );

    expect(result.unwrap()).toEqual({
      type: 'object',
      required: ['owner'],
      properties: {
        owner: { $ref: 'common.json#/components/schemas/Owner' },
      },
    });
    expect(orchestrator.diagnostics.map((d) => d.code)).toEqual([
      'EXTERNAL_REF_PROPAGATED',
    ]);
  });

  it('flattens nested compositions of an external document', () => {
    const orchestrator = documentOrchestrator();
    const result = orchestrator.mergeAllOf(
      [
        reference('common.json#/components/schemas/Outer'),
        inline(schema({ required: ['id'] })),
      ],
      ['Pet']
    );

    expect(result.unwrap()).toEqual({
      type: 'object',
      required: ['id'],
      properties: {
        owner: { $ref: 'common.json#/components/schemas/Owner' },
        id: { type: 'integer' },
      },
    });
  });

  describe('legacy strategy', () => {
    it('generates members separately and intersects them', () => {
      const { orchestrator, generator } = createOrchestrator({
        compatibility: { oldMergeSchemas: true },
      });
      const result = orchestrator.mergeAllOf([ref('Text'), ref('Count')], ['Pet']);

      expect(result.unwrap()).toBe('Pet.AllOf0 & Pet.AllOf1 => Pet');
      expect(generator.calls.map((call) => call.path)).toEqual([
        ['Pet', 'AllOf0'],
        ['Pet', 'AllOf1'],
      ]);
      expect(generator.calls.map((call) => call.source)).toEqual([
        ref('Text'),
        ref('Count'),
      ]);
      expect(orchestrator.diagnostics).toEqual([
        {
          code: 'LEGACY_MERGE_SELECTED',
          path: 'Pet',
          details: { members: 2 },
        },
      ]);
    });

    it('still passes a single member straight through', () => {
      const { orchestrator, generator } = createOrchestrator({
        compatibility: { oldMergeSchemas: true },
      });
      expect(orchestrator.mergeAllOf([ref('Text')], ['Pet']).unwrap()).toBe(
        'Pet'
      );
      expect(generator.calls).toEqual([{ source: ref('Text'), path: ['Pet'] }]);
    });

    it('rejects an empty list', () => {
      const { orchestrator } = createOrchestrator({
        compatibility: { oldMergeSchemas: true },
      });
      expect(orchestrator.mergeAllOf([], ['Pet']).isErr()).toBe(true);
    });
  });

  describe('options', () => {
    it('drops diagnostics when they are off', () => {
      const { orchestrator } = createOrchestrator({ diagnostics: 'off' });
      orchestrator.mergeAllOf([ref('Named')], ['Pet']);
      expect(orchestrator.diagnostics).toEqual([]);
    });

    it('keeps only the diagnostics of the last call', () => {
      const { orchestrator } = createOrchestrator();
      orchestrator.mergeAllOf([ref('Named')], ['First']);
      orchestrator.mergeAllOf([ref('Named'), ref('Aged')], ['Second']);
      expect(orchestrator.diagnostics).toEqual([]);
    });

    it('applies the depth guard', () => {
      const { orchestrator } = createOrchestrator({
        guards: { maxAllOfDepth: 1 },
      });
      const deep = inline(
        schema({ allOf: [{ allOf: [{ type: 'object' }] }] })
      );
      const result = orchestrator.mergeAllOf([deep, ref('Named')], ['Pet']);

      expect(result.isErr()).toBe(true);
      if (result.isErr() && result.error instanceof SchemaMergeError) {
        expect(result.error.rootKind).toBe('CompositionDepthExceeded');
      }
    });

    it('validates options up front', () => {
      expect(() =>
        createOrchestrator({ guards: { maxAllOfDepth: 0 } })
      ).toThrow(ConfigError);
    });
  });
});
