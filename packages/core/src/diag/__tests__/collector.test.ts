import { describe, it, expect } from 'vitest';

import {
  DiagnosticCollector,
  NOOP_DIAGNOSTICS,
  formatDiagnostic,
} from '../collector.js';
import { MERGE_DIAGNOSTIC_CODES } from '../codes.js';

describe('DiagnosticCollector', () => {
  it('records entries under the joined path', () => {
    const collector = new DiagnosticCollector(['Pets', 'Item']);
    collector.emit('ALLOF_FLATTENED', { members: 2, depth: 1 });
    collector.emit('SINGLE_SOURCE_PASSTHROUGH');

    expect(collector.entries).toEqual([
      {
        code: 'ALLOF_FLATTENED',
        path: 'Pets/Item',
        details: { members: 2, depth: 1 },
      },
      { code: 'SINGLE_SOURCE_PASSTHROUGH', path: 'Pets/Item' },
    ]);
  });

  it('drops everything when off', () => {
    const collector = new DiagnosticCollector(['Pet'], 'off');
    collector.emit('PROPERTY_OVERRIDDEN', { property: 'id', allOf: true });
    expect(collector.entries).toEqual([]);
  });

  it('provides a sink that ignores emits', () => {
    expect(() => NOOP_DIAGNOSTICS.emit('ALLOF_FLATTENED')).not.toThrow();
  });
});

describe('formatDiagnostic', () => {
  it('formats code, path and details on one line', () => {
    expect(
      formatDiagnostic({
        code: 'PROPERTY_OVERRIDDEN',
        path: 'Pet',
        details: { property: 'id', allOf: true },
      })
    ).toBe('PROPERTY_OVERRIDDEN Pet {"property":"id","allOf":true}');
  });

  it('names the root path explicitly', () => {
    expect(
      formatDiagnostic({ code: 'LEGACY_MERGE_SELECTED', path: '' })
    ).toBe('LEGACY_MERGE_SELECTED <root>');
  });

  it('exposes every code under its own name', () => {
    for (const [key, value] of Object.entries(MERGE_DIAGNOSTIC_CODES)) {
      expect(value).toBe(key);
    }
  });
});
