import { describe, it, expect } from 'vitest';
import { renderCLIView, stripAnsi } from './render.js';
import type { CLIErrorView } from '@schemafold/core';
import { ErrorCode } from '@schemafold/core';

function view(overrides: Partial<CLIErrorView> = {}): CLIErrorView {
  return {
    title: 'Error E001: error merging schemas for AllOf: can not merge incompatible types',
    code: ErrorCode.INCOMPATIBLE_SCHEMAS,
    location: 'Location: Pet',
    field: 'type',
    causes: ['can not merge incompatible types'],
    colors: false,
    terminalWidth: 120,
    ...overrides,
  };
}

describe('renderCLIView', () => {
  it('renders title, location, field and causes', () => {
    expect(renderCLIView(view()).split('\n')).toEqual([
      '❌ Error E001: error merging schemas for AllOf: can not merge incompatible types',
      '📍 Location: Pet',
      'Field: type',
      '↳ caused by: can not merge incompatible types',
    ]);
  });

  it('omits empty sections', () => {
    const out = renderCLIView(
      view({
        title: 'Error E500: boom',
        code: ErrorCode.INTERNAL_ERROR,
        location: undefined,
        field: undefined,
        causes: [],
      })
    );
    expect(out).toBe('❌ Error E500: boom');
  });

  it('applies ANSI colors when enabled', () => {
    const out = renderCLIView(view({ colors: true }));
    expect(out.includes('\u001B[31m')).toBe(true);
    expect(out.includes('\u001B[2m')).toBe(true);
    expect(stripAnsi(out)).toBe(renderCLIView(view()));
  });

  it('wraps sections based on terminalWidth', () => {
    const out = renderCLIView(
      view({
        location: 'Location: #/components/schemas/Pet',
        field: undefined,
        causes: [],
        terminalWidth: 20,
      })
    );
    expect(out.split('\n').slice(1)).toEqual([
      '📍 Location:',
      '#/components/schemas/Pet',
    ]);
  });
});
