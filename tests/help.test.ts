/**
 * navex Function Help Tests
 */

import {
  formatFunctionLines,
  formatFunctionOneLiner,
  formatFunctionSignature,
  type FunctionMetadata,
} from '../src/index.js';
import { describe, expect, it } from 'vitest';

const size: FunctionMetadata = {
  name: 'size',
  signature: 'value.size() -> int',
  description: 'Length of a value',
  category: 'list',
  isMethod: true,
  returnType: 'int',
  paramTypes: ['dyn'],
  examples: [' [1, 2].size() => 2 ', '', '"abc".size() => 3', '{}.size() => 0'],
};

describe('navex Function Help', () => {
  it('falls back to the bare name without a signature', () => {
    expect(formatFunctionSignature({ ...size, signature: '  ' })).toBe('size()');
    expect(formatFunctionSignature(size)).toBe('value.size() -> int');
  });

  it('joins signature and description on one line', () => {
    expect(formatFunctionOneLiner(size)).toBe('value.size() -> int — Length of a value');
    expect(formatFunctionOneLiner({ ...size, description: '' })).toBe('value.size() -> int');
  });

  it('indents every non-blank example', () => {
    expect(formatFunctionLines(size)).toEqual([
      'value.size() -> int',
      'Length of a value',
      '  [1, 2].size() => 2',
      '  "abc".size() => 3',
      '  {}.size() => 0',
    ]);
  });

  it('limits examples', () => {
    expect(formatFunctionLines(size, 2)).toEqual([
      'value.size() -> int',
      'Length of a value',
      '  [1, 2].size() => 2',
      '  "abc".size() => 3',
    ]);
  });

  it('omits an empty description', () => {
    expect(formatFunctionLines({ ...size, description: '', examples: [] })).toEqual([
      'value.size() -> int',
    ]);
  });
});
