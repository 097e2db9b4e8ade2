/**
 * navex Shape Tests
 * Shape detection, homogeneity and columnar extraction
 */

import {
  detectShape,
  extractColumnarData,
  isHomogeneousArray,
  RECORD_FIELDS,
  stringify,
} from '../src/index.js';
import { describe, expect, it } from 'vitest';

describe('navex Shapes', () => {
  describe('detectShape', () => {
    it('treats arrays with differing key sets as plain arrays', () => {
      expect(detectShape([{ name: 'a' }, { title: 'b' }])).toEqual({ kind: 'array', length: 2 });
    });

    it('reports homogeneous arrays with sorted fields', () => {
      expect(detectShape([{ b: 1, a: 2 }, { a: 3, b: 4 }])).toEqual({
        kind: 'homogeneousArray',
        length: 2,
        fields: ['a', 'b'],
      });
    });

    it('classifies empty arrays, maps and scalars', () => {
      expect(detectShape([])).toEqual({ kind: 'array', length: 0 });
      expect(detectShape({ a: 1, b: 2 })).toEqual({ kind: 'map', length: 2 });
      expect(detectShape('x')).toEqual({ kind: 'scalar', length: 0 });
      expect(detectShape(null)).toEqual({ kind: 'scalar', length: 0 });
    });

    it('counts visible fields of external records', () => {
      class Session {
        [RECORD_FIELDS]() {
          return [
            { name: 'id', value: 1 },
            { name: 'token', declaredName: '-', value: 'test-token' },
            { name: '#cache', value: [] },
          ];
        }
      }
      expect(detectShape(new Session())).toEqual({ kind: 'map', length: 1 });
    });
  });

  describe('isHomogeneousArray', () => {
    it('rejects records without keys', () => {
      expect(isHomogeneousArray([{}, {}])).toEqual({ homogeneous: false });
    });

    it('rejects scalar elements', () => {
      expect(isHomogeneousArray([1, 2])).toEqual({ homogeneous: false });
      expect(isHomogeneousArray([{ a: 1 }, 2])).toEqual({ homogeneous: false });
    });

    it('rejects differing key sets of equal size', () => {
      expect(isHomogeneousArray([{ a: 1 }, { b: 1 }])).toEqual({ homogeneous: false });
    });
  });

  describe('extractColumnarData', () => {
    it('orders preferred columns first and stringifies cells', () => {
      const rows = [
        { id: 1, name: 'a\nb', tags: ['x'] },
        { id: 2, name: null, tags: [] },
      ];
      expect(extractColumnarData(rows, ['name'])).toEqual({
        columns: ['name', 'id', 'tags'],
        rows: [
          ['a\\nb', '1', '["x"]'],
          ['', '2', '[]'],
        ],
      });
    });

    it('ignores preferred columns that do not exist', () => {
      expect(extractColumnarData([{ b: 1, a: 2 }], ['zzz'])?.columns).toEqual(['a', 'b']);
    });

    it('returns null for other values', () => {
      expect(extractColumnarData('x')).toBeNull();
      expect(extractColumnarData([{ a: 1 }, { b: 2 }])).toBeNull();
    });
  });

  describe('stringify', () => {
    it('keeps strings on one line', () => {
      expect(stringify('a\r\nb\tc\rd')).toBe('a\\nb\\tc\\nd');
    });

    it('renders scalars and containers', () => {
      expect(stringify(null)).toBe('');
      expect(stringify(true)).toBe('true');
      expect(stringify(2.5)).toBe('2.5');
      expect(stringify({ a: [1, 2] })).toBe('{"a":[1,2]}');
      expect(stringify(new Uint8Array([104, 105]))).toBe('"aGk="');
    });
  });
});
