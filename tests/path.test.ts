/**
 * navex Path Tests
 * Segment parsing, reconstruction and normalization
 */

import {
  createSession,
  normalizePath,
  parsePath,
  reconstructPath,
} from '../src/index.js';
import { describe, expect, it } from 'vitest';

describe('navex Paths', () => {
  describe('parsePath', () => {
    it('splits fields, indexes and quoted keys', () => {
      expect(parsePath('regions.asia.countries[0]["postal-code"]')).toEqual([
        { kind: 'field', name: 'regions' },
        { kind: 'field', name: 'asia' },
        { kind: 'field', name: 'countries' },
        { kind: 'index', index: 0 },
        { kind: 'quotedKey', name: 'postal-code' },
      ]);
    });

    it('accepts single-quoted keys', () => {
      expect(parsePath("a['k']")).toEqual([
        { kind: 'field', name: 'a' },
        { kind: 'quotedKey', name: 'k' },
      ]);
    });

    it('keeps dotted numbers as field names', () => {
      expect(parsePath('items.0')).toEqual([
        { kind: 'field', name: 'items' },
        { kind: 'field', name: '0' },
      ]);
    });

    it('stops at a call and keeps the rest opaque', () => {
      expect(parsePath('a[0](x)')).toEqual([
        { kind: 'field', name: 'a' },
        { kind: 'index', index: 0 },
        { kind: 'opaque', expr: '(x)' },
      ]);
    });

    it('returns the segments read before an unterminated bracket', () => {
      expect(parsePath('items[0')).toEqual([{ kind: 'field', name: 'items' }]);
    });
  });

  describe('reconstructPath', () => {
    it('renders quoted keys with double quotes', () => {
      expect(reconstructPath(parsePath("a['k'].b[2]"))).toBe('a["k"].b[2]');
    });

    it('escapes quotes and backslashes in keys', () => {
      const segments = [
        { kind: 'field', name: 'a' },
        { kind: 'quotedKey', name: 'say "hi"\\now' },
      ] as const;
      const path = reconstructPath(segments);
      expect(path).toBe('a["say \\"hi\\"\\\\now"]');
      expect(parsePath(path)).toEqual(segments);
    });

    it('resolves escaped keys in both path modes', () => {
      const session = createSession();
      const root = { 'a"b': { 'c\\d': 1 } };
      const simple = reconstructPath([
        { kind: 'quotedKey', name: 'a"b' },
        { kind: 'quotedKey', name: 'c\\d' },
      ]);
      expect(simple).toBe('["a\\"b"]["c\\\\d"]');
      expect(session.resolve(root, simple)).toEqual({ ok: true, value: 1 });
      expect(session.resolve(root, `_${simple}`)).toEqual({ ok: true, value: 1 });
    });

    it('round-trips simple paths to the same value', () => {
      const session = createSession();
      const root = {
        regions: { asia: { countries: [{ 'postal-code': 'JP-100', name: 'Japan' }] } },
      };
      for (const path of [
        'regions.asia.countries[0]["postal-code"]',
        "regions['asia'].countries.0.name",
        'regions.asia',
      ]) {
        const original = session.resolve(root, path);
        const rebuilt = session.resolve(root, reconstructPath(parsePath(path)));
        expect(rebuilt).toEqual(original);
        expect(original.ok).toBe(true);
      }
    });
  });

  describe('normalizePath', () => {
    it('rewrites dotted numeric steps as brackets', () => {
      expect(normalizePath('items.0.tags')).toBe('items[0].tags');
    });
  });
});
