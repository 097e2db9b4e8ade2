/**
 * navex Function Registry Tests
 */

import {
  categorizeFunction,
  createExpressionEngine,
  FunctionRegistry,
  type FunctionMetadata,
  inferReturnType,
} from '../src/index.js';
import { describe, expect, it } from 'vitest';

function meta(name: string, overrides: Partial<FunctionMetadata> = {}): FunctionMetadata {
  return {
    name,
    signature: `${name}()`,
    description: '',
    category: 'general',
    isMethod: false,
    returnType: 'dyn',
    paramTypes: [],
    examples: [],
    ...overrides,
  };
}

describe('navex Function Registry', () => {
  describe('load', () => {
    it('keeps the entry with more examples', () => {
      const registry = new FunctionRegistry();
      registry.load([
        meta('filter', { description: 'a much longer description' }),
        meta('filter', { examples: ['[1].filter(x, true)'] }),
      ]);
      expect(registry.getFunction('filter')?.examples).toEqual(['[1].filter(x, true)']);
    });

    it('breaks example ties by description length', () => {
      const registry = new FunctionRegistry();
      registry.load([meta('size', { description: 'short' }), meta('size', { description: 'much longer' })]);
      expect(registry.getFunction('size')?.description).toBe('much longer');
    });

    it('keeps the first entry on a full tie', () => {
      const registry = new FunctionRegistry();
      registry.load([meta('size', { signature: 'first' }), meta('size', { signature: 'second' })]);
      expect(registry.getFunction('size')?.signature).toBe('first');
    });

    it('is idempotent', () => {
      const functions = [meta('b'), meta('a', { description: 'A' }), meta('c')];
      const registry = new FunctionRegistry();
      registry.load(functions);
      const first = registry.getAll();
      registry.load(functions);
      expect(registry.size()).toBe(3);
      expect(registry.getAll()).toEqual(first);
    });

    it('replaces earlier contents', () => {
      const registry = new FunctionRegistry();
      registry.load([meta('old')]);
      registry.load([meta('new')]);
      expect(registry.getFunction('old')).toBeUndefined();
      expect(registry.size()).toBe(1);
    });
  });

  describe('queries', () => {
    const registry = new FunctionRegistry();
    registry.load([
      meta('upperAscii', { category: 'string', isMethod: true, description: 'Uppercase letters' }),
      meta('abs', { category: 'math', isMethod: true }),
      meta('custom', { category: 'custom' }),
      meta('now', { category: '' }),
      meta('keys', { category: 'map', isMethod: true }),
      meta('int', { category: 'conversion', description: 'Convert to an integer' }),
    ]);

    it('lists names alphabetically', () => {
      expect(registry.getAll().map((fn) => fn.name)).toEqual([
        'abs',
        'custom',
        'int',
        'keys',
        'now',
        'upperAscii',
      ]);
    });

    it('orders known categories first', () => {
      expect(registry.getCategories()).toEqual([
        'conversion',
        'string',
        'map',
        'math',
        'general',
        'custom',
      ]);
    });

    it('files empty categories under general', () => {
      expect(registry.getByCategory('general').map((fn) => fn.name)).toEqual(['now']);
      expect(registry.categoryCount('general')).toBe(1);
      expect(registry.categoryCount('missing')).toBe(0);
    });

    it('searches names and descriptions case-insensitively', () => {
      expect(registry.search('UPPER').map((fn) => fn.name)).toEqual(['upperAscii']);
      expect(registry.search('integer').map((fn) => fn.name)).toEqual(['int']);
      expect(registry.search('')).toHaveLength(6);
    });

    it('partitions methods and globals', () => {
      expect(registry.getMethods().map((fn) => fn.name)).toEqual(['abs', 'keys', 'upperAscii']);
      expect(registry.getGlobals().map((fn) => fn.name)).toEqual(['custom', 'int', 'now']);
    });
  });

  describe('supplement', () => {
    it('never downgrades a described entry', () => {
      const registry = new FunctionRegistry();
      registry.load([meta('filter', { description: 'Keep matching elements', examples: ['e'] })]);
      registry.supplement(['filter(x, cond) - weak']);
      expect(registry.getFunction('filter')?.description).toBe('Keep matching elements');
    });

    it('adds new entries with inferred metadata', () => {
      const registry = new FunctionRegistry();
      registry.supplement(['  toUpper(s) - Uppercase a string  ', '', 'weird']);
      expect(registry.getFunction('toUpper')).toEqual({
        name: 'toUpper',
        signature: 'toUpper(s)',
        description: 'Uppercase a string',
        category: 'string',
        isMethod: false,
        returnType: 'string',
        paramTypes: [],
        examples: [],
      });
      expect(registry.getFunction('weird')?.category).toBe('general');
      expect(registry.getFunction('weird')?.returnType).toBe('any');
      expect(registry.size()).toBe(2);
    });

    it('marks known method names', () => {
      const registry = new FunctionRegistry();
      registry.supplement(['startsWith(prefix) - Check a prefix']);
      expect(registry.getFunction('startsWith')?.isMethod).toBe(true);
    });

    it('replaces undescribed entries and moves their category', () => {
      const registry = new FunctionRegistry();
      registry.load([meta('foo')]);
      registry.supplement(['foo(a) - Check a list']);
      expect(registry.getFunction('foo')?.category).toBe('list');
      expect(registry.getFunction('foo')?.returnType).toBe('bool');
      expect(registry.getCategories()).toEqual(['list']);
      expect(registry.size()).toBe(1);
    });

    it('keeps names sorted as entries arrive', () => {
      const registry = new FunctionRegistry();
      registry.load([meta('b'), meta('d')]);
      registry.supplement(['c - third', 'a - first']);
      expect(registry.getAll().map((fn) => fn.name)).toEqual(['a', 'b', 'c', 'd']);
    });
  });

  describe('loadFromEngine', () => {
    it('merges functions, macros and configured documentation', () => {
      const registry = new FunctionRegistry();
      registry.loadFromEngine(createExpressionEngine(), {
        filter: { description: 'Custom filter', examples: ['[1].filter(x, true)'] },
        size: { examples: ['"ab".size() => 2'] },
        notRegistered: { description: 'ignored', examples: [] },
      });

      expect(registry.getFunction('filter')?.description).toBe('Custom filter');
      expect(registry.getFunction('filter')?.examples).toEqual(['[1].filter(x, true)']);
      expect(registry.getFunction('size')?.description).toBe('Length of a string, bytes, list or map');
      expect(registry.getFunction('size')?.examples).toEqual(['"ab".size() => 2']);
      expect(registry.getFunction('notRegistered')).toBeUndefined();
      expect(registry.getByCategory('encoding').map((fn) => fn.name)).toEqual([
        'base64.decode',
        'base64.encode',
      ]);
    });
  });

  describe('heuristics', () => {
    it.each([
      ['trimAll', '', 'string'],
      ['anything', 'returns a string', 'string'],
      ['flatten', '', 'list'],
      ['math.max', '', 'math'],
      ['matches', '', 'regex'],
      ['base64.encode', '', 'encoding'],
      ['keys', '', 'map'],
      ['now', '', 'general'],
    ])('categorizes %s (%s) as %s', (name, description, category) => {
      expect(categorizeFunction(name, description)).toBe(category);
    });

    it.each([
      ['Check whether x holds', 'bool'],
      ['Returns a string', 'string'],
      ['A list of items', 'list'],
      ['Builds a map', 'map'],
      ['Number of items', 'int'],
      ['Something else', 'any'],
    ])('infers the return type of "%s" as %s', (description, returnType) => {
      expect(inferReturnType(description)).toBe(returnType);
    });
  });
});
