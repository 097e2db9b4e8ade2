/**
 * navex Completion Tests
 * Field, index and function candidates for partial input
 */

import { type Completion, createSession } from '../src/index.js';
import { describe, expect, it } from 'vitest';

const root = {
  count: 2,
  users: [{ name: 'Alice' }, { name: 'Bob' }],
  'first-name': 'x',
};

function displays(completions: Completion[]): string[] {
  return completions.map((c) => c.display);
}

describe('navex Completion', () => {
  const session = createSession();

  describe('fields', () => {
    it('completes a partial field of the root', () => {
      expect(session.filterCompletions('_.u', { currentNode: root })).toEqual([
        {
          text: '_.users',
          display: 'users',
          kind: 'field',
          detail: 'field: users',
          description: '',
          score: 100,
        },
      ]);
    });

    it('is deterministic', () => {
      const first = session.filterCompletions('_.', { currentNode: root });
      const second = session.filterCompletions('_.', { currentNode: root });
      expect(second).toEqual(first);
    });

    it('lists every key after a dot, then compatible functions', () => {
      const completions = session.filterCompletions('_.', { currentNode: root });
      expect(displays(completions)).toEqual([
        'count',
        'first-name',
        'users',
        'all()',
        'exists()',
        'exists_one()',
        'filter()',
        'has()',
        'keys()',
        'map()',
        'size()',
        'type()',
        'values()',
      ]);
    });

    it('brackets keys that are not identifiers', () => {
      const completions = session.filterCompletions('_.fi', { currentNode: root });
      expect(completions.map((c) => c.text)).toEqual(['_["first-name"]', '_.filter']);
    });

    it('escapes quotes in bracketed keys', () => {
      const data = { 'a"b': 1 };
      const [first] = session.filterCompletions('_.', { currentNode: data });
      expect(first?.text).toBe('_["a\\"b"]');
      expect(session.resolve(data, first?.text ?? '')).toEqual({ ok: true, value: 1 });
    });

    it('keeps numeric map keys as keys below them', () => {
      const data = { m: { '0': { x: 1 } } };
      for (const input of ['m.0.', '_.m.0.']) {
        const [first] = session.filterCompletions(input, { currentNode: data });
        expect(first?.display).toBe('x');
        expect(session.resolve(data, first?.text ?? '')).toEqual({ ok: true, value: 1 });
      }
      expect(session.filterCompletions('m.0.', { currentNode: data })[0]?.text).toBe(
        'm["0"].x'
      );
    });

    it('completes fields below an index', () => {
      const completions = session.filterCompletions('_.users[0].', { currentNode: root });
      expect(completions[0]?.text).toBe('_.users[0].name');
      expect(completions[0]?.kind).toBe('field');
    });

    it('keeps the expression before the completed operand', () => {
      const completions = session.filterCompletions('_.count > 1 && _.u', {
        currentNode: root,
      });
      expect(completions.map((c) => c.text)).toEqual(['_.count > 1 && _.users']);
    });

    it('completes relative paths without the root marker', () => {
      const completions = session.filterCompletions('users.', { currentNode: root });
      expect(completions.slice(0, 2).map((c) => c.text)).toEqual(['users[0]', 'users[1]']);
      expect(completions.find((c) => c.display === 'filter()')?.text).toBe('filter');
    });
  });

  describe('indexes', () => {
    it('offers each element of a list', () => {
      const completions = session.filterCompletions('_.users.', { currentNode: root });
      expect(completions.slice(0, 2)).toEqual([
        {
          text: '_.users[0]',
          display: '[0]',
          kind: 'index',
          detail: 'index: 0',
          description: '',
          score: 100,
        },
        {
          text: '_.users[1]',
          display: '[1]',
          kind: 'index',
          detail: 'index: 1',
          description: '',
          score: 100,
        },
      ]);
      expect(displays(completions.slice(2))).toEqual([
        'all()',
        'exists()',
        'exists_one()',
        'filter()',
        'flatten()',
        'map()',
        'size()',
        'slice()',
        'sort()',
        'type()',
      ]);
    });

    it('reads an unclosed numeric bracket as the index it opens', () => {
      const open = session.filterCompletions('_.users[0', { currentNode: root });
      expect(open.slice(0, 2).map((c) => c.text)).toEqual(['_.users[0]', '_.users[0].name']);
      expect(open).toEqual(session.filterCompletions('_.users[0]', { currentNode: root }));
    });

    it('ranks a completed trailing index first', () => {
      const completions = session.filterCompletions('_.users[0]', { currentNode: root });
      expect(completions[0]).toEqual({
        text: '_.users[0]',
        display: '_.users[0]',
        kind: 'index',
        detail: 'array index',
        description: '',
        score: 200,
      });
      expect(completions[1]?.text).toBe('_.users[0].name');
    });
  });

  describe('functions', () => {
    it('scores longer partials higher', () => {
      const completions = session.filterCompletions('_.users.f', { currentNode: root });
      expect(completions.map((c) => [c.text, c.score])).toEqual([
        ['_.users.filter', 60],
        ['_.users.flatten', 60],
      ]);
    });

    it('prefers methods over namespaced globals', () => {
      const completions = session.filterCompletions('', { currentNode: 3.7 });
      expect(displays(completions)).toEqual([
        'abs()',
        'ceil()',
        'floor()',
        'round()',
        'sqrt()',
        'type()',
      ]);
      expect(completions[0]?.text).toBe('_.abs');
    });

    it('describes functions with configured examples', () => {
      const filter = session
        .filterCompletions('_.users.fil', { currentNode: root })
        .find((c) => c.display === 'filter()');
      expect(filter?.description).toBe(
        'Keep the list elements (or map keys) that satisfy a predicate'
      );
      expect(filter?.detail).toBe(
        'Keep the list elements (or map keys) that satisfy a predicate\n' +
          'e.g. [1, 2, 3].filter(x, x > 1) => [2, 3] | _.users.filter(u, u.active)'
      );
      expect(filter?.functionRef?.name).toBe('filter');
    });

    it('offers only type() for bools', () => {
      expect(displays(session.filterCompletions('', { currentNode: true }))).toEqual(['type()']);
    });

    it('offers only type() for values of unknown type', () => {
      expect(displays(session.filterCompletions('', { currentNode: Symbol('opaque') }))).toEqual([
        'type()',
      ]);
      const declared = session.filterCompletions('_.missing.', {
        currentNode: root,
        currentType: 'timestamp',
      });
      expect(declared.map((c) => c.text)).toEqual(['_.missing.type']);
    });

    it('offers numeric functions for int and double fields', () => {
      const numeric = ['abs()', 'ceil()', 'floor()', 'round()', 'sqrt()', 'type()'];
      const data = { count: 2, ratio: 0.5 };
      expect(displays(session.filterCompletions('_.count.', { currentNode: data }))).toEqual(
        numeric
      );
      expect(displays(session.filterCompletions('_.ratio.', { currentNode: data }))).toEqual(
        numeric
      );
      for (const currentType of ['int', 'double']) {
        const completions = session.filterCompletions('_.missing.', {
          currentNode: data,
          currentType,
        });
        expect(displays(completions)).toEqual(numeric);
        expect(completions[0]?.text).toBe('_.missing.abs');
      }
    });

    it('uses the expression result type for the root', () => {
      const completions = session.filterCompletions('', {
        currentNode: { a: 1 },
        expressionResultType: 'string',
      });
      expect(displays(completions)).toContain('a');
      expect(displays(completions)).toContain('contains()');
      expect(displays(completions)).not.toContain('keys()');
    });
  });

  describe('context', () => {
    it('truncates input at the cursor', () => {
      const completions = session.filterCompletions('_.users.f && true', {
        currentNode: root,
        cursorPosition: 9,
      });
      expect(completions.map((c) => c.text)).toEqual(['_.users.filter', '_.users.flatten']);
    });

    it('takes the partial token from the caller', () => {
      const completions = session.filterCompletions('_.', {
        currentNode: root,
        partialToken: 'us',
      });
      expect(completions.map((c) => c.text)).toEqual(['_.users']);
    });

    it('returns nothing when the base cannot be resolved', () => {
      expect(session.filterCompletions('_.missing.', { currentNode: root })).toEqual([]);
    });

    it('falls back to the declared type for unresolved bases', () => {
      const completions = session.filterCompletions('_.missing.', {
        currentNode: root,
        currentType: 'string',
      });
      expect(displays(completions)).toEqual([
        'contains()',
        'endsWith()',
        'lowerAscii()',
        'matches()',
        'size()',
        'startsWith()',
        'type()',
        'upperAscii()',
      ]);
      expect(completions[0]?.text).toBe('_.missing.contains');
    });
  });
});
