/**
 * Function Registry
 *
 * Indexed store of function metadata for completion and help.
 * Names are kept sorted; categories group names for browsing.
 */

import type { ExpressionEngine } from '../runtime/core/types.js';
import type { FunctionMetadata } from './types.js';

/** Extra documentation for one function, keyed by name in configuration */
export interface FunctionExample {
  readonly description?: string | undefined;
  readonly examples: readonly string[];
}

/** Display order for well-known categories */
const CATEGORY_ORDER = [
  'conversion',
  'string',
  'list',
  'map',
  'math',
  'encoding',
  'datetime',
  'regex',
  'general',
] as const;

const DEFAULT_CATEGORY = 'general';

/** Names documented as receiver.name() when supplied as plain suggestions */
const KNOWN_METHODS: ReadonlySet<string> = new Set([
  'all',
  'contains',
  'endsWith',
  'exists',
  'exists_one',
  'filter',
  'flatten',
  'indexOf',
  'join',
  'keys',
  'lowerAscii',
  'map',
  'matches',
  'replace',
  'size',
  'slice',
  'sort',
  'split',
  'startsWith',
  'substring',
  'trim',
  'upperAscii',
  'values',
]);

function includesAny(text: string, needles: readonly string[]): boolean {
  return needles.some((needle) => text.includes(needle));
}

/** Guess a category from a function's name and description */
export function categorizeFunction(name: string, description: string): string {
  const n = name.toLowerCase();
  const d = description.toLowerCase();

  if (d.includes('string') || includesAny(n, ['string', 'upper', 'lower', 'trim', 'split', 'join'])) {
    return 'string';
  }
  if (includesAny(d, ['array', 'list']) || includesAny(n, ['filter', 'map', 'all', 'exists', 'flatten', 'slice'])) {
    return 'list';
  }
  if (d.includes('math') || includesAny(n, ['abs', 'ceil', 'floor', 'round', 'sqrt', 'min', 'max'])) {
    return 'math';
  }
  if (includesAny(n, ['regex', 'matches'])) return 'regex';
  if (includesAny(n, ['base64', 'encode', 'decode'])) return 'encoding';
  if (includesAny(n, ['keys', 'values', 'has'])) return 'map';
  return DEFAULT_CATEGORY;
}

/** Guess a return type from a description */
export function inferReturnType(description: string): string {
  const d = description.toLowerCase();
  if (includesAny(d, ['bool', 'check'])) return 'bool';
  if (d.includes('string')) return 'string';
  if (includesAny(d, ['array', 'list'])) return 'list';
  if (d.includes('map')) return 'map';
  if (includesAny(d, ['number', 'int'])) return 'int';
  return 'any';
}

/** Prefer the entry with more examples, then the longer description */
function isRicher(candidate: FunctionMetadata, existing: FunctionMetadata): boolean {
  if (candidate.examples.length !== existing.examples.length) {
    return candidate.examples.length > existing.examples.length;
  }
  return candidate.description.length > existing.description.length;
}

function insertSorted(names: string[], name: string): void {
  if (names.includes(name)) return;
  names.push(name);
  names.sort();
}

// ============================================================
// REGISTRY
// ============================================================

/**
 * Function metadata store.
 *
 * @example
 * ```typescript
 * const registry = new FunctionRegistry();
 * registry.load(engine.listFunctions());
 * registry.search('upper').map((fn) => fn.name); // ['upperAscii']
 * ```
 */
export class FunctionRegistry {
  private functions = new Map<string, FunctionMetadata>();
  private byCategory = new Map<string, string[]>();
  private allNames: string[] = [];

  /** Replace the contents; duplicates keep the richest entry */
  load(functions: readonly FunctionMetadata[]): void {
    const chosen = new Map<string, FunctionMetadata>();
    for (const fn of functions) {
      const existing = chosen.get(fn.name);
      if (existing === undefined || isRicher(fn, existing)) {
        chosen.set(fn.name, fn);
      }
    }

    this.functions = chosen;
    this.allNames = [...chosen.keys()].sort();
    this.byCategory = new Map();
    for (const name of this.allNames) {
      const fn = chosen.get(name);
      if (fn !== undefined) this.index(fn);
    }
  }

  /** Rebuild from an engine, then apply configured documentation */
  loadFromEngine(
    engine: ExpressionEngine,
    documentation: Readonly<Record<string, FunctionExample>> = {}
  ): void {
    this.load([...engine.listFunctions(), ...engine.listMacros()]);
    for (const [name, doc] of Object.entries(documentation)) {
      const fn = this.functions.get(name);
      if (fn === undefined) continue;
      this.functions.set(name, {
        ...fn,
        description:
          doc.description !== undefined && doc.description !== ''
            ? doc.description
            : fn.description,
        examples: doc.examples.length > 0 ? [...doc.examples] : fn.examples,
      });
    }
  }

  /**
   * Merge `"name(args) - description"` strings.
   * Entries already described are left alone.
   */
  supplement(suggestions: readonly string[]): void {
    for (const raw of suggestions) {
      const entry = raw.trim();
      if (entry === '') continue;

      const separator = entry.indexOf(' - ');
      const signature = (separator === -1 ? entry : entry.slice(0, separator)).trim();
      const description = separator === -1 ? '' : entry.slice(separator + 3).trim();

      const paren = signature.indexOf('(');
      const name = (paren > 0 ? signature.slice(0, paren) : signature).trim();
      if (name === '') continue;

      const existing = this.functions.get(name);
      if (existing !== undefined && existing.description !== '') continue;

      const fn: FunctionMetadata = {
        name,
        signature,
        description,
        category: categorizeFunction(name, description),
        isMethod: KNOWN_METHODS.has(name),
        returnType: inferReturnType(description),
        paramTypes: [],
        examples: [],
      };
      if (existing !== undefined) this.unindex(existing);
      this.functions.set(name, fn);
      insertSorted(this.allNames, name);
      this.index(fn);
    }
  }

  getFunction(name: string): FunctionMetadata | undefined {
    return this.functions.get(name);
  }

  /** All functions, alphabetically */
  getAll(): FunctionMetadata[] {
    return this.collect(this.allNames);
  }

  getByCategory(category: string): FunctionMetadata[] {
    return this.collect(this.byCategory.get(category) ?? []);
  }

  /** Known categories first in display order, then the rest as first seen */
  getCategories(): string[] {
    const known: string[] = CATEGORY_ORDER.filter((category) =>
      this.byCategory.has(category)
    );
    const others = [...this.byCategory.keys()].filter(
      (category) => !known.includes(category)
    );
    return [...known, ...others];
  }

  categoryCount(category: string): number {
    return this.byCategory.get(category)?.length ?? 0;
  }

  /** Case-insensitive substring match on name or description */
  search(query: string): FunctionMetadata[] {
    const needle = query.toLowerCase();
    if (needle === '') return this.getAll();
    return this.getAll().filter(
      (fn) =>
        fn.name.toLowerCase().includes(needle) ||
        fn.description.toLowerCase().includes(needle)
    );
  }

  getMethods(): FunctionMetadata[] {
    return this.getAll().filter((fn) => fn.isMethod);
  }

  getGlobals(): FunctionMetadata[] {
    return this.getAll().filter((fn) => !fn.isMethod);
  }

  size(): number {
    return this.functions.size;
  }

  private collect(names: readonly string[]): FunctionMetadata[] {
    const result: FunctionMetadata[] = [];
    for (const name of names) {
      const fn = this.functions.get(name);
      if (fn !== undefined) result.push(fn);
    }
    return result;
  }

  private index(fn: FunctionMetadata): void {
    const category = fn.category === '' ? DEFAULT_CATEGORY : fn.category;
    let names = this.byCategory.get(category);
    if (names === undefined) {
      names = [];
      this.byCategory.set(category, names);
    }
    insertSorted(names, fn.name);
  }

  private unindex(fn: FunctionMetadata): void {
    const category = fn.category === '' ? DEFAULT_CATEGORY : fn.category;
    const names = this.byCategory.get(category);
    if (names === undefined) return;
    const remaining = names.filter((name) => name !== fn.name);
    if (remaining.length === 0) {
      this.byCategory.delete(category);
    } else {
      this.byCategory.set(category, remaining);
    }
  }
}
