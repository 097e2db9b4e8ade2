/**
 * Macros
 *
 * Calls whose arguments are expressions rather than values:
 * - has(x.f): field presence test
 * - all / exists / exists_one: quantifiers over a list or map keys
 * - map / filter: comprehensions binding an iteration variable
 *
 * @internal
 */

import type { CallNode, ExprNode } from '../../../types.js';
import { NAVEX_ERROR_CODES, RuntimeError } from '../../../types.js';
import type { FunctionMetadata } from '../introspection.js';
import { getField, inferType, isMapLike, mapKeys } from '../values.js';
import { bind, type Scope } from './base.js';

/** The evaluator surface macros need */
export interface MacroHost {
  evaluate(node: ExprNode, scope: Scope): unknown;
  truthy(node: ExprNode, scope: Scope, what: string): boolean;
}

type Macro = (host: MacroHost, node: CallNode, scope: Scope) => unknown;

// ============================================================
// HELPERS
// ============================================================

function arity(node: CallNode, ...counts: number[]): void {
  if (!counts.includes(node.args.length)) {
    throw RuntimeError.fromNode(
      NAVEX_ERROR_CODES.RUNTIME_TYPE_ERROR,
      `${node.name}() expects ${counts.join(' or ')} arguments, got ${node.args.length}`,
      node
    );
  }
}

/** The iteration variable name: first argument must be a bare identifier */
function iterationVar(node: CallNode): string {
  const first = node.args[0];
  if (first?.type !== 'Ident') {
    throw RuntimeError.fromNode(
      NAVEX_ERROR_CODES.RUNTIME_TYPE_ERROR,
      `${node.name}() requires an identifier as its first argument`,
      node
    );
  }
  return first.name;
}

/** Elements of a list, or keys of a map */
function iterationRange(host: MacroHost, node: CallNode, scope: Scope): unknown[] {
  if (node.target === null) {
    throw RuntimeError.fromNode(
      NAVEX_ERROR_CODES.RUNTIME_TYPE_ERROR,
      `${node.name}() must be called as a method`,
      node
    );
  }
  const range = host.evaluate(node.target, scope);
  if (Array.isArray(range)) return range;
  if (isMapLike(range)) return mapKeys(range);
  throw RuntimeError.fromNode(
    NAVEX_ERROR_CODES.RUNTIME_TYPE_ERROR,
    `${node.name}() requires a list or map, got ${inferType(range)}`,
    node
  );
}

function argAt(node: CallNode, index: number): ExprNode {
  const arg = node.args[index];
  if (arg === undefined) {
    throw RuntimeError.fromNode(
      NAVEX_ERROR_CODES.RUNTIME_TYPE_ERROR,
      `${node.name}() is missing argument ${index + 1}`,
      node
    );
  }
  return arg;
}

// ============================================================
// MACRO TABLE
// ============================================================

const has: Macro = (host, node, scope) => {
  arity(node, 1);
  const arg = argAt(node, 0);
  if (node.target !== null || arg.type !== 'Select') {
    throw RuntimeError.fromNode(
      NAVEX_ERROR_CODES.RUNTIME_TYPE_ERROR,
      'has() requires a field selection argument',
      node
    );
  }
  const operand = host.evaluate(arg.operand, scope);
  if (!isMapLike(operand)) {
    throw RuntimeError.fromNode(
      NAVEX_ERROR_CODES.RUNTIME_TYPE_ERROR,
      `has() requires a map operand, got ${inferType(operand)}`,
      arg
    );
  }
  return getField(operand, arg.field).found;
};

const all: Macro = (host, node, scope) => {
  arity(node, 2);
  const name = iterationVar(node);
  const predicate = argAt(node, 1);
  return iterationRange(host, node, scope).every((item) =>
    host.truthy(predicate, bind(scope, name, item), 'all()')
  );
};

const exists: Macro = (host, node, scope) => {
  arity(node, 2);
  const name = iterationVar(node);
  const predicate = argAt(node, 1);
  return iterationRange(host, node, scope).some((item) =>
    host.truthy(predicate, bind(scope, name, item), 'exists()')
  );
};

const existsOne: Macro = (host, node, scope) => {
  arity(node, 2);
  const name = iterationVar(node);
  const predicate = argAt(node, 1);
  let count = 0;
  for (const item of iterationRange(host, node, scope)) {
    if (host.truthy(predicate, bind(scope, name, item), 'exists_one()')) {
      count++;
    }
  }
  return count === 1;
};

const map: Macro = (host, node, scope) => {
  arity(node, 2, 3);
  const name = iterationVar(node);
  const transform = argAt(node, node.args.length - 1);
  const guard = node.args.length === 3 ? argAt(node, 1) : null;
  const result: unknown[] = [];
  for (const item of iterationRange(host, node, scope)) {
    const itemScope = bind(scope, name, item);
    if (guard && !host.truthy(guard, itemScope, 'map()')) continue;
    result.push(host.evaluate(transform, itemScope));
  }
  return result;
};

const filter: Macro = (host, node, scope) => {
  arity(node, 2);
  const name = iterationVar(node);
  const predicate = argAt(node, 1);
  return iterationRange(host, node, scope).filter((item) =>
    host.truthy(predicate, bind(scope, name, item), 'filter()')
  );
};

/** Macros called as global functions */
export const GLOBAL_MACROS: ReadonlyMap<string, Macro> = new Map([['has', has]]);

/** Macros called on a receiver */
export const METHOD_MACROS: ReadonlyMap<string, Macro> = new Map([
  ['all', all],
  ['exists', exists],
  ['exists_one', existsOne],
  ['map', map],
  ['filter', filter],
]);

// ============================================================
// METADATA
// ============================================================

export const MACRO_METADATA: readonly FunctionMetadata[] = [
  {
    name: 'has',
    signature: 'has(map.field) -> bool',
    description: 'Test whether a field is present on a map',
    category: 'map',
    isMethod: false,
    returnType: 'bool',
    paramTypes: ['dyn'],
    examples: [],
  },
  {
    name: 'all',
    signature: 'list.all(x, predicate) -> bool',
    description: 'Test whether every element satisfies the predicate',
    category: 'list',
    isMethod: true,
    returnType: 'bool',
    paramTypes: ['ident', 'bool'],
    examples: [],
  },
  {
    name: 'exists',
    signature: 'list.exists(x, predicate) -> bool',
    description: 'Test whether any element satisfies the predicate',
    category: 'list',
    isMethod: true,
    returnType: 'bool',
    paramTypes: ['ident', 'bool'],
    examples: [],
  },
  {
    name: 'exists_one',
    signature: 'list.exists_one(x, predicate) -> bool',
    description: 'Test whether exactly one element satisfies the predicate',
    category: 'list',
    isMethod: true,
    returnType: 'bool',
    paramTypes: ['ident', 'bool'],
    examples: [],
  },
  {
    name: 'map',
    signature: 'list.map(x, [predicate,] expr) -> list',
    description: 'Transform each element, optionally filtering first',
    category: 'list',
    isMethod: true,
    returnType: 'list',
    paramTypes: ['ident', 'dyn'],
    examples: [],
  },
  {
    name: 'filter',
    signature: 'list.filter(x, predicate) -> list',
    description: 'Keep the elements that satisfy the predicate',
    category: 'list',
    isMethod: true,
    returnType: 'list',
    paramTypes: ['ident', 'bool'],
    examples: [],
  },
];
