/**
 * Binary and Unary Operators
 *
 * Pure operator semantics over evaluated operands. Each operand carries
 * the numeric kind it was computed as, so `1.0 / 2` divides as doubles
 * even though both values are integral.
 *
 * @internal
 */

import type { BinaryOp, ExprNode, UnaryOp } from '../../../types.js';
import { NAVEX_ERROR_CODES, RuntimeError } from '../../../types.js';
import type { NumericKind } from '../types.js';
import { deepEquals, getField, inferType, isMapLike } from '../values.js';

type ArithmeticOp = Exclude<BinaryOp, '||' | '&&' | '==' | '!=' | 'in'>;

/** An evaluated value and, for numbers, the kind it was computed as */
export interface Typed {
  readonly value: unknown;
  readonly kind: NumericKind | undefined;
}

/** Kind of a number taken from data: integral values are ints */
export function numericKindOf(value: unknown): NumericKind | undefined {
  if (typeof value !== 'number') return undefined;
  return Number.isInteger(value) ? 'int' : 'double';
}

export function typed(value: unknown): Typed {
  return { value, kind: numericKindOf(value) };
}

function typeName(operand: Typed): string {
  return operand.kind ?? inferType(operand.value);
}

function mismatch(op: string, left: Typed, right: Typed, node: ExprNode): RuntimeError {
  return RuntimeError.fromNode(
    NAVEX_ERROR_CODES.RUNTIME_TYPE_ERROR,
    `No matching overload for '${op}' applied to (${typeName(left)}, ${typeName(right)})`,
    node,
    { op, left: typeName(left), right: typeName(right) }
  );
}

function resultKind(left: Typed, right: Typed): NumericKind {
  if (left.kind === 'double' || right.kind === 'double') return 'double';
  if (left.kind === 'uint' && right.kind === 'uint') return 'uint';
  return 'int';
}

// ============================================================
// COMPARISON
// ============================================================

function compare(op: '<' | '<=' | '>' | '>=', a: Typed, b: Typed, node: ExprNode): boolean {
  const left = a.value;
  const right = b.value;
  let order: number;
  if (typeof left === 'number' && typeof right === 'number') {
    order = left - right;
  } else if (typeof left === 'string' && typeof right === 'string') {
    order = left < right ? -1 : left > right ? 1 : 0;
  } else if (typeof left === 'boolean' && typeof right === 'boolean') {
    order = Number(left) - Number(right);
  } else {
    throw mismatch(op, a, b, node);
  }

  switch (op) {
    case '<':
      return order < 0;
    case '<=':
      return order <= 0;
    case '>':
      return order > 0;
    case '>=':
      return order >= 0;
  }
}

function contains(a: Typed, b: Typed, node: ExprNode): boolean {
  const left = a.value;
  const right = b.value;
  if (Array.isArray(right)) {
    return right.some((item) => deepEquals(left, item));
  }
  if (isMapLike(right)) {
    if (typeof left !== 'string' && typeof left !== 'number') {
      throw mismatch('in', a, b, node);
    }
    return getField(right, String(left)).found;
  }
  throw mismatch('in', a, b, node);
}

// ============================================================
// ARITHMETIC
// ============================================================

function concatBytes(left: Uint8Array, right: Uint8Array): Uint8Array {
  const result = new Uint8Array(left.length + right.length);
  result.set(left, 0);
  result.set(right, left.length);
  return result;
}

function arithmetic(op: ArithmeticOp, a: Typed, b: Typed, node: ExprNode): Typed {
  if (op === '<' || op === '<=' || op === '>' || op === '>=') {
    return typed(compare(op, a, b, node));
  }

  const left = a.value;
  const right = b.value;

  if (op === '+') {
    if (typeof left === 'string' && typeof right === 'string') return typed(left + right);
    if (Array.isArray(left) && Array.isArray(right)) return typed([...left, ...right]);
    if (left instanceof Uint8Array && right instanceof Uint8Array) {
      return typed(concatBytes(left, right));
    }
  }

  if (typeof left !== 'number' || typeof right !== 'number') {
    throw mismatch(op, a, b, node);
  }

  const kind = resultKind(a, b);
  switch (op) {
    case '+':
      return { value: left + right, kind };
    case '-':
      return { value: left - right, kind };
    case '*':
      return { value: left * right, kind };
    case '/':
      if (kind === 'double') return { value: left / right, kind };
      if (right === 0) throw divisionByZero(node);
      return { value: Math.trunc(left / right), kind };
    case '%':
      if (kind === 'double') throw mismatch(op, a, b, node);
      if (right === 0) throw divisionByZero(node);
      return { value: left % right, kind };
  }
}

function divisionByZero(node: ExprNode): RuntimeError {
  return RuntimeError.fromNode(
    NAVEX_ERROR_CODES.RUNTIME_DIVISION_BY_ZERO,
    'Division by zero',
    node
  );
}

// ============================================================
// ENTRY POINTS
// ============================================================

/**
 * Apply a non-short-circuit binary operator.
 * `&&` and `||` are handled by the evaluator before operands are computed.
 */
export function applyBinary(
  op: Exclude<BinaryOp, '&&' | '||'>,
  left: Typed,
  right: Typed,
  node: ExprNode
): Typed {
  switch (op) {
    case '==':
      return typed(deepEquals(left.value, right.value));
    case '!=':
      return typed(!deepEquals(left.value, right.value));
    case 'in':
      return typed(contains(left, right, node));
    default:
      return arithmetic(op, left, right, node);
  }
}

export function applyUnary(op: UnaryOp, operand: Typed, node: ExprNode): Typed {
  const value = operand.value;
  if (op === '!') {
    if (typeof value !== 'boolean') {
      throw RuntimeError.fromNode(
        NAVEX_ERROR_CODES.RUNTIME_TYPE_ERROR,
        `No matching overload for '!' applied to (${typeName(operand)})`,
        node
      );
    }
    return typed(!value);
  }
  // Unsigned values have no negation
  if (typeof value !== 'number' || operand.kind === 'uint') {
    throw RuntimeError.fromNode(
      NAVEX_ERROR_CODES.RUNTIME_TYPE_ERROR,
      `No matching overload for '-' applied to (${typeName(operand)})`,
      node
    );
  }
  return { value: -value, kind: operand.kind };
}
