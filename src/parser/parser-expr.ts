/**
 * Parser Extension: Expression Parsing
 * Conditional, logical, relational and arithmetic precedence chain
 */

import { Parser } from './parser.js';
import type { BinaryOp, ExprNode, TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { advance, check, current, expect, makeSpan } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExprNode;
    parseConditional(): ExprNode;
    parseLogicalOr(): ExprNode;
    parseLogicalAnd(): ExprNode;
    parseRelation(): ExprNode;
    parseAdditive(): ExprNode;
    parseMultiplicative(): ExprNode;
    parseUnary(): ExprNode;
  }
}

// ============================================================
// OPERATOR TABLES
// ============================================================

const RELATION_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.EQ]: '==',
  [TOKEN_TYPES.NE]: '!=',
  [TOKEN_TYPES.LT]: '<',
  [TOKEN_TYPES.LE]: '<=',
  [TOKEN_TYPES.GT]: '>',
  [TOKEN_TYPES.GE]: '>=',
  [TOKEN_TYPES.IN]: 'in',
};

const ADDITIVE_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.PLUS]: '+',
  [TOKEN_TYPES.MINUS]: '-',
};

const MULTIPLICATIVE_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.STAR]: '*',
  [TOKEN_TYPES.SLASH]: '/',
  [TOKEN_TYPES.PERCENT]: '%',
};

// ============================================================
// EXPRESSION ENTRY
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): ExprNode {
  return this.parseConditional();
};

Parser.prototype.parseConditional = function (this: Parser): ExprNode {
  const condition = this.parseLogicalOr();
  if (!check(this.state, TOKEN_TYPES.QUESTION)) return condition;

  advance(this.state); // consume ?
  const thenBranch = this.parseLogicalOr();
  expect(this.state, TOKEN_TYPES.COLON, "Expected ':' in conditional");
  const elseBranch = this.parseConditional();

  return {
    type: 'Conditional',
    condition,
    thenBranch,
    elseBranch,
    span: makeSpan(condition.span.start, elseBranch.span.end),
  };
};

// ============================================================
// LOGICAL OPERATORS
// ============================================================

Parser.prototype.parseLogicalOr = function (this: Parser): ExprNode {
  let left = this.parseLogicalAnd();

  while (check(this.state, TOKEN_TYPES.OR)) {
    advance(this.state);
    const right = this.parseLogicalAnd();
    left = {
      type: 'Binary',
      op: '||',
      left,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
  }

  return left;
};

Parser.prototype.parseLogicalAnd = function (this: Parser): ExprNode {
  let left = this.parseRelation();

  while (check(this.state, TOKEN_TYPES.AND)) {
    advance(this.state);
    const right = this.parseRelation();
    left = {
      type: 'Binary',
      op: '&&',
      left,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
  }

  return left;
};

// ============================================================
// BINARY LEVELS
// ============================================================

function parseBinaryLevel(
  parser: Parser,
  ops: Partial<Record<TokenType, BinaryOp>>,
  next: () => ExprNode
): ExprNode {
  let left = next();

  for (;;) {
    const op = ops[current(parser.state).type];
    if (op === undefined) return left;
    advance(parser.state);
    const right = next();
    left = {
      type: 'Binary',
      op,
      left,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
  }
}

Parser.prototype.parseRelation = function (this: Parser): ExprNode {
  return parseBinaryLevel(this, RELATION_OPS, () => this.parseAdditive());
};

Parser.prototype.parseAdditive = function (this: Parser): ExprNode {
  return parseBinaryLevel(this, ADDITIVE_OPS, () =>
    this.parseMultiplicative()
  );
};

Parser.prototype.parseMultiplicative = function (this: Parser): ExprNode {
  return parseBinaryLevel(this, MULTIPLICATIVE_OPS, () => this.parseUnary());
};

// ============================================================
// UNARY
// ============================================================

Parser.prototype.parseUnary = function (this: Parser): ExprNode {
  if (check(this.state, TOKEN_TYPES.BANG, TOKEN_TYPES.MINUS)) {
    const token = advance(this.state);
    const operand = this.parseUnary();
    const op = token.type === TOKEN_TYPES.BANG ? '!' : '-';

    // Fold negative numeric literals so -1 stays a literal
    if (
      op === '-' &&
      operand.type === 'Literal' &&
      typeof operand.value === 'number' &&
      operand.numericKind !== 'uint'
    ) {
      return {
        type: 'Literal',
        value: -operand.value,
        numericKind: operand.numericKind,
        span: makeSpan(token.span.start, operand.span.end),
      };
    }

    return {
      type: 'Unary',
      op,
      operand,
      span: makeSpan(token.span.start, operand.span.end),
    };
  }

  return this.parsePostfix();
};
