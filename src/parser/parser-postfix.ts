/**
 * Parser Extension: Postfix Operations
 * Field selection, numeric steps, indexing and method calls
 */

import { Parser } from './parser.js';
import type { ExprNode } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  makeSpan,
  previous,
} from './state.js';

declare module './parser.js' {
  interface Parser {
    parsePostfix(): ExprNode;
    parseArguments(): ExprNode[];
  }
}

// ============================================================
// POSTFIX CHAIN
// ============================================================

Parser.prototype.parsePostfix = function (this: Parser): ExprNode {
  let expr = this.parsePrimary();

  for (;;) {
    if (check(this.state, TOKEN_TYPES.DOT)) {
      const dot = advance(this.state);
      const token = current(this.state);

      // .0 is a numeric index step
      if (token.type === TOKEN_TYPES.INT) {
        advance(this.state);
        expr = {
          type: 'Index',
          operand: expr,
          index: {
            type: 'Literal',
            value: Number(token.value),
            numericKind: 'int',
            span: token.span,
          },
          span: makeSpan(expr.span.start, token.span.end),
        };
        continue;
      }

      if (token.type !== TOKEN_TYPES.IDENTIFIER) {
        throw new ParseError(
          "Expected field name after '.'",
          token.type === TOKEN_TYPES.EOF ? dot.span.end : token.span.start,
          { actual: token.type }
        );
      }
      advance(this.state);

      if (check(this.state, TOKEN_TYPES.LPAREN)) {
        const args = this.parseArguments();
        expr = {
          type: 'Call',
          target: expr,
          name: token.value,
          args,
          span: makeSpan(expr.span.start, previous(this.state).span.end),
        };
        continue;
      }

      expr = {
        type: 'Select',
        operand: expr,
        field: token.value,
        span: makeSpan(expr.span.start, token.span.end),
      };
      continue;
    }

    if (check(this.state, TOKEN_TYPES.LBRACKET)) {
      advance(this.state);
      const index = this.parseExpression();
      const close = expect(
        this.state,
        TOKEN_TYPES.RBRACKET,
        "Expected ']' after index"
      );
      expr = {
        type: 'Index',
        operand: expr,
        index,
        span: makeSpan(expr.span.start, close.span.end),
      };
      continue;
    }

    return expr;
  }
};

// ============================================================
// ARGUMENTS
// ============================================================

/** Parse `( expr, ... )`, consuming both parentheses */
Parser.prototype.parseArguments = function (this: Parser): ExprNode[] {
  expect(this.state, TOKEN_TYPES.LPAREN, "Expected '('");
  const args: ExprNode[] = [];

  if (!check(this.state, TOKEN_TYPES.RPAREN)) {
    args.push(this.parseExpression());
    while (check(this.state, TOKEN_TYPES.COMMA)) {
      advance(this.state);
      args.push(this.parseExpression());
    }
  }

  expect(this.state, TOKEN_TYPES.RPAREN, "Expected ')' after arguments");
  return args;
};
