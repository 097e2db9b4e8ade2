/**
 * Parser Extension: Primary Expressions
 * Literals, identifiers, global calls, groups, lists and maps
 */

import { Parser } from './parser.js';
import type {
  ExprNode,
  ListNode,
  LiteralNode,
  MapEntryNode,
  MapNode,
  Token,
} from '../types.js';
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
    parsePrimary(): ExprNode;
    parseLiteral(): LiteralNode;
    parseList(): ListNode;
    parseMap(): MapNode;
  }
}

const encoder = new TextEncoder();

// ============================================================
// PRIMARY
// ============================================================

Parser.prototype.parsePrimary = function (this: Parser): ExprNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.INT:
    case TOKEN_TYPES.UINT:
    case TOKEN_TYPES.DOUBLE:
    case TOKEN_TYPES.STRING:
    case TOKEN_TYPES.BYTES:
    case TOKEN_TYPES.TRUE:
    case TOKEN_TYPES.FALSE:
    case TOKEN_TYPES.NULL:
      return this.parseLiteral();

    case TOKEN_TYPES.IDENTIFIER: {
      advance(this.state);
      if (check(this.state, TOKEN_TYPES.LPAREN)) {
        const args = this.parseArguments();
        return {
          type: 'Call',
          target: null,
          name: token.value,
          args,
          span: makeSpan(token.span.start, previous(this.state).span.end),
        };
      }
      return { type: 'Ident', name: token.value, span: token.span };
    }

    case TOKEN_TYPES.LPAREN: {
      advance(this.state);
      const inner = this.parseExpression();
      expect(this.state, TOKEN_TYPES.RPAREN, "Expected ')'");
      return inner;
    }

    case TOKEN_TYPES.LBRACKET:
      return this.parseList();

    case TOKEN_TYPES.LBRACE:
      return this.parseMap();

    default:
      throw unexpected(token);
  }
};

function unexpected(token: Token): ParseError {
  if (token.type === TOKEN_TYPES.EOF) {
    return new ParseError('Unexpected end of expression', token.span.start);
  }
  return new ParseError(`Unexpected token '${token.value}'`, token.span.start, {
    token: token.type,
  });
}

// ============================================================
// LITERALS
// ============================================================

Parser.prototype.parseLiteral = function (this: Parser): LiteralNode {
  const token = advance(this.state);
  const span = token.span;

  switch (token.type) {
    case TOKEN_TYPES.INT:
      return { type: 'Literal', value: Number(token.value), numericKind: 'int', span };
    case TOKEN_TYPES.UINT:
      return { type: 'Literal', value: Number(token.value), numericKind: 'uint', span };
    case TOKEN_TYPES.DOUBLE:
      return { type: 'Literal', value: Number(token.value), numericKind: 'double', span };
    case TOKEN_TYPES.STRING:
      return { type: 'Literal', value: token.value, span };
    case TOKEN_TYPES.BYTES:
      return { type: 'Literal', value: encoder.encode(token.value), span };
    case TOKEN_TYPES.TRUE:
      return { type: 'Literal', value: true, span };
    case TOKEN_TYPES.FALSE:
      return { type: 'Literal', value: false, span };
    case TOKEN_TYPES.NULL:
      return { type: 'Literal', value: null, span };
    default:
      throw unexpected(token);
  }
};

// ============================================================
// COLLECTIONS
// ============================================================

/** [a, b, c] with an optional trailing comma */
Parser.prototype.parseList = function (this: Parser): ListNode {
  const open = expect(this.state, TOKEN_TYPES.LBRACKET, "Expected '['");
  const elements: ExprNode[] = [];

  while (!check(this.state, TOKEN_TYPES.RBRACKET)) {
    elements.push(this.parseExpression());
    if (!check(this.state, TOKEN_TYPES.COMMA)) break;
    advance(this.state);
  }

  const close = expect(this.state, TOKEN_TYPES.RBRACKET, "Expected ']'");
  return {
    type: 'List',
    elements,
    span: makeSpan(open.span.start, close.span.end),
  };
};

/** {key: value, ...} with an optional trailing comma */
Parser.prototype.parseMap = function (this: Parser): MapNode {
  const open = expect(this.state, TOKEN_TYPES.LBRACE, "Expected '{'");
  const entries: MapEntryNode[] = [];

  while (!check(this.state, TOKEN_TYPES.RBRACE)) {
    const key = this.parseExpression();
    expect(this.state, TOKEN_TYPES.COLON, "Expected ':' after map key");
    const value = this.parseExpression();
    entries.push({ key, value });
    if (!check(this.state, TOKEN_TYPES.COMMA)) break;
    advance(this.state);
  }

  const close = expect(this.state, TOKEN_TYPES.RBRACE, "Expected '}'");
  return {
    type: 'Map',
    entries,
    span: makeSpan(open.span.start, close.span.end),
  };
};
