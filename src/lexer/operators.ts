/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: ReadonlyMap<string, TokenType> = new Map([
  ['&&', TOKEN_TYPES.AND],
  ['||', TOKEN_TYPES.OR],
  ['==', TOKEN_TYPES.EQ],
  ['!=', TOKEN_TYPES.NE],
  ['<=', TOKEN_TYPES.LE],
  ['>=', TOKEN_TYPES.GE],
]);

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: ReadonlyMap<string, TokenType> = new Map([
  ['.', TOKEN_TYPES.DOT],
  [',', TOKEN_TYPES.COMMA],
  [':', TOKEN_TYPES.COLON],
  ['?', TOKEN_TYPES.QUESTION],
  ['(', TOKEN_TYPES.LPAREN],
  [')', TOKEN_TYPES.RPAREN],
  ['[', TOKEN_TYPES.LBRACKET],
  [']', TOKEN_TYPES.RBRACKET],
  ['{', TOKEN_TYPES.LBRACE],
  ['}', TOKEN_TYPES.RBRACE],
  ['+', TOKEN_TYPES.PLUS],
  ['-', TOKEN_TYPES.MINUS],
  ['*', TOKEN_TYPES.STAR],
  ['/', TOKEN_TYPES.SLASH],
  ['%', TOKEN_TYPES.PERCENT],
  ['!', TOKEN_TYPES.BANG],
  ['<', TOKEN_TYPES.LT],
  ['>', TOKEN_TYPES.GT],
]);

/** Keyword lookup table */
export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ['true', TOKEN_TYPES.TRUE],
  ['false', TOKEN_TYPES.FALSE],
  ['null', TOKEN_TYPES.NULL],
  ['in', TOKEN_TYPES.IN],
]);
