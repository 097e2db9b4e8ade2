/**
 * Source Cursor
 * Read position with line/column tracking, plus the character classes
 * the token readers test against.
 */

import type { SourceLocation, Token, TokenType } from '../types.js';

export interface Cursor {
  readonly source: string;
  pos: number;
  line: number;
  column: number;
}

export function createCursor(source: string): Cursor {
  return { source, pos: 0, line: 1, column: 1 };
}

export function locate(cursor: Cursor): SourceLocation {
  return { line: cursor.line, column: cursor.column, offset: cursor.pos };
}

/** Character `ahead` places past the cursor, or '' beyond the source */
export function charAt(cursor: Cursor, ahead = 0): string {
  return cursor.source.charAt(cursor.pos + ahead);
}

export function lookahead(cursor: Cursor, length: number): string {
  return cursor.source.slice(cursor.pos, cursor.pos + length);
}

export function exhausted(cursor: Cursor): boolean {
  return cursor.pos >= cursor.source.length;
}

/** Move past one character and return it */
export function consume(cursor: Cursor): string {
  const ch = cursor.source.charAt(cursor.pos);
  cursor.pos++;
  if (ch === '\n') {
    cursor.line++;
    cursor.column = 1;
  } else {
    cursor.column++;
  }
  return ch;
}

/** Token spanning from `start` to the cursor */
export function tokenFrom(
  cursor: Cursor,
  type: TokenType,
  value: string,
  start: SourceLocation
): Token {
  return { type, value, span: { start, end: locate(cursor) } };
}

// ============================================================
// CHARACTER CLASSES
// ============================================================

const DIGIT = /^[0-9]$/;
const HEX_DIGIT = /^[0-9A-Fa-f]$/;
const IDENTIFIER_START = /^[A-Za-z_]$/;
const IDENTIFIER_PART = /^[A-Za-z0-9_]$/;
const WHITESPACE = /^[ \t\r\n]$/;

export const isDigit = (ch: string): boolean => DIGIT.test(ch);
export const isHexDigit = (ch: string): boolean => HEX_DIGIT.test(ch);
export const isIdentifierStart = (ch: string): boolean => IDENTIFIER_START.test(ch);
export const isIdentifierPart = (ch: string): boolean => IDENTIFIER_PART.test(ch);
export const isWhitespace = (ch: string): boolean => WHITESPACE.test(ch);
export const isQuote = (ch: string): boolean => ch === '"' || ch === "'";
