/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { SourceLocation, Token, TokenType } from '../types.js';
import { NAVEX_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import {
  charAt,
  consume,
  type Cursor,
  exhausted,
  isDigit,
  isHexDigit,
  isIdentifierPart,
  locate,
  tokenFrom,
} from './cursor.js';
import { KEYWORDS } from './operators.js';

/** Process escape sequence and return the unescaped character */
function processEscape(cursor: Cursor): string {
  const location = locate(cursor);
  const escaped = consume(cursor);
  switch (escaped) {
    case 'n':
      return '\n';
    case 'r':
      return '\r';
    case 't':
      return '\t';
    case '0':
      return '\0';
    case '\\':
    case '"':
    case "'":
    case '`':
      return escaped;
    case 'u': {
      let hex = '';
      for (let i = 0; i < 4; i++) {
        const ch = charAt(cursor);
        if (!isHexDigit(ch)) {
          throw new LexerError(
            NAVEX_ERROR_CODES.LEX_INVALID_ESCAPE,
            `Invalid unicode escape: \\u${hex}`,
            location
          );
        }
        hex += consume(cursor);
      }
      return String.fromCharCode(parseInt(hex, 16));
    }
    default:
      throw new LexerError(
        NAVEX_ERROR_CODES.LEX_INVALID_ESCAPE,
        `Invalid escape sequence: \\${escaped}`,
        location
      );
  }
}

/**
 * Read a single- or double-quoted string.
 * With `bytes` set the leading b prefix has already been seen.
 */
export function readString(cursor: Cursor, bytes = false): Token {
  const start = locate(cursor);
  if (bytes) consume(cursor); // consume b
  const quote = consume(cursor);

  let value = '';
  while (!exhausted(cursor) && charAt(cursor) !== quote) {
    if (charAt(cursor) === '\\') {
      consume(cursor); // consume backslash
      value += processEscape(cursor);
    } else if (charAt(cursor) === '\n') {
      throw new LexerError(
        NAVEX_ERROR_CODES.LEX_UNTERMINATED_STRING,
        'Unterminated string literal',
        start
      );
    } else {
      value += consume(cursor);
    }
  }

  if (exhausted(cursor)) {
    throw new LexerError(
      NAVEX_ERROR_CODES.LEX_UNTERMINATED_STRING,
      'Unterminated string literal',
      start
    );
  }
  consume(cursor); // consume closing quote

  const type = bytes ? TOKEN_TYPES.BYTES : TOKEN_TYPES.STRING;
  return tokenFrom(cursor, type, value, start);
}

/** Int or uint token; rejects values a double cannot hold exactly */
function integerToken(
  cursor: Cursor,
  type: TokenType,
  digits: string,
  radix: 10 | 16,
  start: SourceLocation
): Token {
  const value = Number.parseInt(digits, radix);
  if (!Number.isSafeInteger(value)) {
    throw new LexerError(
      NAVEX_ERROR_CODES.LEX_INVALID_NUMBER,
      `Integer literal out of range: ${cursor.source.slice(start.offset, cursor.pos)}`,
      start
    );
  }
  return tokenFrom(cursor, type, String(value), start);
}

/**
 * Read an int, uint (trailing u) or double literal.
 * Hex ints use the 0x prefix.
 */
export function readNumber(cursor: Cursor): Token {
  const start = locate(cursor);
  let value = '';

  if (charAt(cursor) === '0' && (charAt(cursor, 1) === 'x' || charAt(cursor, 1) === 'X')) {
    consume(cursor);
    consume(cursor);
    while (!exhausted(cursor) && isHexDigit(charAt(cursor))) {
      value += consume(cursor);
    }
    if (charAt(cursor) === 'u' || charAt(cursor) === 'U') {
      consume(cursor);
      return integerToken(cursor, TOKEN_TYPES.UINT, value, 16, start);
    }
    return integerToken(cursor, TOKEN_TYPES.INT, value, 16, start);
  }

  while (!exhausted(cursor) && isDigit(charAt(cursor))) {
    value += consume(cursor);
  }

  // After a dot the number is a numeric path step (a.0.1), never a fraction
  const afterDot = cursor.source[start.offset - 1] === '.';

  let isDouble = false;
  if (!afterDot && charAt(cursor) === '.' && isDigit(charAt(cursor, 1))) {
    isDouble = true;
    value += consume(cursor); // consume .
    while (!exhausted(cursor) && isDigit(charAt(cursor))) {
      value += consume(cursor);
    }
  }

  if (!afterDot && (charAt(cursor) === 'e' || charAt(cursor) === 'E')) {
    const sign = charAt(cursor, 1);
    const hasSign = sign === '+' || sign === '-';
    if (isDigit(charAt(cursor, hasSign ? 2 : 1))) {
      isDouble = true;
      value += consume(cursor); // consume e
      if (hasSign) value += consume(cursor);
      while (!exhausted(cursor) && isDigit(charAt(cursor))) {
        value += consume(cursor);
      }
    }
  }

  if (isDouble) {
    return tokenFrom(cursor, TOKEN_TYPES.DOUBLE, value, start);
  }
  if (charAt(cursor) === 'u' || charAt(cursor) === 'U') {
    consume(cursor);
    return integerToken(cursor, TOKEN_TYPES.UINT, value, 10, start);
  }
  return integerToken(cursor, TOKEN_TYPES.INT, value, 10, start);
}

export function readIdentifier(cursor: Cursor): Token {
  const start = locate(cursor);
  let value = '';

  while (!exhausted(cursor) && isIdentifierPart(charAt(cursor))) {
    value += consume(cursor);
  }

  const type = KEYWORDS.get(value) ?? TOKEN_TYPES.IDENTIFIER;
  return tokenFrom(cursor, type, value, start);
}
