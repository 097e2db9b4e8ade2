/**
 * Tokenizer
 * Turns source text into a token list ending in EOF
 */

import type { SourceLocation, Token, TokenType } from '../types.js';
import { NAVEX_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import {
  charAt,
  consume,
  createCursor,
  type Cursor,
  exhausted,
  isDigit,
  isIdentifierStart,
  isQuote,
  isWhitespace,
  locate,
  lookahead,
  tokenFrom,
} from './cursor.js';
import { SINGLE_CHAR_OPERATORS, TWO_CHAR_OPERATORS } from './operators.js';
import { readIdentifier, readNumber, readString } from './readers.js';

/** Consume `length` characters as one token */
function consumeToken(
  cursor: Cursor,
  length: number,
  type: TokenType,
  value: string,
  start: SourceLocation
): Token {
  for (let i = 0; i < length; i++) consume(cursor);
  return tokenFrom(cursor, type, value, start);
}

function skipTrivia(cursor: Cursor): void {
  while (!exhausted(cursor)) {
    if (isWhitespace(charAt(cursor))) {
      consume(cursor);
    } else if (charAt(cursor) === '/' && charAt(cursor, 1) === '/') {
      // Line comment
      while (!exhausted(cursor) && charAt(cursor) !== '\n') consume(cursor);
    } else {
      return;
    }
  }
}

export function nextToken(cursor: Cursor): Token {
  skipTrivia(cursor);

  if (exhausted(cursor)) {
    return tokenFrom(cursor, TOKEN_TYPES.EOF, '', locate(cursor));
  }

  const start = locate(cursor);
  const ch = charAt(cursor);

  // String
  if (isQuote(ch)) {
    return readString(cursor);
  }

  // Bytes: b"..." or b'...'
  if ((ch === 'b' || ch === 'B') && isQuote(charAt(cursor, 1))) {
    return readString(cursor, true);
  }

  // Number (positive only - unary minus handled by parser)
  if (isDigit(ch)) {
    return readNumber(cursor);
  }

  // Identifier or keyword
  if (isIdentifierStart(ch)) {
    return readIdentifier(cursor);
  }

  // Longest operator wins: `<=` before `<`
  const twoChar = lookahead(cursor, 2);
  const twoCharType = TWO_CHAR_OPERATORS.get(twoChar);
  if (twoCharType !== undefined) {
    return consumeToken(cursor, 2, twoCharType, twoChar, start);
  }

  const singleCharType = SINGLE_CHAR_OPERATORS.get(ch);
  if (singleCharType !== undefined) {
    return consumeToken(cursor, 1, singleCharType, ch, start);
  }

  throw new LexerError(
    NAVEX_ERROR_CODES.LEX_UNEXPECTED_CHARACTER,
    `Unexpected character: ${ch}`,
    start
  );
}

export function tokenize(source: string): Token[] {
  const cursor = createCursor(source);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(cursor);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}
