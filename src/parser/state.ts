/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { SourceLocation, SourceSpan, Token, TokenType } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
  /** Original source text, used to slice spans back into text */
  readonly source: string;
}

export function createParserState(tokens: Token[], source = ''): ParserState {
  return { tokens, pos: 0, source };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  return peek(state, 0);
}

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const token = state.tokens[state.pos + offset];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** Most recently consumed token */
export function previous(state: ParserState): Token {
  return peek(state, state.pos > 0 ? -1 : 0);
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/** @internal */
export function expect(
  state: ParserState,
  type: TokenType,
  message: string
): Token {
  if (check(state, type)) return advance(state);
  const token = current(state);
  const hint = generateHint(type, token);
  const fullMessage = hint ? `${message}. ${hint}` : message;
  throw new ParseError(fullMessage, token.span.start, {
    expected: type,
    actual: token.type,
  });
}

// ============================================================
// ERROR HINTS
// ============================================================

const TYPO_HINTS: ReadonlyMap<string, string> = new Map([
  ['ture', 'true'],
  ['tru', 'true'],
  ['flase', 'false'],
  ['fals', 'false'],
  ['nul', 'null'],
  ['nill', 'null'],
]);

/**
 * Generate contextual hints for common parse errors.
 * @internal
 */
function generateHint(expectedType: TokenType, actualToken: Token): string | null {
  const actual = actualToken.type;

  if (expectedType === TOKEN_TYPES.RPAREN && actual === TOKEN_TYPES.EOF) {
    return 'Hint: Check for unclosed parenthesis';
  }
  if (expectedType === TOKEN_TYPES.RBRACE && actual === TOKEN_TYPES.EOF) {
    return 'Hint: Check for unclosed brace';
  }
  if (expectedType === TOKEN_TYPES.RBRACKET && actual === TOKEN_TYPES.EOF) {
    return 'Hint: Check for unclosed bracket';
  }

  if (actual === TOKEN_TYPES.IDENTIFIER) {
    const suggestion = TYPO_HINTS.get(actualToken.value.toLowerCase());
    if (suggestion) {
      return `Hint: Did you mean '${suggestion}'?`;
    }
  }

  return null;
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}
