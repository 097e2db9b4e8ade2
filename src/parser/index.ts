/**
 * navex Expression Parser
 * Main entry point and re-exports
 */

import { tokenize } from '../lexer/index.js';
import type { ExprNode } from '../types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-expr.js';
import './parser-postfix.js';
import './parser-literals.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Parse an expression into an AST.
 *
 * Throws LexerError or ParseError on the first syntax error.
 *
 * @example
 * ```typescript
 * const ast = parse('_.items.filter(x, x.price > 10)');
 * ```
 */
export function parse(source: string): ExprNode {
  const tokens = tokenize(source);
  const parser = new Parser(tokens, { source });
  return parser.parse();
}

// ============================================================
// RE-EXPORTS
// ============================================================

export { createParserState, type ParserState } from './state.js';
export { Parser } from './parser.js';
