/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ExprNode, Token } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import { type ParserState, check, createParserState, current } from './state.js';

/**
 * Parser class that converts tokens into an expression AST.
 *
 * Methods are organized across multiple files:
 * - parser-expr.ts: Ternary and binary precedence chain
 * - parser-postfix.ts: Field selection, indexing, method calls
 * - parser-literals.ts: Primaries, literals, lists, maps
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokens, { source });
 * const ast = parser.parse();
 * ```
 */
export class Parser {
  state: ParserState;

  constructor(tokens: Token[], options?: { source?: string }) {
    this.state = createParserState(tokens, options?.source ?? '');
  }

  /**
   * Parse tokens into a single expression.
   * Trailing tokens after a complete expression are an error.
   */
  parse(): ExprNode {
    const expr = this.parseExpression();
    if (!check(this.state, TOKEN_TYPES.EOF)) {
      const token = current(this.state);
      throw new ParseError(
        `Unexpected token '${token.value}'`,
        token.span.start,
        { token: token.type }
      );
    }
    return expr;
  }
}
