/**
 * Lexer Errors
 */

import { NavexError } from '../types.js';
import type { NavexErrorCode, SourceLocation } from '../types.js';

export class LexerError extends NavexError {
  // Lexer errors always carry a location
  override readonly location: SourceLocation;

  constructor(
    code: NavexErrorCode,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    super({ code, message, location, context });
    this.name = 'LexerError';
    this.location = location;
  }
}
