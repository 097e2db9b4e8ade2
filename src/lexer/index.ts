/**
 * Lexer Module
 * Converts expression source text into tokens
 */

export { LexerError } from './errors.js';
export { createCursor, type Cursor } from './cursor.js';
export { nextToken, tokenize } from './tokenizer.js';
