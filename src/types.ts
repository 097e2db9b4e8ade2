/**
 * navex Core Types
 * Source locations, the error hierarchy, tokens and expression AST nodes
 */

// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

// ============================================================
// ERROR HIERARCHY
// ============================================================

/** Error codes for programmatic handling */
export const NAVEX_ERROR_CODES = {
  // Lexer errors
  LEX_UNEXPECTED_CHARACTER: 'LEX_UNEXPECTED_CHARACTER',
  LEX_UNTERMINATED_STRING: 'LEX_UNTERMINATED_STRING',
  LEX_INVALID_ESCAPE: 'LEX_INVALID_ESCAPE',
  LEX_INVALID_NUMBER: 'LEX_INVALID_NUMBER',

  // Parse errors
  PARSE_UNEXPECTED_TOKEN: 'PARSE_UNEXPECTED_TOKEN',
  PARSE_INVALID_SYNTAX: 'PARSE_INVALID_SYNTAX',

  // Runtime errors
  RUNTIME_UNDEFINED_VARIABLE: 'RUNTIME_UNDEFINED_VARIABLE',
  RUNTIME_UNDEFINED_FUNCTION: 'RUNTIME_UNDEFINED_FUNCTION',
  RUNTIME_TYPE_ERROR: 'RUNTIME_TYPE_ERROR',
  RUNTIME_PROPERTY_NOT_FOUND: 'RUNTIME_PROPERTY_NOT_FOUND',
  RUNTIME_INDEX_OUT_OF_RANGE: 'RUNTIME_INDEX_OUT_OF_RANGE',
  RUNTIME_DIVISION_BY_ZERO: 'RUNTIME_DIVISION_BY_ZERO',
  RUNTIME_INVALID_PATTERN: 'RUNTIME_INVALID_PATTERN',
  RUNTIME_LIMIT_EXCEEDED: 'RUNTIME_LIMIT_EXCEEDED',

  // Navigation errors
  NAV_KEY_NOT_FOUND: 'NAV_KEY_NOT_FOUND',
  NAV_INDEX_OUT_OF_RANGE: 'NAV_INDEX_OUT_OF_RANGE',
  NAV_TYPE_MISMATCH: 'NAV_TYPE_MISMATCH',
  NAV_NOT_NAVIGABLE: 'NAV_NOT_NAVIGABLE',
  NAV_INVALID_SYNTAX: 'NAV_INVALID_SYNTAX',
  NAV_EVALUATION_ERROR: 'NAV_EVALUATION_ERROR',

  // Configuration errors
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const;

export type NavexErrorCode =
  (typeof NAVEX_ERROR_CODES)[keyof typeof NAVEX_ERROR_CODES];

/** Structured error data for host applications */
export interface NavexErrorData {
  readonly code: NavexErrorCode;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Base error class for all navex errors.
 * Provides structured data for host applications to format as needed.
 */
export class NavexError extends Error {
  readonly code: NavexErrorCode;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: NavexErrorData, options?: { cause?: unknown }) {
    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`, options);
    this.name = 'NavexError';
    this.code = data.code;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): NavexErrorData {
    return {
      code: this.code,
      message: this.message.replace(/ at \d+:\d+$/, ''), // Strip location suffix
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: NavexErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

/** Parse-time errors */
export class ParseError extends NavexError {
  override readonly location: SourceLocation;

  constructor(
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    super({
      code: NAVEX_ERROR_CODES.PARSE_INVALID_SYNTAX,
      message,
      location,
      context,
    });
    this.name = 'ParseError';
    this.location = location;
  }
}

/** Expression evaluation errors */
export class RuntimeError extends NavexError {
  constructor(
    code: NavexErrorCode,
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>
  ) {
    super({ code, message, location, context });
    this.name = 'RuntimeError';
  }

  /** Create from an AST node */
  static fromNode(
    code: NavexErrorCode,
    message: string,
    node?: { span: SourceSpan },
    context?: Record<string, unknown>
  ): RuntimeError {
    return new RuntimeError(code, message, node?.span.start, context);
  }
}

/** Configuration loading and validation errors */
export class ConfigError extends NavexError {
  constructor(
    code: NavexErrorCode,
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super({ code, message, context }, options);
    this.name = 'ConfigError';
  }
}

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  INT: 'INT',
  UINT: 'UINT',
  DOUBLE: 'DOUBLE',
  STRING: 'STRING',
  BYTES: 'BYTES',
  TRUE: 'TRUE',
  FALSE: 'FALSE',
  NULL: 'NULL',

  // Names
  IDENTIFIER: 'IDENTIFIER',
  IN: 'IN',

  // Punctuation
  DOT: 'DOT',
  COMMA: 'COMMA',
  COLON: 'COLON',
  QUESTION: 'QUESTION',
  LPAREN: 'LPAREN',
  RPAREN: 'RPAREN',
  LBRACKET: 'LBRACKET',
  RBRACKET: 'RBRACKET',
  LBRACE: 'LBRACE',
  RBRACE: 'RBRACE',

  // Operators
  PLUS: 'PLUS',
  MINUS: 'MINUS',
  STAR: 'STAR',
  SLASH: 'SLASH',
  PERCENT: 'PERCENT',
  BANG: 'BANG',
  LT: 'LT',
  LE: 'LE',
  GT: 'GT',
  GE: 'GE',
  EQ: 'EQ',
  NE: 'NE',
  AND: 'AND',
  OR: 'OR',

  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly span: SourceSpan;
}

// ============================================================
// EXPRESSION AST
// ============================================================

export type BinaryOp =
  | '||'
  | '&&'
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>='
  | 'in'
  | '+'
  | '-'
  | '*'
  | '/'
  | '%';

export type UnaryOp = '!' | '-';

/** Scalar literal payloads produced by the lexer */
export type LiteralValue = null | boolean | number | string | Uint8Array;

interface BaseNode {
  readonly span: SourceSpan;
}

export interface LiteralNode extends BaseNode {
  readonly type: 'Literal';
  readonly value: LiteralValue;
  /** Numeric literal kind, kept for type() reporting */
  readonly numericKind?: 'int' | 'uint' | 'double' | undefined;
}

export interface IdentNode extends BaseNode {
  readonly type: 'Ident';
  readonly name: string;
}

/** Field selection: operand.field */
export interface SelectNode extends BaseNode {
  readonly type: 'Select';
  readonly operand: ExprNode;
  readonly field: string;
}

/** Index access: operand[index] */
export interface IndexNode extends BaseNode {
  readonly type: 'Index';
  readonly operand: ExprNode;
  readonly index: ExprNode;
}

/** Global call f(args) (target null) or method call target.f(args) */
export interface CallNode extends BaseNode {
  readonly type: 'Call';
  readonly target: ExprNode | null;
  readonly name: string;
  readonly args: ExprNode[];
}

export interface ListNode extends BaseNode {
  readonly type: 'List';
  readonly elements: ExprNode[];
}

export interface MapEntryNode {
  readonly key: ExprNode;
  readonly value: ExprNode;
}

export interface MapNode extends BaseNode {
  readonly type: 'Map';
  readonly entries: MapEntryNode[];
}

export interface UnaryNode extends BaseNode {
  readonly type: 'Unary';
  readonly op: UnaryOp;
  readonly operand: ExprNode;
}

export interface BinaryNode extends BaseNode {
  readonly type: 'Binary';
  readonly op: BinaryOp;
  readonly left: ExprNode;
  readonly right: ExprNode;
}

/** Ternary: condition ? thenBranch : elseBranch */
export interface ConditionalNode extends BaseNode {
  readonly type: 'Conditional';
  readonly condition: ExprNode;
  readonly thenBranch: ExprNode;
  readonly elseBranch: ExprNode;
}

export type ExprNode =
  | LiteralNode
  | IdentNode
  | SelectNode
  | IndexNode
  | CallNode
  | ListNode
  | MapNode
  | UnaryNode
  | BinaryNode
  | ConditionalNode;

export type NodeType = ExprNode['type'];
