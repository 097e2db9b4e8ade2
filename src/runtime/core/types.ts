/**
 * Runtime Types
 *
 * Public types for the expression engine and its function library.
 * These types are the primary interface for host applications.
 */

import type { ExprNode, SourceLocation } from '../../types.js';
import type { FunctionMetadata } from './introspection.js';

/** How a number was computed: `1.0` is a double even though it is integral */
export type NumericKind = 'int' | 'uint' | 'double';

/**
 * Native implementation of a function or method.
 * Method calls receive their receiver as the first argument. `kinds`
 * runs parallel to `args` and is undefined for non-numeric arguments.
 */
export type CallableFn = (
  args: unknown[],
  location?: SourceLocation,
  kinds?: readonly (NumericKind | undefined)[]
) => unknown;

/** A function plus the metadata completion and help display */
export interface FunctionDefinition {
  readonly fn: CallableFn;
  /** Call signature shown in help, e.g. `list.slice(start, end) -> list` */
  readonly signature?: string | undefined;
  readonly description?: string | undefined;
  /** Display category, defaults to `general` */
  readonly category?: string | undefined;
  /** Whether the function is documented as receiver.fn() */
  readonly isMethod?: boolean | undefined;
  /**
   * `int`, `uint` and `double` fix the kind of a numeric result; `number`
   * yields a double when any argument is one
   */
  readonly returnType?: string | undefined;
  readonly paramTypes?: readonly string[] | undefined;
  readonly examples?: readonly string[] | undefined;
}

/** Outcome of compiling an expression */
export type CompileResult =
  | { readonly ok: true; readonly ast: ExprNode }
  | { readonly ok: false; readonly error: Error };

/** Outcome of evaluating an expression */
export type EvaluateResult =
  | { readonly ok: true; readonly value: unknown }
  | { readonly ok: false; readonly error: Error };

/**
 * Expression engine capability consumed by navigation and completion.
 *
 * Implementations evaluate with the root identifier `_` bound to the data
 * passed to evaluate(). Compile results expose the navex AST so completion
 * can locate a trailing field selection.
 */
export interface ExpressionEngine {
  compile(expression: string): CompileResult;
  evaluate(expression: string, root: unknown): EvaluateResult;
  listFunctions(): FunctionMetadata[];
  listMacros(): FunctionMetadata[];
}

/** Options for creating the default expression engine */
export interface EngineOptions {
  /** Host functions, merged over the built-ins (same name replaces) */
  functions?: Record<string, FunctionDefinition>;
  /** Maximum evaluation depth (default: 256) */
  maxDepth?: number;
}

/** Evaluation context shared by one engine */
export interface RuntimeContext {
  readonly functions: ReadonlyMap<string, FunctionDefinition>;
  readonly maxDepth: number;
}
