/**
 * Evaluator Base Class
 *
 * Foundation for the evaluator: context access, depth accounting and
 * error construction shared by operators and macros.
 *
 * @internal
 */

import type { ExprNode, NavexErrorCode, SourceLocation } from '../../../types.js';
import { NAVEX_ERROR_CODES, RuntimeError } from '../../../types.js';
import type { RuntimeContext } from '../types.js';
import { inferType } from '../values.js';

/** Variable bindings visible to an expression (`_` plus macro variables) */
export type Scope = ReadonlyMap<string, unknown>;

/** Create a child scope with one extra binding */
export function bind(scope: Scope, name: string, value: unknown): Scope {
  const child = new Map(scope);
  child.set(name, value);
  return child;
}

export class EvaluatorBase {
  private depth = 0;

  constructor(protected readonly ctx: RuntimeContext) {}

  /**
   * Get source location from an AST node.
   * Used for error reporting with precise location information.
   */
  protected getNodeLocation(node?: ExprNode): SourceLocation | undefined {
    return node?.span.start;
  }

  /** Enter one nesting level; throws when maxDepth is exceeded */
  protected enter(node: ExprNode): void {
    this.depth++;
    if (this.depth > this.ctx.maxDepth) {
      throw RuntimeError.fromNode(
        NAVEX_ERROR_CODES.RUNTIME_LIMIT_EXCEEDED,
        `Maximum evaluation depth of ${this.ctx.maxDepth} exceeded`,
        node,
        { maxDepth: this.ctx.maxDepth }
      );
    }
  }

  protected leave(): void {
    if (this.depth > 0) this.depth--;
  }

  protected error(
    code: NavexErrorCode,
    message: string,
    node?: ExprNode,
    context?: Record<string, unknown>
  ): RuntimeError {
    return RuntimeError.fromNode(code, message, node, context);
  }

  /** RUNTIME_TYPE_ERROR naming the offending value's type */
  protected typeError(
    message: string,
    value: unknown,
    node?: ExprNode
  ): RuntimeError {
    const actual = inferType(value);
    return RuntimeError.fromNode(
      NAVEX_ERROR_CODES.RUNTIME_TYPE_ERROR,
      `${message}, got ${actual}`,
      node,
      { actual }
    );
  }

  /** Require a boolean operand */
  protected expectBool(value: unknown, what: string, node: ExprNode): boolean {
    if (typeof value !== 'boolean') {
      throw this.typeError(`${what} requires bool`, value, node);
    }
    return value;
  }
}
