/**
 * Evaluator
 *
 * Walks an expression AST against a scope. Operators live in
 * operators.ts, macros in macros.ts; this class owns dispatch, access
 * and function calls.
 *
 * @internal
 */

import type {
  BinaryNode,
  CallNode,
  ExprNode,
  IndexNode,
  MapNode,
  SelectNode,
} from '../../../types.js';
import { NAVEX_ERROR_CODES, NavexError } from '../../../types.js';
import type { FunctionDefinition, NumericKind, RuntimeContext } from '../types.js';
import { getField, isMapLike } from '../values.js';
import { EvaluatorBase, type Scope } from './base.js';
import { GLOBAL_MACROS, METHOD_MACROS, type MacroHost } from './macros.js';
import { applyBinary, applyUnary, numericKindOf, typed, type Typed } from './operators.js';

/** Kind of a function result, from the declared return type */
function callResultKind(
  definition: FunctionDefinition,
  kinds: readonly (NumericKind | undefined)[],
  value: unknown
): NumericKind | undefined {
  if (typeof value !== 'number') return undefined;
  switch (definition.returnType) {
    case 'int':
    case 'uint':
    case 'double':
      return definition.returnType;
    case 'number':
      return kinds.includes('double') ? 'double' : numericKindOf(value);
    default:
      return numericKindOf(value);
  }
}

export class Evaluator extends EvaluatorBase implements MacroHost {
  evaluate(node: ExprNode, scope: Scope): unknown {
    return this.evaluateTyped(node, scope).value;
  }

  evaluateTyped(node: ExprNode, scope: Scope): Typed {
    this.enter(node);
    try {
      return this.dispatch(node, scope);
    } finally {
      this.leave();
    }
  }

  /** Evaluate a node that must produce a bool */
  truthy(node: ExprNode, scope: Scope, what: string): boolean {
    return this.expectBool(this.evaluate(node, scope), what, node);
  }

  private dispatch(node: ExprNode, scope: Scope): Typed {
    switch (node.type) {
      case 'Literal':
        return { value: node.value, kind: node.numericKind ?? numericKindOf(node.value) };
      case 'Ident':
        if (!scope.has(node.name)) {
          throw this.error(
            NAVEX_ERROR_CODES.RUNTIME_UNDEFINED_VARIABLE,
            `Undeclared reference to '${node.name}'`,
            node,
            { name: node.name }
          );
        }
        return typed(scope.get(node.name));
      case 'Select':
        return typed(this.evaluateSelect(node, scope));
      case 'Index':
        return typed(this.evaluateIndex(node, scope));
      case 'Call':
        return this.evaluateCall(node, scope);
      case 'List':
        return typed(node.elements.map((element) => this.evaluate(element, scope)));
      case 'Map':
        return typed(this.evaluateMap(node, scope));
      case 'Unary':
        return applyUnary(node.op, this.evaluateTyped(node.operand, scope), node);
      case 'Binary':
        return this.evaluateBinary(node, scope);
      case 'Conditional':
        return this.truthy(node.condition, scope, 'Conditional')
          ? this.evaluateTyped(node.thenBranch, scope)
          : this.evaluateTyped(node.elseBranch, scope);
    }
  }

  // ============================================================
  // ACCESS
  // ============================================================

  private evaluateSelect(node: SelectNode, scope: Scope): unknown {
    const operand = this.evaluate(node.operand, scope);
    if (!isMapLike(operand)) {
      throw this.typeError(
        `Cannot select field '${node.field}'`,
        operand,
        node
      );
    }
    const lookup = getField(operand, node.field);
    if (!lookup.found) {
      throw this.error(
        NAVEX_ERROR_CODES.RUNTIME_PROPERTY_NOT_FOUND,
        `No such key: ${node.field}`,
        node,
        { key: node.field }
      );
    }
    return lookup.value;
  }

  private evaluateIndex(node: IndexNode, scope: Scope): unknown {
    const operand = this.evaluate(node.operand, scope);
    const index = this.evaluate(node.index, scope);

    if (Array.isArray(operand)) {
      if (typeof index !== 'number' || !Number.isInteger(index)) {
        throw this.typeError('List index requires int', index, node);
      }
      if (index < 0 || index >= operand.length) {
        throw this.error(
          NAVEX_ERROR_CODES.RUNTIME_INDEX_OUT_OF_RANGE,
          `Index ${index} out of range`,
          node,
          { index, length: operand.length }
        );
      }
      return operand[index];
    }

    if (isMapLike(operand)) {
      if (typeof index !== 'string' && typeof index !== 'number') {
        throw this.typeError('Map key requires string or int', index, node);
      }
      const key = String(index);
      const lookup = getField(operand, key);
      if (!lookup.found) {
        throw this.error(
          NAVEX_ERROR_CODES.RUNTIME_PROPERTY_NOT_FOUND,
          `No such key: ${key}`,
          node,
          { key }
        );
      }
      return lookup.value;
    }

    throw this.typeError('Cannot index', operand, node);
  }

  // ============================================================
  // CONSTRUCTION
  // ============================================================

  private evaluateMap(node: MapNode, scope: Scope): Record<string, unknown> {
    const entries: [string, unknown][] = [];
    for (const entry of node.entries) {
      const key = this.evaluate(entry.key, scope);
      if (
        typeof key !== 'string' &&
        typeof key !== 'number' &&
        typeof key !== 'boolean'
      ) {
        throw this.typeError('Map key requires string, int or bool', key, entry.key);
      }
      entries.push([String(key), this.evaluate(entry.value, scope)]);
    }
    return Object.fromEntries(entries);
  }

  // ============================================================
  // OPERATORS
  // ============================================================

  private evaluateBinary(node: BinaryNode, scope: Scope): Typed {
    if (node.op === '&&') {
      return typed(
        this.truthy(node.left, scope, "'&&'") &&
          this.truthy(node.right, scope, "'&&'")
      );
    }
    if (node.op === '||') {
      return typed(
        this.truthy(node.left, scope, "'||'") ||
          this.truthy(node.right, scope, "'||'")
      );
    }
    const left = this.evaluateTyped(node.left, scope);
    const right = this.evaluateTyped(node.right, scope);
    return applyBinary(node.op, left, right, node);
  }

  // ============================================================
  // CALLS
  // ============================================================

  private evaluateCall(node: CallNode, scope: Scope): Typed {
    if (node.target === null) {
      const macro = GLOBAL_MACROS.get(node.name);
      if (macro) return typed(macro(this, node, scope));
      return this.invoke(this.lookup(node.name, node), [], node, scope);
    }

    const macro = METHOD_MACROS.get(node.name);
    if (macro) return typed(macro(this, node, scope));

    // Namespaced global: math.abs(x), base64.encode(b)
    const target = node.target;
    if (target.type === 'Ident' && !scope.has(target.name)) {
      const qualified = this.ctx.functions.get(`${target.name}.${node.name}`);
      if (qualified) return this.invoke(qualified, [], node, scope);
    }

    const definition = this.lookup(node.name, node);
    const receiver = this.evaluateTyped(target, scope);
    return this.invoke(definition, [receiver], node, scope);
  }

  private lookup(name: string, node: CallNode): FunctionDefinition {
    const definition = this.ctx.functions.get(name);
    if (!definition) {
      throw this.error(
        NAVEX_ERROR_CODES.RUNTIME_UNDEFINED_FUNCTION,
        `Undeclared reference to function '${name}'`,
        node,
        { name }
      );
    }
    return definition;
  }

  private invoke(
    definition: FunctionDefinition,
    leading: Typed[],
    node: CallNode,
    scope: Scope
  ): Typed {
    const args = [
      ...leading,
      ...node.args.map((arg) => this.evaluateTyped(arg, scope)),
    ];
    const kinds = args.map((arg) => arg.kind);
    let value: unknown;
    try {
      value = definition.fn(
        args.map((arg) => arg.value),
        this.getNodeLocation(node),
        kinds
      );
    } catch (error) {
      if (error instanceof NavexError) throw error;
      throw this.error(
        NAVEX_ERROR_CODES.RUNTIME_TYPE_ERROR,
        `${node.name}() failed: ${error instanceof Error ? error.message : String(error)}`,
        node,
        { name: node.name, cause: error }
      );
    }
    return { value, kind: callResultKind(definition, kinds, value) };
  }
}

// ============================================================
// EVALUATOR CACHE
// ============================================================

/**
 * Evaluator instances are cached per context. Entries are dropped when
 * the RuntimeContext is garbage collected.
 */
const evaluatorCache = new WeakMap<RuntimeContext, Evaluator>();

/**
 * Get or create an evaluator instance for a given RuntimeContext.
 *
 * @internal
 */
export function getEvaluator(ctx: RuntimeContext): Evaluator {
  let evaluator = evaluatorCache.get(ctx);
  if (!evaluator) {
    evaluator = new Evaluator(ctx);
    evaluatorCache.set(ctx, evaluator);
  }
  return evaluator;
}
