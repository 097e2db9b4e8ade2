/**
 * Runtime Context Factory
 *
 * Creates the runtime context and the default expression engine.
 * Public API for host applications.
 */

import { parse } from '../../parser/index.js';
import { BUILTIN_FUNCTIONS } from '../ext/builtins.js';
import { getEvaluator } from './eval/evaluator.js';
import { MACRO_METADATA } from './eval/macros.js';
import { getFunctions } from './introspection.js';
import type {
  EngineOptions,
  ExpressionEngine,
  FunctionDefinition,
  RuntimeContext,
} from './types.js';

/** Default maximum evaluation depth */
export const DEFAULT_MAX_DEPTH = 256;

/** Name of the identifier bound to the evaluated data */
export const ROOT_IDENTIFIER = '_';

const FUNCTION_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

/**
 * Create a runtime context.
 * Host functions are registered after the built-ins and replace any
 * built-in of the same name.
 */
export function createRuntimeContext(
  options: EngineOptions = {}
): RuntimeContext {
  const functions = new Map<string, FunctionDefinition>();

  for (const [name, definition] of Object.entries(BUILTIN_FUNCTIONS)) {
    functions.set(name, definition);
  }

  if (options.functions) {
    for (const [name, definition] of Object.entries(options.functions)) {
      if (!FUNCTION_NAME_PATTERN.test(name)) {
        throw new Error(
          `Invalid function name '${name}': expected identifier or namespace.identifier`
        );
      }
      if (typeof definition.fn !== 'function') {
        throw new Error(`Function '${name}' requires an fn implementation`);
      }
      functions.set(name, definition);
    }
  }

  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new Error(`maxDepth must be a positive integer, got ${maxDepth}`);
  }

  return { functions, maxDepth };
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Create the default expression engine.
 *
 * Errors from lexing, parsing and evaluation are returned as values;
 * neither compile() nor evaluate() throws.
 *
 * @example
 * ```typescript
 * const engine = createExpressionEngine();
 * const result = engine.evaluate('_.items.filter(x, x > 1)', { items: [1, 2, 3] });
 * // result: { ok: true, value: [2, 3] }
 * ```
 */
export function createExpressionEngine(
  options: EngineOptions = {}
): ExpressionEngine {
  const ctx = createRuntimeContext(options);

  return {
    compile(expression) {
      try {
        return { ok: true, ast: parse(expression) };
      } catch (error) {
        return { ok: false, error: toError(error) };
      }
    },

    evaluate(expression, root) {
      try {
        const ast = parse(expression);
        const scope = new Map<string, unknown>([[ROOT_IDENTIFIER, root]]);
        return { ok: true, value: getEvaluator(ctx).evaluate(ast, scope) };
      } catch (error) {
        return { ok: false, error: toError(error) };
      }
    },

    listFunctions() {
      return getFunctions(ctx);
    },

    listMacros() {
      return [...MACRO_METADATA];
    },
  };
}
