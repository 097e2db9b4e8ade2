/**
 * Test utilities for expression engine tests
 */

import {
  createExpressionEngine,
  type EngineOptions,
} from '../../src/index.js';

/** Evaluate an expression against a root, throwing the engine's error */
export function evaluate(
  expression: string,
  root: unknown = {},
  options: EngineOptions = {}
): unknown {
  const result = createExpressionEngine(options).evaluate(expression, root);
  if (!result.ok) throw result.error;
  return result.value;
}

/** Evaluate an expression that must fail and return its error */
export function evaluationError(
  expression: string,
  root: unknown = {},
  options: EngineOptions = {}
): Error {
  const result = createExpressionEngine(options).evaluate(expression, root);
  if (result.ok) {
    throw new Error(`expected '${expression}' to fail, got ${String(result.value)}`);
  }
  return result.error;
}
