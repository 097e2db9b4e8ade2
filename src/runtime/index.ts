/**
 * navex Runtime
 *
 * The default expression engine.
 *
 * Module Structure:
 * - core/: Evaluation
 *   - types.ts: Public types (ExpressionEngine, FunctionDefinition, EngineOptions)
 *   - values.ts: Value types, classification and formatting
 *   - context.ts: Runtime context and engine factory
 *   - introspection.ts: Function metadata
 *   - eval/: Evaluator, operators and macros (internal)
 * - ext/: Built-in function library
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  CallableFn,
  CompileResult,
  EngineOptions,
  EvaluateResult,
  ExpressionEngine,
  FunctionDefinition,
  NumericKind,
  RuntimeContext,
} from './core/types.js';

// ============================================================
// VALUE TYPES AND UTILITIES
// ============================================================

export type { Value, ValueRecord, ValueType } from './core/values.js';

export {
  deepEquals,
  formatValue,
  inferType,
  isMapLike,
  isValueType,
  mapEntries,
  mapKeys,
  getField,
  toJson,
  VALUE_TYPES,
} from './core/values.js';

// ============================================================
// ENGINE
// ============================================================

export {
  createExpressionEngine,
  createRuntimeContext,
  DEFAULT_MAX_DEPTH,
  ROOT_IDENTIFIER,
} from './core/context.js';

// ============================================================
// INTROSPECTION
// ============================================================

export type { FunctionMetadata } from './core/introspection.js';
export { getFunctions, toMetadata } from './core/introspection.js';
