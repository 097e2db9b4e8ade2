/**
 * navex Module
 * Exports the session, navigator, completion, configuration and expression engine
 */

export { LexerError, tokenize } from './lexer/index.js';
export { parse } from './parser/index.js';
export {
  type CallableFn,
  type CompileResult,
  createExpressionEngine,
  createRuntimeContext,
  DEFAULT_MAX_DEPTH,
  deepEquals,
  type EngineOptions,
  type EvaluateResult,
  type ExpressionEngine,
  formatValue,
  type FunctionDefinition,
  type FunctionMetadata,
  getFunctions,
  inferType,
  isMapLike,
  type NumericKind,
  ROOT_IDENTIFIER,
  type RuntimeContext,
  toJson,
  toMetadata,
  type Value,
  type ValueType,
  VALUE_TYPES,
} from './runtime/index.js';

// Navigation
export { classify, isComplex, type PathMode } from './navigator/classify.js';
export {
  NavigationError,
  type NavigationErrorKind,
} from './navigator/errors.js';
export {
  type EngineSource,
  navigateSegments,
  navigateStep,
  Navigator,
  type NavigatorHooks,
  type ResolveEvent,
  type ResolveResult,
} from './navigator/navigator.js';
export {
  normalizePath,
  parsePath,
  type PathSegment,
  reconstructPath,
} from './navigator/path.js';
export {
  type ExternalRecord,
  RECORD_FIELDS,
  type RecordField,
} from './navigator/records.js';
export {
  type ColumnarData,
  detectShape,
  extractColumnarData,
  type Homogeneity,
  isHomogeneousArray,
  type Shape,
  type ShapeKind,
  stringify,
} from './navigator/shape.js';

// Completion
export {
  CompletionEngine,
  type CompletionEngineOptions,
  type CompletionSource,
} from './completion/engine.js';
export {
  isCompatibleWithType,
  normalizeFunctionName,
} from './completion/compatibility.js';
export {
  formatFunctionLines,
  formatFunctionOneLiner,
  formatFunctionSignature,
} from './completion/help.js';
export {
  categorizeFunction,
  type FunctionExample,
  FunctionRegistry,
  inferReturnType,
} from './completion/registry.js';
export type {
  Completion,
  CompletionContext,
  CompletionKind,
} from './completion/types.js';

// Configuration
export {
  type CompletionConfig,
  loadConfig,
  loadDefaultConfig,
  type NavexConfig,
  parseConfigDocument,
} from './config/config.js';

// Session
export {
  type CompletionEvent,
  createSession,
  type EngineChangeEvent,
  NavexSession,
  type ObservabilityCallbacks,
  type RegistryChangeEvent,
  type SessionCallbacks,
  type SessionErrorEvent,
  type SessionOptions,
} from './session.js';

export {
  ConfigError,
  NAVEX_ERROR_CODES,
  type NavexErrorCode,
  NavexError,
  type NavexErrorData,
  ParseError,
  RuntimeError,
  type SourceLocation,
  type SourceSpan,
} from './types.js';
export type { ExprNode, NodeType, Token, TokenType } from './types.js';
