/**
 * Completion Types
 * Candidates and caller context for completion requests
 */

import type { FunctionMetadata } from '../runtime/core/introspection.js';

export type { FunctionMetadata };

export type CompletionKind = 'field' | 'index' | 'function' | 'keyword' | 'variable';

/** A single completion candidate */
export interface Completion {
  /** Replacement for the whole input */
  readonly text: string;
  readonly display: string;
  readonly kind: CompletionKind;
  readonly detail: string;
  /** Longer text for a help panel */
  readonly description: string;
  /** Higher sorts first */
  readonly score: number;
  readonly functionRef?: FunctionMetadata | undefined;
}

/**
 * What the caller knows about the current view.
 * Every field is optional; an empty context completes against `undefined`.
 */
export interface CompletionContext {
  /** Data node currently displayed */
  currentNode?: unknown;
  /** Declared type of currentNode, e.g. "map" or "list" */
  currentType?: string | undefined;
  /** Cursor offset into the input; text after it is ignored */
  cursorPosition?: number | undefined;
  /** Result of the last successful evaluation */
  expressionResult?: unknown;
  expressionResultType?: string | undefined;
  /** Text typed after the last operator; overrides the derived partial */
  partialToken?: string | undefined;
  /** Completion was triggered right after a `.` */
  isAfterDot?: boolean | undefined;
}
