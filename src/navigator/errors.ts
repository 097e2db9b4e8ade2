/**
 * Navigation Errors
 */

import {
  NAVEX_ERROR_CODES,
  NavexError,
  type NavexErrorCode,
} from '../types.js';

export type NavigationErrorKind =
  | 'KeyNotFound'
  | 'IndexOutOfRange'
  | 'TypeMismatch'
  | 'NotNavigable'
  | 'InvalidSyntax'
  | 'EvaluationError';

const KIND_CODES: Record<NavigationErrorKind, NavexErrorCode> = {
  KeyNotFound: NAVEX_ERROR_CODES.NAV_KEY_NOT_FOUND,
  IndexOutOfRange: NAVEX_ERROR_CODES.NAV_INDEX_OUT_OF_RANGE,
  TypeMismatch: NAVEX_ERROR_CODES.NAV_TYPE_MISMATCH,
  NotNavigable: NAVEX_ERROR_CODES.NAV_NOT_NAVIGABLE,
  InvalidSyntax: NAVEX_ERROR_CODES.NAV_INVALID_SYNTAX,
  EvaluationError: NAVEX_ERROR_CODES.NAV_EVALUATION_ERROR,
};

/** A path that could not be resolved against its root */
export class NavigationError extends NavexError {
  readonly kind: NavigationErrorKind;

  constructor(
    kind: NavigationErrorKind,
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super({ code: KIND_CODES[kind], message, context }, options);
    this.name = 'NavigationError';
    this.kind = kind;
  }
}
