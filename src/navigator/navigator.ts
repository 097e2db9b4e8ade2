/**
 * Navigator
 *
 * Resolves a path or expression against a root value. Simple paths are
 * walked structurally; complex expressions go to the active engine.
 */

import type { ExpressionEngine } from '../runtime/core/types.js';
import { getField, inferType, isMapLike } from '../runtime/core/values.js';
import { classify, type PathMode } from './classify.js';
import { NavigationError } from './errors.js';
import { scanPath, type PathSegment } from './path.js';

// ============================================================
// TYPES
// ============================================================

/** Supplies the active engine; read on every resolve */
export interface EngineSource {
  readonly engine: ExpressionEngine;
}

export type ResolveResult =
  | { readonly ok: true; readonly value: unknown }
  | { readonly ok: false; readonly error: NavigationError };

/** Event emitted after each resolve */
export interface ResolveEvent {
  path: string;
  /** `root` for empty paths and the bare root marker */
  mode: PathMode | 'root';
  ok: boolean;
  durationMs: number;
  error?: NavigationError | undefined;
}

export interface NavigatorHooks {
  onResolve?: ((event: ResolveEvent) => void) | undefined;
  log?: ((message: string, fields: Record<string, unknown>) => void) | undefined;
}

const INTEGER = /^[+-]?\d+$/;

// ============================================================
// STRUCTURAL STEPS
// ============================================================

function stepLabel(segment: PathSegment): string {
  switch (segment.kind) {
    case 'field':
    case 'quotedKey':
      return segment.name;
    case 'index':
      return String(segment.index);
    case 'opaque':
      return segment.expr;
  }
}

function lookupKey(current: object, key: string): ResolveResult {
  const lookup = getField(current, key);
  if (!lookup.found) {
    return {
      ok: false,
      error: new NavigationError('KeyNotFound', `key '${key}' not found`, { key }),
    };
  }
  return { ok: true, value: lookup.value };
}

function indexList(list: unknown[], index: number): ResolveResult {
  if (index < 0 || index >= list.length) {
    return {
      ok: false,
      error: new NavigationError(
        'IndexOutOfRange',
        `index ${index} out of range`,
        { index, length: list.length }
      ),
    };
  }
  return { ok: true, value: list[index] };
}

/** Apply one segment to the current value */
export function navigateStep(current: unknown, segment: PathSegment): ResolveResult {
  const step = stepLabel(segment);

  if (segment.kind === 'opaque') {
    return {
      ok: false,
      error: new NavigationError(
        'InvalidSyntax',
        `unexpected expression '${segment.expr}' in path`,
        { step }
      ),
    };
  }

  if (segment.kind === 'field' && segment.name === '') {
    return {
      ok: false,
      error: new NavigationError('InvalidSyntax', 'empty brackets in path', { step }),
    };
  }

  if (Array.isArray(current)) {
    if (segment.kind === 'index') return indexList(current, segment.index);
    if (segment.kind === 'field' && INTEGER.test(segment.name)) {
      return indexList(current, Number.parseInt(segment.name, 10));
    }
    return {
      ok: false,
      error: new NavigationError(
        'TypeMismatch',
        `expected numeric index into array but got '${step}'`,
        { step }
      ),
    };
  }

  if (isMapLike(current)) {
    if (segment.kind === 'index') {
      return {
        ok: false,
        error: new NavigationError(
          'TypeMismatch',
          `expected key into map but got index ${segment.index}`,
          { step }
        ),
      };
    }
    return lookupKey(current, segment.name);
  }

  return {
    ok: false,
    error: new NavigationError(
      'NotNavigable',
      `cannot descend into ${inferType(current)} at '${step}'`,
      { step, actual: inferType(current) }
    ),
  };
}

/** Fold a list of segments over a root value */
export function navigateSegments(
  root: unknown,
  segments: readonly PathSegment[]
): ResolveResult {
  let current = root;
  for (const segment of segments) {
    const result = navigateStep(current, segment);
    if (!result.ok) return result;
    current = result.value;
  }
  return { ok: true, value: current };
}

// ============================================================
// NAVIGATOR
// ============================================================

/**
 * Dual-mode resolver.
 *
 * @example
 * ```typescript
 * const navigator = new Navigator(session);
 * navigator.resolve({ items: ['a', 'b'] }, 'items[1]');
 * // { ok: true, value: 'b' }
 * ```
 */
export class Navigator {
  constructor(
    private readonly source: EngineSource,
    private readonly hooks: NavigatorHooks = {}
  ) {}

  /** Resolve a path; errors are returned, never thrown */
  resolve(root: unknown, path: string): ResolveResult {
    const started = performance.now();
    const trimmed = path.trim();

    let mode: ResolveEvent['mode'];
    let result: ResolveResult;
    if (trimmed === '' || trimmed === '_') {
      mode = 'root';
      result = { ok: true, value: root };
    } else {
      mode = classify(trimmed);
      result =
        mode === 'simple'
          ? this.resolveSimple(root, trimmed)
          : this.resolveComplex(root, path);
    }

    this.hooks.log?.(`resolve ${mode} path`, { path, ok: result.ok });
    this.hooks.onResolve?.({
      path,
      mode,
      ok: result.ok,
      durationMs: performance.now() - started,
      error: result.ok ? undefined : result.error,
    });
    return result;
  }

  /** Resolve a path, throwing NavigationError on failure */
  resolveOrThrow(root: unknown, path: string): unknown {
    const result = this.resolve(root, path);
    if (!result.ok) throw result.error;
    return result.value;
  }

  private resolveSimple(root: unknown, path: string): ResolveResult {
    const scan = scanPath(path);
    if (scan.unterminatedAt !== null) {
      return {
        ok: false,
        error: new NavigationError(
          'InvalidSyntax',
          `unterminated '[' at offset ${scan.unterminatedAt}`,
          { path, offset: scan.unterminatedAt }
        ),
      };
    }
    return navigateSegments(root, scan.segments);
  }

  /** Evaluate the expression exactly as typed; `_` is not prefixed */
  private resolveComplex(root: unknown, expression: string): ResolveResult {
    const result = this.source.engine.evaluate(expression, root);
    if (result.ok) return result;
    return {
      ok: false,
      error: new NavigationError(
        'EvaluationError',
        `evaluation error: ${result.error.message}`,
        { expression },
        { cause: result.error }
      ),
    };
  }
}
