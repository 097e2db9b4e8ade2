/**
 * Completion Engine
 *
 * Produces ranked field, index and function candidates for partially
 * typed paths and expressions. Never throws: parse and navigation
 * failures only narrow the candidate list.
 */

import { navigateStep, type EngineSource, type Navigator } from '../navigator/navigator.js';
import {
  formatSegment,
  reconstructPath,
  scanPath,
  type PathSegment,
} from '../navigator/path.js';
import { inferType, isMapLike, mapKeys } from '../runtime/core/values.js';
import { isCompatibleWithType, normalizeFunctionName } from './compatibility.js';
import type { FunctionRegistry } from './registry.js';
import { splitCompletionInput } from './split.js';
import type { Completion, CompletionContext, FunctionMetadata } from './types.js';

/** Engine and registry read on every request */
export interface CompletionSource extends EngineSource {
  readonly registry: FunctionRegistry;
}

export interface CompletionEngineOptions {
  /** Examples shown in a function's detail (default: 2) */
  maxExamples?: number | undefined;
}

const FIELD_SCORE = 100;
const TRAILING_INDEX_SCORE = 200;
const FUNCTION_SCORE = 50;
const FUNCTION_SCORE_PER_CHAR = 10;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const INTEGER = /^\d+$/;
const TRAILING_INDEX = /(\[\d+\]|\.\d+)$/;

interface Target {
  readonly node: unknown;
  readonly type: string;
  /** False when the base could not be resolved and only a declared type is known */
  readonly navigable: boolean;
}

/**
 * Segments of a navigation-only base, walked against the data so that
 * integer steps become indexes into arrays and quoted keys into maps.
 * Null when the base is an expression.
 */
function baseSegments(base: string, root: unknown): PathSegment[] | null {
  if (base.includes('(')) return null;
  const scan = scanPath(base);
  if (scan.unterminatedAt !== null) return null;

  const segments: PathSegment[] = [];
  let node = root;
  for (const [i, segment] of scan.segments.entries()) {
    if (segment.kind === 'opaque') return null;
    let step: PathSegment = segment;
    if (segment.kind === 'field' && INTEGER.test(segment.name)) {
      step = Array.isArray(node)
        ? { kind: 'index', index: Number.parseInt(segment.name, 10) }
        : { kind: 'quotedKey', name: segment.name };
    }
    segments.push(step);
    if (i === 0 && segment.kind === 'field' && segment.name === '_') continue;
    const next = navigateStep(node, step);
    node = next.ok ? next.value : undefined;
  }
  return segments;
}

function keySegment(key: string): PathSegment {
  return IDENTIFIER.test(key) ? { kind: 'field', name: key } : { kind: 'quotedKey', name: key };
}

function compareCompletions(a: Completion, b: Completion): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.display < b.display) return -1;
  return a.display > b.display ? 1 : 0;
}

/**
 * Completion over a navigator and a function registry.
 *
 * @example
 * ```typescript
 * const completion = new CompletionEngine(session, navigator);
 * completion.filterCompletions('_.it', { currentNode: { items: [] } });
 * // [{ text: '_.items', kind: 'field', ... }]
 * ```
 */
export class CompletionEngine {
  private readonly maxExamples: number;

  constructor(
    private readonly source: CompletionSource,
    private readonly navigator: Navigator,
    options: CompletionEngineOptions = {}
  ) {
    this.maxExamples = options.maxExamples ?? 2;
  }

  filterCompletions(input: string, ctx: CompletionContext = {}): Completion[] {
    let text = input;
    const cursor = ctx.cursorPosition;
    if (cursor !== undefined && cursor >= 0 && cursor < text.length) {
      text = text.slice(0, cursor);
    }
    text = text.trim();
    if (text === '') text = '_';

    const split = splitCompletionInput(text, this.source.engine, ctx.isAfterDot ?? false);
    const partial =
      ctx.partialToken !== undefined && ctx.partialToken !== ''
        ? ctx.partialToken
        : split.partial;

    const target = this.resolveTarget(split.base, ctx);
    if (target === null) return [];

    const segments = baseSegments(split.base, ctx.currentNode);
    const rebuilt = segments === null ? split.base : reconstructPath(segments);
    const hasRoot = split.base.startsWith('_');

    const completions: Completion[] = [];

    if (target.navigable) {
      completions.push(
        ...this.structuralCompletions(target.node, partial, split.prefix, split.base, segments)
      );
    }

    const endsInIndex =
      TRAILING_INDEX.test(split.base) && (segments === null || segments.at(-1)?.kind === 'index');
    if (!split.completionPoint && partial === '' && endsInIndex) {
      completions.push({
        text: split.prefix + rebuilt,
        display: rebuilt,
        kind: 'index',
        detail: 'array index',
        description: '',
        score: TRAILING_INDEX_SCORE,
      });
    }

    completions.push(
      ...this.functionCompletions(target.type, partial, (name) =>
        split.prefix + (hasRoot ? `${rebuilt}.${name}` : name)
      )
    );

    return completions.sort(compareCompletions);
  }

  private resolveTarget(base: string, ctx: CompletionContext): Target | null {
    if (base === '' || base === '_') {
      const type =
        nonEmpty(ctx.expressionResultType) ??
        (ctx.expressionResult !== undefined ? inferType(ctx.expressionResult) : undefined) ??
        nonEmpty(ctx.currentType) ??
        inferType(ctx.currentNode);
      return { node: ctx.currentNode, type, navigable: true };
    }

    const result = this.navigator.resolve(ctx.currentNode, base);
    if (result.ok) {
      return { node: result.value, type: inferType(result.value), navigable: true };
    }
    const declared = nonEmpty(ctx.currentType);
    return declared === undefined ? null : { node: undefined, type: declared, navigable: false };
  }

  private structuralCompletions(
    node: unknown,
    partial: string,
    prefix: string,
    base: string,
    segments: PathSegment[] | null
  ): Completion[] {
    const needle = partial.toLowerCase();
    const textFor = (next: PathSegment): string =>
      prefix +
      (segments === null
        ? base + formatSegment(next, base === '')
        : reconstructPath([...segments, next]));

    if (Array.isArray(node)) {
      const result: Completion[] = [];
      for (let i = 0; i < node.length; i++) {
        const label = String(i);
        if (!label.startsWith(needle)) continue;
        result.push({
          text: textFor({ kind: 'index', index: i }),
          display: `[${label}]`,
          kind: 'index',
          detail: `index: ${label}`,
          description: '',
          score: FIELD_SCORE,
        });
      }
      return result;
    }

    if (!isMapLike(node)) return [];

    return mapKeys(node)
      .sort()
      .filter((key) => key.toLowerCase().startsWith(needle))
      .map((key): Completion => ({
        text: textFor(keySegment(key)),
        display: key,
        kind: 'field',
        detail: `field: ${key}`,
        description: '',
        score: FIELD_SCORE,
      }));
  }

  private functionCompletions(
    type: string,
    partial: string,
    textFor: (name: string) => string
  ): Completion[] {
    const needle = partial.toLowerCase();
    const seen = new Set<string>();
    const result: Completion[] = [];

    // Methods before globals: `abs` shadows `math.abs`
    const { registry } = this.source;
    for (const fn of [...registry.getMethods(), ...registry.getGlobals()]) {
      const normalized = normalizeFunctionName(fn.name);
      if (seen.has(normalized)) continue;
      if (!isCompatibleWithType(fn.name, type)) continue;
      if (!normalized.startsWith(needle)) continue;
      seen.add(normalized);

      result.push({
        text: textFor(fn.name),
        display: `${fn.name}()`,
        kind: 'function',
        detail: this.functionDetail(fn),
        description: fn.description,
        score: FUNCTION_SCORE + FUNCTION_SCORE_PER_CHAR * partial.length,
        functionRef: fn,
      });
    }
    return result;
  }

  private functionDetail(fn: FunctionMetadata): string {
    const examples = fn.examples
      .map((example) => example.trim())
      .filter((example) => example !== '')
      .slice(0, Math.max(this.maxExamples, 0));
    if (examples.length === 0) return fn.description;
    return `${fn.description}\ne.g. ${examples.join(' | ')}`;
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}
