/**
 * Completion Input Splitting
 *
 * Separates completion input into the text kept verbatim (prefix), the
 * expression to resolve (base) and the token being typed (partial).
 */

import type { ExprNode } from '../types.js';
import type { ExpressionEngine } from '../runtime/core/types.js';

export interface CompletionSplit {
  /** Text before the base, kept as typed */
  readonly prefix: string;
  readonly base: string;
  readonly partial: string;
  /** Input ended at `.` or `[`, or the caller reported a dot */
  readonly completionPoint: boolean;
}

const TRAILING_RUN = /[A-Za-z0-9_.[\]"']*$/;
const TRAILING_TOKEN = /(?:^|[.[])(["']?)([^.[\]"']*)$/;
const DIGITS = /^\d+$/;
const OPEN_INDEX = /\[\d+$/;

/** Child that ends where its parent ends, if any */
function rightChild(node: ExprNode): ExprNode | undefined {
  switch (node.type) {
    case 'Binary':
      return node.right;
    case 'Conditional':
      return node.elseBranch;
    case 'Unary':
      return node.operand;
    default:
      return undefined;
  }
}

/**
 * Innermost node ending at `end` along the right spine.
 * Null when the outermost node stops short, as with a closing paren.
 */
function trailingNode(ast: ExprNode, end: number): ExprNode | null {
  if (ast.span.end.offset !== end) return null;
  let node = ast;
  for (;;) {
    const next = rightChild(node);
    if (next === undefined || next.span.end.offset !== end) return node;
    node = next;
  }
}

function splitParsed(ast: ExprNode, body: string, completionPoint: boolean): CompletionSplit {
  const node = trailingNode(ast, body.length);
  if (node === null) {
    return { prefix: '', base: body, partial: '', completionPoint };
  }

  const text = (n: ExprNode): string => body.slice(n.span.start.offset, n.span.end.offset);
  const before = (n: ExprNode): string => body.slice(0, n.span.start.offset);

  if (!completionPoint && node.type === 'Select') {
    return {
      prefix: before(node.operand),
      base: text(node.operand),
      partial: node.field,
      completionPoint,
    };
  }

  if (!completionPoint && node.type === 'Ident' && node.name !== '_') {
    return { prefix: before(node), base: '', partial: node.name, completionPoint };
  }

  return { prefix: before(node), base: text(node), partial: '', completionPoint };
}

function splitLexical(body: string, completionPoint: boolean): CompletionSplit {
  const run = TRAILING_RUN.exec(body)?.[0] ?? '';
  const prefix = body.slice(0, body.length - run.length);

  if (completionPoint) {
    return { prefix, base: run, partial: '', completionPoint };
  }

  const token = TRAILING_TOKEN.exec(run);
  const quote = token?.[1] ?? '';
  const name = token?.[2] ?? '';
  if (name === '' || DIGITS.test(name)) {
    return { prefix, base: run, partial: '', completionPoint };
  }

  let base = run.slice(0, run.length - quote.length - name.length);
  if (base.endsWith('.') || base.endsWith('[')) base = base.slice(0, -1);
  return { prefix, base, partial: name, completionPoint };
}

/**
 * Split trimmed, non-empty completion input.
 *
 * The engine's parser locates a trailing field selection when the text
 * compiles; otherwise the trailing path-like run is split lexically.
 *
 * @example
 * ```typescript
 * splitCompletionInput('_.count > 1 && _.ite', engine, false);
 * // { prefix: '_.count > 1 && ', base: '_', partial: 'ite', completionPoint: false }
 * ```
 */
export function splitCompletionInput(
  input: string,
  engine: ExpressionEngine,
  isAfterDot: boolean
): CompletionSplit {
  const endsAtPoint = input.endsWith('.') || input.endsWith('[');
  const completionPoint = endsAtPoint || isAfterDot;
  let body = endsAtPoint ? input.slice(0, -1) : input;
  // A dangling `[N` reads as the index it is about to close
  if (OPEN_INDEX.test(body)) body += ']';

  const compiled = engine.compile(body);
  if (compiled.ok) return splitParsed(compiled.ast, body, completionPoint);
  return splitLexical(body, completionPoint);
}
