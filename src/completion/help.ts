/**
 * Function Help Formatting
 * Plain-text renderings of function metadata for help panels
 */

import type { FunctionMetadata } from './types.js';

export function formatFunctionSignature(fn: FunctionMetadata): string {
  const signature = fn.signature.trim();
  return signature === '' ? `${fn.name}()` : signature;
}

/**
 * Signature and description on one line.
 *
 * @example
 * ```typescript
 * formatFunctionOneLiner(fn); // 'size(value) -> int — Number of elements'
 * ```
 */
export function formatFunctionOneLiner(fn: FunctionMetadata): string {
  const signature = formatFunctionSignature(fn);
  const description = fn.description.trim();
  return description === '' ? signature : `${signature} — ${description}`;
}

/**
 * Multi-line help: signature, description, then indented examples.
 * A maxExamples of 0 or less shows every example.
 */
export function formatFunctionLines(fn: FunctionMetadata, maxExamples = 0): string[] {
  const lines = [formatFunctionSignature(fn)];
  const description = fn.description.trim();
  if (description !== '') lines.push(description);

  let shown = 0;
  for (const example of fn.examples) {
    if (maxExamples > 0 && shown >= maxExamples) break;
    const trimmed = example.trim();
    if (trimmed === '') continue;
    lines.push(`  ${trimmed}`);
    shown++;
  }
  return lines;
}
