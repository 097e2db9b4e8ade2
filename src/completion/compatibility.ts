/**
 * Function/Type Compatibility
 * Which functions make sense on a value of a given inferred type
 */

const COMPATIBLE: Readonly<Record<string, ReadonlySet<string>>> = {
  map: new Set(['keys', 'values', 'filter', 'map', 'all', 'exists', 'exists_one', 'size', 'has']),
  list: new Set(['filter', 'map', 'all', 'exists', 'exists_one', 'size', 'flatten', 'slice', 'sort']),
  string: new Set([
    'contains',
    'startswith',
    'endswith',
    'matches',
    'lowerascii',
    'upperascii',
    'size',
  ]),
  double: new Set(['abs', 'ceil', 'floor', 'round', 'sqrt']),
  int: new Set(['abs', 'ceil', 'floor', 'round', 'sqrt']),
  uint: new Set(['abs', 'ceil', 'floor', 'round', 'sqrt']),
};

/**
 * Reduce a function name to its comparable form.
 *
 * @example
 * ```typescript
 * normalizeFunctionName('math.Abs()'); // 'abs'
 * ```
 */
export function normalizeFunctionName(name: string): string {
  let normalized = name.toLowerCase();
  const paren = normalized.indexOf('(');
  if (paren !== -1) normalized = normalized.slice(0, paren);
  const dot = normalized.lastIndexOf('.');
  return dot === -1 ? normalized : normalized.slice(dot + 1);
}

/** `type` applies to every value; unknown types accept nothing else */
export function isCompatibleWithType(functionName: string, valueType: string): boolean {
  const name = normalizeFunctionName(functionName);
  if (name === 'type') return true;
  return COMPATIBLE[valueType.toLowerCase()]?.has(name) ?? false;
}
