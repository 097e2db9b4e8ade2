/**
 * Expression Classifier
 * Decides whether a path needs the expression engine
 */

export type PathMode = 'simple' | 'complex';

const OPERATORS = ['==', '!=', '<=', '>=', '<', '>', '&&', '||'] as const;

const INTEGER = /^[+-]?\d+$/;

/**
 * Classify a path as simple navigation or a complex expression.
 *
 * Literal and bracket checks run before the operator scan so `[0]` is
 * never read as a comparison. The operator scan is a plain substring test
 * and also fires inside quoted keys such as `["a<b"]`.
 */
export function classify(input: string): PathMode {
  const trimmed = input.trim();

  // "literal"
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return 'complex';
  }

  // {"a": 1}
  if (trimmed.startsWith('{')) return 'complex';

  // [0] and ["key"] navigate; [1, 2] is a list literal
  if (trimmed.startsWith('[')) {
    const close = trimmed.indexOf(']');
    if (close > 0) {
      const inside = trimmed.slice(1, close);
      if (INTEGER.test(inside)) return 'simple';
      if (inside.length >= 2 && inside.startsWith('"') && inside.endsWith('"')) {
        return 'simple';
      }
      return 'complex';
    }
  }

  if (trimmed.includes('(') && trimmed.includes(')')) return 'complex';

  if (trimmed.startsWith('_.') || trimmed.startsWith('_[')) return 'complex';

  if (OPERATORS.some((op) => trimmed.includes(op))) return 'complex';

  return 'simple';
}

export function isComplex(input: string): boolean {
  return classify(input) === 'complex';
}
