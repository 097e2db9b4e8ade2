/**
 * Path Segments
 * Lightweight path tokenizer used by simple navigation and completion
 */

// ============================================================
// SEGMENT TYPES
// ============================================================

export interface FieldSegment {
  readonly kind: 'field';
  readonly name: string;
}

/** Bracket-quoted key: ["key"] or ['key'] */
export interface QuotedKeySegment {
  readonly kind: 'quotedKey';
  readonly name: string;
}

export interface IndexSegment {
  readonly kind: 'index';
  readonly index: number;
}

/** Unparsed expression tail, always the last segment */
export interface OpaqueSegment {
  readonly kind: 'opaque';
  readonly expr: string;
}

export type PathSegment =
  | FieldSegment
  | QuotedKeySegment
  | IndexSegment
  | OpaqueSegment;

export interface PathScan {
  readonly segments: PathSegment[];
  /** Offset of an unterminated `[`, or null when the whole input was read */
  readonly unterminatedAt: number | null;
}

const INTEGER = /^[+-]?\d+$/;

function isQuoted(text: string): boolean {
  if (text.length < 2) return false;
  const quote = text[0];
  return (quote === '"' || quote === "'") && text.endsWith(quote);
}

// ============================================================
// PARSING
// ============================================================

/**
 * Read a quoted key body starting after the opening quote.
 * `\\` and an escaped quote stand for themselves. Null when the quote
 * never closes.
 */
function readQuotedKey(
  input: string,
  from: number,
  quote: string
): { name: string; end: number } | null {
  let name = '';
  let i = from;
  while (i < input.length) {
    const ch = input.charAt(i);
    if (ch === quote) return { name, end: i + 1 };
    if (ch === '\\' && i + 1 < input.length) {
      name += input.charAt(i + 1);
      i += 2;
      continue;
    }
    name += ch;
    i++;
  }
  return null;
}

/** Tokenize a path, reporting where scanning stopped */
export function scanPath(input: string): PathScan {
  const segments: PathSegment[] = [];
  let i = 0;

  while (i < input.length) {
    const ch = input[i];

    if (ch === '.') {
      i++;
      continue;
    }

    if (ch === '[') {
      const quote = input[i + 1];
      if (quote === '"' || quote === "'") {
        const quoted = readQuotedKey(input, i + 2, quote);
        if (quoted !== null && input[quoted.end] === ']') {
          segments.push({ kind: 'quotedKey', name: quoted.name });
          i = quoted.end + 1;
          continue;
        }
      }

      const close = input.indexOf(']', i);
      if (close === -1) {
        return { segments, unterminatedAt: i };
      }
      const inside = input.slice(i + 1, close);
      if (isQuoted(inside)) {
        segments.push({ kind: 'quotedKey', name: inside.slice(1, -1) });
      } else if (INTEGER.test(inside)) {
        segments.push({ kind: 'index', index: Number.parseInt(inside, 10) });
      } else {
        segments.push({ kind: 'field', name: inside });
      }
      i = close + 1;
      continue;
    }

    if (ch === '(') {
      segments.push({ kind: 'opaque', expr: input.slice(i) });
      break;
    }

    let j = i;
    while (j < input.length && input[j] !== '.' && input[j] !== '[') j++;
    segments.push({ kind: 'field', name: input.slice(i, j) });
    i = j;
  }

  return { segments, unterminatedAt: null };
}

/**
 * Split a path into segments.
 *
 * @example
 * ```typescript
 * parsePath('regions.asia.countries[0]["postal-code"]');
 * // field regions, field asia, field countries, index 0, quotedKey postal-code
 * ```
 */
export function parsePath(input: string): PathSegment[] {
  return scanPath(input).segments;
}

// ============================================================
// RECONSTRUCTION
// ============================================================

/** Escape a key for a double-quoted bracket */
export function escapeKey(key: string): string {
  return key.replace(/[\\"]/g, (ch) => `\\${ch}`);
}

/** Render one segment as it appears after a preceding segment */
export function formatSegment(segment: PathSegment, first = false): string {
  switch (segment.kind) {
    case 'field':
      return first ? segment.name : `.${segment.name}`;
    case 'quotedKey':
      return `["${escapeKey(segment.name)}"]`;
    case 'index':
      return `[${segment.index}]`;
    case 'opaque':
      return first ? segment.expr : `.${segment.expr}`;
  }
}

/** Rebuild a path string from segments */
export function reconstructPath(segments: readonly PathSegment[]): string {
  return segments.map((segment, i) => formatSegment(segment, i === 0)).join('');
}

/**
 * Rewrite dotted numeric steps in bracket notation.
 * `items.0.tags` becomes `items[0].tags`.
 */
export function normalizePath(path: string): string {
  return path.replace(/\.(\d+)/g, '[$1]');
}
