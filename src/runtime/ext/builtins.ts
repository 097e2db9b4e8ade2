/**
 * Built-in Functions and Methods
 *
 * The default function library. Every entry is callable as name(x, ...)
 * or as x.name(...); `isMethod` records the documented form. Host
 * applications add domain-specific functions via EngineOptions.
 *
 * @internal - Not part of public API
 */

import type { SourceLocation } from '../../types.js';
import { NAVEX_ERROR_CODES, RuntimeError } from '../../types.js';
import type { CallableFn, FunctionDefinition } from '../core/types.js';
import {
  formatValue,
  inferType,
  isMapLike,
  mapEntries,
  mapKeys,
} from '../core/values.js';

const encoder = new TextEncoder();

// ============================================================
// ARGUMENT HELPERS
// ============================================================

type Check<T> = (
  value: unknown,
  fn: string,
  location?: SourceLocation
) => T;

function typeError(
  fn: string,
  expected: string,
  value: unknown,
  location?: SourceLocation
): RuntimeError {
  return new RuntimeError(
    NAVEX_ERROR_CODES.RUNTIME_TYPE_ERROR,
    `${fn}() expects ${expected}, got ${inferType(value)}`,
    location,
    { fn, expected, actual: inferType(value) }
  );
}

const asString: Check<string> = (value, fn, location) => {
  if (typeof value !== 'string') throw typeError(fn, 'string', value, location);
  return value;
};

const asNumber: Check<number> = (value, fn, location) => {
  if (typeof value !== 'number') throw typeError(fn, 'number', value, location);
  return value;
};

const asInt: Check<number> = (value, fn, location) => {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw typeError(fn, 'int', value, location);
  }
  return value;
};

const asList: Check<unknown[]> = (value, fn, location) => {
  if (!Array.isArray(value)) throw typeError(fn, 'list', value, location);
  return value;
};

/** Check the argument count, including any receiver */
function arity(
  args: unknown[],
  fn: string,
  min: number,
  max = min,
  location?: SourceLocation
): void {
  if (args.length < min || args.length > max) {
    const expected = min === max ? `${min}` : `${min} to ${max}`;
    throw new RuntimeError(
      NAVEX_ERROR_CODES.RUNTIME_TYPE_ERROR,
      `${fn}() expects ${expected} arguments, got ${args.length}`,
      location,
      { fn }
    );
  }
}

/** Wrap a unary numeric function */
function numeric(name: string, op: (n: number) => number): CallableFn {
  return (args, location) => {
    arity(args, name, 1, 1, location);
    return op(asNumber(args[0], name, location));
  };
}

function squareRoot(name: string): CallableFn {
  return (args, location) => {
    arity(args, name, 1, 1, location);
    const n = asNumber(args[0], name, location);
    if (n < 0) {
      throw new RuntimeError(
        NAVEX_ERROR_CODES.RUNTIME_TYPE_ERROR,
        `${name}() of negative value ${n}`,
        location,
        { fn: name, value: n }
      );
    }
    return Math.sqrt(n);
  };
}

/** Wrap a string predicate taking one string argument */
function stringTest(
  name: string,
  test: (s: string, arg: string) => boolean
): CallableFn {
  return (args, location) => {
    arity(args, name, 2, 2, location);
    return test(
      asString(args[0], name, location),
      asString(args[1], name, location)
    );
  };
}

function outOfRange(fn: string, index: number, location?: SourceLocation) {
  return new RuntimeError(
    NAVEX_ERROR_CODES.RUNTIME_INDEX_OUT_OF_RANGE,
    `${fn}() index ${index} out of range`,
    location,
    { fn, index }
  );
}

/** Round half away from zero */
function roundHalfAway(n: number): number {
  return Math.sign(n) * Math.round(Math.abs(n));
}

function extremum(name: string, pick: (a: number, b: number) => number): CallableFn {
  return (args, location) => {
    const first = args[0];
    const values: unknown[] =
      args.length === 1 && Array.isArray(first) ? first : args;
    if (values.length === 0) {
      throw new RuntimeError(
        NAVEX_ERROR_CODES.RUNTIME_TYPE_ERROR,
        `${name}() requires at least one value`,
        location
      );
    }
    return values
      .map((value) => asNumber(value, name, location))
      .reduce((a, b) => pick(a, b));
  };
}

function toInt(name: string, value: unknown, location?: SourceLocation): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw typeError(name, 'finite number', value, location);
    return Math.trunc(value);
  }
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string' && /^[+-]?\d+$/.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }
  if (typeof value === 'string') {
    throw new RuntimeError(
      NAVEX_ERROR_CODES.RUNTIME_TYPE_ERROR,
      `${name}() cannot parse '${value}'`,
      location,
      { fn: name }
    );
  }
  throw typeError(name, 'number or string', value, location);
}

function compareSortable(a: unknown, b: unknown, location?: SourceLocation): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  throw new RuntimeError(
    NAVEX_ERROR_CODES.RUNTIME_TYPE_ERROR,
    `sort() cannot order ${inferType(a)} and ${inferType(b)}`,
    location
  );
}

// ============================================================
// BUILT-IN FUNCTIONS
// ============================================================

export const BUILTIN_FUNCTIONS: Record<string, FunctionDefinition> = {
  // === Conversion ===

  int: {
    signature: 'int(value) -> int',
    description: 'Convert a number or numeric string to an integer, truncating decimals',
    category: 'conversion',
    returnType: 'int',
    paramTypes: ['dyn'],
    fn: (args, location) => {
      arity(args, 'int', 1, 1, location);
      return toInt('int', args[0], location);
    },
  },

  uint: {
    signature: 'uint(value) -> uint',
    description: 'Convert a value to a non-negative integer',
    category: 'conversion',
    returnType: 'uint',
    paramTypes: ['dyn'],
    fn: (args, location) => {
      arity(args, 'uint', 1, 1, location);
      const result = toInt('uint', args[0], location);
      if (result < 0) {
        throw new RuntimeError(
          NAVEX_ERROR_CODES.RUNTIME_TYPE_ERROR,
          `uint() got negative value ${result}`,
          location
        );
      }
      return result;
    },
  },

  double: {
    signature: 'double(value) -> double',
    description: 'Convert a number or numeric string to floating point',
    category: 'conversion',
    returnType: 'double',
    paramTypes: ['dyn'],
    fn: (args, location) => {
      arity(args, 'double', 1, 1, location);
      const value = args[0];
      if (typeof value === 'number') return value;
      if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        if (!Number.isNaN(parsed)) return parsed;
      }
      throw typeError('double', 'number or numeric string', value, location);
    },
  },

  string: {
    signature: 'string(value) -> string',
    description: 'Convert a value to its string form',
    category: 'conversion',
    returnType: 'string',
    paramTypes: ['dyn'],
    fn: (args, location) => {
      arity(args, 'string', 1, 1, location);
      return formatValue(args[0]);
    },
  },

  bytes: {
    signature: 'bytes(string) -> bytes',
    description: 'Encode a string as UTF-8 bytes',
    category: 'conversion',
    returnType: 'bytes',
    paramTypes: ['string'],
    fn: (args, location) => {
      arity(args, 'bytes', 1, 1, location);
      const value = args[0];
      if (value instanceof Uint8Array) return value;
      return encoder.encode(asString(value, 'bytes', location));
    },
  },

  bool: {
    signature: 'bool(value) -> bool',
    description: "Convert a bool or one of 'true', 'false', 't', 'f', '1', '0'",
    category: 'conversion',
    returnType: 'bool',
    paramTypes: ['dyn'],
    fn: (args, location) => {
      arity(args, 'bool', 1, 1, location);
      const value = args[0];
      if (typeof value === 'boolean') return value;
      const text = asString(value, 'bool', location).toLowerCase();
      if (text === 'true' || text === 't' || text === '1') return true;
      if (text === 'false' || text === 'f' || text === '0') return false;
      throw new RuntimeError(
        NAVEX_ERROR_CODES.RUNTIME_TYPE_ERROR,
        `bool() cannot parse '${text}'`,
        location
      );
    },
  },

  dyn: {
    signature: 'dyn(value) -> dyn',
    description: 'Return the value unchanged, typed as dynamic',
    category: 'conversion',
    returnType: 'dyn',
    paramTypes: ['dyn'],
    fn: (args, location) => {
      arity(args, 'dyn', 1, 1, location);
      return args[0] ?? null;
    },
  },

  type: {
    signature: 'type(value) -> string',
    description: 'Name the type of a value',
    category: 'general',
    returnType: 'string',
    paramTypes: ['dyn'],
    fn: (args, location, kinds) => {
      arity(args, 'type', 1, 1, location);
      return kinds?.[0] ?? inferType(args[0]);
    },
  },

  // === Collections ===

  size: {
    signature: 'value.size() -> int',
    description: 'Length of a string, bytes, list or map',
    category: 'list',
    isMethod: true,
    returnType: 'int',
    paramTypes: ['dyn'],
    fn: (args, location) => {
      arity(args, 'size', 1, 1, location);
      const value = args[0];
      if (typeof value === 'string') return [...value].length;
      if (value instanceof Uint8Array || Array.isArray(value)) return value.length;
      if (isMapLike(value)) return mapKeys(value).length;
      throw typeError('size', 'string, bytes, list or map', value, location);
    },
  },

  // === Strings ===

  contains: {
    signature: 'string.contains(substring) -> bool',
    description: 'Test whether the string contains a substring',
    category: 'string',
    isMethod: true,
    returnType: 'bool',
    paramTypes: ['string', 'string'],
    fn: stringTest('contains', (s, sub) => s.includes(sub)),
  },

  startsWith: {
    signature: 'string.startsWith(prefix) -> bool',
    description: 'Test whether the string starts with a prefix',
    category: 'string',
    isMethod: true,
    returnType: 'bool',
    paramTypes: ['string', 'string'],
    fn: stringTest('startsWith', (s, prefix) => s.startsWith(prefix)),
  },

  endsWith: {
    signature: 'string.endsWith(suffix) -> bool',
    description: 'Test whether the string ends with a suffix',
    category: 'string',
    isMethod: true,
    returnType: 'bool',
    paramTypes: ['string', 'string'],
    fn: stringTest('endsWith', (s, suffix) => s.endsWith(suffix)),
  },

  matches: {
    signature: 'string.matches(pattern) -> bool',
    description: 'Test whether a regular expression matches anywhere in the string',
    category: 'regex',
    isMethod: true,
    returnType: 'bool',
    paramTypes: ['string', 'string'],
    fn: (args, location) => {
      arity(args, 'matches', 2, 2, location);
      const text = asString(args[0], 'matches', location);
      const pattern = asString(args[1], 'matches', location);
      let regex: RegExp;
      try {
        regex = new RegExp(pattern, 'u');
      } catch (error) {
        throw new RuntimeError(
          NAVEX_ERROR_CODES.RUNTIME_INVALID_PATTERN,
          `Invalid regex pattern '${pattern}'`,
          location,
          { pattern, cause: error }
        );
      }
      return regex.test(text);
    },
  },

  lowerAscii: {
    signature: 'string.lowerAscii() -> string',
    description: 'Lowercase ASCII letters, leaving other characters unchanged',
    category: 'string',
    isMethod: true,
    returnType: 'string',
    paramTypes: ['string'],
    fn: (args, location) => {
      arity(args, 'lowerAscii', 1, 1, location);
      return asString(args[0], 'lowerAscii', location).replace(/[A-Z]/g, (c) =>
        c.toLowerCase()
      );
    },
  },

  upperAscii: {
    signature: 'string.upperAscii() -> string',
    description: 'Uppercase ASCII letters, leaving other characters unchanged',
    category: 'string',
    isMethod: true,
    returnType: 'string',
    paramTypes: ['string'],
    fn: (args, location) => {
      arity(args, 'upperAscii', 1, 1, location);
      return asString(args[0], 'upperAscii', location).replace(/[a-z]/g, (c) =>
        c.toUpperCase()
      );
    },
  },

  trim: {
    signature: 'string.trim() -> string',
    description: 'Remove leading and trailing whitespace',
    category: 'string',
    isMethod: true,
    returnType: 'string',
    paramTypes: ['string'],
    fn: (args, location) => {
      arity(args, 'trim', 1, 1, location);
      return asString(args[0], 'trim', location).trim();
    },
  },

  split: {
    signature: 'string.split(separator) -> list',
    description: 'Split the string on a separator',
    category: 'string',
    isMethod: true,
    returnType: 'list',
    paramTypes: ['string', 'string'],
    fn: (args, location) => {
      arity(args, 'split', 2, 2, location);
      return asString(args[0], 'split', location).split(
        asString(args[1], 'split', location)
      );
    },
  },

  replace: {
    signature: 'string.replace(old, new) -> string',
    description: 'Replace every occurrence of a substring',
    category: 'string',
    isMethod: true,
    returnType: 'string',
    paramTypes: ['string', 'string', 'string'],
    fn: (args, location) => {
      arity(args, 'replace', 3, 3, location);
      return asString(args[0], 'replace', location).replaceAll(
        asString(args[1], 'replace', location),
        asString(args[2], 'replace', location)
      );
    },
  },

  substring: {
    signature: 'string.substring(start, [end]) -> string',
    description: 'Characters from start up to but excluding end',
    category: 'string',
    isMethod: true,
    returnType: 'string',
    paramTypes: ['string', 'int', 'int'],
    fn: (args, location) => {
      arity(args, 'substring', 2, 3, location);
      const chars = [...asString(args[0], 'substring', location)];
      const start = asInt(args[1], 'substring', location);
      const end =
        args[2] === undefined
          ? chars.length
          : asInt(args[2], 'substring', location);
      if (start < 0 || start > chars.length) {
        throw outOfRange('substring', start, location);
      }
      if (end < start || end > chars.length) {
        throw outOfRange('substring', end, location);
      }
      return chars.slice(start, end).join('');
    },
  },

  indexOf: {
    signature: 'string.indexOf(substring) -> int',
    description: 'Position of the first occurrence of a substring, or -1',
    category: 'string',
    isMethod: true,
    returnType: 'int',
    paramTypes: ['string', 'string'],
    fn: (args, location) => {
      arity(args, 'indexOf', 2, 2, location);
      return asString(args[0], 'indexOf', location).indexOf(
        asString(args[1], 'indexOf', location)
      );
    },
  },

  join: {
    signature: 'list.join([separator]) -> string',
    description: 'Concatenate a list of strings',
    category: 'string',
    isMethod: true,
    returnType: 'string',
    paramTypes: ['list', 'string'],
    fn: (args, location) => {
      arity(args, 'join', 1, 2, location);
      const items = asList(args[0], 'join', location).map((item) =>
        asString(item, 'join', location)
      );
      const separator =
        args[1] === undefined ? '' : asString(args[1], 'join', location);
      return items.join(separator);
    },
  },

  // === Lists ===

  flatten: {
    signature: 'list.flatten() -> list',
    description: 'Flatten one level of nested lists',
    category: 'list',
    isMethod: true,
    returnType: 'list',
    paramTypes: ['list'],
    fn: (args, location) => {
      arity(args, 'flatten', 1, 1, location);
      return asList(args[0], 'flatten', location).flatMap((item) =>
        Array.isArray(item) ? item : [item]
      );
    },
  },

  slice: {
    signature: 'list.slice(start, end) -> list',
    description: 'Elements from start up to but excluding end',
    category: 'list',
    isMethod: true,
    returnType: 'list',
    paramTypes: ['list', 'int', 'int'],
    fn: (args, location) => {
      arity(args, 'slice', 3, 3, location);
      const items = asList(args[0], 'slice', location);
      const start = asInt(args[1], 'slice', location);
      const end = asInt(args[2], 'slice', location);
      if (start < 0 || start > items.length) {
        throw outOfRange('slice', start, location);
      }
      if (end < start || end > items.length) {
        throw outOfRange('slice', end, location);
      }
      return items.slice(start, end);
    },
  },

  sort: {
    signature: 'list.sort() -> list',
    description: 'Sort a list of numbers or strings ascending',
    category: 'list',
    isMethod: true,
    returnType: 'list',
    paramTypes: ['list'],
    fn: (args, location) => {
      arity(args, 'sort', 1, 1, location);
      return [...asList(args[0], 'sort', location)].sort((a, b) =>
        compareSortable(a, b, location)
      );
    },
  },

  // === Maps ===

  keys: {
    signature: 'map.keys() -> list',
    description: 'Keys of a map in natural order',
    category: 'map',
    isMethod: true,
    returnType: 'list',
    paramTypes: ['map'],
    fn: (args, location) => {
      arity(args, 'keys', 1, 1, location);
      const value = args[0];
      if (!isMapLike(value)) throw typeError('keys', 'map', value, location);
      return mapKeys(value);
    },
  },

  values: {
    signature: 'map.values() -> list',
    description: 'Values of a map in key order',
    category: 'map',
    isMethod: true,
    returnType: 'list',
    paramTypes: ['map'],
    fn: (args, location) => {
      arity(args, 'values', 1, 1, location);
      const value = args[0];
      if (!isMapLike(value)) throw typeError('values', 'map', value, location);
      return mapEntries(value).map(([, item]) => item);
    },
  },

  // === Math ===
  // Method forms come first so completion prefers them over math.* aliases

  abs: {
    signature: 'number.abs() -> number',
    description: 'Absolute value',
    category: 'math',
    isMethod: true,
    returnType: 'number',
    paramTypes: ['double'],
    fn: numeric('abs', Math.abs),
  },

  ceil: {
    signature: 'number.ceil() -> number',
    description: 'Round up to the nearest integer',
    category: 'math',
    isMethod: true,
    returnType: 'number',
    paramTypes: ['double'],
    fn: numeric('ceil', Math.ceil),
  },

  floor: {
    signature: 'number.floor() -> number',
    description: 'Round down to the nearest integer',
    category: 'math',
    isMethod: true,
    returnType: 'number',
    paramTypes: ['double'],
    fn: numeric('floor', Math.floor),
  },

  round: {
    signature: 'number.round() -> number',
    description: 'Round to the nearest integer, halves away from zero',
    category: 'math',
    isMethod: true,
    returnType: 'number',
    paramTypes: ['double'],
    fn: numeric('round', roundHalfAway),
  },

  sqrt: {
    signature: 'number.sqrt() -> double',
    description: 'Square root',
    category: 'math',
    isMethod: true,
    returnType: 'double',
    paramTypes: ['double'],
    fn: squareRoot('sqrt'),
  },

  'math.abs': {
    signature: 'math.abs(number) -> number',
    description: 'Absolute value',
    category: 'math',
    returnType: 'number',
    paramTypes: ['double'],
    fn: numeric('math.abs', Math.abs),
  },

  'math.ceil': {
    signature: 'math.ceil(number) -> number',
    description: 'Round up to the nearest integer',
    category: 'math',
    returnType: 'number',
    paramTypes: ['double'],
    fn: numeric('math.ceil', Math.ceil),
  },

  'math.floor': {
    signature: 'math.floor(number) -> number',
    description: 'Round down to the nearest integer',
    category: 'math',
    returnType: 'number',
    paramTypes: ['double'],
    fn: numeric('math.floor', Math.floor),
  },

  'math.round': {
    signature: 'math.round(number) -> number',
    description: 'Round to the nearest integer, halves away from zero',
    category: 'math',
    returnType: 'number',
    paramTypes: ['double'],
    fn: numeric('math.round', roundHalfAway),
  },

  'math.sqrt': {
    signature: 'math.sqrt(number) -> double',
    description: 'Square root',
    category: 'math',
    returnType: 'double',
    paramTypes: ['double'],
    fn: squareRoot('math.sqrt'),
  },

  'math.greatest': {
    signature: 'math.greatest(list) -> number',
    description: 'Greatest of a list or argument list of numbers',
    category: 'math',
    returnType: 'number',
    paramTypes: ['list'],
    fn: extremum('math.greatest', Math.max),
  },

  'math.least': {
    signature: 'math.least(list) -> number',
    description: 'Least of a list or argument list of numbers',
    category: 'math',
    returnType: 'number',
    paramTypes: ['list'],
    fn: extremum('math.least', Math.min),
  },

  // === Encoding ===

  'base64.encode': {
    signature: 'base64.encode(bytes) -> string',
    description: 'Encode bytes as base64 text',
    category: 'encoding',
    returnType: 'string',
    paramTypes: ['bytes'],
    fn: (args, location) => {
      arity(args, 'base64.encode', 1, 1, location);
      const value = args[0];
      if (value instanceof Uint8Array) {
        return Buffer.from(value).toString('base64');
      }
      return Buffer.from(asString(value, 'base64.encode', location), 'utf8').toString('base64');
    },
  },

  'base64.decode': {
    signature: 'base64.decode(string) -> bytes',
    description: 'Decode base64 text into bytes',
    category: 'encoding',
    returnType: 'bytes',
    paramTypes: ['string'],
    fn: (args, location) => {
      arity(args, 'base64.decode', 1, 1, location);
      return new Uint8Array(
        Buffer.from(asString(args[0], 'base64.decode', location), 'base64')
      );
    },
  },
};
