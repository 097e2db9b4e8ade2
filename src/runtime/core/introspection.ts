/**
 * Runtime Introspection API
 *
 * Metadata describing the functions and macros an engine offers.
 * Host applications use these to drive completion and help text.
 */

import type { FunctionDefinition, RuntimeContext } from './types.js';

/**
 * Metadata describing a function's signature and documentation.
 * Returned by ExpressionEngine.listFunctions() and listMacros().
 */
export interface FunctionMetadata {
  /** Function name, qualified where namespaced (e.g. "math.abs") */
  readonly name: string;
  readonly signature: string;
  readonly description: string;
  readonly category: string;
  /** Documented as receiver.name() rather than name(receiver) */
  readonly isMethod: boolean;
  readonly returnType: string;
  readonly paramTypes: readonly string[];
  readonly examples: readonly string[];
}

/** Convert a registered definition into display metadata */
export function toMetadata(
  name: string,
  definition: FunctionDefinition
): FunctionMetadata {
  return {
    name,
    signature: definition.signature ?? `${name}()`,
    description: definition.description ?? '',
    category: definition.category ?? 'general',
    isMethod: definition.isMethod ?? false,
    returnType: definition.returnType ?? 'dyn',
    paramTypes: definition.paramTypes ?? [],
    examples: definition.examples ?? [],
  };
}

/**
 * Enumerate all functions registered in a runtime context.
 * Order: registration order (built-ins, then host functions).
 */
export function getFunctions(ctx: RuntimeContext): FunctionMetadata[] {
  const result: FunctionMetadata[] = [];
  for (const [name, definition] of ctx.functions) {
    result.push(toMetadata(name, definition));
  }
  return result;
}
