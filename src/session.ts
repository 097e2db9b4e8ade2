/**
 * Navigation Session
 *
 * Owns the active expression engine, the function registry, the navigator
 * and completion. Swapping the engine reloads the registry; requests in
 * flight keep the references they started with.
 */

import { CompletionEngine, type CompletionSource } from './completion/engine.js';
import { formatFunctionLines } from './completion/help.js';
import { FunctionRegistry } from './completion/registry.js';
import type { Completion, CompletionContext } from './completion/types.js';
import { loadDefaultConfig, type NavexConfig } from './config/config.js';
import type { NavigationError } from './navigator/errors.js';
import {
  Navigator,
  type ResolveEvent,
  type ResolveResult,
} from './navigator/navigator.js';
import { detectShape, extractColumnarData, type ColumnarData, type Shape } from './navigator/shape.js';
import { createExpressionEngine } from './runtime/core/context.js';
import type { EngineOptions, ExpressionEngine } from './runtime/core/types.js';

// ============================================================
// CALLBACKS
// ============================================================

export interface SessionCallbacks {
  /** Debug log sink; fields carry structured detail */
  onLog: (message: string, fields: Record<string, unknown>) => void;
}

/** Event emitted after each completion request */
export interface CompletionEvent {
  input: string;
  count: number;
  durationMs: number;
}

/** Event emitted after the engine is replaced */
export interface EngineChangeEvent {
  functionCount: number;
  macroCount: number;
}

/** Event emitted after the registry is rebuilt or supplemented */
export interface RegistryChangeEvent {
  size: number;
  categories: string[];
}

/** Event emitted when a resolve fails */
export interface SessionErrorEvent {
  path: string;
  error: NavigationError;
}

/** Observability callbacks for monitoring a session */
export interface ObservabilityCallbacks {
  onResolve?: (event: ResolveEvent) => void;
  onCompletion?: (event: CompletionEvent) => void;
  onEngineChange?: (event: EngineChangeEvent) => void;
  onRegistryChange?: (event: RegistryChangeEvent) => void;
  onError?: (event: SessionErrorEvent) => void;
}

export interface SessionOptions {
  /** Engine to start with; built from engineOptions when omitted */
  engine?: ExpressionEngine | undefined;
  engineOptions?: EngineOptions | undefined;
  /** Defaults to the bundled configuration */
  config?: NavexConfig | undefined;
  callbacks?: Partial<SessionCallbacks> | undefined;
  observability?: ObservabilityCallbacks | undefined;
}

// ============================================================
// SESSION
// ============================================================

/**
 * Entry point for host applications.
 *
 * @example
 * ```typescript
 * const session = createSession();
 * session.resolve({ items: [{ id: 1 }] }, 'items.0.id'); // { ok: true, value: 1 }
 * session.filterCompletions('_.it', { currentNode: { items: [] } });
 * ```
 */
export class NavexSession implements CompletionSource {
  readonly registry = new FunctionRegistry();
  readonly config: NavexConfig;

  private current: ExpressionEngine;
  private readonly navigator: Navigator;
  private readonly completion: CompletionEngine;
  private readonly callbacks: SessionCallbacks;
  private readonly observability: ObservabilityCallbacks;

  constructor(options: SessionOptions = {}) {
    this.config = options.config ?? loadDefaultConfig();
    this.observability = options.observability ?? {};

    const debug = this.config.debug;
    this.callbacks = {
      onLog:
        options.callbacks?.onLog ??
        ((message, fields) => {
          if (debug) console.error(`[navex] ${message}`, fields);
        }),
    };

    const log = this.callbacks.onLog;
    this.navigator = new Navigator(this, {
      log,
      onResolve: (event) => {
        this.observability.onResolve?.(event);
        if (!event.ok && event.error !== undefined) {
          this.observability.onError?.({ path: event.path, error: event.error });
        }
      },
    });
    // Completion resolves without reporting resolve events
    this.completion = new CompletionEngine(this, new Navigator(this, { log }), {
      maxExamples: this.config.completion.maxExamples,
    });

    this.current = options.engine ?? createExpressionEngine(options.engineOptions);
    this.reloadRegistry();
  }

  get engine(): ExpressionEngine {
    return this.current;
  }

  /** Replace the engine and rebuild the registry from it */
  setEngine(engine: ExpressionEngine): void {
    this.current = engine;
    const functionCount = engine.listFunctions().length;
    const macroCount = engine.listMacros().length;
    this.callbacks.onLog('engine replaced', { functionCount, macroCount });
    this.observability.onEngineChange?.({ functionCount, macroCount });
    this.reloadRegistry();
  }

  /** Add `"name(args) - description"` entries to the registry */
  supplementFunctions(suggestions: readonly string[]): void {
    this.registry.supplement(suggestions);
    this.notifyRegistryChange();
  }

  resolve(root: unknown, path: string): ResolveResult {
    return this.navigator.resolve(root, path);
  }

  /** Resolve, throwing NavigationError on failure */
  resolveOrThrow(root: unknown, path: string): unknown {
    return this.navigator.resolveOrThrow(root, path);
  }

  filterCompletions(input: string, ctx: CompletionContext = {}): Completion[] {
    const started = performance.now();
    const completions = this.completion.filterCompletions(input, ctx);
    const durationMs = performance.now() - started;
    this.callbacks.onLog('completion', { input, count: completions.length });
    this.observability.onCompletion?.({ input, count: completions.length, durationMs });
    return completions;
  }

  shapeOf(value: unknown): Shape {
    return detectShape(value);
  }

  /** Table view of a homogeneous array, or null */
  columnsOf(value: unknown, preferredOrder: readonly string[] = []): ColumnarData | null {
    return extractColumnarData(value, preferredOrder);
  }

  /** Help lines for a registered function, or undefined when unknown */
  functionHelp(name: string): string[] | undefined {
    const fn = this.registry.getFunction(name);
    if (fn === undefined) return undefined;
    return formatFunctionLines(fn, this.config.completion.maxExamples);
  }

  private reloadRegistry(): void {
    this.registry.loadFromEngine(this.current, this.config.completion.functionExamples);
    this.notifyRegistryChange();
  }

  private notifyRegistryChange(): void {
    const event = {
      size: this.registry.size(),
      categories: this.registry.getCategories(),
    };
    this.callbacks.onLog('function registry loaded', event);
    this.observability.onRegistryChange?.(event);
  }
}

export function createSession(options: SessionOptions = {}): NavexSession {
  return new NavexSession(options);
}
