/**
 * Configuration Loader
 * Loads YAML configuration and merges it over the bundled defaults.
 */

import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import * as yaml from 'yaml';
import type { FunctionExample } from '../completion/registry.js';
import { ConfigError, NAVEX_ERROR_CODES } from '../types.js';

// ============================================================
// TYPES
// ============================================================

export interface CompletionConfig {
  /** Examples shown per function in completion detail */
  readonly maxExamples: number;
  /** Documentation applied over the engine's function metadata */
  readonly functionExamples: Readonly<Record<string, FunctionExample>>;
}

export interface NavexConfig {
  readonly debug: boolean;
  readonly completion: CompletionConfig;
}

/** Bundled defaults, located beside this module */
export const DEFAULT_CONFIG_PATH = fileURLToPath(
  new URL('./default-config.yaml', import.meta.url)
);

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(source: string, reason: string): ConfigError {
  return new ConfigError(
    NAVEX_ERROR_CODES.CONFIG_INVALID,
    `Invalid configuration: ${reason}`,
    { source }
  );
}

function parseFunctionExample(
  source: string,
  name: string,
  value: unknown
): FunctionExample {
  if (!isRecord(value)) {
    throw invalid(source, `functionExamples.${name} must be an object`);
  }
  const { description, examples } = value;
  if (description !== undefined && description !== null && typeof description !== 'string') {
    throw invalid(source, `functionExamples.${name}.description must be a string`);
  }
  if (examples !== undefined && examples !== null) {
    if (!Array.isArray(examples) || !examples.every((e) => typeof e === 'string')) {
      throw invalid(source, `functionExamples.${name}.examples must be a list of strings`);
    }
  }
  return {
    description: typeof description === 'string' ? description : undefined,
    examples: Array.isArray(examples) ? examples.map(String) : [],
  };
}

interface PartialConfig {
  debug?: boolean;
  maxExamples?: number;
  functionExamples: Record<string, FunctionExample>;
}

/** Validate a parsed document; every key is optional */
function parseConfig(source: string, data: unknown): PartialConfig {
  // An empty YAML document parses to null
  if (data === null || data === undefined) return { functionExamples: {} };
  if (!isRecord(data)) throw invalid(source, 'must be a mapping');

  const result: PartialConfig = { functionExamples: {} };

  const debug = data['debug'];
  if (debug !== undefined) {
    if (typeof debug !== 'boolean') {
      throw invalid(source, 'debug must be true or false');
    }
    result.debug = debug;
  }

  const completion = data['completion'];
  if (completion === undefined || completion === null) return result;
  if (!isRecord(completion)) throw invalid(source, 'completion must be a mapping');

  const maxExamples = completion['maxExamples'];
  if (maxExamples !== undefined) {
    if (typeof maxExamples !== 'number' || !Number.isInteger(maxExamples) || maxExamples < 0) {
      throw invalid(source, 'completion.maxExamples must be a non-negative integer');
    }
    result.maxExamples = maxExamples;
  }

  const functionExamples = completion['functionExamples'];
  if (functionExamples !== undefined && functionExamples !== null) {
    if (!isRecord(functionExamples)) {
      throw invalid(source, 'completion.functionExamples must be a mapping');
    }
    for (const [name, entry] of Object.entries(functionExamples)) {
      result.functionExamples[name] = parseFunctionExample(source, name, entry);
    }
  }

  return result;
}

// ============================================================
// LOADING
// ============================================================

function parseYaml(text: string, source: string): unknown {
  try {
    return yaml.parse(text);
  } catch (err) {
    throw new ConfigError(
      NAVEX_ERROR_CODES.CONFIG_INVALID,
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`,
      { source },
      { cause: err }
    );
  }
}

function readDocument(path: string): unknown {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      NAVEX_ERROR_CODES.CONFIG_INVALID,
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`,
      { source: path },
      { cause: err }
    );
  }
  return parseYaml(content, path);
}

function merge(base: NavexConfig, overlay: PartialConfig): NavexConfig {
  return {
    debug: overlay.debug ?? base.debug,
    completion: {
      maxExamples: overlay.maxExamples ?? base.completion.maxExamples,
      functionExamples: {
        ...base.completion.functionExamples,
        ...overlay.functionExamples,
      },
    },
  };
}

/** Built-in configuration from the bundled defaults file */
export function loadDefaultConfig(): NavexConfig {
  const empty: NavexConfig = {
    debug: false,
    completion: { maxExamples: 2, functionExamples: {} },
  };
  return merge(empty, parseConfig(DEFAULT_CONFIG_PATH, readDocument(DEFAULT_CONFIG_PATH)));
}

/**
 * Load configuration, merged over the defaults.
 *
 * @param path - YAML file; omit for the defaults alone
 * @throws ConfigError CONFIG_NOT_FOUND when path does not exist
 * @throws ConfigError CONFIG_INVALID when the file is not valid YAML or has the wrong shape
 */
export function loadConfig(path?: string): NavexConfig {
  const defaults = loadDefaultConfig();
  if (path === undefined) return defaults;

  if (!existsSync(path)) {
    throw new ConfigError(
      NAVEX_ERROR_CODES.CONFIG_NOT_FOUND,
      `Configuration file not found: ${path}`,
      { source: path }
    );
  }

  return merge(defaults, parseConfig(path, readDocument(path)));
}

/** Validate an in-memory document the same way as a file */
export function parseConfigDocument(text: string, source = '<inline>'): NavexConfig {
  return merge(loadDefaultConfig(), parseConfig(source, parseYaml(text, source)));
}
