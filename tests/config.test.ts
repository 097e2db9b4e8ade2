/**
 * navex Configuration Tests
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ConfigError,
  loadConfig,
  loadDefaultConfig,
  NAVEX_ERROR_CODES,
  parseConfigDocument,
} from '../src/index.js';
import { afterAll, describe, expect, it } from 'vitest';

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('navex Configuration', () => {
  const dir = mkdtempSync(join(tmpdir(), 'navex-config-'));

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(name: string, content: string): string {
    const path = join(dir, name);
    writeFileSync(path, content, 'utf-8');
    return path;
  }

  describe('defaults', () => {
    it('loads the bundled file', () => {
      const config = loadDefaultConfig();
      expect(config.debug).toBe(false);
      expect(config.completion.maxExamples).toBe(2);
      expect(config.completion.functionExamples['filter']?.examples).toEqual([
        '[1, 2, 3].filter(x, x > 1) => [2, 3]',
        '_.users.filter(u, u.active)',
      ]);
    });

    it('returns the defaults without a path', () => {
      expect(loadConfig()).toEqual(loadDefaultConfig());
    });
  });

  describe('files', () => {
    it('merges a file over the defaults', () => {
      const path = writeConfig(
        'overlay.yaml',
        [
          'debug: true',
          'completion:',
          '  maxExamples: 1',
          '  functionExamples:',
          '    size:',
          '      examples: ["[1].size() => 1"]',
          '',
        ].join('\n')
      );
      const config = loadConfig(path);
      expect(config.debug).toBe(true);
      expect(config.completion.maxExamples).toBe(1);
      expect(config.completion.functionExamples['size']).toEqual({
        description: undefined,
        examples: ['[1].size() => 1'],
      });
      expect(config.completion.functionExamples['filter']).toEqual(
        loadDefaultConfig().completion.functionExamples['filter']
      );
    });

    it('treats an empty file as no overrides', () => {
      const path = writeConfig('empty.yaml', '');
      expect(loadConfig(path)).toEqual(loadDefaultConfig());
    });

    it('reports missing files', () => {
      const path = join(dir, 'missing.yaml');
      const err = configError(() => loadConfig(path));
      expect(err.code).toBe(NAVEX_ERROR_CODES.CONFIG_NOT_FOUND);
      expect(err.message).toBe(`Configuration file not found: ${path}`);
    });

    it('reports malformed YAML', () => {
      const path = writeConfig('broken.yaml', 'completion: [1, 2\n');
      const err = configError(() => loadConfig(path));
      expect(err.code).toBe(NAVEX_ERROR_CODES.CONFIG_INVALID);
      expect(err.message.startsWith('Invalid configuration: invalid YAML')).toBe(true);
      expect(err.context).toEqual({ source: path });
    });
  });

  describe('validation', () => {
    it.each([
      ['- a\n- b', 'Invalid configuration: must be a mapping'],
      ['debug: "yes"', 'Invalid configuration: debug must be true or false'],
      ['completion: 3', 'Invalid configuration: completion must be a mapping'],
      [
        'completion:\n  maxExamples: -1',
        'Invalid configuration: completion.maxExamples must be a non-negative integer',
      ],
      [
        'completion:\n  maxExamples: 1.5',
        'Invalid configuration: completion.maxExamples must be a non-negative integer',
      ],
      [
        'completion:\n  functionExamples:\n    size: 3',
        'Invalid configuration: functionExamples.size must be an object',
      ],
      [
        'completion:\n  functionExamples:\n    size:\n      examples: [1]',
        'Invalid configuration: functionExamples.size.examples must be a list of strings',
      ],
    ])('rejects %j', (text, message) => {
      const err = configError(() => parseConfigDocument(text));
      expect(err.code).toBe(NAVEX_ERROR_CODES.CONFIG_INVALID);
      expect(err.message).toBe(message);
    });

    it('names the source of an inline document', () => {
      const err = configError(() => parseConfigDocument('- a', 'inline.yaml'));
      expect(err.context).toEqual({ source: 'inline.yaml' });
    });

    it('accepts descriptions without examples', () => {
      const config = parseConfigDocument(
        'completion:\n  functionExamples:\n    size:\n      description: Count things'
      );
      expect(config.completion.functionExamples['size']).toEqual({
        description: 'Count things',
        examples: [],
      });
    });
  });
});
