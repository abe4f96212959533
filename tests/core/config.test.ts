/**
 * Tests for configuration, logging and error reporting.
 */

import { describe, it, expect } from 'vitest';
import { loadConfig, DEFAULT_MAX_PRESET_DEPTH, MANIFEST_FILE } from '../../src/core/config.js';
import { ConsoleLogger } from '../../src/core/logger.js';
import {
  ConfigError,
  DependencyCycleError,
  ErrorCodes,
  handleError,
} from '../../src/core/errors.js';

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadConfig({})).toEqual({
      logLevel: 'warn',
      manifestFile: MANIFEST_FILE,
      maxPresetDepth: DEFAULT_MAX_PRESET_DEPTH,
    });
  });

  it('should read overrides from the environment', () => {
    expect(
      loadConfig({
        BUILDGRAPH_VERBOSE: '1',
        BUILDGRAPH_MANIFEST: 'project.yaml',
        BUILDGRAPH_MAX_PRESET_DEPTH: '4',
      })
    ).toEqual({ logLevel: 'debug', manifestFile: 'project.yaml', maxPresetDepth: 4 });
  });

  it('should prefer an explicit log level over verbose', () => {
    expect(loadConfig({ BUILDGRAPH_VERBOSE: '1', BUILDGRAPH_LOG_LEVEL: 'error' }).logLevel).toBe(
      'error'
    );
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ BUILDGRAPH_LOG_LEVEL: 'loud' })).toThrow(ConfigError);
    expect(() => loadConfig({ BUILDGRAPH_MAX_PRESET_DEPTH: '0' })).toThrow(
      "BUILDGRAPH_MAX_PRESET_DEPTH must be a positive integer, got '0'"
    );
    expect(() => loadConfig({ BUILDGRAPH_MAX_PRESET_DEPTH: '2.5' })).toThrow(ConfigError);
  });
});

describe('ConsoleLogger', () => {
  it('should drop messages below its level', () => {
    const lines: string[] = [];
    const log = new ConsoleLogger('warn', (line) => lines.push(line));

    log.debug('hidden');
    log.info('hidden too');
    log.warn('shown');
    log.error('also shown');

    expect(lines).toHaveLength(2);
    expect(lines[0]).toContain('shown');
    expect(lines[1]).toContain('also shown');
  });

  it('should print metadata as JSON after the message', () => {
    const lines: string[] = [];
    const log = new ConsoleLogger('debug', (line) => lines.push(line));

    log.debug('Plan order', { order: ['a'] });

    expect(lines[0].split('\n').slice(1)).toEqual(['{', '  "order": [', '    "a"', '  ]', '}']);
  });

  it('should change level at runtime', () => {
    const lines: string[] = [];
    const log = new ConsoleLogger('error', (line) => lines.push(line));

    log.setLevel('info');
    log.info('now visible');

    expect(log.getLevel()).toBe('info');
    expect(lines).toHaveLength(1);
  });
});

describe('handleError', () => {
  it('should keep the message of typed errors', () => {
    const error = new DependencyCycleError(['a', 'b', 'a']);

    expect(error.code).toBe(ErrorCodes.DEPENDENCY_CYCLE);
    expect(error.details).toEqual({ cycle: ['a', 'b', 'a'] });
    expect(handleError(error)).toEqual({ success: false, error: 'Dependency cycle: a → b → a' });
  });

  it('should cope with plain errors and thrown values', () => {
    expect(handleError(new Error('boom'))).toEqual({ success: false, error: 'boom' });
    expect(handleError('boom')).toEqual({ success: false, error: 'An unknown error occurred' });
  });
});
