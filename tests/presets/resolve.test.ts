/**
 * Tests for preset registration and resolution.
 */

import { describe, it, expect } from 'vitest';
import { PresetResolver, applyOverrides, unsetKeys, EMPTY_CONTEXT } from '../../src/presets/resolve.js';
import { BuildEngine } from '../../src/core/engine.js';
import {
  ConfigError,
  DuplicatePresetError,
  InvalidPresetError,
  PresetChainTooDeepError,
  PresetCycleError,
  UnknownPresetError,
} from '../../src/core/errors.js';

describe('PresetResolver.resolve', () => {
  it('should merge a child over its parent', () => {
    const presets = new PresetResolver();
    presets.register({ name: 'base', context: { configuration: 'Debug' } });
    presets.register({ name: 'ci', inherits: 'base', context: { platform: 'Linux' } });

    expect(presets.resolve('ci')).toEqual({
      configuration: 'Debug',
      platform: 'Linux',
      compiler: undefined,
    });
  });

  it('should let the closest preset win on a shared key', () => {
    const presets = new PresetResolver();
    presets.register({ name: 'root', context: { configuration: 'Debug', compiler: 'GCC' } });
    presets.register({ name: 'mid', inherits: 'root', context: { configuration: 'RelWithDebInfo' } });
    presets.register({ name: 'leaf', inherits: 'mid', context: { configuration: 'Release' } });

    expect(presets.resolve('leaf')).toEqual({
      configuration: 'Release',
      platform: undefined,
      compiler: 'GCC',
    });
    expect(presets.resolve('mid').configuration).toBe('RelWithDebInfo');
  });

  it('should accept parents registered after their children', () => {
    const presets = new PresetResolver();
    presets.register({ name: 'child', inherits: 'parent' });
    presets.register({ name: 'parent', context: { compiler: 'Clang' } });

    expect(presets.resolve('child').compiler).toBe('Clang');
  });

  it('should fail on an unknown preset or parent', () => {
    const presets = new PresetResolver();
    presets.register({ name: 'orphan', inherits: 'missing' });

    expect(() => presets.resolve('nope')).toThrow(UnknownPresetError);
    expect(() => presets.resolve('orphan')).toThrow(
      "Unknown preset 'missing' (inherited by 'orphan')"
    );
  });

  it('should name the inheritance cycle', () => {
    const presets = new PresetResolver();
    presets.register({ name: 'x', inherits: 'y' });
    presets.register({ name: 'y', inherits: 'z' });
    presets.register({ name: 'z', inherits: 'y' });

    try {
      presets.resolve('x');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PresetCycleError);
      if (error instanceof PresetCycleError) {
        expect(error.cycle).toEqual(['y', 'z', 'y']);
      }
    }
  });

  it('should bound the chain length', () => {
    const presets = new PresetResolver({ maxDepth: 3 });
    presets.register({ name: 'p0' });
    presets.register({ name: 'p1', inherits: 'p0' });
    presets.register({ name: 'p2', inherits: 'p1' });
    presets.register({ name: 'p3', inherits: 'p2' });

    expect(presets.chain('p2')).toEqual(['p0', 'p1', 'p2']);
    expect(() => presets.resolve('p3')).toThrow(PresetChainTooDeepError);
  });

  it('should refuse a depth bound that is not a positive integer', () => {
    for (const maxDepth of [0, -1, 2.5, Number.NaN]) {
      expect(() => new PresetResolver({ maxDepth })).toThrow(ConfigError);
    }
    expect(() => new PresetResolver({ maxDepth: 0 })).toThrow(
      'maxDepth must be a positive integer, got 0'
    );
    expect(() => new BuildEngine({ maxPresetDepth: -3 })).toThrow(ConfigError);
  });

  it('should not mutate registered presets', () => {
    const presets = new PresetResolver();
    const declaration = { name: 'base', context: { configuration: 'Debug' as const } };
    presets.register(declaration);
    presets.register({ name: 'ci', inherits: 'base', context: { configuration: 'Release' } });

    presets.resolve('ci');

    expect(presets.resolve('base').configuration).toBe('Debug');
    expect(Object.isFrozen(presets.lookup('base'))).toBe(true);
  });
});

describe('PresetResolver.resolveDetailed', () => {
  it('should report the chain and merge variables', () => {
    const presets = new PresetResolver();
    presets.register({
      name: 'base',
      hidden: true,
      variables: { BUILD_TESTING: 'ON', WARNINGS: 'default' },
    });
    presets.register({ name: 'strict', inherits: 'base', variables: { WARNINGS: 'error' } });

    expect(presets.resolveDetailed('strict')).toEqual({
      name: 'strict',
      chain: ['base', 'strict'],
      context: { configuration: undefined, platform: undefined, compiler: undefined },
      variables: { BUILD_TESTING: 'ON', WARNINGS: 'error' },
    });
  });
});

describe('PresetResolver.register', () => {
  it('should reject duplicates, unknown keys and unknown configurations', () => {
    const presets = new PresetResolver();
    presets.register({ name: 'base' });

    expect(() => presets.register({ name: 'base' })).toThrow(DuplicatePresetError);
    expect(() => presets.register({ name: 'bad', context: { configuration: 'Fast' } })).toThrow(
      InvalidPresetError
    );
  });

  it('should list selectable presets in registration order', () => {
    const presets = new PresetResolver();
    presets.register({ name: 'zeta' });
    presets.register({ name: 'hidden-base', hidden: true });
    presets.register({ name: 'alpha', inherits: 'hidden-base' });

    expect(presets.names()).toEqual(['zeta', 'alpha']);
    expect(presets.names({ includeHidden: true })).toEqual(['zeta', 'hidden-base', 'alpha']);
  });
});

describe('applyOverrides', () => {
  it('should replace only the keys given', () => {
    const context = applyOverrides(EMPTY_CONTEXT, { configuration: 'Debug', platform: 'Linux' });
    const overridden = applyOverrides(context, { platform: 'Darwin', compiler: undefined });

    expect(overridden).toEqual({ configuration: 'Debug', platform: 'Darwin', compiler: undefined });
    expect(unsetKeys(overridden)).toEqual(['compiler']);
  });
});
