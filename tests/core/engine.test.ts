/**
 * Tests for the engine entry points.
 */

import { describe, it, expect } from 'vitest';
import { BuildEngine } from '../../src/core/engine.js';
import {
  DependencyCycleError,
  DuplicateTargetError,
  InvalidTargetError,
  UnsetContextKeyError,
} from '../../src/core/errors.js';
import { equals, when } from '../../src/expr/evaluate.js';

function sampleEngine(): BuildEngine {
  const engine = new BuildEngine();
  engine.registerPreset({ name: 'base', context: { configuration: 'Debug' } });
  engine.registerPreset({ name: 'ci', inherits: 'base', context: { platform: 'Linux' } });
  engine.registerPreset({
    name: 'release',
    inherits: 'ci',
    context: { configuration: 'Release', compiler: 'GCC' },
  });

  engine.registerTarget({
    name: 'app',
    kind: 'executable',
    sources: ['main.c'],
    private: {
      links: ['mathlib'],
      options: [when(equals('configuration', 'Release'), '-O2')],
    },
  });
  engine.registerTarget({
    name: 'mathlib',
    kind: 'static-library',
    sources: ['math.c'],
    public: { links: ['corelib'] },
  });
  engine.registerTarget({ name: 'corelib', kind: 'static-library', sources: ['core.c'] });
  return engine;
}

describe('BuildEngine.resolvePreset', () => {
  it('should resolve inherited presets', () => {
    expect(sampleEngine().resolvePreset('ci')).toEqual({
      configuration: 'Debug',
      platform: 'Linux',
      compiler: undefined,
    });
  });
});

describe('BuildEngine.buildPlan', () => {
  it('should link dependencies before dependents', () => {
    const engine = sampleEngine();
    const plan = engine.buildPlan(['app'], engine.resolvePreset('release'));

    expect(plan.map((entry) => entry.name)).toEqual(['corelib', 'mathlib', 'app']);
    expect(plan[2].linkDependencies).toEqual(['corelib', 'mathlib']);
    expect(plan[2].options).toEqual(['-O2']);
  });

  it('should fail when a condition reads a key the context leaves unset', () => {
    const engine = new BuildEngine();
    engine.registerPreset({ name: 'debug', context: { configuration: 'Debug' } });
    engine.registerTarget({
      name: 'app',
      kind: 'executable',
      private: { definitions: [when(equals('platform', 'Windows'), 'WIN32')] },
    });

    expect(() => engine.buildPlan(['app'], engine.resolvePreset('debug'))).toThrow(
      UnsetContextKeyError
    );
  });

  it('should see targets registered after an earlier resolution', () => {
    const engine = new BuildEngine();
    engine.registerTarget({ name: 'base', kind: 'static-library' });
    engine.registerTarget({ name: 'app', kind: 'executable', private: { links: ['base', 'late'] } });

    expect(engine.describeTarget('base').linkDependencies).toEqual([]);
    expect(() => engine.describeTarget('app')).toThrow("Unknown target 'late' (required by 'app')");

    engine.registerTarget({ name: 'late', kind: 'static-library' });

    expect(engine.describeTarget('app').linkDependencies).toEqual(['base', 'late']);
  });
});

describe('BuildEngine.planForPreset', () => {
  it('should apply explicit overrides over the preset', () => {
    const engine = sampleEngine();
    const debugPlan = engine.planForPreset(['app'], 'release', { configuration: 'Debug' });

    expect(debugPlan[2].options).toEqual([]);
  });
});

describe('BuildEngine registration errors', () => {
  it('should surface typed failures', () => {
    const engine = sampleEngine();

    expect(() => engine.registerTarget({ name: 'app', kind: 'executable' })).toThrow(
      DuplicateTargetError
    );
    expect(() =>
      engine.registerTarget({ name: 'hdr', kind: 'interface-only', sources: ['x.h'] })
    ).toThrow(InvalidTargetError);
  });

  it('should report cycles from buildPlan', () => {
    const engine = new BuildEngine();
    engine.registerTarget({ name: 'a', kind: 'static-library', public: { links: ['b'] } });
    engine.registerTarget({ name: 'b', kind: 'static-library', public: { links: ['c'] } });
    engine.registerTarget({ name: 'c', kind: 'static-library', public: { links: ['a'] } });

    expect(() =>
      engine.buildPlan(['a'], { configuration: 'Debug', platform: 'Linux', compiler: 'GCC' })
    ).toThrow(DependencyCycleError);
  });
});
