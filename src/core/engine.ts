/**
 * Entry points used by the manifest loader and the CLI.
 */

import type {
  BuildContext,
  ContextOverrides,
  PlanEntry,
  PresetDeclaration,
  ResolvedPreset,
  ResolvedTarget,
  TargetDeclaration,
} from './types.js';
import { logger } from './logger.js';
import { TargetRegistry } from '../graph/registry.js';
import { RequirementPropagator } from '../graph/propagate.js';
import { PresetResolver, applyOverrides } from '../presets/resolve.js';
import { PlanGenerator } from '../plan/generate.js';

export interface BuildEngineOptions {
  maxPresetDepth?: number;
}

export class BuildEngine {
  readonly targets = new TargetRegistry();
  readonly presets: PresetResolver;
  // Registered targets never change, so memoised resolutions survive later registrations.
  private readonly propagator = new RequirementPropagator(this.targets);

  constructor(options: BuildEngineOptions = {}) {
    this.presets = new PresetResolver({ maxDepth: options.maxPresetDepth });
  }

  registerTarget(declaration: TargetDeclaration): void {
    this.targets.register(declaration);
    logger.debug(`Registered ${declaration.kind} ${declaration.name}`);
  }

  registerPreset(declaration: PresetDeclaration): void {
    this.presets.register(declaration);
    logger.debug(`Registered preset ${declaration.name}`, {
      inherits: declaration.inherits,
    });
  }

  resolvePreset(name: string): BuildContext {
    return this.presets.resolve(name);
  }

  resolvePresetDetailed(name: string): ResolvedPreset {
    return this.presets.resolveDetailed(name);
  }

  describeTarget(name: string): ResolvedTarget {
    this.targets.lookup(name);
    return this.propagator.resolve(name);
  }

  buildPlan(targetNames: readonly string[], context: BuildContext): PlanEntry[] {
    const plan = new PlanGenerator(this.targets, this.propagator).generate(targetNames, context);
    logger.info(`Planned ${plan.length} target(s)`, { context });
    return plan;
  }

  /**
   * Resolve a preset, apply explicit overrides on top, and plan with the result.
   */
  planForPreset(
    targetNames: readonly string[],
    presetName: string,
    overrides: ContextOverrides = {}
  ): PlanEntry[] {
    const context = applyOverrides(this.resolvePreset(presetName), overrides);
    return this.buildPlan(targetNames, context);
  }
}
