/**
 * buildgraph - declarative build-target resolution
 *
 * @packageDocumentation
 */

export type {
  BuildContext,
  ContextKey,
  ContextOverrides,
  DependencyEdge,
  Expression,
  PlanEntry,
  Predicate,
  PresetDeclaration,
  RequirementSetDeclaration,
  ResolvedPreset,
  ResolvedTarget,
  TargetDeclaration,
  TargetKind,
  Visibility,
} from './core/types.js';
export * from './core/errors.js';
export { BuildEngine } from './core/engine.js';
export { loadConfig } from './core/config.js';
export { logger, ConsoleLogger } from './core/logger.js';
export { literal, when, equals, and, or, not, evaluate, evaluateAll } from './expr/evaluate.js';
export { parseCondition, formatCondition } from './expr/parse.js';
export { applyOverrides } from './presets/resolve.js';
export { loadManifest, parseManifest, findManifest, createEngine } from './storage/manifest.js';
export { renderPlan } from './export/render.js';
