/**
 * Core type definitions for targets, presets, build contexts and plans.
 */

/**
 * The three kinds of build target.
 */
export type TargetKind = 'executable' | 'static-library' | 'interface-only';

export const TARGET_KINDS: readonly TargetKind[] = [
  'executable',
  'static-library',
  'interface-only',
];

/**
 * Who consumes a usage requirement.
 */
export type Visibility =
  | 'private' // the declaring target only
  | 'public' // the declaring target and its consumers
  | 'interface'; // consumers only

export const VISIBILITIES: readonly Visibility[] = ['private', 'public', 'interface'];

/**
 * Requirement kinds carried by every visibility set, in plan order.
 */
export type RequirementKind = 'includeDirs' | 'definitions' | 'options';

export const REQUIREMENT_KINDS: readonly RequirementKind[] = [
  'includeDirs',
  'definitions',
  'options',
];

/**
 * Keys a build context assigns.
 */
export type ContextKey = 'configuration' | 'platform' | 'compiler';

export const CONTEXT_KEYS: readonly ContextKey[] = ['configuration', 'platform', 'compiler'];

export type Configuration = 'Debug' | 'Release' | 'RelWithDebInfo' | 'MinSizeRel';

export const CONFIGURATIONS: readonly Configuration[] = [
  'Debug',
  'Release',
  'RelWithDebInfo',
  'MinSizeRel',
];

/**
 * Resolved configuration/platform/compiler values. A key holding `undefined` is unset.
 */
export type BuildContext = Readonly<Record<ContextKey, string | undefined>>;

/**
 * Partial assignment of context keys, as written in presets and CLI overrides.
 */
export type ContextOverrides = Partial<Record<ContextKey, string>>;

/**
 * Boolean condition over a build context.
 */
export type Predicate =
  | { kind: 'equals'; key: string; value: string }
  | { kind: 'and'; operands: readonly Predicate[] }
  | { kind: 'or'; operands: readonly Predicate[] }
  | { kind: 'not'; operand: Predicate };

/**
 * A requirement entry: a plain value, or a value that applies only when its predicate holds.
 */
export type Expression =
  | { kind: 'literal'; value: string }
  | { kind: 'conditional'; when: Predicate; value: string };

/**
 * Requirements declared under one visibility.
 */
export interface RequirementSet {
  includeDirs: readonly Expression[];
  definitions: readonly Expression[];
  options: readonly Expression[];
  links: readonly string[];
}

/**
 * Requirement set as written by callers: every field optional, plain strings allowed.
 */
export interface RequirementSetDeclaration {
  includeDirs?: readonly (string | Expression)[];
  definitions?: readonly (string | Expression)[];
  options?: readonly (string | Expression)[];
  links?: readonly string[];
}

/**
 * An already-parsed target declaration.
 */
export interface TargetDeclaration {
  name: string;
  kind: TargetKind;
  sources?: readonly string[];
  private?: RequirementSetDeclaration;
  public?: RequirementSetDeclaration;
  interface?: RequirementSetDeclaration;
}

/**
 * A registered target with every set present.
 */
export interface Target {
  readonly name: string;
  readonly kind: TargetKind;
  readonly sources: readonly string[];
  readonly requirements: Readonly<Record<Visibility, RequirementSet>>;
}

/**
 * A directed dependency edge, tagged with the visibility it was declared under.
 */
export interface DependencyEdge {
  from: string;
  to: string;
  visibility: Visibility;
}

/**
 * Compile requirements after propagation, still unevaluated.
 */
export type Requirements = Readonly<Record<RequirementKind, readonly Expression[]>>;

/**
 * Derived, read-only view of a target after propagation.
 */
export interface ResolvedTarget {
  name: string;
  kind: TargetKind;
  sources: readonly string[];
  edges: readonly DependencyEdge[];
  effective: Requirements;
  exported: Requirements;
  /** Static libraries this target's own link step needs, dependencies first. */
  linkDependencies: readonly string[];
  /** Static libraries a consumer of this target inherits, across every edge. */
  linkInterface: readonly string[];
}

/**
 * An already-parsed preset declaration.
 */
export interface PresetDeclaration {
  name: string;
  inherits?: string;
  description?: string;
  hidden?: boolean;
  context?: ContextOverrides;
  variables?: Readonly<Record<string, string>>;
}

export interface ResolvedPreset {
  name: string;
  /** Presets walked, root first. */
  chain: readonly string[];
  context: BuildContext;
  variables: Readonly<Record<string, string>>;
}

/**
 * Concrete build instructions for one target.
 */
export interface PlanEntry {
  name: string;
  kind: TargetKind;
  sources: string[];
  includeDirs: string[];
  definitions: string[];
  options: string[];
  linkDependencies: string[];
}
