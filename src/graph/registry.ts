/**
 * Target registry: owns target declarations for one resolution run.
 */

import type {
  DependencyEdge,
  Expression,
  RequirementSet,
  RequirementSetDeclaration,
  Target,
  TargetDeclaration,
  Visibility,
} from '../core/types.js';
import { TARGET_KINDS, VISIBILITIES } from '../core/types.js';
import { DuplicateTargetError, InvalidTargetError, UnknownTargetError } from '../core/errors.js';
import { checkKeys, toExpression } from '../expr/evaluate.js';

const EMPTY_SET: RequirementSet = Object.freeze({
  includeDirs: [],
  definitions: [],
  options: [],
  links: [],
});

function isEmptySet(set: RequirementSetDeclaration | undefined): boolean {
  if (!set) return true;
  return (
    (set.includeDirs?.length ?? 0) === 0 &&
    (set.definitions?.length ?? 0) === 0 &&
    (set.options?.length ?? 0) === 0 &&
    (set.links?.length ?? 0) === 0
  );
}

function toExpressions(entries: readonly (string | Expression)[] = []): readonly Expression[] {
  return Object.freeze(
    entries.map((entry) => {
      const expression = toExpression(entry);
      if (expression.kind === 'conditional') checkKeys(expression.when);
      return expression;
    })
  );
}

function normalizeSet(
  target: string,
  visibility: Visibility,
  set: RequirementSetDeclaration | undefined
): RequirementSet {
  if (!set) return EMPTY_SET;

  const links = set.links ?? [];
  const seen = new Set<string>();
  for (const link of links) {
    if (seen.has(link)) {
      throw new InvalidTargetError(target, `dependency '${link}' listed twice under ${visibility}`);
    }
    seen.add(link);
  }

  return Object.freeze({
    includeDirs: toExpressions(set.includeDirs),
    definitions: toExpressions(set.definitions),
    options: toExpressions(set.options),
    links: Object.freeze([...links]),
  });
}

function validate(declaration: TargetDeclaration): void {
  const { name, kind } = declaration;

  if (typeof name !== 'string' || name.length === 0 || /\s/.test(name)) {
    throw new InvalidTargetError(String(name), 'name must be non-empty and contain no whitespace');
  }
  if (!TARGET_KINDS.includes(kind)) {
    throw new InvalidTargetError(name, `unknown kind '${String(kind)}'`);
  }
  if (kind === 'interface-only') {
    if ((declaration.sources?.length ?? 0) > 0) {
      throw new InvalidTargetError(name, 'an interface-only target cannot have sources');
    }
    for (const visibility of ['private', 'public'] as const) {
      if (!isEmptySet(declaration[visibility])) {
        throw new InvalidTargetError(
          name,
          `an interface-only target can only declare interface requirements, found ${visibility}`
        );
      }
    }
  }
}

export class TargetRegistry {
  private readonly targets = new Map<string, Target>();
  private readonly positions = new Map<string, number>();

  /**
   * Register a declaration. Dependencies may name targets registered later.
   */
  register(declaration: TargetDeclaration): Target {
    validate(declaration);
    if (this.targets.has(declaration.name)) {
      throw new DuplicateTargetError(declaration.name);
    }

    const target: Target = Object.freeze({
      name: declaration.name,
      kind: declaration.kind,
      sources: Object.freeze([...(declaration.sources ?? [])]),
      requirements: Object.freeze({
        private: normalizeSet(declaration.name, 'private', declaration.private),
        public: normalizeSet(declaration.name, 'public', declaration.public),
        interface: normalizeSet(declaration.name, 'interface', declaration.interface),
      }),
    });

    this.positions.set(target.name, this.targets.size);
    this.targets.set(target.name, target);
    return target;
  }

  lookup(name: string): Target {
    const target = this.targets.get(name);
    if (!target) {
      throw new UnknownTargetError(name);
    }
    return target;
  }

  has(name: string): boolean {
    return this.targets.has(name);
  }

  get size(): number {
    return this.targets.size;
  }

  /**
   * Registered names in insertion order. Each iteration starts over.
   */
  allNames(): Iterable<string> {
    const targets = this.targets;
    return {
      [Symbol.iterator]: () => targets.keys(),
    };
  }

  /**
   * Position of a target in registration order, used to break ordering ties.
   */
  declarationIndex(name: string): number {
    const position = this.positions.get(name);
    if (position === undefined) {
      throw new UnknownTargetError(name);
    }
    return position;
  }

  /**
   * Outgoing edges in declaration order: private, then public, then interface.
   */
  dependencies(name: string): DependencyEdge[] {
    const target = this.lookup(name);
    const edges: DependencyEdge[] = [];
    for (const visibility of VISIBILITIES) {
      for (const to of target.requirements[visibility].links) {
        edges.push({ from: name, to, visibility });
      }
    }
    return edges;
  }
}
