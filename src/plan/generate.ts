/**
 * Build plan generation: orders targets and evaluates their requirements against a context.
 */

import type { BuildContext, PlanEntry, ResolvedTarget } from '../core/types.js';
import { UnknownTargetError } from '../core/errors.js';
import { logger } from '../core/logger.js';
import { evaluateAll } from '../expr/evaluate.js';
import type { TargetRegistry } from '../graph/registry.js';
import type { RequirementPropagator } from '../graph/propagate.js';

/**
 * Requested targets plus everything they transitively depend on.
 */
function collectSubgraph(
  roots: readonly string[],
  propagator: RequirementPropagator
): Map<string, ResolvedTarget> {
  const subgraph = new Map<string, ResolvedTarget>();
  const pending = [...roots];

  while (pending.length > 0) {
    const name = pending.pop();
    if (name === undefined || subgraph.has(name)) continue;
    const resolved = propagator.resolve(name);
    subgraph.set(name, resolved);
    for (const edge of resolved.edges) {
      pending.push(edge.to);
    }
  }

  return subgraph;
}

/**
 * Kahn's algorithm: dependencies come before their dependents, ties go to the
 * target registered first.
 */
export function topologicalOrder(
  subgraph: ReadonlyMap<string, ResolvedTarget>,
  registry: TargetRegistry
): string[] {
  const remaining = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const [name, resolved] of subgraph) {
    const unique = new Set(resolved.edges.map((edge) => edge.to));
    remaining.set(name, unique.size);
    for (const dependency of unique) {
      const list = dependents.get(dependency) ?? [];
      list.push(name);
      dependents.set(dependency, list);
    }
  }

  const rank = new Map<string, number>();
  for (const name of subgraph.keys()) {
    rank.set(name, registry.declarationIndex(name));
  }
  const byRank = (a: string, b: string): number => (rank.get(a) ?? 0) - (rank.get(b) ?? 0);

  const ready = [...remaining.entries()]
    .filter(([, count]) => count === 0)
    .map(([name]) => name)
    .sort(byRank);
  const order: string[] = [];

  while (ready.length > 0) {
    const name = ready.shift();
    if (name === undefined) break;
    order.push(name);

    for (const dependent of dependents.get(name) ?? []) {
      const count = (remaining.get(dependent) ?? 0) - 1;
      remaining.set(dependent, count);
      if (count === 0) {
        ready.push(dependent);
        ready.sort(byRank);
      }
    }
  }

  return order;
}

export function toPlanEntry(resolved: ResolvedTarget, context: BuildContext): PlanEntry {
  return {
    name: resolved.name,
    kind: resolved.kind,
    sources: [...resolved.sources],
    includeDirs: evaluateAll(resolved.effective.includeDirs, context),
    definitions: evaluateAll(resolved.effective.definitions, context),
    options: evaluateAll(resolved.effective.options, context),
    linkDependencies: [...resolved.linkDependencies],
  };
}

export class PlanGenerator {
  constructor(
    private readonly registry: TargetRegistry,
    private readonly propagator: RequirementPropagator
  ) {}

  /**
   * Plan the requested targets and their dependencies. An empty request plans every target.
   */
  generate(targetNames: readonly string[], context: BuildContext): PlanEntry[] {
    const requested = targetNames.length > 0 ? [...targetNames] : [...this.registry.allNames()];

    for (const name of requested) {
      if (!this.registry.has(name)) {
        throw new UnknownTargetError(name);
      }
    }
    for (const name of requested) {
      this.propagator.resolve(name);
    }

    const subgraph = collectSubgraph(requested, this.propagator);
    const order = topologicalOrder(subgraph, this.registry);
    logger.debug('Plan order', { order });

    return order.map((name) => {
      const resolved = subgraph.get(name);
      if (!resolved) {
        throw new UnknownTargetError(name);
      }
      return toPlanEntry(resolved, context);
    });
  }
}
