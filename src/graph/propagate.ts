/**
 * Transitive propagation of usage requirements across the dependency graph.
 *
 * For every target T:
 *   exported(T)  = own public + interface, then exported(D) for each public/interface edge T→D
 *   effective(T) = own private + public,   then exported(D) for each private/public edge T→D
 *
 * An interface edge is a requirement of T's consumers, so it reaches exported(T) only.
 */

import type {
  DependencyEdge,
  Expression,
  RequirementKind,
  Requirements,
  ResolvedTarget,
  Target,
  Visibility,
} from '../core/types.js';
import { REQUIREMENT_KINDS } from '../core/types.js';
import { DependencyCycleError, UnknownTargetError } from '../core/errors.js';
import { logger } from '../core/logger.js';
import { expressionKey } from '../expr/evaluate.js';
import type { TargetRegistry } from './registry.js';

/**
 * Accumulates entries per requirement kind, keeping the first occurrence of each value.
 */
class RequirementCollector {
  private readonly entries: Record<RequirementKind, Expression[]> = {
    includeDirs: [],
    definitions: [],
    options: [],
  };
  private readonly seen: Record<RequirementKind, Set<string>> = {
    includeDirs: new Set(),
    definitions: new Set(),
    options: new Set(),
  };

  add(kind: RequirementKind, entries: readonly Expression[]): void {
    for (const entry of entries) {
      const key = expressionKey(entry);
      if (this.seen[kind].has(key)) continue;
      this.seen[kind].add(key);
      this.entries[kind].push(entry);
    }
  }

  addOwn(target: Target, visibilities: readonly Visibility[]): void {
    for (const visibility of visibilities) {
      const set = target.requirements[visibility];
      for (const kind of REQUIREMENT_KINDS) {
        this.add(kind, set[kind]);
      }
    }
  }

  addAll(requirements: Requirements): void {
    for (const kind of REQUIREMENT_KINDS) {
      this.add(kind, requirements[kind]);
    }
  }

  build(): Requirements {
    return Object.freeze({
      includeDirs: Object.freeze(this.entries.includeDirs),
      definitions: Object.freeze(this.entries.definitions),
      options: Object.freeze(this.entries.options),
    });
  }
}

const EXPORTING: ReadonlySet<Visibility> = new Set<Visibility>(['public', 'interface']);
const CONSUMING: ReadonlySet<Visibility> = new Set<Visibility>(['private', 'public']);

/**
 * Ordered list of library names, keeping the first occurrence.
 */
class LinkList {
  private readonly names: string[] = [];
  private readonly seen = new Set<string>();

  addAll(names: Iterable<string>): void {
    for (const name of names) {
      if (this.seen.has(name)) continue;
      this.seen.add(name);
      this.names.push(name);
    }
  }

  build(): readonly string[] {
    return Object.freeze(this.names);
  }
}

/**
 * A target whose dependencies are being walked; `next` indexes its next unvisited edge.
 */
interface Frame {
  target: Target;
  edges: readonly DependencyEdge[];
  next: number;
}

export class RequirementPropagator {
  private readonly resolved = new Map<string, ResolvedTarget>();

  constructor(private readonly registry: TargetRegistry) {}

  /**
   * Resolve a target and, first, everything it depends on. Results are memoised.
   */
  resolve(name: string): ResolvedTarget {
    return this.visit(name);
  }

  exported(name: string): Requirements {
    return this.visit(name).exported;
  }

  effective(name: string): Requirements {
    return this.visit(name).effective;
  }

  /**
   * Static libraries to link for `name`, each listed after everything it depends on.
   */
  linkClosure(name: string): readonly string[] {
    return this.visit(name).linkDependencies;
  }

  /**
   * Number of targets resolved so far.
   */
  get resolvedCount(): number {
    return this.resolved.size;
  }

  /**
   * Post-order walk with an explicit stack, so chain depth is bounded by memory only.
   * The frames double as the active path reported by a cycle.
   */
  private visit(root: string): ResolvedTarget {
    const cached = this.resolved.get(root);
    if (cached) return cached;

    const frames: Frame[] = [];
    const positions = new Map<string, number>();
    const enter = (name: string, referencedBy?: string): void => {
      if (!this.registry.has(name)) {
        throw new UnknownTargetError(name, referencedBy);
      }
      positions.set(name, frames.length);
      frames.push({
        target: this.registry.lookup(name),
        edges: this.registry.dependencies(name),
        next: 0,
      });
    };

    enter(root);
    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      const { target, edges } = frame;

      if (frame.next < edges.length) {
        const to = edges[frame.next].to;
        frame.next++;
        if (this.resolved.has(to)) continue;

        const position = positions.get(to);
        if (position !== undefined) {
          const path = frames.slice(position).map((entry) => entry.target.name);
          throw new DependencyCycleError([...path, to]);
        }
        enter(to, target.name);
        continue;
      }

      frames.pop();
      positions.delete(target.name);
      this.resolved.set(target.name, this.combine(target, edges));
      logger.debug(`Resolved target ${target.name}`, {
        dependencies: edges.map((edge) => `${edge.to} (${edge.visibility})`),
      });
    }

    return this.lookupResolved(root);
  }

  private lookupResolved(name: string): ResolvedTarget {
    const resolved = this.resolved.get(name);
    if (!resolved) {
      throw new UnknownTargetError(name);
    }
    return resolved;
  }

  /**
   * Consumers inherit libraries across every edge; the target's own link step only
   * across the edges it consumes.
   */
  private combine(target: Target, edges: readonly DependencyEdge[]): ResolvedTarget {
    const exported = new RequirementCollector();
    exported.addOwn(target, ['public', 'interface']);

    const effective = new RequirementCollector();
    effective.addOwn(target, ['private', 'public']);

    const links = new LinkList();
    const linkInterface = new LinkList();

    for (const edge of edges) {
      const dependency = this.lookupResolved(edge.to);
      const artifacts =
        dependency.kind === 'static-library'
          ? [...dependency.linkInterface, dependency.name]
          : dependency.linkInterface;

      if (CONSUMING.has(edge.visibility)) {
        effective.addAll(dependency.exported);
        links.addAll(artifacts);
      }
      if (EXPORTING.has(edge.visibility)) {
        exported.addAll(dependency.exported);
      }
      linkInterface.addAll(artifacts);
    }

    return Object.freeze({
      name: target.name,
      kind: target.kind,
      sources: target.sources,
      edges: Object.freeze([...edges]),
      effective: effective.build(),
      exported: exported.build(),
      linkDependencies: links.build(),
      linkInterface: linkInterface.build(),
    });
  }
}
