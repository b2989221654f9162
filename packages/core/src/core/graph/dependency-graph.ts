import type { ComponentRegistry } from '../registry/registry.js';
import { defaultRegistry } from '../registry/registry.js';
import { CyclicDependencyError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

type VisitState = 'in-progress' | 'done';

/**
 * Transitive closures over the component registry.
 *
 * Forward edges come straight from each component's declared dependencies;
 * the reverse index (dependency -> direct dependents) is derived once, on
 * first use, and shared by every reverse query.
 */
export class DependencyGraph {
  private reverseIndex: ReadonlyMap<string, readonly string[]> | undefined;
  private readonly declarationIndex: ReadonlyMap<string, number>;

  constructor(private readonly registry: ComponentRegistry = defaultRegistry()) {
    this.declarationIndex = new Map(registry.ids().map((id, index): [string, number] => [id, index]));
  }

  directDependencies(componentId: string): string[] {
    return [...this.registry.require(componentId).directDependencies];
  }

  /**
   * Components that list `componentId` as a direct dependency, in declaration order.
   */
  directDependents(componentId: string): string[] {
    this.registry.require(componentId);
    return [...(this.getReverseIndex().get(componentId) ?? [])];
  }

  /**
   * Everything that must be built before `componentId`, followed by the
   * component itself. Each dependency appears strictly before every component
   * that depends on it; siblings are walked in declared order.
   */
  allDeps(componentId: string): string[] {
    this.registry.require(componentId);

    const state = new Map<string, VisitState>();
    const stack: string[] = [];
    const order: string[] = [];

    const visit = (id: string): void => {
      const current = state.get(id);
      if (current === 'done') {
        return;
      }
      if (current === 'in-progress') {
        throw new CyclicDependencyError([...stack.slice(stack.indexOf(id)), id]);
      }

      state.set(id, 'in-progress');
      stack.push(id);
      for (const dependency of this.registry.require(id).directDependencies) {
        visit(dependency);
      }
      stack.pop();
      state.set(id, 'done');
      order.push(id);
    };

    visit(componentId);
    logger.debug(`Resolved ${order.length - 1} dependencies for ${componentId}`);
    return order;
  }

  /**
   * Every component that depends on `componentId`, directly or transitively,
   * excluding the component itself.
   *
   * Ordered by the longest dependency chain back to `componentId`, furthest
   * first, so callers can clear dependents before what they depend on.
   * Components at the same distance keep registry declaration order.
   */
  allDependents(componentId: string): string[] {
    this.registry.require(componentId);
    const reverse = this.getReverseIndex();

    const state = new Map<string, VisitState>();
    const stack: string[] = [];
    const finished: string[] = [];

    const visit = (id: string): void => {
      const current = state.get(id);
      if (current === 'done') {
        return;
      }
      if (current === 'in-progress') {
        // The reverse walk runs against the edges, so flip the path to read dependent -> dependency
        throw new CyclicDependencyError([...stack.slice(stack.indexOf(id)), id].reverse());
      }

      state.set(id, 'in-progress');
      stack.push(id);
      for (const dependent of reverse.get(id) ?? []) {
        visit(dependent);
      }
      stack.pop();
      state.set(id, 'done');
      finished.push(id);
    };

    visit(componentId);

    // Reversed finish order lists every node before its dependents, so ranks settle in one pass
    const rank = new Map<string, number>([[componentId, 0]]);
    for (const id of finished.reverse()) {
      const base = rank.get(id) ?? 0;
      for (const dependent of reverse.get(id) ?? []) {
        rank.set(dependent, Math.max(rank.get(dependent) ?? 0, base + 1));
      }
    }

    const dependents = [...rank.keys()].filter(id => id !== componentId);
    dependents.sort((a, b) => {
      const byRank = (rank.get(b) ?? 0) - (rank.get(a) ?? 0);
      return byRank !== 0 ? byRank : this.declarationOrder(a) - this.declarationOrder(b);
    });

    logger.debug(`Resolved ${dependents.length} dependents for ${componentId}`);
    return dependents;
  }

  private declarationOrder(id: string): number {
    return this.declarationIndex.get(id) ?? Number.MAX_SAFE_INTEGER;
  }

  private getReverseIndex(): ReadonlyMap<string, readonly string[]> {
    if (!this.reverseIndex) {
      const index = new Map<string, string[]>();
      for (const component of this.registry.components()) {
        for (const dependency of component.directDependencies) {
          const dependents = index.get(dependency) ?? [];
          dependents.push(component.id);
          index.set(dependency, dependents);
        }
      }
      this.reverseIndex = index;
    }
    return this.reverseIndex;
  }
}

let defaultGraph: DependencyGraph | undefined;

/**
 * Graph over the default registry, created once per process.
 */
export function getDependencyGraph(): DependencyGraph {
  if (!defaultGraph) {
    defaultGraph = new DependencyGraph(defaultRegistry());
  }
  return defaultGraph;
}
