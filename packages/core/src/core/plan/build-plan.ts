import type { ComponentRegistry } from '../registry/registry.js';
import { defaultRegistry } from '../registry/registry.js';
import { DependencyGraph, getDependencyGraph } from '../graph/dependency-graph.js';
import { isBuilt } from '../artifacts/artifact-prober.js';
import { logger } from '../../utils/logger.js';

export interface BuildPlan {
  target: string;
  /** Components still to build, in build order */
  build: string[];
  /** Components skipped because their artifacts are already installed */
  skipped: string[];
}

export interface RebuildPlan {
  target: string;
  /** Dependents first, the target last */
  clear: string[];
  /** The target's dependency chain, then its dependents in build order */
  build: string[];
}

export interface PlanOptions {
  registry?: ComponentRegistry;
  graph?: DependencyGraph;
}

function resolveGraph(options: PlanOptions): DependencyGraph {
  if (options.graph) return options.graph;
  return options.registry ? new DependencyGraph(options.registry) : getDependencyGraph();
}

/**
 * The dependency chain of `componentId` minus whatever is already built.
 */
export async function buildPlan(componentId: string, installRoot: string, options: PlanOptions = {}): Promise<BuildPlan> {
  const graph = resolveGraph(options);
  const registry = options.registry ?? defaultRegistry();
  const chain = graph.allDeps(componentId);

  const build: string[] = [];
  const skipped: string[] = [];
  for (const id of chain) {
    if (await isBuilt(id, installRoot, registry)) {
      skipped.push(id);
    } else {
      build.push(id);
    }
  }

  logger.debug(`Build plan for ${componentId}: ${build.length} to build, ${skipped.length} already built`);
  return { target: componentId, build, skipped };
}

/**
 * Clear the target and everything above it, then build it back up.
 * Dependents are rebuilt in the reverse of the order they are cleared.
 */
export function rebuildPlan(componentId: string, options: PlanOptions = {}): RebuildPlan {
  const graph = resolveGraph(options);
  const dependents = graph.allDependents(componentId);

  const build = graph.allDeps(componentId);
  for (const dependent of [...dependents].reverse()) {
    if (!build.includes(dependent)) {
      build.push(dependent);
    }
  }

  return {
    target: componentId,
    clear: [...dependents, componentId],
    build
  };
}
