import type { Component, ComponentDefinition, ComponentKind } from '../../types/index.js';
import { RegistryDefinitionError, UnknownComponentError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { COMPONENT_DEFINITIONS } from './definitions.js';

/**
 * Read-only table of every known component, keyed by canonical id.
 *
 * Definitions are validated and frozen at construction. Cycles are left to
 * the graph resolver, which reports them with the offending path.
 */
export class ComponentRegistry {
  private readonly byId: ReadonlyMap<string, Component>;

  constructor(definitions: readonly ComponentDefinition[]) {
    this.byId = buildComponentTable(definitions);
  }

  get size(): number {
    return this.byId.size;
  }

  lookup(id: string): Component | undefined {
    return this.byId.get(id);
  }

  require(id: string): Component {
    const component = this.byId.get(id);
    if (!component) {
      throw new UnknownComponentError(id);
    }
    return component;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  /** Component ids in declaration order */
  ids(): string[] {
    return [...this.byId.keys()];
  }

  components(kind?: ComponentKind): Component[] {
    const all = [...this.byId.values()];
    return kind ? all.filter(component => component.kind === kind) : all;
  }
}

function buildComponentTable(definitions: readonly ComponentDefinition[]): ReadonlyMap<string, Component> {
  const table = new Map<string, Component>();

  for (const definition of definitions) {
    if (table.has(definition.id)) {
      throw new RegistryDefinitionError(`duplicate component '${definition.id}'`, { componentId: definition.id });
    }

    const dependencies = definition.dependencies ?? [];
    const seen = new Set<string>();
    for (const dependency of dependencies) {
      if (dependency === definition.id) {
        throw new RegistryDefinitionError(`component '${definition.id}' depends on itself`, { componentId: definition.id });
      }
      if (seen.has(dependency)) {
        throw new RegistryDefinitionError(
          `component '${definition.id}' lists '${dependency}' more than once`,
          { componentId: definition.id, dependency }
        );
      }
      seen.add(dependency);
    }

    table.set(definition.id, Object.freeze({
      id: definition.id,
      kind: definition.kind,
      directDependencies: Object.freeze([...dependencies]),
      artifacts: Object.freeze(definition.artifacts.map(descriptor => Object.freeze({ ...descriptor })))
    }));
  }

  // Dependencies may be declared after their dependents, so check once all ids are known
  for (const component of table.values()) {
    for (const dependency of component.directDependencies) {
      if (!table.has(dependency)) {
        throw new RegistryDefinitionError(
          `component '${component.id}' depends on undeclared component '${dependency}'`,
          { componentId: component.id, dependency }
        );
      }
    }
  }

  logger.debug(`Component registry loaded with ${table.size} components`);
  return table;
}

let defaultInstance: ComponentRegistry | undefined;

/**
 * The registry of the benchmark stack, created once per process.
 */
export function defaultRegistry(): ComponentRegistry {
  if (!defaultInstance) {
    defaultInstance = new ComponentRegistry(COMPONENT_DEFINITIONS);
  }
  return defaultInstance;
}
