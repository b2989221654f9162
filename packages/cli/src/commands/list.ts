import { COMPONENT_KINDS, ValidationError, type ComponentKind } from '@component-resolver/core';
import type { CliContext } from '../cli/context.js';

export interface ListOptions {
  kind?: string;
  long?: boolean;
}

function parseComponentKind(value: string): ComponentKind {
  const kind = COMPONENT_KINDS.find(candidate => candidate === value);
  if (!kind) {
    throw new ValidationError(`unknown component kind '${value}' (expected one of ${COMPONENT_KINDS.join(', ')})`, { kind: value });
  }
  return kind;
}

/**
 * Registry contents in declaration order.
 */
export function listCommand(ctx: CliContext, options: ListOptions): void {
  const kind = options.kind ? parseComponentKind(options.kind) : undefined;

  for (const component of ctx.registry.components(kind)) {
    if (options.long) {
      const deps = component.directDependencies.length > 0 ? component.directDependencies.join(',') : '-';
      ctx.output.line(`${component.id}\t${component.kind}\t${deps}`);
    } else {
      ctx.output.line(component.id);
    }
  }
}
