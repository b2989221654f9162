/**
 * Graph query commands: all-deps, all-dependents, deps, dependents.
 * Each prints canonical component ids, one per line, in contract order.
 */

import { normalizeComponent, parseKindHint, type KindHint } from '@component-resolver/core';
import type { CliContext } from '../cli/context.js';

export interface ComponentOptions {
  kind?: string;
}

/**
 * Canonical id for a positional component argument and its optional --kind hint.
 */
export function resolveComponentArg(rawName: string, options: ComponentOptions): string {
  const hint: KindHint | undefined = options.kind ? parseKindHint(options.kind) : undefined;
  return normalizeComponent(hint, rawName);
}

function printIds(ctx: CliContext, ids: string[]): void {
  for (const id of ids) {
    ctx.output.line(id);
  }
}

export function allDepsCommand(ctx: CliContext, rawName: string, options: ComponentOptions): void {
  printIds(ctx, ctx.graph.allDeps(resolveComponentArg(rawName, options)));
}

export function allDependentsCommand(ctx: CliContext, rawName: string, options: ComponentOptions): void {
  printIds(ctx, ctx.graph.allDependents(resolveComponentArg(rawName, options)));
}

export function depsCommand(ctx: CliContext, rawName: string, options: ComponentOptions): void {
  printIds(ctx, ctx.graph.directDependencies(resolveComponentArg(rawName, options)));
}

export function dependentsCommand(ctx: CliContext, rawName: string, options: ComponentOptions): void {
  printIds(ctx, ctx.graph.directDependents(resolveComponentArg(rawName, options)));
}
