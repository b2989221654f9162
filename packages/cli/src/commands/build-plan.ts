import { buildPlan, rebuildPlan, resolveInstallRoot } from '@component-resolver/core';
import type { CliContext } from '../cli/context.js';
import { resolveComponentArg, type ComponentOptions } from './graph.js';

/**
 * Components still to build for a target, in build order.
 * Install root defaults to the configured one.
 */
export async function buildPlanCommand(
  ctx: CliContext,
  rawName: string,
  installRoot: string | undefined,
  options: ComponentOptions
): Promise<void> {
  const componentId = resolveComponentArg(rawName, options);
  const root = resolveInstallRoot(installRoot, ctx.config, ctx.cwd);
  const plan = await buildPlan(componentId, root, { registry: ctx.registry, graph: ctx.graph });

  for (const id of plan.build) {
    ctx.output.line(id);
  }
  if (plan.skipped.length > 0) {
    ctx.output.diagnostic(`already built: ${plan.skipped.join(' ')}`);
  }
}

export interface RebuildPlanOptions extends ComponentOptions {
  phase: string;
}

/**
 * `--phase clear` prints what to clear (dependents first); `--phase build`
 * prints what to build back afterwards.
 */
export function rebuildPlanCommand(ctx: CliContext, rawName: string, options: RebuildPlanOptions): void {
  const componentId = resolveComponentArg(rawName, options);
  const plan = rebuildPlan(componentId, { registry: ctx.registry, graph: ctx.graph });

  const ids = options.phase === 'clear' ? plan.clear : plan.build;
  for (const id of ids) {
    ctx.output.line(id);
  }
}
