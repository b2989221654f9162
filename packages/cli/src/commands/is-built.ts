import { UnknownComponentError, isBuilt, probeArtifacts, resolveInstallRoot } from '@component-resolver/core';
import type { CliContext } from '../cli/context.js';
import { resolveComponentArg, type ComponentOptions } from './graph.js';

export interface IsBuiltOptions extends ComponentOptions {
  verbose?: boolean;
}

/**
 * Exit code alone says whether the component is built: 0 yes, 1 no.
 * Nothing is written to the line output; an unknown id also exits 1,
 * with a diagnostic.
 */
export async function isBuiltCommand(
  ctx: CliContext,
  rawName: string,
  installRoot: string,
  options: IsBuiltOptions
): Promise<void> {
  const componentId = resolveComponentArg(rawName, options);
  const root = resolveInstallRoot(installRoot, ctx.config, ctx.cwd);

  const component = ctx.registry.lookup(componentId);
  if (!component) {
    ctx.output.diagnostic(new UnknownComponentError(componentId).message);
    ctx.exitCode = 1;
    return;
  }

  if (options.verbose) {
    const report = await probeArtifacts(component, root);
    if (!report.authoritative) {
      ctx.output.diagnostic(`${componentId}: build state is managed by its toolchain`);
    }
    for (const check of report.checks) {
      ctx.output.diagnostic(`${check.status.padEnd(7)} ${check.descriptor} ${check.path}`);
    }
  }

  const built = await isBuilt(componentId, root, ctx.registry);
  ctx.exitCode = built ? 0 : 1;
}
