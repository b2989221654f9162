import { resolve } from 'path';
import { Command, CommanderError, Option } from 'commander';
import { consoleOutput, handleError, loadResolverConfig, logger, LogLevel } from '@component-resolver/core';
import { createCliContext, type CliContext, type CliContextOptions } from './cli/context.js';
import { withErrorHandling } from './utils/error-handling.js';
import {
  allDependentsCommand,
  allDepsCommand,
  dependentsCommand,
  depsCommand,
  type ComponentOptions
} from './commands/graph.js';
import { isBuiltCommand, type IsBuiltOptions } from './commands/is-built.js';
import { buildPlanCommand, rebuildPlanCommand, type RebuildPlanOptions } from './commands/build-plan.js';
import { listCommand, type ListOptions } from './commands/list.js';

export const VERSION = '0.1.0';

const KIND_OPTION_DESCRIPTION = 'kind of the named component: runner, client or dependency (runner names may omit their prefix)';

/**
 * Build the `resolver` program bound to a context.
 * Commander's own errors and help go through the context's output port.
 */
export function createProgram(ctx: CliContext): Command {
  const program = new Command();

  program
    .name('resolver')
    .description('Resolve build order, dependents and build state of benchmark components')
    .version(VERSION)
    .option('--cwd <dir>', 'working directory used to resolve relative install roots')
    .option('--debug', 'log resolution details to stderr')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => ctx.output.diagnostic(text.trimEnd()),
      writeErr: (text) => ctx.output.diagnostic(text.trimEnd())
    });

  program.hook('preAction', () => {
    const opts = program.opts<{ cwd?: string; debug?: boolean }>();
    if (opts.debug || ctx.config.verbose) {
      logger.setLevel(LogLevel.DEBUG);
    }
    if (opts.cwd) {
      ctx.cwd = resolve(ctx.cwd, opts.cwd);
      ctx.config = loadResolverConfig({ env: ctx.env, cwd: ctx.cwd });
      logger.debug(`Working directory: ${ctx.cwd}`);
    }
  });

  // === GRAPH QUERIES ===

  program
    .command('all-deps')
    .description('all components to build before <component-id>, in build order, ending with it')
    .argument('<component-id>', 'component id or shorthand')
    .option('-k, --kind <kind>', KIND_OPTION_DESCRIPTION)
    .action(withErrorHandling(ctx, (componentId: string, options: ComponentOptions) =>
      allDepsCommand(ctx, componentId, options)));

  program
    .command('all-dependents')
    .description('all components depending on <component-id>, furthest first')
    .argument('<component-id>', 'component id or shorthand')
    .option('-k, --kind <kind>', KIND_OPTION_DESCRIPTION)
    .action(withErrorHandling(ctx, (componentId: string, options: ComponentOptions) =>
      allDependentsCommand(ctx, componentId, options)));

  program
    .command('deps')
    .description('direct dependencies of <component-id>')
    .argument('<component-id>', 'component id or shorthand')
    .option('-k, --kind <kind>', KIND_OPTION_DESCRIPTION)
    .action(withErrorHandling(ctx, (componentId: string, options: ComponentOptions) =>
      depsCommand(ctx, componentId, options)));

  program
    .command('dependents')
    .description('direct dependents of <component-id>')
    .argument('<component-id>', 'component id or shorthand')
    .option('-k, --kind <kind>', KIND_OPTION_DESCRIPTION)
    .action(withErrorHandling(ctx, (componentId: string, options: ComponentOptions) =>
      dependentsCommand(ctx, componentId, options)));

  // === BUILD STATE ===

  program
    .command('is-built')
    .description('exit 0 if <component-id> is fully installed under <install-root>, 1 otherwise')
    .argument('<component-id>', 'component id or shorthand')
    .argument('<install-root>', 'installation root to probe')
    .option('-k, --kind <kind>', KIND_OPTION_DESCRIPTION)
    .option('-v, --verbose', 'report every artifact check on stderr')
    .action(withErrorHandling(ctx, (componentId: string, installRoot: string, options: IsBuiltOptions) =>
      isBuiltCommand(ctx, componentId, installRoot, options)));

  program
    .command('build-plan')
    .description('components still to build for <component-id>, in build order')
    .argument('<component-id>', 'component id or shorthand')
    .argument('[install-root]', 'installation root (default: $RESOLVER_INSTALL_DIR or ./install)')
    .option('-k, --kind <kind>', KIND_OPTION_DESCRIPTION)
    .action(withErrorHandling(ctx, (componentId: string, installRoot: string | undefined, options: ComponentOptions) =>
      buildPlanCommand(ctx, componentId, installRoot, options)));

  program
    .command('rebuild-plan')
    .description('components to clear, or to build back, when rebuilding <component-id>')
    .argument('<component-id>', 'component id or shorthand')
    .option('-k, --kind <kind>', KIND_OPTION_DESCRIPTION)
    .addOption(new Option('--phase <phase>', 'which half of the rebuild to print').choices(['clear', 'build']).default('clear'))
    .action(withErrorHandling(ctx, (componentId: string, options: RebuildPlanOptions) =>
      rebuildPlanCommand(ctx, componentId, options)));

  // === REGISTRY ===

  program
    .command('list')
    .alias('ls')
    .description('list known components in declaration order')
    .option('--kind <kind>', 'only components of this kind (native-dependency, native-client, managed-client, runner)')
    .option('-l, --long', 'also print kind and direct dependencies')
    .action(withErrorHandling(ctx, (options: ListOptions) => listCommand(ctx, options)));

  return program;
}

/**
 * Run the CLI against `argv` (user arguments only) and return the exit code.
 */
export async function runCli(argv: string[], options: CliContextOptions = {}): Promise<number> {
  const output = options.output ?? consoleOutput;
  let ctx: CliContext;
  try {
    ctx = createCliContext({ ...options, output });
  } catch (error) {
    output.diagnostic(handleError(error).error ?? 'An unknown error occurred');
    return 1;
  }

  const program = createProgram(ctx);
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return ctx.exitCode;
}
