/**
 * CLI Context
 *
 * Everything a command needs, created once per invocation: where output
 * goes, the resolved configuration and the graph to query. Tests build one
 * with a captured output port and their own registry.
 */

import {
  ComponentRegistry,
  DependencyGraph,
  consoleOutput,
  defaultRegistry,
  getDependencyGraph,
  loadResolverConfig,
  type OutputPort,
  type ResolverConfig
} from '@component-resolver/core';

export interface CliContext {
  output: OutputPort;
  config: ResolverConfig;
  registry: ComponentRegistry;
  graph: DependencyGraph;
  env: NodeJS.ProcessEnv;
  cwd: string;
  exitCode: number;
}

export interface CliContextOptions {
  output?: OutputPort;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  registry?: ComponentRegistry;
}

export function createCliContext(options: CliContextOptions = {}): CliContext {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const registry = options.registry ?? defaultRegistry();
  return {
    output: options.output ?? consoleOutput,
    config: loadResolverConfig({ env, cwd }),
    registry,
    graph: options.registry ? new DependencyGraph(registry) : getDependencyGraph(),
    env,
    cwd,
    exitCode: 0
  };
}
