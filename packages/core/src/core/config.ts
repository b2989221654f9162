import { isAbsolute, resolve } from 'path';
import type { ResolverConfig } from '../types/index.js';
import { DEFAULT_INSTALL_DIR, ENV_VARS } from '../constants/index.js';
import { ConfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { parseEnvFlag } from '../utils/env.js';

/**
 * Configuration for the resolver, read from the environment.
 * There is no config file: every invocation recomputes from the static
 * registry and the current environment.
 */

export interface ConfigSource {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

function parseFlag(name: string, value: string | undefined): boolean {
  const flag = parseEnvFlag(value);
  if (flag === undefined) {
    throw new ConfigError(`Invalid value for ${name}: '${value}' (expected 1/0, true/false or yes/no)`, { name, value });
  }
  return flag;
}

export function loadResolverConfig(source: ConfigSource = {}): ResolverConfig {
  const env = source.env ?? process.env;
  const cwd = source.cwd ?? process.cwd();

  const rawInstallDir = env[ENV_VARS.INSTALL_DIR]?.trim();
  const installDir = rawInstallDir
    ? (isAbsolute(rawInstallDir) ? rawInstallDir : resolve(cwd, rawInstallDir))
    : resolve(cwd, DEFAULT_INSTALL_DIR);

  const config: ResolverConfig = {
    installDir,
    verbose: parseFlag(ENV_VARS.VERBOSE, env[ENV_VARS.VERBOSE])
  };

  logger.debug('Resolved configuration', config);
  return config;
}

/**
 * Resolve an install root given on the command line against the working directory.
 */
export function resolveInstallRoot(installRoot: string | undefined, config: ResolverConfig, cwd: string = process.cwd()): string {
  if (!installRoot || installRoot.trim() === '') {
    return config.installDir;
  }
  return resolve(cwd, installRoot);
}
