/**
 * Shared constants for the component resolver.
 * Install-tree layout, naming prefixes and environment variable names live here
 * so the registry, the normalizer and the prober agree on them.
 */

/**
 * Layout of an installation root, relative to the root itself
 */
export const INSTALL_LAYOUT = {
  LIB: 'lib',
  PACKAGE_CONFIG: 'lib/cmake',
  INCLUDE: 'include',
  FAMILY_INCLUDE: 'include/aws',
  BIN: 'bin'
} as const;

export const ARCHIVE_PATTERN = {
  PREFIX: 'lib',
  SUFFIX: '.a'
} as const;

export const NAMING = {
  RUNNER_PREFIX: 'runner-',
  RUNNER_FAMILY: 's3-',
  RUNNER_EXECUTABLE_SUFFIX: '-runner',
  /**
   * Library-family prefixes stripped when deriving header directory names.
   * Longest first: `aws-c-io` -> `io`, `aws-checksums` -> `checksums`.
   */
  LIBRARY_FAMILY_PREFIXES: ['aws-c-', 'aws-']
} as const;

export const ENV_VARS = {
  INSTALL_DIR: 'RESOLVER_INSTALL_DIR',
  VERBOSE: 'RESOLVER_VERBOSE'
} as const;

export const DEFAULT_INSTALL_DIR = 'install';
