/**
 * @component-resolver/core
 *
 * Dependency resolution for the benchmark build pipeline: the component
 * registry, name normalization, forward and reverse closures, and artifact
 * probing. Pure queries over a static graph and the filesystem; nothing here
 * builds, clears or writes anything.
 */

// ============================================================================
// Types
// ============================================================================

export type {
  ArtifactCheck,
  ArtifactCheckResult,
  ArtifactCheckStatus,
  ArtifactDescriptor,
  ArtifactEntryType,
  ArtifactReport,
  CommandResult,
  Component,
  ComponentDefinition,
  ComponentKind,
  KindHint,
  Logger,
  ResolverConfig
} from './types/index.js';
export { COMPONENT_KINDS, ErrorCodes, LogLevel, ResolverError } from './types/index.js';

// ============================================================================
// Registry, naming and graph
// ============================================================================

export { ComponentRegistry, defaultRegistry, COMPONENT_DEFINITIONS } from './core/registry/index.js';
export { normalizeComponent, deriveHeaderDirName, parseKindHint } from './core/naming.js';
export { DependencyGraph, getDependencyGraph } from './core/graph/index.js';

// ============================================================================
// Artifacts and plans
// ============================================================================

export { isBuilt, probeArtifacts, artifactPaths, isAuthoritative } from './core/artifacts/artifact-prober.js';
export { buildPlan, rebuildPlan, type BuildPlan, type RebuildPlan, type PlanOptions } from './core/plan/build-plan.js';

// ============================================================================
// Configuration, output and errors
// ============================================================================

export { loadResolverConfig, resolveInstallRoot, type ConfigSource } from './core/config.js';
export { consoleOutput, createCapturedOutput, type OutputPort, type CapturedOutput } from './core/ports/output.js';
export {
  UnknownComponentError,
  CyclicDependencyError,
  ArtifactProbeError,
  RegistryDefinitionError,
  ValidationError,
  ConfigError,
  handleError
} from './utils/errors.js';
export { logger, ConsoleLogger } from './utils/logger.js';
