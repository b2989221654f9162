// Component types

export type ComponentKind = 'native-dependency' | 'native-client' | 'managed-client' | 'runner';

export const COMPONENT_KINDS: readonly ComponentKind[] = [
  'native-dependency',
  'native-client',
  'managed-client',
  'runner'
];

/**
 * Filesystem evidence that a component has been built and installed.
 * Paths are resolved against an installation root by the artifact prober.
 */
export type ArtifactDescriptor =
  | { type: 'package-config' }
  | { type: 'archive'; library?: string }
  | { type: 'headers'; path?: string }
  | { type: 'executable'; name: string }
  | { type: 'toolchain-output'; toolchain: 'cargo' | 'pip' | 'maven' };

export interface ComponentDefinition {
  id: string;
  kind: ComponentKind;
  dependencies?: string[];
  artifacts: ArtifactDescriptor[];
}

export interface Component {
  readonly id: string;
  readonly kind: ComponentKind;
  readonly directDependencies: readonly string[];
  readonly artifacts: readonly ArtifactDescriptor[];
}

/**
 * Kind hint supplied by callers alongside a raw component name
 */
export type KindHint = 'runner' | 'client' | 'dependency';

// Artifact probing

export type ArtifactEntryType = 'file' | 'directory';

export type ArtifactCheckStatus = 'present' | 'missing' | 'error';

export interface ArtifactCheck {
  descriptor: ArtifactDescriptor['type'];
  path: string;
  expect: ArtifactEntryType;
}

export interface ArtifactCheckResult extends ArtifactCheck {
  status: ArtifactCheckStatus;
  detail?: string;
}

export interface ArtifactReport {
  componentId: string;
  authoritative: boolean;
  built: boolean;
  checks: ArtifactCheckResult[];
}

// Configuration

export interface ResolverConfig {
  installDir: string;
  verbose: boolean;
}

// Command results

export interface CommandResult {
  success: boolean;
  error?: string;
}

// Error types
export class ResolverError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ResolverError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  UNKNOWN_COMPONENT = 'UNKNOWN_COMPONENT',
  CYCLIC_DEPENDENCY = 'CYCLIC_DEPENDENCY',
  ARTIFACT_PROBE_FAILED = 'ARTIFACT_PROBE_FAILED',
  INVALID_REGISTRY = 'INVALID_REGISTRY',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
