import { ResolverError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes for the component resolver
 */

export class UnknownComponentError extends ResolverError {
  constructor(componentId: string) {
    super(`Unknown component '${componentId}'`, ErrorCodes.UNKNOWN_COMPONENT, { componentId });
    this.name = 'UnknownComponentError';
  }
}

export class CyclicDependencyError extends ResolverError {
  public readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Dependency cycle detected: ${cycle.join(' -> ')}`, ErrorCodes.CYCLIC_DEPENDENCY, { cycle });
    this.name = 'CyclicDependencyError';
    this.cycle = cycle;
  }
}

/**
 * Raised by filesystem probes. Never escapes isBuilt(): the prober downgrades
 * it to "not built".
 */
export class ArtifactProbeError extends ResolverError {
  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to probe artifact ${path}: ${reason}`, ErrorCodes.ARTIFACT_PROBE_FAILED, { path, cause: reason });
    this.name = 'ArtifactProbeError';
  }
}

export class RegistryDefinitionError extends ResolverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Invalid component registry: ${message}`, ErrorCodes.INVALID_REGISTRY, details);
    this.name = 'RegistryDefinitionError';
  }
}

export class ValidationError extends ResolverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends ResolverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * Error handler that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof ResolverError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}
