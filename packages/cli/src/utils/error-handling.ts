/**
 * CLI-specific error handling wrapper for Commander.js actions.
 *
 * Lives in the CLI package because it decides exit codes and writes to the
 * diagnostic stream, which core does not own.
 */

import { handleError } from '@component-resolver/core';
import type { CliContext } from '../cli/context.js';

/**
 * Wraps a command action: any error is reported on the diagnostic stream
 * and turns into exit code 1.
 */
export function withErrorHandling<T extends unknown[]>(
  ctx: CliContext,
  fn: (...args: T) => void | Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      ctx.output.diagnostic(result.error ?? 'An unknown error occurred');
      ctx.exitCode = 1;
    }
  };
}
