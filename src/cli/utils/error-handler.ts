// CLI error handling and status output

import { CityError, ConfigError, NotFoundError, ValidationError } from '../../core/errors.js';

function labelFor(error: CityError): string {
  if (error instanceof ValidationError) {
    return error.field ? `Validation Error (field: ${error.field})` : 'Validation Error';
  }
  if (error instanceof ConfigError) return 'Configuration Error';
  if (error instanceof NotFoundError) return 'Not Found';
  return `Error [${error.code}]`;
}

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (!(error instanceof Error)) return `Unknown error: ${String(error)}`;
  if (!(error instanceof CityError)) return `Error: ${error.message}`;
  return `${labelFor(error)}: ${error.message}`;
}

/**
 * Exit status for an error. Errors of our own carry one, anything else is 1.
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof CityError ? error.exitCode : 1;
}

export function handleError(error: unknown): never {
  console.error(`\n❌ ${formatError(error)}\n`);
  process.exit(exitCodeFor(error));
}

/**
 * Wrap an async CLI action so failures print and exit with their status
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

export type StatusKind = 'done' | 'note' | 'warning';

const MARKS: Record<StatusKind, string> = { done: '✓', note: 'ℹ', warning: '⚠' };

/**
 * Print a one-line status for the operator. Warnings go to stderr.
 */
export function report(kind: StatusKind, message: string): void {
  const line = `${MARKS[kind]} ${message}`;
  if (kind === 'warning') {
    console.warn(line);
  } else {
    console.log(line);
  }
}
