import { MonoforgeError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for different types of errors in the monoforge CLI
 */

// === Manifest ===

export class ManifestError extends MonoforgeError {
  constructor(
    reason: string,
    public readonly location?: string,
    details?: unknown
  ) {
    super(
      location ? `Invalid manifest ${location}: ${reason}` : `Invalid manifest: ${reason}`,
      ErrorCodes.MANIFEST_ERROR,
      details
    );
    this.name = 'ManifestError';
  }
}

// === Graph ===

export class GraphError extends MonoforgeError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.GRAPH_ERROR, details);
    this.name = 'GraphError';
  }
}

export class DuplicatePackageError extends GraphError {
  constructor(
    public readonly packageName: string,
    public readonly paths: string[]
  ) {
    super(`Package '${packageName}' is declared more than once: ${paths.join(', ')}`, { packageName, paths });
    this.name = 'DuplicatePackageError';
  }
}

export class UnknownDependencyError extends GraphError {
  constructor(
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Package '${from}' depends on unknown package '${to}'`, { from, to });
    this.name = 'UnknownDependencyError';
  }
}

export class CycleError extends GraphError {
  /** Cycle path, first name repeated at the end: [a, b, c, a] */
  constructor(public readonly cycle: string[]) {
    super(`Dependency cycle detected: ${cycle.join(' -> ')}`, { cycle });
    this.name = 'CycleError';
  }
}

// === Selection ===

export class SelectionError extends MonoforgeError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.SELECTION_ERROR, details);
    this.name = 'SelectionError';
  }
}

export class UnsatisfiableSelectionError extends SelectionError {
  constructor(
    public readonly packageName: string,
    public readonly missingDep: string
  ) {
    super(
      `Package '${packageName}' requires '${missingDep}', which is excluded`,
      { package: packageName, missingDep }
    );
    this.name = 'UnsatisfiableSelectionError';
  }
}

export class UnknownPackageSelectionError extends SelectionError {
  constructor(public readonly names: string[]) {
    super(`Unknown package${names.length > 1 ? 's' : ''}: ${names.join(', ')}`, { names });
    this.name = 'UnknownPackageSelectionError';
  }
}

export class ConflictingSelectionError extends SelectionError {
  constructor(public readonly names: string[]) {
    super(`Packages both included and excluded: ${names.join(', ')}`, { names });
    this.name = 'ConflictingSelectionError';
  }
}

export class UnknownWorkspaceError extends SelectionError {
  constructor(
    public readonly workspace: string,
    available: string[]
  ) {
    super(
      `Unknown workspace '${workspace}'. Available: ${available.length > 0 ? available.join(', ') : 'none'}`,
      { workspace, available }
    );
    this.name = 'UnknownWorkspaceError';
  }
}

// === Orchestration ===

export class OrchestratorInvariantError extends MonoforgeError {
  constructor(message: string, details?: unknown) {
    super(`Scheduling invariant violated: ${message}`, ErrorCodes.ORCHESTRATOR_INVARIANT, details);
    this.name = 'OrchestratorInvariantError';
  }
}

export class RunFailedError extends MonoforgeError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.RUN_FAILED, details);
    this.name = 'RunFailedError';
  }
}

// === Generic ===

export class FileSystemError extends MonoforgeError {
  constructor(message: string, details?: unknown) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ValidationError extends MonoforgeError {
  constructor(message: string, details?: unknown) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
  }
}

export class ConfigError extends MonoforgeError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof MonoforgeError) {
    // Details only surface in verbose mode
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

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
