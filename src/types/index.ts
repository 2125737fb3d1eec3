/**
 * Common types and interfaces for the monoforge CLI application
 */

import type { LogLevel } from '../utils/logger.js';

export * from './execution-context.js';

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

// Error types
export class MonoforgeError extends Error {
  public code: string;
  public details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'MonoforgeError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  MANIFEST_ERROR = 'MANIFEST_ERROR',
  GRAPH_ERROR = 'GRAPH_ERROR',
  SELECTION_ERROR = 'SELECTION_ERROR',
  ORCHESTRATOR_INVARIANT = 'ORCHESTRATOR_INVARIANT',
  RUN_FAILED = 'RUN_FAILED',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Repo configuration types (monoforge.yml)

/** Per-package actions run through the orchestrator */
export type ActionKind = 'install' | 'build' | 'run';

export type FailurePolicy = 'fail-fast-per-branch' | 'continue-independent' | 'fail-fast';

export const FAILURE_POLICIES: readonly FailurePolicy[] = [
  'fail-fast-per-branch',
  'continue-independent',
  'fail-fast'
];

/** Configurable command argv; `run` takes its argv from the command line */
export interface RepoCommands {
  install?: string[];
  build?: string[];
  /** Run once at the repo root with the selected package names appended */
  uninstall?: string[];
}

export interface RepoConfig {
  name?: string;
  /** Workspace group name -> glob patterns of package directories, relative to the root */
  workspaces: Record<string, string[]>;
  /** Repo-wide shared dependency constraints */
  dependencies: Record<string, string>;
  lockfile: string;
  concurrency: number;
  failurePolicy: FailurePolicy;
  timeoutMs?: number;
  manifestFile: string;
  commands: RepoCommands;
  logLevel?: LogLevel;
}
