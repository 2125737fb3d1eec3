/**
 * Shared constants for the monoforge CLI application
 * Single source of truth for file names, defaults and environment variables.
 */

export const FILE_PATTERNS = {
  REPO_YML: 'monoforge.yml',
  PROJECT_YML: 'project.yml',
  LOCK_YML: 'monoforge.lock.yml',
  MANIFEST_JSON: '.monoforge-manifest.json'
} as const;

/** Directories never walked during workspace discovery */
export const IGNORED_DIRS = ['node_modules', '.git', 'dist', '.venv'] as const;

export const DEFAULTS = {
  CONCURRENCY: 4,
  FAILURE_POLICY: 'fail-fast-per-branch',
  WORKSPACE: 'default',
  WORKSPACE_PATTERNS: ['**'],
  /** Lines of action output kept on a task result */
  OUTPUT_TAIL_LINES: 40
} as const;

export const ENV_VARS = {
  VERBOSE: 'MONOFORGE_VERBOSE',
  LOG_LEVEL: 'MONOFORGE_LOG_LEVEL',
  CONCURRENCY: 'MONOFORGE_CONCURRENCY',
  MANIFEST: 'MONOFORGE_MANIFEST',
  PACKAGE: 'MONOFORGE_PACKAGE'
} as const;

/** Constraint used when an external dependency is declared without one */
export const ANY_VERSION = '*';
