/**
 * Execution Context Types
 *
 * Type definitions for the execution context system that resolves the
 * working directory and the repo root for commands.
 */

import type { OutputPort } from '../core/ports/output.js';

/**
 * ExecutionContext - Single source of truth for directory resolution
 *
 * Strictly separates:
 * - sourceCwd: Where the command was invoked from
 * - targetDir: Where the repo lookup starts (--cwd, or sourceCwd)
 *
 * Also carries the output port so the same core logic can be driven
 * by the CLI or by tests.
 */
export interface ExecutionContext {
  /**
   * Absolute path to the original working directory.
   */
  sourceCwd: string;

  /**
   * Absolute path where the repo root lookup starts.
   */
  targetDir: string;

  /**
   * Output port for user-facing messages.
   * Defaults to consoleOutput if not provided.
   */
  output?: OutputPort;
}

/**
 * Options for creating an ExecutionContext
 */
export interface ExecutionOptions {
  /**
   * Value of --cwd flag (relative or absolute path)
   */
  cwd?: string;

  output?: OutputPort;
}
