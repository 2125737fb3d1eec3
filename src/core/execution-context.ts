/**
 * Execution Context Module
 *
 * Creates and validates the ExecutionContext for commands:
 * - sourceCwd: the original working directory
 * - targetDir: where the repo root lookup starts (--cwd, or sourceCwd)
 */

import { resolve } from 'path';
import { stat } from 'fs/promises';
import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { ValidationError } from '../utils/errors.js';
import { hasErrorCode } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * Create an ExecutionContext from command options.
 *
 * @throws ValidationError if targetDir is missing or not a directory
 */
export async function createExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const sourceCwd = process.cwd();
  const targetDir = options.cwd ? resolve(sourceCwd, options.cwd) : sourceCwd;

  const context: ExecutionContext = {
    sourceCwd,
    targetDir,
    ...(options.output ? { output: options.output } : {})
  };

  await validateExecutionContext(context);

  logger.debug('Created execution context', {
    sourceCwd: context.sourceCwd,
    targetDir: context.targetDir
  });

  return context;
}

async function validateExecutionContext(context: ExecutionContext): Promise<void> {
  try {
    const targetStat = await stat(context.targetDir);
    if (!targetStat.isDirectory()) {
      throw new ValidationError(`Target path is not a directory: ${context.targetDir}`);
    }
  } catch (error) {
    if (error instanceof ValidationError) {
      throw error;
    }
    if (hasErrorCode(error, 'ENOENT')) {
      throw new ValidationError(
        `Target directory does not exist: ${context.targetDir}\n\n` +
        `Hint: Specify a different directory with --cwd`
      );
    }
    throw new ValidationError(
      `Invalid target directory: ${context.targetDir}\n` +
      `Error: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
