/**
 * CLI Context Factory
 *
 * Creates ExecutionContext instances with the CLI's output port injected:
 * Clack in an interactive terminal, plain console otherwise.
 */

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { createExecutionContext } from '../core/execution-context.js';
import { consoleOutput } from '../core/ports/console-output.js';
import type { OutputPort } from '../core/ports/output.js';
import { createClackOutput } from './clack-output-adapter.js';

export interface CliContextOptions extends ExecutionOptions {
  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
}

let cachedClackOutput: OutputPort | undefined;

/** Detect whether the current session is interactive (TTY, no CI). */
function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  return process.stdout.isTTY === true && process.env.CI !== 'true';
}

export async function createCliExecutionContext(options: CliContextOptions = {}): Promise<ExecutionContext> {
  let output = options.output;
  if (!output) {
    if (detectInteractive(options.interactive)) {
      cachedClackOutput ??= createClackOutput();
      output = cachedClackOutput;
    } else {
      output = consoleOutput;
    }
  }
  return createExecutionContext({ ...options, output });
}
