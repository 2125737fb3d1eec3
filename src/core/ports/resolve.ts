/**
 * Port Resolution Helpers
 *
 * Resolves the OutputPort from an ExecutionContext, falling back to the
 * console adapter when none is provided.
 */

import type { ExecutionContext } from '../../types/execution-context.js';
import type { OutputPort } from './output.js';
import { consoleOutput } from './console-output.js';

export function resolveOutput(ctx?: ExecutionContext | { output?: OutputPort }): OutputPort {
  return ctx?.output ?? consoleOutput;
}
