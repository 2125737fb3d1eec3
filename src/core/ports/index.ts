/**
 * Core Ports
 *
 * Boundary between core logic and user-facing I/O.
 */

export type { OutputPort } from './output.js';
export { consoleOutput, createBufferedOutput } from './console-output.js';
export { resolveOutput } from './resolve.js';
