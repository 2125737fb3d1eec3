/**
 * Console Output Adapter (Default/CI)
 *
 * Plain console.log-based implementation of OutputPort.
 */

import type { OutputPort } from './output.js';

export const consoleOutput: OutputPort = {
  info(message: string): void {
    console.log(message);
  },

  step(message: string): void {
    console.log(`… ${message}`);
  },

  message(message: string): void {
    console.log(message);
  },

  success(message: string): void {
    console.log(`✓ ${message}`);
  },

  error(message: string): void {
    console.error(`✗ ${message}`);
  },

  warn(message: string): void {
    console.warn(`⚠ ${message}`);
  },

  note(content: string, title?: string): void {
    if (title) {
      console.log(`\n${title}\n${content}`);
    } else {
      console.log(`\n${content}`);
    }
  },
};

/**
 * OutputPort that records every line, for tests and JSON-only commands.
 */
export function createBufferedOutput(): OutputPort & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => { lines.push(message); },
    step: (message) => { lines.push(`… ${message}`); },
    message: (message) => { lines.push(message); },
    success: (message) => { lines.push(`✓ ${message}`); },
    error: (message) => { lines.push(`✗ ${message}`); },
    warn: (message) => { lines.push(`⚠ ${message}`); },
    note: (content, title) => { lines.push(title ? `${title}\n${content}` : content); },
  };
}
