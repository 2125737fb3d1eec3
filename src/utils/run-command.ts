import { spawn } from 'child_process';
import { logger } from './logger.js';
import { DEFAULTS } from '../constants/index.js';

export interface RunCommandOptions {
  cwd?: string;
  /** Merged over process.env */
  env?: Record<string, string>;
  /** Kills the child when aborted */
  signal?: AbortSignal;
  /** Lines of combined stdout/stderr to keep (default 40) */
  tailLines?: number;
}

export interface RunCommandResult {
  /** Exit code, null when the child was killed by a signal */
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Last lines of combined output */
  output: string;
  aborted: boolean;
}

/**
 * Keeps only the last N complete lines of a stream, plus the trailing partial line.
 */
class OutputTail {
  private lines: string[] = [];
  private partial = '';

  constructor(private readonly max: number) {}

  push(chunk: Buffer | string): void {
    const parts = (this.partial + chunk.toString()).split(/\r?\n/);
    this.partial = parts.pop() ?? '';
    this.lines.push(...parts);
    if (this.lines.length > this.max) {
      this.lines = this.lines.slice(-this.max);
    }
  }

  toString(): string {
    const all = this.partial === '' ? this.lines : [...this.lines, this.partial];
    return all.slice(-this.max).join('\n');
  }
}

/**
 * Spawn an argv (no shell) and collect the tail of its output.
 * Resolves with the exit status; rejects only when the process cannot be started.
 */
export function runCommand(argv: readonly string[], opts: RunCommandOptions = {}): Promise<RunCommandResult> {
  const { cwd, env, signal, tailLines = DEFAULTS.OUTPUT_TAIL_LINES } = opts;
  const [file, ...args] = argv;

  logger.debug('runCommand start', { argv, cwd });

  return new Promise((resolve, reject) => {
    if (file === undefined) {
      reject(new Error('Cannot run an empty command'));
      return;
    }

    const child = spawn(file, args, {
      cwd,
      env: { ...process.env, ...env },
      stdio: ['ignore', 'pipe', 'pipe'],
      signal
    });

    const tail = new OutputTail(tailLines);
    child.stdout.on('data', (chunk: Buffer) => tail.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => tail.push(chunk));

    let aborted = false;
    let settled = false;

    child.on('error', (err) => {
      if (err.name === 'AbortError') {
        // 'close' follows once the child is gone
        aborted = true;
        return;
      }
      if (!settled) {
        settled = true;
        logger.debug('runCommand error', { argv, cwd, err });
        reject(err);
      }
    });

    child.on('close', (code, exitSignal) => {
      if (settled) {
        return;
      }
      settled = true;
      logger.debug('runCommand done', { argv, cwd, code, signal: exitSignal, aborted });
      resolve({ code, signal: exitSignal, output: tail.toString(), aborted });
    });
  });
}
