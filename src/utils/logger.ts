import { ENV_VARS } from '../constants/index.js';

/**
 * Diagnostic logging. User-facing run output goes through the OutputPort;
 * this logger traces what the core does and is quiet unless asked.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type MessageLevel = Exclude<LogLevel, 'silent'>;

export type LogSink = (level: MessageLevel, line: string) => void;

export const DEFAULT_LOG_LEVEL: LogLevel = 'error';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

/**
 * Level requested through the environment, if any.
 * MONOFORGE_LOG_LEVEL wins over MONOFORGE_VERBOSE=1, which wins over NODE_ENV=development.
 */
export function levelFromEnv(env: NodeJS.ProcessEnv): LogLevel | undefined {
  const explicit = env[ENV_VARS.LOG_LEVEL];
  if (isLogLevel(explicit)) {
    return explicit;
  }
  if (env[ENV_VARS.VERBOSE] === '1') {
    return 'debug';
  }
  if (env.NODE_ENV === 'development') {
    return 'info';
  }
  return undefined;
}

export interface LogLineParts {
  scope?: string;
  meta?: unknown;
  time?: Date;
}

export function formatLogLine(level: MessageLevel, message: string, parts: LogLineParts = {}): string {
  const { scope, meta, time = new Date() } = parts;
  let line = `${time.toISOString()} ${level.toUpperCase().padEnd(5)} ${scope ? `[${scope}] ` : ''}${message}`;

  if (meta !== null && typeof meta === 'object') {
    // JSON.stringify(new Error()) is {}
    const metaToLog = meta instanceof Error ? { ...meta, name: meta.name, message: meta.message, stack: meta.stack } : meta;
    line += `\n${JSON.stringify(metaToLog, null, 2)}`;
  } else if (meta !== undefined && meta !== null && meta !== '') {
    line += ` ${String(meta)}`;
  }
  return line;
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
};

interface LoggerState {
  level: LogLevel;
  sink: LogSink;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

export class Logger {
  private constructor(
    private readonly state: LoggerState,
    private readonly scope?: string
  ) {}

  static create(options: LoggerOptions = {}): Logger {
    return new Logger({ level: options.level ?? DEFAULT_LOG_LEVEL, sink: options.sink ?? consoleSink });
  }

  /** Logger that prefixes every line with a scope (usually a package name) and shares this logger's level */
  child(scope: string): Logger {
    return new Logger(this.state, this.scope ? `${this.scope}:${scope}` : scope);
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  debug(message: string, meta?: unknown): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.log('error', message, meta);
  }

  private log(level: MessageLevel, message: string, meta: unknown): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.state.level)) {
      return;
    }
    this.state.sink(level, formatLogLine(level, message, { ...(this.scope ? { scope: this.scope } : {}), meta }));
  }
}

export const logger = Logger.create({ level: levelFromEnv(process.env) ?? DEFAULT_LOG_LEVEL });

/**
 * Apply the log-level from monoforge.yml unless the environment already chose one.
 */
export function applyConfiguredLogLevel(level: LogLevel | undefined, env: NodeJS.ProcessEnv = process.env): void {
  if (level !== undefined && levelFromEnv(env) === undefined) {
    logger.setLevel(level);
  }
}
