/**
 * Root configuration (monoforge.yml): discovery, parsing and defaults.
 */

import * as yaml from 'js-yaml';
import { dirname, join, resolve } from 'path';
import { DEFAULTS, ENV_VARS, FILE_PATTERNS } from '../../constants/index.js';
import { FAILURE_POLICIES, type FailurePolicy, type RepoCommands, type RepoConfig } from '../../types/index.js';
import { ConfigError } from '../../utils/errors.js';
import { exists, readTextFile } from '../../utils/fs.js';
import { isLogLevel, LOG_LEVELS, logger } from '../../utils/logger.js';
import { isRecord } from '../manifest/manifest-model.js';

const ALLOWED_KEYS = new Set([
  'name',
  'workspaces',
  'dependencies',
  'lockfile',
  'concurrency',
  'failure-policy',
  'timeout-ms',
  'manifest-file',
  'commands',
  'log-level'
]);

const CONFIGURABLE_COMMANDS = ['install', 'build', 'uninstall'] as const;

type ConfigurableCommand = (typeof CONFIGURABLE_COMMANDS)[number];

function isConfigurableCommand(value: string): value is ConfigurableCommand {
  return CONFIGURABLE_COMMANDS.some((kind) => kind === value);
}

/**
 * Walk up from startDir to the nearest directory holding monoforge.yml.
 *
 * @throws ConfigError when no ancestor has one
 */
export async function findRepoRoot(startDir: string): Promise<string> {
  let current = resolve(startDir);
  for (;;) {
    if (await exists(join(current, FILE_PATTERNS.REPO_YML))) {
      logger.debug(`Found repo root at ${current}`);
      return current;
    }
    const parent = dirname(current);
    if (parent === current) {
      throw new ConfigError(
        `No ${FILE_PATTERNS.REPO_YML} found in ${resolve(startDir)} or any parent directory`
      );
    }
    current = parent;
  }
}

export function isFailurePolicy(value: unknown): value is FailurePolicy {
  return typeof value === 'string' && FAILURE_POLICIES.some((policy) => policy === value);
}

export function parsePositiveInteger(value: unknown, field: string): number {
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError(`'${field}' must be a positive integer, got ${String(value)}`);
  }
  return parsed;
}

function parseStringList(value: unknown, field: string): string[] {
  if (typeof value === 'string') {
    return [value];
  }
  if (!Array.isArray(value) || !value.every((entry) => typeof entry === 'string' && entry !== '')) {
    throw new ConfigError(`'${field}' must be a string or a list of strings`);
  }
  return value.map(String);
}

/**
 * Commands are argv lists and are spawned without a shell, so a single
 * string such as "pip install -e ." is rejected rather than run as one
 * executable name.
 */
function parseArgv(value: unknown, field: string): string[] {
  if (typeof value === 'string') {
    throw new ConfigError(`'${field}' must be a list of arguments, not a single string: ${value}`);
  }
  if (!Array.isArray(value) || !value.every((part) => typeof part === 'string' && part !== '')) {
    throw new ConfigError(`'${field}' must be a list of non-empty strings`);
  }
  if (value.length === 0) {
    throw new ConfigError(`'${field}' must not be empty`);
  }
  return value.map(String);
}

function parseCommands(value: unknown): RepoCommands {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError(`'commands' must be a mapping with ${CONFIGURABLE_COMMANDS.map((kind) => `'${kind}'`).join(', ')}`);
  }
  const commands: RepoCommands = {};
  for (const [kind, argv] of Object.entries(value)) {
    if (!isConfigurableCommand(kind)) {
      throw new ConfigError(`unknown command in 'commands': ${kind}`);
    }
    commands[kind] = parseArgv(argv, `commands.${kind}`);
  }
  return commands;
}

/**
 * Validate a parsed monoforge.yml value and fill in defaults.
 */
export function parseRepoConfig(raw: unknown): RepoConfig {
  // An empty file is a valid, all-defaults configuration
  const data = raw === undefined || raw === null ? {} : raw;
  if (!isRecord(data)) {
    throw new ConfigError(`${FILE_PATTERNS.REPO_YML} must be a mapping`);
  }

  const unknownKeys = Object.keys(data).filter((key) => !ALLOWED_KEYS.has(key));
  if (unknownKeys.length > 0) {
    throw new ConfigError(`Unknown field(s) in ${FILE_PATTERNS.REPO_YML}: ${unknownKeys.join(', ')}`);
  }

  let name: string | undefined;
  if (data.name !== undefined) {
    if (typeof data.name !== 'string') {
      throw new ConfigError("'name' must be a string");
    }
    name = data.name;
  }

  const workspaces: Record<string, string[]> = {};
  if (data.workspaces === undefined || data.workspaces === null) {
    workspaces[DEFAULTS.WORKSPACE] = [...DEFAULTS.WORKSPACE_PATTERNS];
  } else if (isRecord(data.workspaces)) {
    for (const [workspace, patterns] of Object.entries(data.workspaces)) {
      workspaces[workspace] = parseStringList(patterns, `workspaces.${workspace}`);
    }
  } else {
    throw new ConfigError("'workspaces' must be a mapping of workspace name to glob patterns");
  }

  const dependencies: Record<string, string> = {};
  if (data.dependencies !== undefined && data.dependencies !== null) {
    if (!isRecord(data.dependencies)) {
      throw new ConfigError("'dependencies' must be a mapping of name to version constraint");
    }
    for (const [depName, constraint] of Object.entries(data.dependencies)) {
      if (typeof constraint !== 'string' || constraint.trim() === '') {
        throw new ConfigError(`constraint of shared dependency '${depName}' must be a non-empty string`);
      }
      dependencies[depName] = constraint.trim();
    }
  }

  const failurePolicy = data['failure-policy'] ?? DEFAULTS.FAILURE_POLICY;
  if (!isFailurePolicy(failurePolicy)) {
    throw new ConfigError(
      `'failure-policy' must be one of ${FAILURE_POLICIES.join(', ')}, got ${String(failurePolicy)}`
    );
  }

  const lockfile = data.lockfile ?? FILE_PATTERNS.LOCK_YML;
  const manifestFile = data['manifest-file'] ?? FILE_PATTERNS.MANIFEST_JSON;
  if (typeof lockfile !== 'string' || typeof manifestFile !== 'string') {
    throw new ConfigError("'lockfile' and 'manifest-file' must be strings");
  }

  const timeout = data['timeout-ms'];

  const logLevel = data['log-level'];
  if (logLevel !== undefined && logLevel !== null && !isLogLevel(logLevel)) {
    throw new ConfigError(`'log-level' must be one of ${LOG_LEVELS.join(', ')}, got ${String(logLevel)}`);
  }

  return {
    ...(name !== undefined ? { name } : {}),
    workspaces,
    dependencies,
    lockfile,
    concurrency:
      data.concurrency === undefined ? DEFAULTS.CONCURRENCY : parsePositiveInteger(data.concurrency, 'concurrency'),
    failurePolicy,
    ...(timeout !== undefined && timeout !== null ? { timeoutMs: parsePositiveInteger(timeout, 'timeout-ms') } : {}),
    manifestFile,
    commands: parseCommands(data.commands),
    ...(isLogLevel(logLevel) ? { logLevel } : {})
  };
}

/**
 * Apply environment overrides on top of a parsed configuration.
 */
export function applyEnvOverrides(config: RepoConfig, env: NodeJS.ProcessEnv = process.env): RepoConfig {
  const concurrency = env[ENV_VARS.CONCURRENCY];
  if (concurrency === undefined || concurrency === '') {
    return config;
  }
  return { ...config, concurrency: parsePositiveInteger(concurrency, ENV_VARS.CONCURRENCY) };
}

/**
 * Read <root>/monoforge.yml.
 */
export async function loadRepoConfig(root: string): Promise<RepoConfig> {
  const configPath = join(root, FILE_PATTERNS.REPO_YML);
  const content = await readTextFile(configPath);

  let raw: unknown;
  try {
    raw = yaml.load(content, { filename: configPath });
  } catch (error) {
    throw new ConfigError(
      `Failed to parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const config = applyEnvOverrides(parseRepoConfig(raw));
  logger.debug('Loaded repo configuration', config);
  return config;
}
