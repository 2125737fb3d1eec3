/**
 * Package manifest model.
 *
 * Parses one raw project.yml value into the strict Package representation.
 * Everything downstream (graph, selection, synthesis, scheduling) only ever
 * sees validated Packages.
 */

import semver from 'semver';
import { ANY_VERSION } from '../../constants/index.js';
import { ManifestError } from '../../utils/errors.js';
import type { ManifestSource, Package, PackageBuildConfig } from './types.js';

const PACKAGE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const ALLOWED_KEYS = new Set([
  'name',
  'version',
  'description',
  'dependencies',
  'extras',
  'commands',
  'env'
]);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate and freeze one package manifest.
 *
 * @throws ManifestError on malformed structure, a missing required field,
 *   an unparseable version, or a duplicate dependency declaration
 */
export function loadManifest(raw: unknown, source: ManifestSource = {}): Package {
  const location = source.location;

  if (!isRecord(raw)) {
    throw new ManifestError('manifest must be a mapping', location);
  }

  const unknownKeys = Object.keys(raw).filter((key) => !ALLOWED_KEYS.has(key));
  if (unknownKeys.length > 0) {
    throw new ManifestError(`unknown field${unknownKeys.length > 1 ? 's' : ''}: ${unknownKeys.join(', ')}`, location);
  }

  const name = raw.name;
  if (name === undefined || name === null) {
    throw new ManifestError("missing required field 'name'", location);
  }
  if (typeof name !== 'string' || name.trim() === '') {
    throw new ManifestError("'name' must be a non-empty string", location);
  }
  if (!PACKAGE_NAME_PATTERN.test(name)) {
    throw new ManifestError(`invalid package name '${name}'`, location);
  }

  const version = raw.version;
  if (version === undefined || version === null) {
    throw new ManifestError(`missing required field 'version' for package '${name}'`, location);
  }
  if (typeof version !== 'string' || semver.valid(version) === null) {
    throw new ManifestError(
      `'version' of package '${name}' is not a valid semantic version: ${String(version)}`,
      location
    );
  }

  const description = raw.description;
  if (description !== undefined && typeof description !== 'string') {
    throw new ManifestError("'description' must be a string", location);
  }

  const { internal, external } = parseDependencies(raw.dependencies, location);

  for (const depName of internal) {
    if (Object.hasOwn(external, depName)) {
      throw new ManifestError(
        `duplicate dependency declaration '${depName}': declared both internal and external`,
        location
      );
    }
  }

  const extras = parseExtras(raw.extras, location);
  const build = parseBuildConfig(raw.commands, raw.env, location);

  const pkg: Package = {
    name,
    version,
    ...(description !== undefined ? { description } : {}),
    path: source.path ?? '.',
    ...(source.workspace !== undefined ? { workspace: source.workspace } : {}),
    internalDeps: Object.freeze([...internal]),
    externalDeps: Object.freeze(external),
    extras: Object.freeze(extras),
    build
  };
  return Object.freeze(pkg);
}

function parseDependencies(
  value: unknown,
  location: string | undefined
): { internal: string[]; external: Record<string, string> } {
  if (value === undefined || value === null) {
    return { internal: [], external: {} };
  }
  if (!isRecord(value)) {
    throw new ManifestError("'dependencies' must be a mapping with 'internal' and/or 'external'", location);
  }

  const unknownKeys = Object.keys(value).filter((key) => key !== 'internal' && key !== 'external');
  if (unknownKeys.length > 0) {
    throw new ManifestError(`unknown field in 'dependencies': ${unknownKeys.join(', ')}`, location);
  }

  return {
    internal: parseInternalDependencies(value.internal, location),
    external: parseExternalDeclaration(value.external, 'dependencies.external', location)
  };
}

function parseInternalDependencies(value: unknown, location: string | undefined): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ManifestError("'dependencies.internal' must be a list of package names", location);
  }

  const seen = new Set<string>();
  for (const entry of value) {
    if (typeof entry !== 'string' || entry.trim() === '') {
      throw new ManifestError("'dependencies.internal' entries must be non-empty strings", location);
    }
    if (seen.has(entry)) {
      throw new ManifestError(`duplicate dependency declaration '${entry}' in dependencies.internal`, location);
    }
    seen.add(entry);
  }
  return [...seen];
}

/**
 * Parse an external declaration (mapping or list form) into name -> constraint.
 */
export function parseExternalDeclaration(
  value: unknown,
  field: string,
  location?: string
): Record<string, string> {
  const result = new Map<string, string>();
  if (value === undefined || value === null) {
    return {};
  }

  const add = (depName: string, constraint: unknown): void => {
    if (depName.trim() === '') {
      throw new ManifestError(`empty dependency name in ${field}`, location);
    }
    if (result.has(depName)) {
      throw new ManifestError(`duplicate dependency declaration '${depName}' in ${field}`, location);
    }
    if (typeof constraint !== 'string' || constraint.trim() === '') {
      throw new ManifestError(`constraint of '${depName}' in ${field} must be a non-empty string`, location);
    }
    result.set(depName, constraint.trim());
  };

  if (Array.isArray(value)) {
    for (const entry of value) {
      if (typeof entry === 'string') {
        add(entry, ANY_VERSION);
      } else if (isRecord(entry) && Object.keys(entry).length === 1) {
        const [[depName, constraint]] = Object.entries(entry);
        add(depName, constraint);
      } else {
        throw new ManifestError(
          `${field} entries must be a name or a single 'name: constraint' mapping`,
          location
        );
      }
    }
  } else if (isRecord(value)) {
    for (const [depName, constraint] of Object.entries(value)) {
      add(depName, constraint);
    }
  } else {
    throw new ManifestError(`'${field}' must be a mapping or a list`, location);
  }

  // fromEntries defines own properties, so names like __proto__ survive
  return Object.fromEntries(result);
}

function parseExtras(
  value: unknown,
  location: string | undefined
): Record<string, Readonly<Record<string, string>>> {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ManifestError("'extras' must be a mapping of group name to dependencies", location);
  }
  return Object.fromEntries(
    Object.entries(value).map(([group, declaration]) => [
      group,
      Object.freeze(parseExternalDeclaration(declaration, `extras.${group}`, location))
    ])
  );
}

function parseArgv(value: unknown, field: string, location: string | undefined): readonly string[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (
    !Array.isArray(value) ||
    value.length === 0 ||
    !value.every((part) => typeof part === 'string' && part !== '')
  ) {
    throw new ManifestError(`'${field}' must be a non-empty list of strings`, location);
  }
  return Object.freeze(value.map(String));
}

function parseBuildConfig(
  commands: unknown,
  env: unknown,
  location: string | undefined
): PackageBuildConfig {
  if (commands !== undefined && commands !== null && !isRecord(commands)) {
    throw new ManifestError("'commands' must be a mapping with 'install' and/or 'build'", location);
  }
  const commandMap = isRecord(commands) ? commands : {};
  const unknownCommands = Object.keys(commandMap).filter((key) => key !== 'install' && key !== 'build');
  if (unknownCommands.length > 0) {
    throw new ManifestError(`unknown command in 'commands': ${unknownCommands.join(', ')}`, location);
  }

  const install = parseArgv(commandMap.install, 'commands.install', location);
  const build = parseArgv(commandMap.build, 'commands.build', location);

  const envVars: Record<string, string> = {};
  if (env !== undefined && env !== null) {
    if (!isRecord(env)) {
      throw new ManifestError("'env' must be a mapping", location);
    }
    for (const [key, envValue] of Object.entries(env)) {
      if (typeof envValue !== 'string' && typeof envValue !== 'number' && typeof envValue !== 'boolean') {
        throw new ManifestError(`'env.${key}' must be a scalar value`, location);
      }
      envVars[key] = String(envValue);
    }
  }

  return Object.freeze({
    commands: Object.freeze({
      ...(install ? { install } : {}),
      ...(build ? { build } : {})
    }),
    env: Object.freeze(envVars)
  });
}
