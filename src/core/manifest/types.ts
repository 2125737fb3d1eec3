/**
 * Types for package manifests (project.yml) and the validated Package model.
 */

/**
 * External dependency declaration as written in project.yml.
 * Either a mapping `name: constraint`, or a list whose entries are a bare
 * name (any version) or a single-key mapping `{ name: constraint }`.
 */
export type ExternalDeclaration = Record<string, string> | Array<string | Record<string, string>>;

/** Raw project.yml shape, before validation */
export interface ProjectYml {
  name: string;
  version: string;
  description?: string;
  dependencies?: {
    internal?: string[];
    external?: ExternalDeclaration;
  };
  /** Optional dependency groups: group name -> external declaration */
  extras?: Record<string, ExternalDeclaration>;
  /** Per-package command overrides (argv arrays) */
  commands?: {
    install?: string[];
    build?: string[];
  };
  env?: Record<string, string>;
}

export interface PackageCommands {
  readonly install?: readonly string[];
  readonly build?: readonly string[];
}

export interface PackageBuildConfig {
  readonly commands: PackageCommands;
  readonly env: Readonly<Record<string, string>>;
}

/**
 * One validated monorepo member. Frozen once loaded.
 */
export interface Package {
  readonly name: string;
  readonly version: string;
  readonly description?: string;
  /** Package directory; opaque to graph, selection and scheduling */
  readonly path: string;
  /** Workspace group the package was discovered in */
  readonly workspace?: string;
  /** Names of monorepo packages this package depends on, in declaration order */
  readonly internalDeps: readonly string[];
  /** External dependency name -> version constraint */
  readonly externalDeps: Readonly<Record<string, string>>;
  /** Optional dependency groups: group -> (name -> constraint) */
  readonly extras: Readonly<Record<string, Readonly<Record<string, string>>>>;
  readonly build: PackageBuildConfig;
}

/**
 * Where a raw manifest came from. Used to fill Package.path and to
 * give errors a location.
 */
export interface ManifestSource {
  path?: string;
  workspace?: string;
  /** Human-readable location for diagnostics, usually the project.yml path */
  location?: string;
}
