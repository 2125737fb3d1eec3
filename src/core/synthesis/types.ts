import type { ActionKind } from '../../types/index.js';

/** Name -> constraint, from the root monoforge.yml */
export type SharedDependencySet = Readonly<Record<string, string>>;

/** Name -> pinned version, from the lock file */
export type LockMapping = Readonly<Record<string, string>>;

export type DependencySource = 'local' | 'shared';

export interface LocalDependency {
  /** Absolute directory of the internal package */
  path: string;
  version: string;
  /** Editable reference (install mode) */
  develop: boolean;
}

/**
 * Fully materialized manifest handed to an action.
 */
export interface MergedManifest {
  name: string;
  version: string;
  description?: string;
  dependencies: Record<string, string>;
  provenance: Record<string, DependencySource>;
  localDependencies: Record<string, LocalDependency>;
  /** Selected optional dependency groups */
  extras: Record<string, Record<string, string>>;
  /** Dependencies whose constraint was replaced by a locked version */
  locked: string[];
  sharedDepsApplied: true;
}

/**
 * Which optional dependency groups to materialize; every group when empty.
 * `none` wins over `only`, and `only` over `with`/`without`. Otherwise
 * `without` drops groups and a non-empty `with` keeps just the named ones.
 */
export interface ExtrasSelection {
  none?: boolean;
  only?: readonly string[];
  with?: readonly string[];
  without?: readonly string[];
}

export interface SynthesizerOptions {
  mode?: ActionKind;
  lock?: LockMapping;
  /** Pin every dependency present in the lock mapping */
  lockVersions?: boolean;
  extras?: ExtrasSelection;
}
