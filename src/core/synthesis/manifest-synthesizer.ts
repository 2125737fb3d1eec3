/**
 * Manifest synthesis.
 *
 * Merges the repo-wide shared dependency set into a package's own
 * declarations and translates internal dependencies into local path
 * references. Local constraints always win over shared ones.
 */

import type { ActionKind } from '../../types/index.js';
import type { Package } from '../manifest/types.js';
import { getPackage, type DependencyGraph } from '../graph/graph-builder.js';
import { logger } from '../../utils/logger.js';
import type {
  DependencySource,
  ExtrasSelection,
  LocalDependency,
  LockMapping,
  MergedManifest,
  SharedDependencySet,
  SynthesizerOptions
} from './types.js';

const compareKeys = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/** Record with keys in sorted order; built with fromEntries so every key is an own property */
function sortedRecord<T>(entries: Iterable<readonly [string, T]>): Record<string, T> {
  return Object.fromEntries([...entries].sort(([a], [b]) => compareKeys(a, b)));
}

/**
 * Filter a package's extras groups by the requested selection.
 */
export function selectExtrasGroups(groups: readonly string[], selection: ExtrasSelection = {}): string[] {
  if (selection.none) {
    return [];
  }
  const { only, without, with: withGroups } = selection;
  if (only && only.length > 0) {
    return groups.filter((group) => only.includes(group));
  }
  let selected = [...groups];
  if (without && without.length > 0) {
    selected = selected.filter((group) => !without.includes(group));
  }
  if (withGroups && withGroups.length > 0) {
    selected = selected.filter((group) => withGroups.includes(group));
  }
  return selected;
}

export class ManifestSynthesizer {
  private readonly mode: ActionKind;
  private readonly lock: LockMapping;
  private readonly lockVersions: boolean;
  private readonly extras: ExtrasSelection;

  constructor(
    private readonly graph: DependencyGraph,
    options: SynthesizerOptions = {}
  ) {
    this.mode = options.mode ?? 'install';
    this.lock = options.lock ?? {};
    this.lockVersions = options.lockVersions ?? false;
    this.extras = options.extras ?? {};
  }

  synthesize(pkg: Package, sharedDeps: SharedDependencySet): MergedManifest {
    const dependencies = new Map<string, string>();
    const provenance = new Map<string, DependencySource>();

    for (const [depName, constraint] of Object.entries(sharedDeps)) {
      if (this.graph.indexOf.has(depName)) {
        logger.warn(`Shared dependency '${depName}' names a repo package and is not inherited by '${pkg.name}'`);
        continue;
      }
      dependencies.set(depName, constraint);
      provenance.set(depName, 'shared');
    }

    for (const [depName, constraint] of Object.entries(pkg.externalDeps)) {
      dependencies.set(depName, constraint);
      provenance.set(depName, 'local');
    }

    const locked = new Set<string>();
    const pin = (depName: string, constraint: string): string => {
      if (!this.lockVersions || !Object.hasOwn(this.lock, depName)) {
        return constraint;
      }
      locked.add(depName);
      return this.lock[depName];
    };

    const pinned = [...dependencies].map(([depName, constraint]): [string, string] => [
      depName,
      pin(depName, constraint)
    ]);

    const groups = selectExtrasGroups(Object.keys(pkg.extras).sort(compareKeys), this.extras);
    const extras = Object.fromEntries(
      groups.map((group): [string, Record<string, string>] => [
        group,
        sortedRecord(
          Object.entries(pkg.extras[group]).map(([depName, constraint]): [string, string] => [
            depName,
            pin(depName, constraint)
          ])
        )
      ])
    );

    const localDependencies = pkg.internalDeps.map((depName): [string, LocalDependency] => {
      const dep = getPackage(this.graph, depName);
      return [depName, { path: dep.path, version: dep.version, develop: this.mode !== 'build' }];
    });

    return {
      name: pkg.name,
      version: pkg.version,
      ...(pkg.description !== undefined ? { description: pkg.description } : {}),
      dependencies: sortedRecord(pinned),
      provenance: sortedRecord(provenance),
      localDependencies: sortedRecord(localDependencies),
      extras,
      locked: [...locked].sort(compareKeys),
      sharedDepsApplied: true
    };
  }

  synthesizeAll(packages: Iterable<Package>, sharedDeps: SharedDependencySet): Map<string, MergedManifest> {
    const manifests = new Map<string, MergedManifest>();
    for (const pkg of packages) {
      manifests.set(pkg.name, this.synthesize(pkg, sharedDeps));
    }
    return manifests;
  }
}
