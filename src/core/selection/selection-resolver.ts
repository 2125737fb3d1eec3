/**
 * Selection resolution: turns include/exclude lists into the set of
 * packages to act on, closed under internal dependencies.
 */

import { dependentsOf, type DependencyGraph } from '../graph/graph-builder.js';
import {
  ConflictingSelectionError,
  UnknownPackageSelectionError,
  UnknownWorkspaceError,
  UnsatisfiableSelectionError
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

function validateSelection(
  graph: DependencyGraph,
  include: Iterable<string>,
  exclude: Iterable<string>
): { includeSet: Set<string>; excludeSet: Set<string> } {
  const includeSet = new Set(include);
  const excludeSet = new Set<string>();

  const unknownIncludes = [...includeSet].filter((name) => !graph.indexOf.has(name)).sort();
  if (unknownIncludes.length > 0) {
    throw new UnknownPackageSelectionError(unknownIncludes);
  }

  for (const name of exclude) {
    if (!graph.indexOf.has(name)) {
      logger.warn(`Ignoring unknown excluded package '${name}'`);
      continue;
    }
    excludeSet.add(name);
  }

  const conflicts = [...includeSet].filter((name) => excludeSet.has(name)).sort();
  if (conflicts.length > 0) {
    throw new ConflictingSelectionError(conflicts);
  }
  return { includeSet, excludeSet };
}

/**
 * Resolve the target set.
 *
 * With an empty include list every package is a target, minus each excluded
 * package and everything that depends on it. With a non-empty include list
 * the targets are the included packages plus all their transitive internal
 * dependencies; excluding one of those dependencies is an error.
 *
 * The returned set iterates in topological order.
 */
export function selectPackages(
  graph: DependencyGraph,
  include: Iterable<string> = [],
  exclude: Iterable<string> = []
): Set<string> {
  const { includeSet, excludeSet } = validateSelection(graph, include, exclude);
  const selected = new Set<string>();

  if (includeSet.size === 0) {
    const removed = new Set<string>();
    for (const name of excludeSet) {
      removed.add(name);
      for (const dependent of dependentsOf(graph, name, { transitive: true })) {
        removed.add(dependent);
      }
    }
    for (const name of graph.order) {
      if (!removed.has(name)) {
        selected.add(name);
      }
    }
    if (removed.size > excludeSet.size) {
      logger.debug('Excluded packages removed their dependents', { removed: [...removed].sort() });
    }
    return selected;
  }

  // Iterative DFS: the first excluded dependency found is reported with the package requiring it
  const required = new Set<string>();
  for (const name of [...includeSet].sort()) {
    const start = graph.indexOf.get(name);
    if (start === undefined || required.has(name)) {
      continue;
    }
    required.add(name);
    const path = [start];
    const cursor = [0];

    while (path.length > 0) {
      const top = path.length - 1;
      const deps = graph.dependencies[path[top]];
      if (cursor[top] === deps.length) {
        path.pop();
        cursor.pop();
        continue;
      }

      const depIndex = deps[cursor[top]];
      cursor[top] += 1;
      const depName = graph.packages[depIndex].name;
      if (excludeSet.has(depName)) {
        throw new UnsatisfiableSelectionError(graph.packages[path[top]].name, depName);
      }
      if (!required.has(depName)) {
        required.add(depName);
        path.push(depIndex);
        cursor.push(0);
      }
    }
  }

  for (const name of graph.order) {
    if (required.has(name)) {
      selected.add(name);
    }
  }
  return selected;
}

/**
 * Plain name filter with no dependency closure, for operations that act on
 * each named package alone. Empty include means every package. Topological order.
 */
export function filterPackages(
  graph: DependencyGraph,
  include: Iterable<string> = [],
  exclude: Iterable<string> = []
): Set<string> {
  const { includeSet, excludeSet } = validateSelection(graph, include, exclude);
  return new Set(
    graph.order.filter((name) => (includeSet.size === 0 || includeSet.has(name)) && !excludeSet.has(name))
  );
}

/**
 * Names of every package discovered in the given workspaces, in
 * topological order.
 *
 * @param available workspace names that may be requested; defaults to the
 *   workspaces the graph's packages belong to
 */
export function expandWorkspaces(
  graph: DependencyGraph,
  workspaces: Iterable<string>,
  available?: Iterable<string>
): string[] {
  const known = new Set(available ?? []);
  for (const pkg of graph.packages) {
    if (pkg.workspace !== undefined) {
      known.add(pkg.workspace);
    }
  }

  const requested = new Set<string>();
  for (const workspace of workspaces) {
    if (!known.has(workspace)) {
      throw new UnknownWorkspaceError(workspace, [...known].sort());
    }
    requested.add(workspace);
  }

  return graph.order.filter((name) => {
    const index = graph.indexOf.get(name);
    if (index === undefined) {
      return false;
    }
    const workspace = graph.packages[index].workspace;
    return workspace !== undefined && requested.has(workspace);
  });
}
