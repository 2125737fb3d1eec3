/**
 * Dependency graph construction and queries.
 *
 * The graph is an arena: packages live in one array sorted by name and every
 * edge is an index into it. Edge A -> B means "A depends on B".
 */

import type { Package } from '../manifest/types.js';
import {
  CycleError,
  DuplicatePackageError,
  GraphError,
  UnknownDependencyError
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface DependencyGraph {
  /** All packages, sorted by name */
  readonly packages: readonly Package[];
  readonly indexOf: ReadonlyMap<string, number>;
  /** dependencies[i]: indices package i depends on, ascending */
  readonly dependencies: readonly (readonly number[])[];
  /** dependents[i]: indices depending on package i, ascending */
  readonly dependents: readonly (readonly number[])[];
  /** Package names, dependencies before dependents */
  readonly order: readonly string[];
  /** Whole-graph execution batches */
  readonly batches: readonly (readonly string[])[];
}

export interface TraversalOptions {
  transitive?: boolean;
}

const compareNames = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Validate packages and build the dependency graph.
 *
 * @throws DuplicatePackageError, UnknownDependencyError or CycleError
 */
export function buildGraph(packages: readonly Package[]): DependencyGraph {
  const byName = new Map<string, Package>();
  for (const pkg of packages) {
    const existing = byName.get(pkg.name);
    if (existing) {
      throw new DuplicatePackageError(pkg.name, [existing.path, pkg.path]);
    }
    byName.set(pkg.name, pkg);
  }

  const sorted = [...packages].sort((a, b) => compareNames(a.name, b.name));
  const indexOf = new Map<string, number>();
  sorted.forEach((pkg, index) => indexOf.set(pkg.name, index));

  const dependencies: number[][] = sorted.map(() => []);
  const dependents: number[][] = sorted.map(() => []);

  sorted.forEach((pkg, index) => {
    for (const depName of pkg.internalDeps) {
      const depIndex = indexOf.get(depName);
      if (depIndex === undefined) {
        throw new UnknownDependencyError(pkg.name, depName);
      }
      dependencies[index].push(depIndex);
      dependents[depIndex].push(index);
    }
  });

  for (const list of [...dependencies, ...dependents]) {
    list.sort((a, b) => a - b);
  }

  detectCycles(sorted, dependencies);

  const batches = kahnBatches(sorted.length, dependencies, dependents).map((batch) =>
    batch.map((index) => sorted[index].name)
  );
  const order = batches.flat();

  logger.debug('Built dependency graph', { packages: sorted.length, batches: batches.length });

  return {
    packages: sorted,
    indexOf,
    dependencies,
    dependents,
    order,
    batches
  };
}

/**
 * Depth-first search with an in-progress set, on an explicit stack so deep
 * chains do not exhaust the call stack. Nodes and neighbours are visited in
 * index (name) order so the reported cycle is deterministic.
 */
function detectCycles(packages: readonly Package[], dependencies: readonly (readonly number[])[]): void {
  const done = new Set<number>();
  const inProgress = new Set<number>();
  // path[i] is on the current DFS path; cursor[i] is its next neighbour position
  const path: number[] = [];
  const cursor: number[] = [];

  for (let root = 0; root < packages.length; root++) {
    if (done.has(root)) {
      continue;
    }
    path.push(root);
    cursor.push(0);
    inProgress.add(root);

    while (path.length > 0) {
      const top = path.length - 1;
      const index = path[top];
      const deps = dependencies[index];

      if (cursor[top] === deps.length) {
        path.pop();
        cursor.pop();
        inProgress.delete(index);
        done.add(index);
        continue;
      }

      const dep = deps[cursor[top]];
      cursor[top] += 1;
      if (inProgress.has(dep)) {
        const cycle = [...path.slice(path.indexOf(dep)), dep].map((i) => packages[i].name);
        throw new CycleError(cycle);
      }
      if (!done.has(dep)) {
        path.push(dep);
        cursor.push(0);
        inProgress.add(dep);
      }
    }
  }
}

/**
 * Kahn's algorithm over dependency counts. Each batch holds every package
 * whose dependencies are all in earlier batches, in ascending index order.
 */
function kahnBatches(
  size: number,
  dependencies: readonly (readonly number[])[],
  dependents: readonly (readonly number[])[]
): number[][] {
  const remaining = dependencies.map((deps) => deps.length);
  const batches: number[][] = [];
  let current: number[] = [];

  for (let index = 0; index < size; index++) {
    if (remaining[index] === 0) {
      current.push(index);
    }
  }

  let placed = 0;
  while (current.length > 0) {
    batches.push(current);
    placed += current.length;

    const next: number[] = [];
    for (const index of current) {
      for (const dependent of dependents[index]) {
        remaining[dependent]--;
        if (remaining[dependent] === 0) {
          next.push(dependent);
        }
      }
    }
    current = next.sort((a, b) => a - b);
  }

  if (placed !== size) {
    // Unreachable once detectCycles has passed
    throw new GraphError('Topological sort did not place every package');
  }
  return batches;
}

/**
 * Look up a package by name.
 *
 * @throws GraphError when the graph has no such package
 */
export function getPackage(graph: DependencyGraph, name: string): Package {
  const index = graph.indexOf.get(name);
  if (index === undefined) {
    throw new GraphError(`Unknown package '${name}'`, { name });
  }
  return graph.packages[index];
}

export function dependenciesOf(graph: DependencyGraph, name: string, options: TraversalOptions = {}): string[] {
  return collect(graph, name, graph.dependencies, options.transitive ?? false);
}

export function dependentsOf(graph: DependencyGraph, name: string, options: TraversalOptions = {}): string[] {
  return collect(graph, name, graph.dependents, options.transitive ?? false);
}

/**
 * Neighbours of a package along one edge direction. Transitive results are
 * returned in topological order.
 */
function collect(
  graph: DependencyGraph,
  name: string,
  edges: readonly (readonly number[])[],
  transitive: boolean
): string[] {
  const start = graph.indexOf.get(name);
  if (start === undefined) {
    throw new GraphError(`Unknown package '${name}'`, { name });
  }

  if (!transitive) {
    return edges[start].map((index) => graph.packages[index].name);
  }

  const seen = new Set<number>();
  const queue = [...edges[start]];
  while (queue.length > 0) {
    const index = queue.shift();
    if (index === undefined || seen.has(index)) {
      continue;
    }
    seen.add(index);
    queue.push(...edges[index]);
  }

  const names = new Set([...seen].map((index) => graph.packages[index].name));
  return graph.order.filter((pkgName) => names.has(pkgName));
}
