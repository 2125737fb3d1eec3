import type { DependencyGraph } from './graph-builder.js';
import { GraphError } from '../../utils/errors.js';

export interface ExecutionPlan {
  /** batches[i] only depends on selected packages in batches 0..i-1 */
  readonly batches: readonly (readonly string[])[];
}

/**
 * Batches for a selected subset of the graph. Dependencies outside the
 * selection count as already satisfied. Names within a batch are sorted.
 */
export function planBatches(graph: DependencyGraph, selected: Iterable<string>): ExecutionPlan {
  const selectedIndices = new Set<number>();
  for (const name of selected) {
    const index = graph.indexOf.get(name);
    if (index === undefined) {
      throw new GraphError(`Unknown package '${name}'`, { name });
    }
    selectedIndices.add(index);
  }

  const level = new Map<number, number>();
  const batches: string[][] = [];

  // graph.order already places dependencies first
  for (const name of graph.order) {
    const index = graph.indexOf.get(name);
    if (index === undefined || !selectedIndices.has(index)) {
      continue;
    }

    let batch = 0;
    for (const dep of graph.dependencies[index]) {
      const depLevel = level.get(dep);
      if (depLevel !== undefined) {
        batch = Math.max(batch, depLevel + 1);
      }
    }
    level.set(index, batch);

    while (batches.length <= batch) {
      batches.push([]);
    }
    batches[batch].push(name);
  }

  for (const batch of batches) {
    batch.sort();
  }
  return { batches };
}

/** Plan order flattened: batch by batch */
export function planOrder(plan: ExecutionPlan): string[] {
  return plan.batches.flat();
}
