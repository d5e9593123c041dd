/**
 * Transitive closure computation over edge lists.
 *
 * Uses naive fixed-point composition: every pass composes each pair of
 * edges present at the start of the pass, and passes repeat until one adds
 * nothing. Quadratic passes over a list bounded by N² make this
 * O(N⁶) in the worst case, so it is meant for small graphs.
 */

import {
  type CapacityOptions,
  type Closure,
  type EdgeList,
  type NodeIndex,
} from "../core/types";
import { EdgeListBuffer, resolveCapacity } from "../edges/edge-list";

/**
 * Progress of one composition pass.
 */
export type ClosurePassStats = Readonly<{
  /** 1-based pass number */
  pass: number;
  /** Edges appended during this pass */
  added: number;
  /** Edge count after this pass */
  total: number;
}>;

export type ClosureOptions = CapacityOptions &
  Readonly<{
    /** Called after every pass, including the final pass that adds nothing */
    onPass?: (stats: ClosurePassStats) => void;
  }>;

/**
 * Computes the transitive closure of a list of directed edges.
 *
 * Given edges like [0→1, 1→2], returns [0→1, 1→2, 0→2]. The input edges
 * come first, in their original order, followed by derived edges in the
 * order they were found. Compositions that would produce a self-loop are
 * skipped; self-loops already in the input are kept.
 *
 * @param edges - Base edges; not modified. Repeated pairs collapse to the first.
 * @returns A new list with no duplicate pairs
 * @throws AllocationError when the closure needs more than `maxEdges` edges
 */
export function computeClosure(
  edges: EdgeList,
  options: ClosureOptions = {},
): Closure {
  const buffer = new EdgeListBuffer(
    "compute-closure",
    resolveCapacity(options),
  );
  for (const [source, destination] of edges) {
    buffer.add(source, destination);
  }

  let pass = 0;
  let changed = true;

  while (changed) {
    changed = false;
    pass++;

    // Edges appended during this pass only become operands in the next one.
    const snapshot = buffer.snapshot();

    for (const [u, v] of snapshot) {
      for (const [y, w] of snapshot) {
        // u ≠ w also rules out composing an edge with itself.
        if (v !== y || u === w) continue;

        if (buffer.add(u, w)) {
          changed = true;
        }
      }
    }

    options.onPass?.({
      pass,
      added: buffer.size - snapshot.length,
      total: buffer.size,
    });
  }

  return buffer.snapshot();
}

/**
 * Checks if the closure holds the pair (start, target).
 */
export function isReachable(
  closure: Closure,
  start: NodeIndex,
  target: NodeIndex,
): boolean {
  return closure.some(
    ([source, destination]) => source === start && destination === target,
  );
}
