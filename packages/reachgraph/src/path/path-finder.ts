/**
 * Path reconstruction.
 *
 * The closure only answers whether a target is reachable. The path itself is
 * walked over the base edges, since closure edges are shortcuts rather than
 * direct connections.
 */

import {
  type Closure,
  type EdgeList,
  type NodeIndex,
  type Path,
} from "../core/types";
import { isReachable } from "../closure/closure-engine";

// ============================================================
// Types
// ============================================================

/**
 * How the path is walked once the closure says the target is reachable.
 *
 * - `greedy`: follow the first unvisited base edge out of the last node, in
 *   list order, without backtracking. Can stop at a dead end.
 * - `breadth-first`: search base edges level by level and return a path
 *   with the fewest hops.
 */
export type PathStrategy = "greedy" | "breadth-first";

export const PATH_STRATEGIES = [
  "greedy",
  "breadth-first",
] as const satisfies readonly PathStrategy[];

export type FindPathOptions = Readonly<{
  /** @default "greedy" */
  strategy?: PathStrategy;
}>;

/**
 * Outcome of a path query. An unreachable target is an ordinary outcome,
 * not an error.
 */
export type PathLookup =
  | Readonly<{ status: "found"; path: Path }>
  | Readonly<{ status: "not-found" }>
  | Readonly<{
      status: "dead-end";
      /** Nodes walked before no unvisited base edge was left */
      partial: Path;
    }>;

const NOT_FOUND: PathLookup = { status: "not-found" };

// ============================================================
// Path Finding
// ============================================================

/**
 * Finds one path from `start` to `target`.
 *
 * @param closure - Closure of `baseEdges`, used as the reachability oracle
 * @param baseEdges - The direct edges the path is built from
 *
 * @example
 * ```typescript
 * const base = [[0, 1], [1, 2]] as const;
 * findPath(computeClosure(base), base, 0, 2);
 * // { status: "found", path: [0, 1, 2] }
 * ```
 */
export function findPath(
  closure: Closure,
  baseEdges: EdgeList,
  start: NodeIndex,
  target: NodeIndex,
  options: FindPathOptions = {},
): PathLookup {
  if (!isReachable(closure, start, target)) {
    return NOT_FOUND;
  }

  // Only a direct self-loop puts (start, start) in the closure.
  if (start === target) {
    return { status: "found", path: [start] };
  }

  const strategy = options.strategy ?? "greedy";
  switch (strategy) {
    case "greedy": {
      return walkGreedy(baseEdges, start, target);
    }
    case "breadth-first": {
      return searchBreadthFirst(baseEdges, start, target);
    }
  }
}

function nextGreedyNode(
  baseEdges: EdgeList,
  current: NodeIndex,
  visited: ReadonlySet<NodeIndex>,
): NodeIndex | undefined {
  for (const [source, destination] of baseEdges) {
    if (source === current && !visited.has(destination)) {
      return destination;
    }
  }
  return undefined;
}

function walkGreedy(
  baseEdges: EdgeList,
  start: NodeIndex,
  target: NodeIndex,
): PathLookup {
  const path: NodeIndex[] = [start];
  const visited = new Set<NodeIndex>(path);
  let current = start;

  while (current !== target) {
    const next = nextGreedyNode(baseEdges, current, visited);
    if (next === undefined) {
      return { status: "dead-end", partial: path };
    }
    path.push(next);
    visited.add(next);
    current = next;
  }

  return { status: "found", path };
}

function searchBreadthFirst(
  baseEdges: EdgeList,
  start: NodeIndex,
  target: NodeIndex,
): PathLookup {
  const parents = new Map<NodeIndex, NodeIndex>();
  let frontier: NodeIndex[] = [start];

  while (frontier.length > 0) {
    const nextFrontier: NodeIndex[] = [];

    for (const node of frontier) {
      for (const [source, destination] of baseEdges) {
        if (
          source !== node ||
          destination === start ||
          parents.has(destination)
        ) {
          continue;
        }

        parents.set(destination, node);
        if (destination === target) {
          return { status: "found", path: tracePath(parents, start, target) };
        }
        nextFrontier.push(destination);
      }
    }

    frontier = nextFrontier;
  }

  // Only reachable when the closure was not computed from these base edges.
  return { status: "dead-end", partial: [start] };
}

function tracePath(
  parents: ReadonlyMap<NodeIndex, NodeIndex>,
  start: NodeIndex,
  target: NodeIndex,
): Path {
  const reversed: NodeIndex[] = [target];
  let node = parents.get(target);

  while (node !== undefined) {
    reversed.push(node);
    node = node === start ? undefined : parents.get(node);
  }

  return reversed.toReversed();
}
