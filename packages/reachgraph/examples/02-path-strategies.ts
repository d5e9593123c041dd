/**
 * Example 02: Path Strategies
 *
 * The greedy walk follows the first unvisited edge and never backtracks, so
 * it can stop short of a target the closure says is reachable. The
 * breadth-first strategy searches every branch and returns a shortest path.
 */
import {
  buildEdgeList,
  computeClosure,
  findPath,
  formatPath,
  isReachable,
  PATH_STRATEGIES,
} from "reachgraph";

// 0 → 1 is listed first but leads nowhere; the way to 3 is 0 → 2 → 3
const matrix = [
  [0, 1, 1, 0],
  [0, 0, 0, 0],
  [0, 0, 0, 1],
  [0, 0, 0, 0],
] as const;

export async function main(): Promise<void> {
  const edges = buildEdgeList(matrix, matrix.length);
  const closure = computeClosure(edges);

  console.log(`0 reaches 3: ${isReachable(closure, 0, 3)}`);

  for (const strategy of PATH_STRATEGIES) {
    const lookup = findPath(closure, edges, 0, 3, { strategy });

    if (lookup.status === "found") {
      console.log(`${strategy}: ${formatPath(lookup.path)}`);
    } else if (lookup.status === "dead-end") {
      console.log(`${strategy}: dead end after ${formatPath(lookup.partial)}`);
    }
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error(error);
    process.exit(1);
  });
}
