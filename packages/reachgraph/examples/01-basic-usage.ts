/**
 * Example 01: Basic Usage
 *
 * Parses a matrix file, computes its transitive closure and walks a path:
 * - Parsing matrix text into an adjacency matrix
 * - Building the base edge list
 * - Computing the closure with per-pass statistics
 * - Answering a reachability query
 */
import {
  buildEdgeList,
  computeClosure,
  findPath,
  formatClosureTable,
  formatNeighborTable,
  formatPath,
  parseMatrixText,
  parseRoute,
  unwrap,
} from "reachgraph";

// ============================================================
// Step 1: Parse the Matrix
// ============================================================

// Same layout as a matrix file: N on the first line, then N rows
const MATRIX_TEXT = `4
0 1 0 0
0 0 1 0
0 0 0 1
0 0 0 0
`;

export async function main(): Promise<void> {
  const { size, matrix } = unwrap(parseMatrixText(MATRIX_TEXT));
  console.log(formatNeighborTable(matrix));

  // ============================================================
  // Step 2: Edge List and Closure
  // ============================================================

  const edges = buildEdgeList(matrix, size);
  const closure = computeClosure(edges, {
    onPass: ({ pass, added, total }) => {
      console.log(`pass ${pass}: +${added} (${total} total)`);
    },
  });
  console.log(formatClosureTable(closure));

  // ============================================================
  // Step 3: Query
  // ============================================================

  const { start, target } = unwrap(parseRoute("0,3", size));
  const lookup = findPath(closure, edges, start, target);

  switch (lookup.status) {
    case "found": {
      console.log(`\n${start} reaches ${target}: ${formatPath(lookup.path)}`);
      break;
    }
    case "not-found": {
      console.log(`\n${start} does not reach ${target}`);
      break;
    }
    case "dead-end": {
      console.log(`\nWalk stopped at ${formatPath(lookup.partial)}`);
      break;
    }
  }

  // Edges only point forward, so nothing leads back to 0
  const reverse = findPath(closure, edges, target, start);
  console.log(`${target} reaches ${start}: ${reverse.status !== "not-found"}`);
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error(error);
    process.exit(1);
  });
}
