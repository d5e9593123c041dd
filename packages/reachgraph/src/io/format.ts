import {
  type AdjacencyMatrix,
  type Closure,
  type Path,
} from "../core/types";

export const NEIGHBOR_TABLE_TITLE = "Neighbor table";
export const CLOSURE_TABLE_TITLE = "R* Table";

/**
 * Renders the matrix one row per line, cells separated by spaces.
 */
export function formatNeighborTable(matrix: AdjacencyMatrix): string {
  return [NEIGHBOR_TABLE_TITLE, ...matrix.map((row) => row.join(" "))].join(
    "\n",
  );
}

/**
 * Renders the closure as "R* Table" followed by one "source -> destination"
 * line per edge, in closure order.
 */
export function formatClosureTable(closure: Closure): string {
  return [
    CLOSURE_TABLE_TITLE,
    ...closure.map(([source, destination]) => `${source} -> ${destination}`),
  ].join("\n");
}

/**
 * formatPath([0, 1, 2]) // "0 => 1 => 2"
 */
export function formatPath(path: Path): string {
  return path.join(" => ");
}
