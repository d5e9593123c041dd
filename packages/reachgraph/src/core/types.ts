/**
 * Core graph types shared by the edge-list builder, the closure engine and
 * the path finder.
 */

/**
 * A node, identified by its row/column index in the adjacency matrix.
 * Always an integer in [0, N).
 */
export type NodeIndex = number;

/**
 * A single adjacency matrix cell.
 */
export type Bit = 0 | 1;

/**
 * Dense N×N adjacency matrix. Cell (i, j) = 1 means a direct edge i → j.
 */
export type AdjacencyMatrix = readonly (readonly Bit[])[];

/**
 * A directed edge as an ordered (source, destination) pair.
 */
export type Edge = readonly [source: NodeIndex, destination: NodeIndex];

/**
 * Ordered list of unique edges.
 *
 * Order is insertion order. It carries no meaning of its own, but it decides
 * which edge the greedy path walk tries first, so it is kept stable.
 */
export type EdgeList = readonly Edge[];

/**
 * An edge list closed under transitivity: whenever (u, v) and (v, w) are
 * present and u ≠ w, (u, w) is present too. Its first entries are the base
 * edges it was computed from, in their original order.
 */
export type Closure = EdgeList;

/**
 * Nodes from start to target where each consecutive pair is a base edge and
 * no node repeats.
 */
export type Path = readonly NodeIndex[];

/**
 * Options shared by every operation that grows an edge list.
 */
export type CapacityOptions = Readonly<{
  /**
   * Largest number of edges the list may hold. Growing past it raises
   * AllocationError.
   *
   * @default MAX_EDGE_CAPACITY
   */
  maxEdges?: number;
}>;

/**
 * The most edges an edge list can hold: the entry limit of a V8 `Set`,
 * which backs duplicate lookup.
 */
export const MAX_EDGE_CAPACITY = 2 ** 24;
