/**
 * Edge list construction.
 *
 * Turns a dense adjacency matrix into the ordered list of its direct edges,
 * and provides the growable, duplicate-aware buffer the closure engine
 * extends.
 */

import {
  AllocationError,
  type AllocationErrorDetails,
  ConfigurationError,
} from "../errors";
import {
  type AdjacencyMatrix,
  type CapacityOptions,
  type Edge,
  type EdgeList,
  MAX_EDGE_CAPACITY,
  type NodeIndex,
} from "../core/types";
import { assertMatrixDimension } from "../matrix/adjacency-matrix";

type GrowingOperation = AllocationErrorDetails["operation"];

// ============================================================
// Edge Keys
// ============================================================

/**
 * Lookup key for a (source, destination) pair.
 */
export function edgeKey(source: NodeIndex, destination: NodeIndex): string {
  return `${source}\u0000${destination}`;
}

/**
 * Resolves `maxEdges`, rejecting values that cannot be a capacity.
 */
export function resolveCapacity(options: CapacityOptions = {}): number {
  const capacity = options.maxEdges ?? MAX_EDGE_CAPACITY;
  if (!Number.isInteger(capacity) || capacity < 0) {
    throw new ConfigurationError(
      `maxEdges must be a non-negative integer, got ${capacity}`,
      { maxEdges: capacity },
    );
  }
  return Math.min(capacity, MAX_EDGE_CAPACITY);
}

// ============================================================
// EdgeListBuffer
// ============================================================

/**
 * Append-only edge list with set-backed duplicate lookup.
 *
 * The array keeps insertion order for output and path reconstruction; the
 * key set answers "is (u, w) already present" without a rescan.
 */
export class EdgeListBuffer {
  readonly #edges: Edge[] = [];
  readonly #keys = new Set<string>();
  readonly #capacity: number;
  readonly #operation: GrowingOperation;

  constructor(operation: GrowingOperation, capacity: number) {
    this.#operation = operation;
    this.#capacity = capacity;
  }

  get size(): number {
    return this.#edges.length;
  }

  has(source: NodeIndex, destination: NodeIndex): boolean {
    return this.#keys.has(edgeKey(source, destination));
  }

  /**
   * Appends the edge unless the pair is already present.
   *
   * @returns Whether the edge was appended
   * @throws AllocationError when the list is full
   */
  add(source: NodeIndex, destination: NodeIndex): boolean {
    const key = edgeKey(source, destination);
    if (this.#keys.has(key)) return false;

    const requested = this.#edges.length + 1;
    if (requested > this.#capacity) {
      throw new AllocationError(
        `Cannot grow edge list to ${requested} edges (capacity ${this.#capacity})`,
        {
          operation: this.#operation,
          requested,
          capacity: this.#capacity,
        },
      );
    }

    // Key first: a failed insert leaves both stores unchanged.
    try {
      this.#keys.add(key);
    } catch (error) {
      throw new AllocationError(
        `Runtime refused to grow edge list to ${requested} edges`,
        {
          operation: this.#operation,
          requested,
          capacity: this.#capacity,
        },
        { cause: error },
      );
    }
    this.#edges.push([source, destination]);
    return true;
  }

  /**
   * Copy of the current contents. Later appends do not show up in it.
   */
  snapshot(): EdgeList {
    return [...this.#edges];
  }
}

// ============================================================
// Matrix → Edge List
// ============================================================

/**
 * Lists every direct edge of the matrix in row-major order.
 *
 * @param matrix - N×N adjacency matrix; not modified
 * @param n - The matrix dimension N
 * @throws ValidationError when `n` does not match the matrix
 * @throws AllocationError when the edges exceed `maxEdges`
 *
 * @example
 * ```typescript
 * buildEdgeList([[0, 1], [1, 0]], 2); // [[0, 1], [1, 0]]
 * ```
 */
export function buildEdgeList(
  matrix: AdjacencyMatrix,
  n: number,
  options?: CapacityOptions,
): EdgeList {
  assertMatrixDimension(matrix, n);
  const buffer = new EdgeListBuffer("build-edge-list", resolveCapacity(options));

  for (const [row, cells] of matrix.entries()) {
    for (const [column, cell] of cells.entries()) {
      if (cell === 1) {
        buffer.add(row, column);
      }
    }
  }

  return buffer.snapshot();
}
