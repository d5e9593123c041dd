/**
 * reachgraph: reachability over small directed graphs given as adjacency
 * matrices.
 *
 * @example
 * ```typescript
 * import {
 *   buildEdgeList,
 *   computeClosure,
 *   findPath,
 *   formatPath,
 * } from "reachgraph";
 *
 * const matrix = [
 *   [0, 1, 0],
 *   [0, 0, 1],
 *   [0, 0, 0],
 * ] as const;
 *
 * const edges = buildEdgeList(matrix, 3);
 * const closure = computeClosure(edges);
 * const lookup = findPath(closure, edges, 0, 2);
 * if (lookup.status === "found") {
 *   console.log(formatPath(lookup.path)); // "0 => 1 => 2"
 * }
 * ```
 */

// ============================================================
// Core
// ============================================================

export {
  type AdjacencyMatrix,
  type Bit,
  type CapacityOptions,
  type Closure,
  type Edge,
  type EdgeList,
  MAX_EDGE_CAPACITY,
  type NodeIndex,
  type Path,
} from "./core/types";

export {
  AdjacencyMatrixSchema,
  assertMatrixDimension,
  validateAdjacencyMatrix,
} from "./matrix/adjacency-matrix";

export { buildEdgeList, EdgeListBuffer, edgeKey } from "./edges/edge-list";

export {
  type ClosureOptions,
  type ClosurePassStats,
  computeClosure,
  isReachable,
} from "./closure/closure-engine";

export {
  type FindPathOptions,
  findPath,
  PATH_STRATEGIES,
  type PathLookup,
  type PathStrategy,
} from "./path/path-finder";

// ============================================================
// Text I/O
// ============================================================

export {
  CLOSURE_TABLE_TITLE,
  formatClosureTable,
  formatNeighborTable,
  formatPath,
  NEIGHBOR_TABLE_TITLE,
} from "./io/format";
export { type ParsedMatrix, parseMatrixText } from "./io/matrix-parser";
export { parseRoute, type Route } from "./io/route-parser";

// ============================================================
// Errors
// ============================================================

export {
  AllocationError,
  type AllocationErrorDetails,
  ConfigurationError,
  type ErrorCategory,
  getErrorSuggestion,
  InputFileError,
  isReachGraphError,
  isSystemError,
  isUserRecoverable,
  ReachGraphError,
  type ReachGraphErrorOptions,
  ValidationError,
  type ValidationErrorDetails,
  type ValidationIssue,
} from "./errors";
export {
  safeValidate,
  validate,
  zodIssuesToValidationIssues,
} from "./errors/validation";

// ============================================================
// Utilities
// ============================================================

export { err, flatMap, map, ok, type Result, unwrap } from "./utils/result";
