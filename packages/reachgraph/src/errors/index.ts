/**
 * reachgraph Error Hierarchy
 *
 * All errors extend ReachGraphError with:
 * - `code`: Machine-readable error code for programmatic handling
 * - `category`: Classification for error handling strategies
 * - `suggestion`: Optional recovery guidance for users
 * - `details`: Structured context about the error
 *
 * An unreachable target is not an error: `findPath` reports it as a
 * `not-found` lookup value.
 *
 * @example
 * ```typescript
 * try {
 *   const closure = computeClosure(edges, { maxEdges: 64 });
 * } catch (error) {
 *   if (isReachGraphError(error)) {
 *     console.error(error.toUserMessage());
 *   }
 * }
 * ```
 */

// ============================================================
// Types
// ============================================================

/**
 * Error category for programmatic handling.
 *
 * - `user`: Caused by invalid input or incorrect usage. Recoverable by fixing input.
 * - `system`: Resource exhaustion or an internal failure. The operation is aborted.
 */
export type ErrorCategory = "user" | "system";

/**
 * Options for ReachGraphError constructor.
 */
export type ReachGraphErrorOptions = Readonly<{
  /** Structured context about the error */
  details?: Record<string, unknown>;
  /** Error category for handling strategies */
  category: ErrorCategory;
  /** Recovery guidance for users */
  suggestion?: string;
  /** Underlying cause of the error */
  cause?: unknown;
}>;

function formatCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.stack ?? cause.message;
  }
  if (typeof cause === "string") {
    return cause;
  }
  if (typeof cause === "number" || typeof cause === "boolean") {
    return String(cause);
  }

  try {
    return JSON.stringify(cause);
  } catch (error) {
    return `Unserializable cause: ${
      error instanceof Error ? error.message : "Unknown error"
    }`;
  }
}

// ============================================================
// Base Error
// ============================================================

/**
 * Base error class for all reachgraph errors.
 */
export class ReachGraphError extends Error {
  /** Machine-readable error code (e.g., "ALLOCATION_ERROR") */
  readonly code: string;

  /** Error category for handling strategies */
  readonly category: ErrorCategory;

  /** Structured context about the error */
  readonly details: Readonly<Record<string, unknown>>;

  /** Recovery guidance for users */
  readonly suggestion?: string;

  constructor(message: string, code: string, options: ReachGraphErrorOptions) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = "ReachGraphError";
    this.code = code;
    this.category = options.category;
    this.details = Object.freeze(options.details ?? {});
    if (options.suggestion !== undefined) {
      this.suggestion = options.suggestion;
    }
  }

  /**
   * Returns a user-friendly error message with suggestion if available.
   */
  toUserMessage(): string {
    if (this.suggestion) {
      return `${this.message}\n\nSuggestion: ${this.suggestion}`;
    }
    return this.message;
  }

  /**
   * Returns a detailed string representation for logging.
   */
  toLogString(): string {
    const lines = [
      `[${this.code}] ${this.message}`,
      `  Category: ${this.category}`,
    ];

    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`);
    }

    const detailKeys = Object.keys(this.details);
    if (detailKeys.length > 0) {
      lines.push(`  Details: ${JSON.stringify(this.details)}`);
    }

    if (this.cause) {
      lines.push(`  Cause: ${formatCause(this.cause)}`);
    }

    return lines.join("\n");
  }
}

// ============================================================
// Validation Errors (category: "user")
// ============================================================

/**
 * Validation issue from Zod or custom validation.
 */
export type ValidationIssue = Readonly<{
  /** Path to the invalid value (e.g., "rows.2.4") */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Zod error code if from Zod validation */
  code?: string;
}>;

/**
 * Details for ValidationError.
 */
export type ValidationErrorDetails = Readonly<{
  /** What was being validated */
  subject: "matrix" | "route";
  /** Individual validation issues */
  issues: readonly ValidationIssue[];
}>;

/**
 * Thrown (or returned in a failed Result) when input does not have the
 * expected shape: a malformed matrix file, a route outside the graph, or a
 * dimension that does not match the matrix.
 *
 * @example
 * ```typescript
 * const parsed = parseMatrixText("2\n0 1\n");
 * if (!parsed.success) {
 *   console.log(parsed.error.details.issues);
 *   // [{ path: "rows", message: "Expected 2 rows", code: "too_small" }]
 * }
 * ```
 */
export class ValidationError extends ReachGraphError {
  declare readonly details: ValidationErrorDetails;

  constructor(
    message: string,
    details: ValidationErrorDetails,
    options?: { cause?: unknown; suggestion?: string },
  ) {
    const pathList =
      details.issues.length > 0 ?
        details.issues.map((issue) => issue.path || "(root)").join(", ")
      : "unknown";

    super(message, "VALIDATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ??
        `Check the following locations: ${pathList}. See error.details.issues for specific validation failures.`,
      cause: options?.cause,
    });
    this.name = "ValidationError";
  }
}

// ============================================================
// Configuration Errors (category: "user")
// ============================================================

/**
 * Thrown when command-line options or engine options are invalid.
 */
export class ConfigurationError extends ReachGraphError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "CONFIGURATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ?? `Review the options passed to reachgraph.`,
      cause: options?.cause,
    });
    this.name = "ConfigurationError";
  }
}

/**
 * Thrown when the matrix file cannot be read or the output file cannot be
 * written.
 */
export class InputFileError extends ReachGraphError {
  constructor(
    message: string,
    details: Readonly<{ path: string; operation: "read" | "write" }>,
    options?: { cause?: unknown },
  ) {
    super(message, "INPUT_FILE_ERROR", {
      details,
      category: "user",
      suggestion:
        details.operation === "read" ?
          `Verify that "${details.path}" exists and is readable.`
        : `Verify that the directory of "${details.path}" is writable.`,
      cause: options?.cause,
    });
    this.name = "InputFileError";
  }
}

// ============================================================
// Allocation Errors (category: "system")
// ============================================================

/**
 * Details for AllocationError.
 */
export type AllocationErrorDetails = Readonly<{
  /** Which edge list was growing */
  operation: "build-edge-list" | "compute-closure";
  /** Edge count the list needed */
  requested: number;
  /** Edge count the list may hold */
  capacity: number;
}>;

/**
 * Thrown when an edge list cannot grow to hold the next edge.
 *
 * Aborts the current operation. No partial edge list or closure is
 * returned and there is nothing to retry against.
 */
export class AllocationError extends ReachGraphError {
  declare readonly details: AllocationErrorDetails;

  constructor(
    message: string,
    details: AllocationErrorDetails,
    options?: { cause?: unknown },
  ) {
    super(message, "ALLOCATION_ERROR", {
      details,
      category: "system",
      suggestion: `The edge list needs ${details.requested} entries but only ${details.capacity} fit. Raise maxEdges or use a smaller graph.`,
      cause: options?.cause,
    });
    this.name = "AllocationError";
  }
}

// ============================================================
// Utility Functions
// ============================================================

/**
 * Type guard for ReachGraphError.
 */
export function isReachGraphError(error: unknown): error is ReachGraphError {
  return error instanceof ReachGraphError;
}

/**
 * Check if error is recoverable by user action (fixing the input or flags).
 */
export function isUserRecoverable(error: unknown): boolean {
  return isReachGraphError(error) && error.category === "user";
}

/**
 * Check if error indicates resource exhaustion or an internal failure.
 */
export function isSystemError(error: unknown): boolean {
  return isReachGraphError(error) && error.category === "system";
}

/**
 * Extract suggestion from error if available.
 */
export function getErrorSuggestion(error: unknown): string | undefined {
  return isReachGraphError(error) ? error.suggestion : undefined;
}
