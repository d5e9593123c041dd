import { z } from "zod";

import { type AdjacencyMatrix } from "../core/types";
import { ValidationError, type ValidationIssue } from "../errors";
import { validate } from "../errors/validation";

// ============================================================
// Schemas
// ============================================================

export const BitSchema = z.union([z.literal(0), z.literal(1)]);

/**
 * A non-empty square matrix of 0/1 cells.
 */
export const AdjacencyMatrixSchema = z
  .array(z.array(BitSchema))
  .min(1, "Matrix must have at least one row")
  .superRefine((rows, context) => {
    for (const [index, row] of rows.entries()) {
      if (row.length !== rows.length) {
        context.addIssue({
          code: "custom",
          path: [index],
          message: `Expected ${rows.length} columns, found ${row.length}`,
        });
      }
    }
  });

// ============================================================
// Validation
// ============================================================

/**
 * Validates an in-memory matrix.
 *
 * @throws ValidationError listing every row that is not N cells of 0/1
 */
export function validateAdjacencyMatrix(value: unknown): AdjacencyMatrix {
  return validate(AdjacencyMatrixSchema, value, "matrix");
}

/**
 * Checks that `n` is the dimension of `matrix`.
 */
export function assertMatrixDimension(
  matrix: AdjacencyMatrix,
  n: number,
): void {
  const issues: ValidationIssue[] = [];

  if (matrix.length !== n) {
    issues.push({
      path: "",
      message: `Expected ${n} rows, found ${matrix.length}`,
    });
  }
  for (const [index, row] of matrix.entries()) {
    if (row.length !== n) {
      issues.push({
        path: String(index),
        message: `Expected ${n} columns, found ${row.length}`,
      });
    }
  }

  if (issues.length > 0) {
    throw new ValidationError(
      `Matrix does not have dimension ${n}`,
      { subject: "matrix", issues },
      { suggestion: `Pass the dimension the matrix was parsed with.` },
    );
  }
}
