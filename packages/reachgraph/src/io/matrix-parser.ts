/**
 * Matrix file parsing.
 *
 * The file holds the dimension N alone on its first line, followed by N
 * lines of N whitespace-separated 0/1 cells:
 *
 * ```text
 * 3
 * 0 1 0
 * 0 0 1
 * 0 0 0
 * ```
 *
 * Blank lines and surrounding whitespace are ignored.
 */

import { z } from "zod";

import { type AdjacencyMatrix, type Bit } from "../core/types";
import { type ValidationError } from "../errors";
import { safeValidate } from "../errors/validation";
import { type Result, flatMap, map } from "../utils/result";

export type ParsedMatrix = Readonly<{
  size: number;
  matrix: AdjacencyMatrix;
}>;

// ============================================================
// Schemas
// ============================================================

const MatrixHeaderSchema = z.object({
  size: z
    .string()
    .regex(/^[1-9]\d*$/, "Matrix size must be a positive integer")
    .transform(Number),
});

const CellTokenSchema = z
  .enum(["0", "1"], { error: "Cell must be 0 or 1" })
  .transform((token): Bit => (token === "1" ? 1 : 0));

function matrixBodySchema(size: number) {
  return z.object({
    rows: z
      .array(z.array(CellTokenSchema).length(size, `Expected ${size} columns`))
      .length(size, `Expected ${size} rows`),
  });
}

// ============================================================
// Parsing
// ============================================================

function tokenizeLines(text: string): string[][] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "")
    .map((line) => line.split(/\s+/));
}

/**
 * Parses matrix file contents.
 *
 * @returns The matrix and its dimension, or a ValidationError whose issues
 * point at `size`, `rows`, `rows.<row>` or `rows.<row>.<column>`
 *
 * @example
 * ```typescript
 * parseMatrixText("2\n0 1\n0 0\n");
 * // { success: true, data: { size: 2, matrix: [[0, 1], [0, 0]] } }
 * ```
 */
export function parseMatrixText(
  text: string,
): Result<ParsedMatrix, ValidationError> {
  const [header = [], ...rows] = tokenizeLines(text);

  const parsedHeader = safeValidate(
    MatrixHeaderSchema,
    { size: header.length === 1 ? header[0] : header.join(" ") },
    "matrix",
  );

  return flatMap(parsedHeader, ({ size }) =>
    map(
      safeValidate(matrixBodySchema(size), { rows }, "matrix"),
      (body): ParsedMatrix => ({ size, matrix: body.rows }),
    ),
  );
}
