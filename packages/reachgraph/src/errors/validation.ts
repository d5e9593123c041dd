/**
 * Contextual Validation Utilities
 *
 * Zod validation wrappers that report failures as ValidationError with the
 * subject being validated and one issue per failing location.
 */

import { type ZodError, type ZodType } from "zod";

import { type Result, err, ok } from "../utils/result";
import {
  ValidationError,
  type ValidationErrorDetails,
  type ValidationIssue,
} from "./index";

/**
 * Converts Zod issues to ValidationIssue format.
 */
export function zodIssuesToValidationIssues(
  error: ZodError,
): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
    code: issue.code,
  }));
}

function describeIssues(issues: readonly ValidationIssue[]): string {
  return issues
    .map((issue) =>
      issue.path === "" ? issue.message : `${issue.path}: ${issue.message}`,
    )
    .join("; ");
}

/**
 * Validates a value and returns a Result instead of throwing.
 *
 * @example
 * ```typescript
 * const result = safeValidate(routeSchema, "0,2", "route");
 * if (result.success) {
 *   console.log(result.data);
 * }
 * ```
 */
export function safeValidate<T>(
  schema: ZodType<T>,
  value: unknown,
  subject: ValidationErrorDetails["subject"],
): Result<T, ValidationError> {
  const result = schema.safeParse(value);

  if (result.success) {
    return ok(result.data);
  }

  const issues = zodIssuesToValidationIssues(result.error);
  return err(
    new ValidationError(
      `Invalid ${subject}: ${describeIssues(issues)}`,
      { subject, issues },
      { cause: result.error },
    ),
  );
}

/**
 * Validates a value, throwing ValidationError on failure.
 */
export function validate<T>(
  schema: ZodType<T>,
  value: unknown,
  subject: ValidationErrorDetails["subject"],
): T {
  const result = safeValidate(schema, value, subject);
  if (result.success) {
    return result.data;
  }
  throw result.error;
}
