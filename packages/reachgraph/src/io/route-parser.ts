import { z } from "zod";

import { type NodeIndex } from "../core/types";
import { type ValidationError } from "../errors";
import { safeValidate } from "../errors/validation";
import { type Result, flatMap } from "../utils/result";

/**
 * A reachability query between two nodes.
 */
export type Route = Readonly<{
  start: NodeIndex;
  target: NodeIndex;
}>;

const RouteTokenSchema = z
  .string()
  .regex(/^\s*\d+\s*,\s*\d+\s*$/, 'Expected "<source>,<destination>"');

function routeNodesSchema(size: number) {
  const node = z
    .number()
    .int()
    .max(size - 1, `Node must be less than ${size}`);

  return z.object({ start: node, target: node });
}

/**
 * Parses a "source,destination" token against a graph of `size` nodes.
 *
 * @example
 * ```typescript
 * parseRoute("0,2", 3); // { success: true, data: { start: 0, target: 2 } }
 * parseRoute("0,3", 3); // { success: false, error: ValidationError }
 * ```
 */
export function parseRoute(
  token: string,
  size: number,
): Result<Route, ValidationError> {
  return flatMap(safeValidate(RouteTokenSchema, token, "route"), (valid) => {
    const [start, target] = valid.split(",").map((part) => Number(part));
    return safeValidate(routeNodesSchema(size), { start, target }, "route");
  });
}
