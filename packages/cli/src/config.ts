import { basename, dirname, join } from "node:path";

import { PATH_STRATEGIES } from "reachgraph";
import { z } from "zod";

export const USAGE =
  "Usage: reachgraph -i <inputfile> [-r <source>,<destination>] [-p] [-o]";

export const OUTPUT_FILE_PREFIX = "out-";

/**
 * Options for one run, as validated from the command line.
 */
export const CliOptionsSchema = z.object({
  /** Matrix file to read */
  input: z.string().min(1, "Input file name must not be empty"),
  /** "source,destination" reachability query */
  route: z.string().optional(),
  /** Print the closure to the console */
  print: z.boolean().default(false),
  /** Write the closure next to the input file */
  output: z.boolean().default(false),
  /** Path strategy for the route query */
  strategy: z.enum(PATH_STRATEGIES).default("greedy"),
  /** Closure capacity; AllocationError beyond it */
  maxEdges: z.coerce
    .number()
    .int("--max-edges must be an integer")
    .nonnegative("--max-edges must not be negative")
    .optional(),
  /** Log closure passes and full error details */
  verbose: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

/**
 * out-<filename> in the input file's directory.
 *
 * @example
 * outputPathFor("data/cities.txt") // "data/out-cities.txt"
 */
export function outputPathFor(inputPath: string): string {
  return join(dirname(inputPath), `${OUTPUT_FILE_PREFIX}${basename(inputPath)}`);
}
