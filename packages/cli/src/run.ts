import { readFile, writeFile } from "node:fs/promises";

import {
  buildEdgeList,
  type Closure,
  type ClosurePassStats,
  computeClosure,
  findPath,
  formatClosureTable,
  formatNeighborTable,
  InputFileError,
  isReachGraphError,
  parseMatrixText,
  parseRoute,
  unwrap,
} from "reachgraph";

import { type CliOptions, outputPathFor } from "./config";
import { formatPassStats, type Output, printPathLookup } from "./report";

async function readMatrixFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    throw new InputFileError(
      `Input file can not be read: ${path}`,
      { path, operation: "read" },
      { cause: error },
    );
  }
}

async function writeClosureFile(
  output: Output,
  inputPath: string,
  closure: Closure,
): Promise<void> {
  const path = outputPathFor(inputPath);
  try {
    await writeFile(path, `${formatClosureTable(closure)}\n\n`, "utf8");
  } catch (error) {
    throw new InputFileError(
      `Can't write in ${path}`,
      { path, operation: "write" },
      { cause: error },
    );
  }
  output.log(`Saving ${path}...`);
}

/**
 * Runs the pipeline for one invocation: matrix file → edge list → closure,
 * then the requested reports.
 *
 * @returns The process exit code
 */
export async function run(
  options: CliOptions,
  output: Output = console,
): Promise<number> {
  try {
    const { size, matrix } = unwrap(
      parseMatrixText(await readMatrixFile(options.input)),
    );
    const route =
      options.route === undefined ?
        undefined
      : unwrap(parseRoute(options.route, size));

    output.log(formatNeighborTable(matrix));
    output.log("");

    const capacity = { maxEdges: options.maxEdges };
    const edges = buildEdgeList(matrix, size, capacity);
    const closure = computeClosure(edges, {
      ...capacity,
      ...(options.verbose && {
        onPass: (stats: ClosurePassStats) => output.error(formatPassStats(stats)),
      }),
    });

    if (options.print) {
      output.log("");
      output.log(formatClosureTable(closure));
    }

    if (route !== undefined) {
      const lookup = findPath(closure, edges, route.start, route.target, {
        strategy: options.strategy,
      });
      printPathLookup(output, route, lookup);
    }

    if (options.output) {
      await writeClosureFile(output, options.input, closure);
    }

    return 0;
  } catch (error) {
    if (!isReachGraphError(error)) throw error;

    output.error(options.verbose ? error.toLogString() : error.toUserMessage());
    return 1;
  }
}
