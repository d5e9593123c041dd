import { Command, CommanderError, Option } from "commander";
import {
  ConfigurationError,
  PATH_STRATEGIES,
  zodIssuesToValidationIssues,
} from "reachgraph";

import { type CliOptions, CliOptionsSchema, USAGE } from "./config";

export type CliCommand =
  | Readonly<{ kind: "run"; options: CliOptions }>
  | Readonly<{ kind: "help"; text: string }>;

function createProgram(): Command {
  return new Command()
    .name("reachgraph")
    .description(
      "Computes the transitive closure of a graph read from an adjacency matrix file and answers reachability queries.",
    )
    .usage("-i <inputfile> [-r <source>,<destination>] [-p] [-o]")
    .requiredOption("-i, --input <file>", "adjacency matrix file")
    .option(
      "-r, --route <source,destination>",
      "find a path between two nodes",
    )
    .option("-p, --print", "print the transitive closure to the console")
    .option("-o, --output", "write the transitive closure to out-<filename>")
    .addOption(
      new Option("--strategy <strategy>", "path strategy for --route")
        .choices(PATH_STRATEGIES)
        .default("greedy"),
    )
    .option("--max-edges <count>", "largest closure to compute")
    .option("-v, --verbose", "log closure passes and error details")
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: () => undefined,
      writeErr: () => undefined,
    });
}

/**
 * Parses command-line arguments (without the node and script entries).
 *
 * Short flags combine, so `-opr 0,1` equals `-o -p -r 0,1`.
 *
 * @throws ConfigurationError for missing, unknown or invalid options
 */
export function parseCliOptions(argv: readonly string[]): CliCommand {
  if (argv.length === 0) {
    throw new ConfigurationError(
      "No command line arguments given",
      {},
      { suggestion: USAGE },
    );
  }

  const program = createProgram();
  try {
    program.parse([...argv], { from: "user" });
  } catch (error) {
    if (!(error instanceof CommanderError)) throw error;

    if (error.code === "commander.helpDisplayed") {
      return { kind: "help", text: program.helpInformation() };
    }
    throw new ConfigurationError(
      error.message.replace(/^error: /, ""),
      { commanderCode: error.code },
      { cause: error, suggestion: USAGE },
    );
  }

  const result = CliOptionsSchema.safeParse(program.opts());
  if (!result.success) {
    const issues = zodIssuesToValidationIssues(result.error);
    throw new ConfigurationError(
      issues.map((issue) => issue.message).join("; "),
      { issues },
      { cause: result.error, suggestion: USAGE },
    );
  }

  return { kind: "run", options: result.data };
}
