import { ConfigurationError } from "reachgraph";

import { type CliCommand, parseCliOptions } from "./cli";
import { USAGE } from "./config";
import { type Output } from "./report";
import { run } from "./run";

/**
 * Entry point shared by the executable and the tests.
 *
 * @returns The process exit code
 */
export async function main(
  argv: readonly string[],
  output: Output = console,
): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliOptions(argv);
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;

    output.error(`reachgraph: ${error.message}`);
    output.error(USAGE);
    return 1;
  }

  if (command.kind === "help") {
    output.log(command.text);
    return 0;
  }

  return run(command.options, output);
}
