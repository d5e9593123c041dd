/**
 * Unit tests for command-line parsing.
 */
import { ConfigurationError } from "reachgraph";
import { describe, expect, it } from "vitest";

import { parseCliOptions } from "../src/cli";
import { outputPathFor, USAGE } from "../src/config";

function parseError(argv: readonly string[]): ConfigurationError {
  try {
    parseCliOptions(argv);
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error("Expected the arguments to be rejected");
}

describe("parseCliOptions", () => {
  it("applies defaults for everything but the input file", () => {
    expect(parseCliOptions(["-i", "matrix.txt"])).toEqual({
      kind: "run",
      options: {
        input: "matrix.txt",
        print: false,
        output: false,
        strategy: "greedy",
        verbose: false,
      },
    });
  });

  it("reads long options", () => {
    expect(
      parseCliOptions([
        "--input",
        "matrix.txt",
        "--route",
        "0,2",
        "--print",
        "--output",
        "--strategy",
        "breadth-first",
        "--max-edges",
        "64",
        "--verbose",
      ]),
    ).toEqual({
      kind: "run",
      options: {
        input: "matrix.txt",
        route: "0,2",
        print: true,
        output: true,
        strategy: "breadth-first",
        maxEdges: 64,
        verbose: true,
      },
    });
  });

  it("combines short flags", () => {
    const command = parseCliOptions(["-i", "matrix.txt", "-opr", "0,1"]);

    expect(command).toMatchObject({
      kind: "run",
      options: { output: true, print: true, route: "0,1" },
    });
  });

  it("rejects an empty argument list", () => {
    const error = parseError([]);

    expect(error.message).toBe("No command line arguments given");
    expect(error.suggestion).toBe(USAGE);
  });

  it("requires the input file", () => {
    const error = parseError(["-p"]);

    expect(error.message).toBe("required option '-i, --input <file>' not specified");
    expect(error.details).toEqual({
      commanderCode: "commander.missingMandatoryOptionValue",
    });
  });

  it("rejects unknown options", () => {
    expect(parseError(["-i", "matrix.txt", "-x"]).details).toEqual({
      commanderCode: "commander.unknownOption",
    });
  });

  it("rejects positional arguments", () => {
    expect(parseError(["-i", "matrix.txt", "extra"]).details).toEqual({
      commanderCode: "commander.excessArguments",
    });
  });

  it("rejects unknown path strategies", () => {
    expect(
      parseError(["-i", "matrix.txt", "--strategy", "depth-first"]).details,
    ).toEqual({ commanderCode: "commander.invalidArgument" });
  });

  it("rejects a fractional --max-edges", () => {
    const error = parseError(["-i", "matrix.txt", "--max-edges", "1.5"]);

    expect(error.message).toBe("--max-edges must be an integer");
    expect(error.details).toMatchObject({ issues: [{ path: "maxEdges" }] });
  });

  it("rejects a negative --max-edges", () => {
    expect(parseError(["-i", "matrix.txt", "--max-edges=-1"]).message).toBe(
      "--max-edges must not be negative",
    );
  });

  it("returns the help text for --help", () => {
    const command = parseCliOptions(["--help"]);

    expect(command.kind).toBe("help");
    if (command.kind === "help") {
      expect(command.text.startsWith(USAGE)).toBe(true);
    }
  });
});

describe("outputPathFor", () => {
  it("prefixes the file name, not the directory", () => {
    expect(outputPathFor("data/cities.txt")).toBe("data/out-cities.txt");
  });

  it("keeps a bare file name in the working directory", () => {
    expect(outputPathFor("cities.txt")).toBe("out-cities.txt");
  });
});
