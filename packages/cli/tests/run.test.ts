/**
 * End-to-end tests for the command: matrix file in, console lines and
 * output file out.
 */
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { main } from "../src/main";
import { type Output } from "../src/report";

type CapturedOutput = Output &
  Readonly<{ logs: string[]; errors: string[] }>;

function captureOutput(): CapturedOutput {
  const logs: string[] = [];
  const errors: string[] = [];
  return {
    logs,
    errors,
    log: (line) => logs.push(line),
    error: (line) => errors.push(line),
  };
}

const CHAIN = "3\n0 1 0\n0 0 1\n0 0 0\n";
const CHAIN_TABLE = "Neighbor table\n0 1 0\n0 0 1\n0 0 0";
const CHAIN_CLOSURE = "R* Table\n0 -> 1\n1 -> 2\n0 -> 2";

// 0 → 1 is listed first but leads nowhere; 3 is reached through 2
const BRANCH = "4\n0 1 1 0\n0 0 0 0\n0 0 0 1\n0 0 0 0\n";

describe("reachgraph command", () => {
  let dir: string;
  let output: CapturedOutput;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "reachgraph-"));
    output = captureOutput();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function matrixFile(text: string, name = "matrix.txt") {
    const path = join(dir, name);
    await writeFile(path, text, "utf8");
    return path;
  }

  describe("reports", () => {
    it("prints the neighbor table, the closure and a path", async () => {
      const input = await matrixFile(CHAIN);

      const code = await main(["-i", input, "-p", "-r", "0,2"], output);

      expect(code).toBe(0);
      expect(output.logs).toEqual([
        CHAIN_TABLE,
        "",
        "",
        CHAIN_CLOSURE,
        "Yes path exists!",
        "0 => 1 => 2",
      ]);
      expect(output.errors).toEqual([]);
    });

    it("prints only the neighbor table without other flags", async () => {
      const input = await matrixFile(CHAIN);

      expect(await main(["-i", input], output)).toBe(0);
      expect(output.logs).toEqual([CHAIN_TABLE, ""]);
    });

    it("reports an unreachable target", async () => {
      const input = await matrixFile(CHAIN);

      expect(await main(["-i", input, "-r", "2,0"], output)).toBe(0);
      expect(output.logs.at(-1)).toBe("No Path Exists!");
    });

    it("reports where the greedy walk stops", async () => {
      const input = await matrixFile(BRANCH);

      expect(await main(["-i", input, "-r", "0,3"], output)).toBe(0);
      expect(output.logs.slice(-2)).toEqual([
        "Path search reached a dead end at node 1",
        "Partial path: 0 => 1",
      ]);
    });

    it("finds the path with the breadth-first strategy", async () => {
      const input = await matrixFile(BRANCH);

      const code = await main(
        ["-i", input, "-r", "0,3", "--strategy", "breadth-first"],
        output,
      );

      expect(code).toBe(0);
      expect(output.logs.slice(-2)).toEqual(["Yes path exists!", "0 => 2 => 3"]);
    });

    it("logs closure passes in verbose mode", async () => {
      const input = await matrixFile(CHAIN);

      expect(await main(["-i", input, "-v"], output)).toBe(0);
      expect(output.errors).toEqual([
        "closure pass 1: +1 edges (3 total)",
        "closure pass 2: +0 edges (3 total)",
      ]);
    });
  });

  describe("output file", () => {
    it("writes the closure next to the input file", async () => {
      const input = await matrixFile(CHAIN);
      const outPath = join(dir, "out-matrix.txt");

      expect(await main(["-i", input, "-o"], output)).toBe(0);
      expect(output.logs.at(-1)).toBe(`Saving ${outPath}...`);
      expect(await readFile(outPath, "utf8")).toBe(`${CHAIN_CLOSURE}\n\n`);
    });

    it("fails when the output file cannot be written", async () => {
      const input = await matrixFile(CHAIN);
      const outPath = join(dir, "out-matrix.txt");
      await mkdir(outPath);

      expect(await main(["-i", input, "-o"], output)).toBe(1);
      expect(output.errors).toEqual([
        `Can't write in ${outPath}\n\nSuggestion: Verify that the directory of "${outPath}" is writable.`,
      ]);
    });
  });

  describe("failures", () => {
    it("prints usage when no arguments are given", async () => {
      expect(await main([], output)).toBe(1);
      expect(output.errors).toEqual([
        "reachgraph: No command line arguments given",
        "Usage: reachgraph -i <inputfile> [-r <source>,<destination>] [-p] [-o]",
      ]);
    });

    it("prints help and succeeds", async () => {
      expect(await main(["-h"], output)).toBe(0);
      expect(output.logs).toHaveLength(1);
      expect(output.logs[0]).toContain("--max-edges <count>");
    });

    it("fails on a missing input file", async () => {
      const input = join(dir, "missing.txt");

      expect(await main(["-i", input], output)).toBe(1);
      expect(output.errors).toEqual([
        `Input file can not be read: ${input}\n\nSuggestion: Verify that "${input}" exists and is readable.`,
      ]);
      expect(output.logs).toEqual([]);
    });

    it("fails on a malformed matrix before printing anything", async () => {
      const input = await matrixFile("2\n0 1\n1 2\n");

      expect(await main(["-i", input], output)).toBe(1);
      expect(output.logs).toEqual([]);
      expect(output.errors).toEqual([
        "Invalid matrix: rows.1.1: Cell must be 0 or 1\n\nSuggestion: Check the following locations: rows.1.1. See error.details.issues for specific validation failures.",
      ]);
    });

    it("checks the route against the matrix size before computing", async () => {
      const input = await matrixFile(CHAIN);

      expect(await main(["-i", input, "-p", "-r", "0,3"], output)).toBe(1);
      expect(output.logs).toEqual([]);
      expect(output.errors).toEqual([
        "Invalid route: target: Node must be less than 3\n\nSuggestion: Check the following locations: target. See error.details.issues for specific validation failures.",
      ]);
    });

    it("fails when the closure outgrows --max-edges", async () => {
      const input = await matrixFile(CHAIN);

      expect(await main(["-i", input, "--max-edges", "2"], output)).toBe(1);
      expect(output.errors).toEqual([
        "Cannot grow edge list to 3 edges (capacity 2)\n\nSuggestion: The edge list needs 3 entries but only 2 fit. Raise maxEdges or use a smaller graph.",
      ]);
    });

    it("prints the full error record in verbose mode", async () => {
      const input = await matrixFile(CHAIN);

      const code = await main(["-i", input, "-v", "--max-edges", "2"], output);

      expect(code).toBe(1);
      expect(output.errors.at(-1)).toBe(
        [
          "[ALLOCATION_ERROR] Cannot grow edge list to 3 edges (capacity 2)",
          "  Category: system",
          "  Suggestion: The edge list needs 3 entries but only 2 fit. Raise maxEdges or use a smaller graph.",
          '  Details: {"operation":"compute-closure","requested":3,"capacity":2}',
        ].join("\n"),
      );
    });
  });
});
