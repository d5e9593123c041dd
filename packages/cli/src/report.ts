import {
  type ClosurePassStats,
  formatPath,
  type PathLookup,
  type Route,
} from "reachgraph";

/**
 * Where results and diagnostics go. `console` satisfies it.
 */
export type Output = Readonly<{
  log: (line: string) => void;
  error: (line: string) => void;
}>;

export function printPathLookup(
  output: Output,
  route: Route,
  lookup: PathLookup,
): void {
  switch (lookup.status) {
    case "found": {
      output.log("Yes path exists!");
      output.log(formatPath(lookup.path));
      return;
    }
    case "not-found": {
      output.log("No Path Exists!");
      return;
    }
    case "dead-end": {
      const stuckAt = lookup.partial.at(-1) ?? route.start;
      output.log(`Path search reached a dead end at node ${stuckAt}`);
      output.log(`Partial path: ${formatPath(lookup.partial)}`);
      return;
    }
  }
}

export function formatPassStats(stats: ClosurePassStats): string {
  return `closure pass ${stats.pass}: +${stats.added} edges (${stats.total} total)`;
}
