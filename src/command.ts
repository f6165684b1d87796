import yargs from "yargs";
import {
  INCLUDE_ENV,
  buildSearchPaths,
  expandIncludeFlags,
  relativeLabel,
} from "./cli-args.js";
import { DEFAULT_ROOT_PATTERNS } from "./fileDiscovery.js";
import { scanIncludeTree } from "./scan.js";
import { findIncludeCycles, printIncludeForest } from "./deps/tree.js";
import { computeGraphStats, renderGraphStats } from "./stats.js";

export type CommandIO = {
  log: (line: string) => void;
  error: (line: string) => void;
};

export function createCli(args: string[]) {
  return yargs(expandIncludeFlags(args))
    .scriptName("include-tree")
    .usage("$0 [options]")
    .option("dir", {
      alias: "C",
      type: "string",
      describe: "Directory to scan for root files",
      default: process.cwd(),
    })
    .option("include-dir", {
      alias: "I",
      type: "string",
      array: true,
      describe: "Add an include search path (repeatable, -I<path> works too)",
    })
    .option("pattern", {
      type: "string",
      array: true,
      default: DEFAULT_ROOT_PATTERNS,
      describe: "Root file glob (repeatable)",
    })
    .option("ignore", {
      type: "string",
      array: true,
      describe: "Ignore root files matching a glob (repeatable)",
    })
    .option("env", {
      type: "boolean",
      default: true,
      describe: `Read search paths from the ${INCLUDE_ENV} environment variable`,
    })
    .option("relative", {
      type: "boolean",
      default: false,
      describe: "Print paths relative to the scanned directory",
    })
    .option("circular", {
      type: "boolean",
      default: false,
      describe: "List include cycles after the tree",
    })
    .option("stats", {
      type: "boolean",
      default: false,
      describe: "Print graph statistics after the tree",
    })
    .option("quiet", {
      alias: "q",
      type: "boolean",
      default: false,
      describe: "Suppress progress lines",
    })
    .strict()
    .check((argv) => {
      const extra = argv._.map(String);
      if (extra.length === 0) return true;
      const noun = extra.length === 1 ? "argument" : "arguments";
      throw new Error(`Unknown ${noun}: ${extra.join(", ")}`);
    })
    .fail((msg, err) => {
      throw err ?? new Error(msg);
    })
    .help()
    .version();
}

/**
 * Runs the command and returns the process exit status: 1 for a malformed
 * invocation or an unreadable scan directory, 0 otherwise.
 */
export async function runCommand(
  args: string[],
  io: CommandIO = console,
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  try {
    const argv = await createCli(args).parse();
    const dir = argv.dir;

    const { searchPaths, rejected } = buildSearchPaths({
      dir,
      envValue: argv.env ? env[INCLUDE_ENV] : undefined,
      includeDirs: argv["include-dir"],
    });
    for (const bad of rejected) {
      io.error(`Couldn't add include directory '${bad}'`);
    }

    if (!argv.quiet) io.log("Finding source files...");
    const { roots, graph } = scanIncludeTree({
      dir,
      patterns: argv.pattern,
      ignore: argv.ignore,
      searchPaths,
    });
    if (!argv.quiet) io.log(`${roots.length} files found.`);

    const label = argv.relative
      ? relativeLabel(dir)
      : (filePath: string) => filePath;
    printIncludeForest(graph, roots, io.log, { label });

    if (argv.circular) {
      const cycles = findIncludeCycles(graph);
      if (cycles.length === 0) {
        io.log("No circular includes found.");
      } else {
        io.log("Circular includes:");
        for (const cycle of cycles) {
          io.log(`- ${cycle.map(label).join(" -> ")}`);
        }
      }
    }

    if (argv.stats) {
      io.log(renderGraphStats(computeGraphStats(graph)));
    }
    return 0;
  } catch (err: unknown) {
    io.error(err instanceof Error ? err.message : String(err));
    return 1;
  }
}
