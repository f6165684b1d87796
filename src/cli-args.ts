import path from "node:path";
import {
  addSearchPath,
  createSearchPathSet,
  hasSearchPath,
} from "./deps/include-resolver.js";
import type { SearchPathSet } from "./types.js";

export const INCLUDE_ENV = "INCLUDE";

/**
 * Rewrites compiler-style `-I<path>` into `--include-dir=<path>`. yargs would
 * read `-Iinclude` as a cluster of short flags. A bare `-I` with no value
 * after it gets an explicit empty value so the empty path is reported; one
 * followed by a separate value is left for yargs.
 */
export function expandIncludeFlags(args: string[]): string[] {
  return args.flatMap((arg, i) => {
    if (arg.startsWith("-I") && arg.length > 2) {
      return [`--include-dir=${arg.slice(2)}`];
    }
    if (arg === "-I") {
      const next = args[i + 1];
      // `--include-dir=` alone parses to an empty array.
      if (next === undefined || next.startsWith("-")) {
        return ["--include-dir", ""];
      }
    }
    return [arg];
  });
}

export function splitEnvPaths(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(path.delimiter).filter(Boolean);
}

export type SearchPathInput = {
  dir: string;
  envValue?: string;
  includeDirs?: string[];
};

export type SearchPathReport = {
  searchPaths: SearchPathSet;
  rejected: string[];
};

/**
 * Search order: the scanned directory, then INCLUDE entries, then -I flags.
 * Duplicates are dropped quietly; anything else that cannot be added is
 * returned in `rejected` so the caller can warn about it.
 */
export function buildSearchPaths(input: SearchPathInput): SearchPathReport {
  const searchPaths = createSearchPathSet();
  const rejected: string[] = [];
  const baseDir = path.resolve(input.dir);

  const candidates = [
    baseDir,
    ...splitEnvPaths(input.envValue),
    ...(input.includeDirs ?? []),
  ];

  for (const candidate of candidates) {
    if (hasSearchPath(searchPaths, candidate, baseDir)) continue;
    if (!addSearchPath(searchPaths, candidate, baseDir)) {
      rejected.push(candidate);
    }
  }

  return { searchPaths, rejected };
}

function toPosixPath(inputPath: string): string {
  return inputPath.split(path.sep).join("/");
}

/**
 * Display label relative to `dir` for paths inside it. Paths outside `dir`
 * and unresolved raw includes are shown as they are.
 */
export function relativeLabel(dir: string): (filePath: string) => string {
  const root = path.resolve(dir);
  return (filePath) => {
    if (!path.isAbsolute(filePath)) return filePath;
    const relative = path.relative(root, filePath);
    const outside =
      relative === ".." || relative.startsWith(`..${path.sep}`);
    if (relative && !outside && !path.isAbsolute(relative)) {
      return toPosixPath(relative);
    }
    return filePath;
  };
}
