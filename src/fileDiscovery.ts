import fs from "node:fs";
import path from "node:path";
import micromatch from "micromatch";

export const DEFAULT_ROOT_PATTERNS = ["*.cpp", "*.h"];

export type DiscoveryOptions = {
  dir: string;
  patterns?: string[];
  ignore?: string[];
};

const MM_OPTS = { dot: true } as const;

/**
 * Lists the files directly inside `dir` (no recursion) whose names match one
 * of `patterns` and none of `ignore`. Paths come back absolute and sorted.
 */
export function discoverRootFiles(opts: DiscoveryOptions): string[] {
  const { patterns = DEFAULT_ROOT_PATTERNS, ignore = [] } = opts;
  const dir = path.resolve(opts.dir);

  let names = fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((ent) => ent.isFile())
    .map((ent) => ent.name);

  names = names.filter((name) =>
    patterns.some((p) => micromatch.isMatch(name, p, MM_OPTS)),
  );

  if (ignore.length > 0) {
    names = names.filter(
      (name) => !ignore.some((p) => micromatch.isMatch(name, p, MM_OPTS)),
    );
  }

  return names.sort().map((name) => path.join(dir, name));
}
