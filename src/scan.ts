import path from "node:path";
import { discoverRootFiles } from "./fileDiscovery.js";
import { IncludeGraph } from "./deps/graph.js";
import type { FileNode, ScanOptions } from "./types.js";

export type ScanResult = {
  dir: string;
  roots: FileNode[];
  graph: IncludeGraph;
};

export function scanIncludeTree(opts: ScanOptions): ScanResult {
  const dir = path.resolve(opts.dir);
  const files = discoverRootFiles({
    dir,
    patterns: opts.patterns,
    ignore: opts.ignore,
  });

  const graph = new IncludeGraph(opts.searchPaths);
  const roots = files.map((file) => graph.buildOrGet(file));

  return { dir, roots, graph };
}
