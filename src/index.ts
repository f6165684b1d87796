export { scanIncludeTree } from "./scan.js";
export { createCli, runCommand } from "./command.js";
export type { CommandIO } from "./command.js";
export type { ScanResult } from "./scan.js";
export { discoverRootFiles, DEFAULT_ROOT_PATTERNS } from "./fileDiscovery.js";
export { computeGraphStats, renderGraphStats } from "./stats.js";

// Include graph
export {
  addSearchPath,
  createSearchPathSet,
  hasSearchPath,
  resolveInclude,
} from "./deps/include-resolver.js";
export {
  extractIncludes,
  matchInclude,
  readIncludes,
} from "./deps/extract-includes.js";
export { IncludeGraph } from "./deps/graph.js";
export {
  INDENT_TOKEN,
  findIncludeCycles,
  printIncludeForest,
  renderIncludeForest,
} from "./deps/tree.js";
export type { ForestOptions } from "./deps/tree.js";

export type {
  IncludeKind,
  IncludeSpec,
  ResolvedInclude,
  SearchPathSet,
  IncludeEdge,
  FileNode,
  GraphStats,
  ScanOptions,
} from "./types.js";
