import type { GraphStats } from "./types.js";
import type { IncludeGraph } from "./deps/graph.js";

export function computeGraphStats(graph: IncludeGraph): GraphStats {
  let resolvedFiles = 0;
  let totalEdges = 0;
  let maxFanOut = 0;

  for (const node of graph.nodes()) {
    if (node.exists) resolvedFiles++;
    totalEdges += node.edges.length;
    maxFanOut = Math.max(maxFanOut, node.edges.length);
  }

  return {
    totalFiles: graph.size,
    resolvedFiles,
    unresolvedFiles: graph.size - resolvedFiles,
    totalEdges,
    maxFanOut,
  };
}

export function renderGraphStats(stats: GraphStats): string {
  const lines = [
    "Stats:",
    `  - files: ${stats.totalFiles}`,
    `  - resolved: ${stats.resolvedFiles}`,
    `  - unresolved: ${stats.unresolvedFiles}`,
    `  - includes: ${stats.totalEdges}`,
    `  - max fan-out: ${stats.maxFanOut}`,
  ];
  return lines.join("\n");
}
