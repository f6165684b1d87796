import type { FileNode } from "../types.js";
import type { IncludeGraph } from "./graph.js";

export const INDENT_TOKEN = "| ";

export type ForestOptions = {
  label?: (filePath: string) => string;
};

type PrintFrame = {
  node: FileNode;
  depth: number;
  next: number;
};

function indent(content: string, depth: number): string {
  return `${INDENT_TOKEN.repeat(depth)}${content}`;
}

function lookup(graph: IncludeGraph, filePath: string): FileNode {
  const node = graph.get(filePath);
  if (!node) {
    throw new Error(`Include graph has no node for ${filePath}`);
  }
  return node;
}

/**
 * Renders one tree per root. Visited paths are shared across the whole
 * forest: a node already printed with children shows up again as
 * "(see above)" instead of being expanded twice. Leaves are always reprinted.
 */
export function renderIncludeForest(
  graph: IncludeGraph,
  roots: FileNode[],
  options: ForestOptions = {},
): string[] {
  const label = options.label ?? ((filePath: string) => filePath);
  const lines: string[] = [];
  const visited = new Set<string>();

  for (const root of roots) {
    visited.add(root.path);
    lines.push(indent(label(root.path), 0));

    const stack: PrintFrame[] = [{ node: root, depth: 1, next: 0 }];
    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame.next >= frame.node.edges.length) {
        stack.pop();
        continue;
      }

      const edge = frame.node.edges[frame.next++];
      const child = lookup(graph, edge.path);
      const text = `[${edge.line}]: ${label(child.path)}`;

      if (visited.has(child.path) && child.edges.length > 0) {
        lines.push(indent(`${text} (see above)`, frame.depth));
        continue;
      }

      visited.add(child.path);
      if (!child.exists) {
        lines.push(indent(`${text} (unresolved)`, frame.depth));
        continue;
      }
      lines.push(indent(text, frame.depth));
      stack.push({ node: child, depth: frame.depth + 1, next: 0 });
    }
  }

  return lines;
}

export function printIncludeForest(
  graph: IncludeGraph,
  roots: FileNode[],
  write: (line: string) => void = console.log,
  options: ForestOptions = {},
): void {
  for (const line of renderIncludeForest(graph, roots, options)) {
    write(line);
  }
}

function canonicalizeCycle(nodes: string[]): string {
  if (nodes.length === 0) return "";
  let minIndex = 0;
  for (let i = 1; i < nodes.length; i += 1) {
    if (nodes[i] < nodes[minIndex]) minIndex = i;
  }
  const rotated = nodes.slice(minIndex).concat(nodes.slice(0, minIndex));
  return rotated.join(" -> ");
}

export function findIncludeCycles(graph: IncludeGraph): string[][] {
  const visited = new Set<string>();
  const stack: string[] = [];
  const onStack = new Set<string>();
  const cycles: string[][] = [];
  const seen = new Set<string>();

  const visit = (start: FileNode) => {
    const frames: { node: FileNode; next: number }[] = [];
    const enter = (node: FileNode) => {
      visited.add(node.path);
      stack.push(node.path);
      onStack.add(node.path);
      frames.push({ node, next: 0 });
    };

    enter(start);
    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      if (frame.next >= frame.node.edges.length) {
        frames.pop();
        stack.pop();
        onStack.delete(frame.node.path);
        continue;
      }

      const dep = frame.node.edges[frame.next++].path;
      if (!visited.has(dep)) {
        enter(lookup(graph, dep));
        continue;
      }
      if (onStack.has(dep)) {
        const idx = stack.indexOf(dep);
        const cycle = stack.slice(idx).concat(dep);
        const key = canonicalizeCycle(cycle.slice(0, -1));
        if (!seen.has(key)) {
          seen.add(key);
          cycles.push(cycle);
        }
      }
    }
  };

  for (const node of graph.nodes()) {
    if (!visited.has(node.path)) visit(node);
  }

  return cycles;
}
