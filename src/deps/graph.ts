import type { FileNode, IncludeSpec, SearchPathSet } from "../types.js";
import { readIncludes } from "./extract-includes.js";
import { isFile, resolveInclude } from "./include-resolver.js";

type BuildFrame = {
  node: FileNode;
  includes: Iterator<IncludeSpec>;
};

function addEdge(node: FileNode, childPath: string, line: number): void {
  if (node.edges.some((edge) => edge.path === childPath)) return;
  node.edges.push({ path: childPath, line });
}

/**
 * Registry of file nodes keyed by path. Nodes are created on first lookup and
 * edges refer to their targets by path, so cycles and shared headers map onto
 * a single node each.
 */
export class IncludeGraph {
  private readonly registry = new Map<string, FileNode>();

  constructor(private readonly searchPaths: SearchPathSet) {}

  get size(): number {
    return this.registry.size;
  }

  has(filePath: string): boolean {
    return this.registry.has(filePath);
  }

  get(filePath: string): FileNode | undefined {
    return this.registry.get(filePath);
  }

  nodes(): FileNode[] {
    return [...this.registry.values()];
  }

  /**
   * Returns the node for `filePath`, scanning it (and everything it includes)
   * the first time the path is seen. A node is registered before its
   * contents are read, so an include cycle finds the in-progress node instead
   * of scanning it again. Works off an explicit stack rather than recursion.
   */
  buildOrGet(filePath: string): FileNode {
    const existing = this.registry.get(filePath);
    if (existing) return existing;

    const root = this.createNode(filePath, isFile(filePath));
    const stack: BuildFrame[] = [];
    if (root.exists) {
      stack.push({ node: root, includes: readIncludes(root.path) });
    }

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const next = frame.includes.next();
      if (next.done) {
        stack.pop();
        continue;
      }

      const resolved = resolveInclude(this.searchPaths, next.value.source);
      let child = this.registry.get(resolved.path);
      if (!child) {
        child = this.createNode(resolved.path, resolved.found);
        if (child.exists) {
          stack.push({ node: child, includes: readIncludes(child.path) });
        }
      }
      addEdge(frame.node, child.path, next.value.line);
    }

    return root;
  }

  // An unresolved relative include must not be probed against the cwd.
  private createNode(filePath: string, exists: boolean): FileNode {
    const node: FileNode = {
      path: filePath,
      exists,
      edges: [],
    };
    this.registry.set(filePath, node);
    return node;
  }
}
