import fs from "node:fs";
import type { IncludeSpec } from "../types.js";

// Anchored at line start: no comment or #if awareness.
const INCLUDE_RE = /^\s*#include\s+(?:"([^"<>]+)"|<([^"<>]+)>)/;

export function matchInclude(line: string): Omit<IncludeSpec, "line"> | null {
  const match = line.match(INCLUDE_RE);
  if (!match) return null;
  if (match[1] !== undefined) {
    return { source: match[1], kind: "local" };
  }
  if (match[2] !== undefined) {
    return { source: match[2], kind: "system" };
  }
  return null;
}

export function* extractIncludes(content: string): Generator<IncludeSpec> {
  const lines = content.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const include = matchInclude(lines[i]);
    if (!include) continue;
    yield { ...include, line: i + 1 };
  }
}

/**
 * Reads `filePath` and yields its include directives. A file that cannot be
 * read yields nothing.
 */
export function* readIncludes(filePath: string): Generator<IncludeSpec> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch {
    return;
  }
  yield* extractIncludes(content);
}
