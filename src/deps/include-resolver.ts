import fs from "node:fs";
import path from "node:path";
import type { ResolvedInclude, SearchPathSet } from "../types.js";

export function createSearchPathSet(): SearchPathSet {
  return { dirs: [] };
}

function normalizeIncludePath(value: string): string {
  return value.replace(/[\\/]/g, path.sep);
}

function statPath(target: string): fs.Stats | undefined {
  try {
    return fs.statSync(target, { throwIfNoEntry: false });
  } catch {
    // ENOTDIR, EACCES and friends: treat as missing.
    return undefined;
  }
}

export function isFile(filePath: string): boolean {
  return statPath(filePath)?.isFile() ?? false;
}

function isDirectory(dirPath: string): boolean {
  return statPath(dirPath)?.isDirectory() ?? false;
}

export function hasSearchPath(
  set: SearchPathSet,
  dir: string,
  baseDir: string = process.cwd(),
): boolean {
  if (!dir) return false;
  return set.dirs.includes(path.resolve(baseDir, normalizeIncludePath(dir)));
}

/**
 * Registers `dir` as a search path. Relative paths are taken against
 * `baseDir`. Returns false when the path is empty, not an existing directory
 * or already registered.
 */
export function addSearchPath(
  set: SearchPathSet,
  dir: string,
  baseDir: string = process.cwd(),
): boolean {
  if (!dir) return false;

  const absolute = path.resolve(baseDir, normalizeIncludePath(dir));
  if (!isDirectory(absolute)) return false;
  if (set.dirs.includes(absolute)) return false;

  set.dirs.push(absolute);
  return true;
}

export function resolveInclude(
  set: SearchPathSet,
  source: string,
): ResolvedInclude {
  if (!source) return { path: source, found: false };

  const normalized = normalizeIncludePath(source);
  if (path.isAbsolute(normalized)) {
    return { path: normalized, found: isFile(normalized) };
  }

  for (const dir of set.dirs) {
    const candidate = path.join(dir, normalized);
    if (isFile(candidate)) return { path: candidate, found: true };
  }

  return { path: source, found: false };
}
