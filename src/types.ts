export type IncludeKind = "local" | "system";

export type IncludeSpec = {
  source: string;
  kind: IncludeKind;
  line: number;
};

export type ResolvedInclude = {
  path: string;
  found: boolean;
};

export type SearchPathSet = {
  readonly dirs: string[];
};

export type IncludeEdge = {
  path: string;
  line: number;
};

export type FileNode = {
  path: string;
  exists: boolean;
  edges: IncludeEdge[];
};

export type GraphStats = {
  totalFiles: number;
  resolvedFiles: number;
  unresolvedFiles: number;
  totalEdges: number;
  maxFanOut: number;
};

export type ScanOptions = {
  dir: string;
  patterns?: string[];
  ignore?: string[];
  searchPaths: SearchPathSet;
};
