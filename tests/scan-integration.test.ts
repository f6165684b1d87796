import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect } from "vitest";
import { scanIncludeTree } from "../src/scan.js";
import { buildSearchPaths, relativeLabel } from "../src/cli-args.js";
import { renderIncludeForest } from "../src/deps/tree.js";

function createTempProject(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "include-tree-scan-"));
  fs.mkdirSync(path.join(dir, "include", "lib"), { recursive: true });
  fs.mkdirSync(path.join(dir, "third_party"), { recursive: true });

  fs.writeFileSync(
    path.join(dir, "main.cpp"),
    [
      "#include <vector>",
      '#include "app.h"',
      '#include "lib/util.h"',
      "",
      "int main() { return 0; }",
    ].join("\n"),
  );
  fs.writeFileSync(
    path.join(dir, "app.h"),
    ['#pragma once', '#include "lib/util.h"', '#include "config.h"'].join("\n"),
  );
  fs.writeFileSync(
    path.join(dir, "include", "lib", "util.h"),
    '#include "config.h"\n',
  );
  fs.writeFileSync(path.join(dir, "third_party", "config.h"), "");
  fs.writeFileSync(path.join(dir, "notes.txt"), '#include "app.h"\n');

  return dir;
}

describe("scanIncludeTree", () => {
  it("builds and renders the forest for a source directory", () => {
    const dir = createTempProject();
    const { searchPaths, rejected } = buildSearchPaths({
      dir,
      includeDirs: ["include", "third_party"],
    });
    expect(rejected).toEqual([]);

    const result = scanIncludeTree({ dir, searchPaths });
    expect(result.roots.map((root) => root.path)).toEqual([
      path.join(dir, "app.h"),
      path.join(dir, "main.cpp"),
    ]);

    expect(
      renderIncludeForest(result.graph, result.roots, {
        label: relativeLabel(dir),
      }),
    ).toEqual([
      "app.h",
      "| [2]: include/lib/util.h",
      "| | [1]: third_party/config.h",
      "| [3]: third_party/config.h",
      "main.cpp",
      "| [1]: vector (unresolved)",
      "| [2]: app.h (see above)",
      "| [3]: include/lib/util.h (see above)",
    ]);

    fs.rmSync(dir, { recursive: true, force: true });
  });
});
