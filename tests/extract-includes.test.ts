import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect } from "vitest";
import {
  extractIncludes,
  matchInclude,
  readIncludes,
} from "../src/deps/extract-includes.js";

describe("matchInclude", () => {
  it("extracts quoted and angle-bracket paths", () => {
    expect(matchInclude('  #include "a.h"  ')).toEqual({
      source: "a.h",
      kind: "local",
    });
    expect(matchInclude("#include <a.h>")).toEqual({
      source: "a.h",
      kind: "system",
    });
    expect(matchInclude('\t#include   "sub/dir/b.hpp" // trailing')).toEqual({
      source: "sub/dir/b.hpp",
      kind: "local",
    });
  });

  it("rejects lines that do not fit the pattern", () => {
    expect(matchInclude('#include"a.h"')).toBeNull();
    expect(matchInclude("#include a.h")).toBeNull();
    expect(matchInclude('#include "a.h>')).toBeNull();
    expect(matchInclude('#include "a<b.h"')).toBeNull();
    expect(matchInclude("#import <a.h>")).toBeNull();
    expect(matchInclude('# include "a.h"')).toBeNull();
  });

  it("is anchored at the line start, so // comments are not matched", () => {
    expect(matchInclude('// #include "a.h"')).toBeNull();
  });
});

describe("extractIncludes", () => {
  it("reports 1-based line numbers in file order", () => {
    const content = [
      "#pragma once",
      '#include "first.h"',
      "",
      "#include <vector>",
      "int x;",
    ].join("\n");

    expect([...extractIncludes(content)]).toEqual([
      { source: "first.h", kind: "local", line: 2 },
      { source: "vector", kind: "system", line: 4 },
    ]);
  });

  it("handles CRLF line endings", () => {
    const content = '#include "a.h"\r\n#include "b.h"\r\n';
    expect([...extractIncludes(content)].map((inc) => inc.line)).toEqual([1, 2]);
  });

  it("still picks up directives inside block comments and #if 0", () => {
    const content = [
      "/*",
      '#include "commented.h"',
      "*/",
      "#if 0",
      '#include "disabled.h"',
      "#endif",
    ].join("\n");

    expect([...extractIncludes(content)].map((inc) => inc.source)).toEqual([
      "commented.h",
      "disabled.h",
    ]);
  });
});

describe("readIncludes", () => {
  it("reads includes from disk", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "include-tree-read-"));
    const file = path.join(dir, "main.cpp");
    fs.writeFileSync(file, '#include "a.h"\nint main() { return 0; }\n');

    expect([...readIncludes(file)]).toEqual([
      { source: "a.h", kind: "local", line: 1 },
    ]);

    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("yields nothing for missing files and directories", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "include-tree-read-"));

    expect([...readIncludes(path.join(dir, "gone.h"))]).toEqual([]);
    expect([...readIncludes(dir)]).toEqual([]);

    fs.rmSync(dir, { recursive: true, force: true });
  });
});
