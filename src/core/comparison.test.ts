import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { compareDependencyFiles, renderComparison, writeComparison } from "./comparison.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("renderComparison", () => {
  it("prints None for empty sections", () => {
    const text = renderComparison({
      missing_in_b: [{ name: "pkgB", version: "2.0" }],
      version_mismatch: [{ name: "lib", tree_version: "1.0", sbom_version: "1.1" }],
      same: [],
      extra_in_b: [],
    });

    expect(text).toBe(
      [
        "=== Dependencies missing in SBOM ===",
        "pkgB@2.0",
        "",
        "=== Version mismatches ===",
        "lib (tree: 1.0, sbom: 1.1)",
        "",
        "=== Dependencies same in both ===",
        "None",
        "",
        "=== Extra dependencies in SBOM ===",
        "None",
        "",
      ].join("\n"),
    );
  });
});

describe("compareDependencyFiles", () => {
  it("loads both files and reconciles them", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "bomkeeper-compare-"));
    tempDirs.push(dir);
    const tree = path.join(dir, "t.json");
    const sbom = path.join(dir, "sbom.json");
    fs.writeFileSync(tree, 'go: downloading\n{"packages":[{"name":"m@v1","children":["dep@v2","dep@v3"]}]}');
    fs.writeFileSync(sbom, '{"components":[{"name":"m","version":"v1"},{"name":"dep","version":"v3"}]}');

    const comparison = await compareDependencyFiles(tree, sbom);

    expect(comparison.result.same).toEqual([
      { name: "m", version: "v1" },
      { name: "dep", version: "v3" },
    ]);
    expect(comparison.conflicts).toEqual([{ name: "dep", versions: ["v2", "v3"] }]);

    const output = path.join(dir, "out", "comparison.txt");
    await writeComparison(output, comparison.result);
    expect(fs.readFileSync(output, "utf8")).toContain("=== Dependencies same in both ===\nm@v1\ndep@v3\n");
  });
});
