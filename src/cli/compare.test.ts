import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { compareCommand } from "./compare.js";

const TREE = JSON.stringify({
  packages: [{ name: "app@1.0.0", children: ["lib@2.0.0"] }],
});

const SBOM = JSON.stringify({
  bomFormat: "CycloneDX",
  components: [
    { name: "lib", version: "2.0.0" },
    { name: "extra", version: "0.1.0" },
  ],
});

describe("compareCommand", () => {
  let dir: string;
  let logs: string[];
  let errors: string[];

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "compare-cli-"));
    logs = [];
    errors = [];
    vi.spyOn(console, "log").mockImplementation((line: unknown) => {
      logs.push(String(line));
    });
    vi.spyOn(console, "error").mockImplementation((line: unknown) => {
      errors.push(String(line));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const writeInput = (name: string, content: string): string => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content, "utf8");
    return file;
  };

  it("prints the four comparison sections", async () => {
    const code = await compareCommand({ tree: writeInput("tree.json", TREE), sbom: writeInput("sbom.json", SBOM) });

    expect(code).toBe(0);
    expect(logs).toEqual([
      [
        "=== Dependencies missing in SBOM ===",
        "app@1.0.0",
        "",
        "=== Version mismatches ===",
        "None",
        "",
        "=== Dependencies same in both ===",
        "lib@2.0.0",
        "",
        "=== Extra dependencies in SBOM ===",
        "extra@0.1.0",
        "",
      ].join("\n"),
    ]);
  });

  it("prints JSON with the recorded version conflicts", async () => {
    const tree = writeInput(
      "tree.json",
      JSON.stringify({ packages: [{ name: "app@1.0.0", children: ["lib@1.0.0", "lib@2.0.0"] }] }),
    );

    const code = await compareCommand({ tree, sbom: writeInput("sbom.json", SBOM), json: true });

    expect(code).toBe(0);
    const printed = JSON.parse(logs[0] ?? "null");
    expect(printed.conflicts).toEqual([{ name: "lib", versions: ["1.0.0", "2.0.0"] }]);
    expect(printed.result.same).toEqual([{ name: "lib", version: "2.0.0" }]);
  });

  it("warns about conflicting tree versions in text mode", async () => {
    const tree = writeInput(
      "tree.json",
      JSON.stringify({ packages: [{ name: "lib@1.0.0" }, { name: "lib@2.0.0" }] }),
    );

    await compareCommand({ tree, sbom: writeInput("sbom.json", SBOM) });

    expect(logs.at(-1)).toBe("Warning: lib appears at versions 1.0.0, 2.0.0");
  });

  it("exits with 2 for an empty input", async () => {
    const sbom = writeInput("sbom.json", "  \n");

    const code = await compareCommand({ tree: writeInput("tree.json", TREE), sbom });

    expect(code).toBe(2);
    expect(errors[0]).toContain(`SBOM ${sbom} is empty`);
  });

  it("exits with 3 for a malformed input", async () => {
    const tree = writeInput("tree.json", "resolver failed before printing anything");

    const code = await compareCommand({ tree, sbom: writeInput("sbom.json", SBOM) });

    expect(code).toBe(3);
    expect(errors[0]).toContain(`No JSON object found in Dependency tree ${tree}`);
    expect(logs).toEqual([]);
  });
});
