import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import {
  loadDependencyTree,
  loadSbomComponents,
  normalizePipTree,
  normalizePipTreeFile,
  parseDependencyTree,
  parseSbomComponents,
} from "./dependency-sets.js";
import { EmptyInputError, MalformedInputError } from "./errors.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "bomkeeper-deps-"));
  tempDirs.push(dir);
  return dir;
}

describe("parseDependencyTree", () => {
  it("fails with EmptyInput on an empty file rather than MalformedInput", async () => {
    const dir = makeTempDir();
    const file = path.join(dir, "t.json");
    fs.writeFileSync(file, "");

    const error = await loadDependencyTree(file).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(EmptyInputError);
    expect(error).not.toBeInstanceOf(MalformedInputError);
  });

  it("skips log noise ahead of the document", () => {
    const parsed = parseDependencyTree('INFO: starting\n{"packages":[]}');

    expect(parsed.dependencies.size).toBe(0);
    expect(parsed.conflicts).toEqual([]);
  });

  it("fails with MalformedInput when no object is present", () => {
    expect(() => parseDependencyTree("just some log output")).toThrow(MalformedInputError);
  });

  it("fails with MalformedInput when the remainder is not JSON", () => {
    expect(() => parseDependencyTree('{"packages": [')).toThrow(MalformedInputError);
  });

  it("fails with MalformedInput when the packages key is missing", () => {
    expect(() => parseDependencyTree('{"modules": []}')).toThrow(
      'Unexpected format in dependency tree, expected an object with a "packages" list',
    );
  });

  it("splits identifiers at the last @", () => {
    const parsed = parseDependencyTree(
      '{"packages":[{"name":"@scope/pkg@1.2.3","children":["github.com/a/b@v0.1.0","noversion"]}]}',
    );

    expect(Object.fromEntries(parsed.dependencies)).toEqual({
      "@scope/pkg": "1.2.3",
      "github.com/a/b": "v0.1.0",
    });
  });

  it("keeps the last version of a duplicated name and reports the conflict", () => {
    const parsed = parseDependencyTree(
      JSON.stringify({
        packages: [
          { name: "app@1.0", children: ["lib@1.0", "util@2.0"] },
          { name: "other@1.0", children: ["lib@1.1", "util@2.0"] },
        ],
      }),
    );

    expect(parsed.dependencies.get("lib")).toBe("1.1");
    expect(parsed.dependencies.get("util")).toBe("2.0");
    expect(parsed.conflicts).toEqual([{ name: "lib", versions: ["1.0", "1.1"] }]);
  });

  it("accepts packages without children", () => {
    const parsed = parseDependencyTree('{"packages":[{"name":"solo@0.1"}]}');
    expect(Object.fromEntries(parsed.dependencies)).toEqual({ solo: "0.1" });
  });
});

describe("parseSbomComponents", () => {
  it("skips components missing a name or a version", () => {
    const sbom = parseSbomComponents(
      JSON.stringify({
        bomFormat: "CycloneDX",
        components: [
          { name: "kept", version: "1.0" },
          { name: "no-version" },
          { version: "2.0" },
          { name: "", version: "3.0" },
        ],
      }),
    );

    expect(Object.fromEntries(sbom)).toEqual({ kept: "1.0" });
  });

  it("treats a document without components as an empty set", () => {
    expect(parseSbomComponents('{"bomFormat":"CycloneDX"}').size).toBe(0);
  });

  it("distinguishes empty from malformed input", async () => {
    const dir = makeTempDir();
    const empty = path.join(dir, "empty.json");
    const broken = path.join(dir, "broken.json");
    fs.writeFileSync(empty, "   \n");
    fs.writeFileSync(broken, "not json");

    await expect(loadSbomComponents(empty)).rejects.toBeInstanceOf(EmptyInputError);
    await expect(loadSbomComponents(broken)).rejects.toBeInstanceOf(MalformedInputError);
  });

  it("rejects a components value that is not a list", () => {
    expect(() => parseSbomComponents('{"components": {"name": "x"}}')).toThrow(MalformedInputError);
  });
});

describe("normalizePipTree", () => {
  const pipTree = JSON.stringify([
    {
      key: "requests",
      package_name: "requests",
      installed_version: "2.31.0",
      dependencies: [
        {
          key: "urllib3",
          package_name: "urllib3",
          installed_version: "2.0.7",
          dependencies: [],
        },
        {
          key: "idna",
          package_name: "idna",
          installed_version: "3.4",
          dependencies: [],
        },
      ],
    },
  ]);

  it("flattens every node into a package entry", () => {
    expect(normalizePipTree(pipTree)).toEqual({
      packages: [
        { name: "requests@2.31.0", children: ["urllib3@2.0.7", "idna@3.4"] },
        { name: "urllib3@2.0.7", children: [] },
        { name: "idna@3.4", children: [] },
      ],
    });
  });

  it("writes a document the tree loader accepts", async () => {
    const dir = makeTempDir();
    const input = path.join(dir, "dets.json");
    const output = path.join(dir, "normalized_deps.json");
    fs.writeFileSync(input, pipTree);

    await normalizePipTreeFile(input, output);
    const parsed = await loadDependencyTree(output);

    expect(Object.fromEntries(parsed.dependencies)).toEqual({
      requests: "2.31.0",
      urllib3: "2.0.7",
      idna: "3.4",
    });
  });

  it("rejects a document that is not a list of nodes", () => {
    expect(() => normalizePipTree('{"packages": []}')).toThrow(MalformedInputError);
  });
});
