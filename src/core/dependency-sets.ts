/*
Purpose: load the two dependency views (resolver tree, SBOM component list) into name -> version maps.
Assumptions: identifiers in the tree are `name@version`; the version is whatever follows the last `@`.
Usage: loadDependencyTree(file) / loadSbomComponents(file), or the parse* variants on raw text.
*/

import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import { EmptyInputError, MalformedInputError } from "./errors.js";
import { formatZodIssues } from "./error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type NormalizedDependencySet = Map<string, string>;

export type VersionConflict = {
  name: string;
  versions: string[];
};

export type DependencyTreeParse = {
  dependencies: NormalizedDependencySet;
  conflicts: VersionConflict[];
};

const TreePackageSchema = z.object({
  name: z.string().optional(),
  children: z.array(z.string()).default([]),
});

const DependencyTreeSchema = z.object({
  packages: z.array(TreePackageSchema),
});

export type DependencyTreeDocument = z.input<typeof DependencyTreeSchema>;

const SbomComponentSchema = z
  .object({
    name: z.unknown().optional(),
    version: z.unknown().optional(),
  })
  .passthrough();

const SbomDocumentSchema = z
  .object({
    components: z.array(SbomComponentSchema).default([]),
  })
  .passthrough();

// pipdeptree --json-tree output; nodes nest through `dependencies`.
export type PipTreeNode = {
  package_name: string;
  installed_version: string;
  dependencies: PipTreeNode[];
};

const PipTreeNodeSchema: z.ZodType<PipTreeNode, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    package_name: z.string(),
    installed_version: z.string(),
    dependencies: z.array(PipTreeNodeSchema).default([]),
  }),
);

const PipTreeSchema = z.array(PipTreeNodeSchema);

// =============================================================================
// TREE SOURCE
// =============================================================================

/**
 * Parses resolver output. Log lines ahead of the document are dropped by
 * starting at the first `{`. Every package and every child contributes a
 * pair; a later occurrence of a name replaces the earlier version.
 */
export function parseDependencyTree(content: string, source = "dependency tree"): DependencyTreeParse {
  const trimmed = content.trim();
  if (trimmed.length === 0) {
    throw new EmptyInputError(source);
  }

  const start = trimmed.indexOf("{");
  if (start === -1) {
    throw new MalformedInputError(`No JSON object found in ${source}`);
  }

  const doc = parseJson(trimmed.slice(start), source);
  if (!doc || typeof doc !== "object" || Array.isArray(doc) || !("packages" in doc)) {
    throw new MalformedInputError(
      `Unexpected format in ${source}, expected an object with a "packages" list`,
    );
  }

  const parsed = DependencyTreeSchema.safeParse(doc);
  if (!parsed.success) {
    throw new MalformedInputError(
      `Unexpected format in ${source}:\n${formatZodIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }

  const dependencies: NormalizedDependencySet = new Map();
  const seen = new Map<string, Set<string>>();

  const record = (identifier: string): void => {
    const split = splitIdentifier(identifier);
    if (!split) return;

    dependencies.set(split.name, split.version);
    const versions = seen.get(split.name) ?? new Set<string>();
    versions.add(split.version);
    seen.set(split.name, versions);
  };

  for (const pkg of parsed.data.packages) {
    if (pkg.name) record(pkg.name);
    for (const child of pkg.children) record(child);
  }

  const conflicts: VersionConflict[] = [];
  for (const [name, versions] of seen) {
    if (versions.size > 1) {
      conflicts.push({ name, versions: [...versions] });
    }
  }

  return { dependencies, conflicts };
}

// =============================================================================
// FLAT SOURCE
// =============================================================================

/** Components without both a name and a version are skipped. */
export function parseSbomComponents(content: string, source = "SBOM"): NormalizedDependencySet {
  const trimmed = content.trim();
  if (trimmed.length === 0) {
    throw new EmptyInputError(source);
  }

  const doc = parseJson(trimmed, source);
  const parsed = SbomDocumentSchema.safeParse(doc);
  if (!parsed.success) {
    throw new MalformedInputError(
      `Unexpected format in ${source}:\n${formatZodIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }

  const dependencies: NormalizedDependencySet = new Map();
  for (const component of parsed.data.components) {
    const { name, version } = component;
    if (typeof name === "string" && name && typeof version === "string" && version) {
      dependencies.set(name, version);
    }
  }

  return dependencies;
}

// =============================================================================
// FILE LOADERS
// =============================================================================

export async function loadDependencyTree(filePath: string): Promise<DependencyTreeParse> {
  const content = await readInput(filePath);
  return parseDependencyTree(content, `Dependency tree ${filePath}`);
}

export async function loadSbomComponents(filePath: string): Promise<NormalizedDependencySet> {
  const content = await readInput(filePath);
  return parseSbomComponents(content, `SBOM ${filePath}`);
}

// =============================================================================
// PIP TREE NORMALIZATION
// =============================================================================

/**
 * Flattens a pipdeptree JSON tree into the resolver-tree document shape.
 * Each node, at any depth, becomes one package entry listing its direct children.
 */
export function normalizePipTree(content: string, source = "pip dependency tree"): DependencyTreeDocument {
  const trimmed = content.trim();
  if (trimmed.length === 0) {
    throw new EmptyInputError(source);
  }

  const parsed = PipTreeSchema.safeParse(parseJson(trimmed, source));
  if (!parsed.success) {
    throw new MalformedInputError(
      `Unexpected format in ${source}:\n${formatZodIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }

  const packages: DependencyTreeDocument["packages"] = [];
  const visit = (node: PipTreeNode): void => {
    packages.push({
      name: pipIdentifier(node),
      children: node.dependencies.map(pipIdentifier),
    });
    node.dependencies.forEach(visit);
  };
  parsed.data.forEach(visit);

  return { packages };
}

export async function normalizePipTreeFile(inputPath: string, outputPath: string): Promise<string> {
  const content = await readInput(inputPath);
  const doc = normalizePipTree(content, `pip dependency tree ${inputPath}`);
  await fse.ensureDir(path.dirname(outputPath));
  await fse.writeFile(outputPath, JSON.stringify(doc, null, 2) + "\n", "utf8");
  return outputPath;
}

// =============================================================================
// INTERNALS
// =============================================================================

function splitIdentifier(identifier: string): { name: string; version: string } | null {
  const at = identifier.lastIndexOf("@");
  if (at === -1) return null;
  return { name: identifier.slice(0, at), version: identifier.slice(at + 1) };
}

function pipIdentifier(node: PipTreeNode): string {
  return `${node.package_name}@${node.installed_version}`;
}

function parseJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new MalformedInputError(`Invalid JSON in ${source}: ${detail}`, err);
  }
}

async function readInput(filePath: string): Promise<string> {
  return fse.readFile(filePath, "utf8");
}
