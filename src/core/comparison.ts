import type { VersionConflict } from "./dependency-sets.js";
import { loadDependencyTree, loadSbomComponents } from "./dependency-sets.js";
import {
  formatEntry,
  formatMismatch,
  reconcile,
  type ReconciliationResult,
} from "./reconcile.js";
import { writeTextFile } from "./utils.js";

export type DependencyComparison = {
  result: ReconciliationResult;
  conflicts: VersionConflict[];
};

const SECTIONS: Array<{ title: string; lines: (result: ReconciliationResult) => string[] }> = [
  {
    title: "Dependencies missing in SBOM",
    lines: (result) => result.missing_in_b.map(formatEntry),
  },
  {
    title: "Version mismatches",
    lines: (result) => result.version_mismatch.map(formatMismatch),
  },
  {
    title: "Dependencies same in both",
    lines: (result) => result.same.map(formatEntry),
  },
  {
    title: "Extra dependencies in SBOM",
    lines: (result) => result.extra_in_b.map(formatEntry),
  },
];

export function renderComparison(result: ReconciliationResult): string {
  return SECTIONS.map(({ title, lines }) => {
    const body = lines(result);
    return `=== ${title} ===\n${body.length > 0 ? body.join("\n") : "None"}\n`;
  }).join("\n");
}

export async function compareDependencyFiles(
  treePath: string,
  sbomPath: string,
): Promise<DependencyComparison> {
  const tree = await loadDependencyTree(treePath);
  const sbom = await loadSbomComponents(sbomPath);
  return { result: reconcile(tree.dependencies, sbom), conflicts: tree.conflicts };
}

export async function writeComparison(outputPath: string, result: ReconciliationResult): Promise<void> {
  await writeTextFile(outputPath, renderComparison(result));
}
