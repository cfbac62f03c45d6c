import path from "node:path";

import fse from "fs-extra";

import { normalizePipTreeFile } from "../../../core/dependency-sets.js";
import type { PipelineArtifact } from "../../../core/report.js";
import type { PythonEnvironment, PythonToolchain, VulnerabilityScanner } from "../ports.js";
import { artifact, type PipelineState, type Stage } from "../stages.js";
import { reconcileStage, scanStage } from "./shared.js";

export const NORMALIZED_TREE_FILE = "normalized_deps.json";

export const PYTHON_SCAN_OUTPUTS = {
  structured: "sbom_p.json",
  flat: "trivy_report.json",
  table: "table_trivy.txt",
} as const;

export type PythonState = PipelineState & {
  env: PythonEnvironment | null;
  resolvedFile: string | null;
  treeFile: string | null;
};

export function createPythonState(base: PipelineState): PythonState {
  return { ...base, env: null, resolvedFile: null, treeFile: null };
}

export function pythonStages(
  toolchain: PythonToolchain,
  scanner: VulnerabilityScanner,
): Array<Stage<PythonState>> {
  return [
    {
      name: "isolate-environment",
      async run(state, ctx) {
        state.env = await toolchain.prepareEnvironment(state.repoPath, ctx);
        return { artifacts: [artifact("environment", state.env.envDir)] };
      },
    },
    {
      name: "install-dependencies",
      async run(state, ctx) {
        const env = requireEnvironment(state);
        const outputs = await toolchain.installDeclaredDependencies(env, state.repoPath, ctx);
        state.resolvedFile = outputs.resolvedFile;
        state.treeFile = outputs.treeFile;

        const artifacts: PipelineArtifact[] = [];
        if (outputs.resolvedFile) artifacts.push(artifact("resolved-dependencies", outputs.resolvedFile));
        if (outputs.treeFile) artifacts.push(artifact("dependency-manifest", outputs.treeFile));
        return { artifacts };
      },
    },
    {
      name: "normalize-manifest",
      async skipReason(state) {
        if (!state.treeFile || !(await fse.pathExists(state.treeFile))) {
          return "no dependency manifest";
        }
        return null;
      },
      async run(state, ctx) {
        if (!state.treeFile) return { skipped: true, reason: "no dependency manifest" };
        const output = await normalizePipTreeFile(
          state.treeFile,
          path.join(ctx.jobDir, NORMALIZED_TREE_FILE),
        );
        return {
          artifacts: [artifact("dependency-tree", output)],
          resultFiles: { normalized_deps: output },
        };
      },
    },
    {
      name: "generate-sbom",
      async skipReason(state) {
        if (!state.resolvedFile || !(await fse.pathExists(state.resolvedFile))) {
          return "no resolved dependency file";
        }
        return null;
      },
      async run(state, ctx) {
        if (!state.resolvedFile) return { skipped: true, reason: "no resolved dependency file" };
        const sbom = await toolchain.generateSbom(requireEnvironment(state), state.resolvedFile, ctx);
        return { artifacts: [artifact("sbom", sbom)], resultFiles: { sbom } };
      },
    },
    scanStage(scanner, PYTHON_SCAN_OUTPUTS),
    // Scanner's CycloneDX output is the SBOM view compared against the tree.
    reconcileStage("sbom-cyclonedx"),
  ];
}

function requireEnvironment(state: PythonState): PythonEnvironment {
  if (!state.env) {
    throw new Error("Python environment was not prepared");
  }
  return state.env;
}
