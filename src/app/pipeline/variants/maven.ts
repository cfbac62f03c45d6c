import path from "node:path";

import fse from "fs-extra";

import type { MavenToolchain, VulnerabilityScanner } from "../ports.js";
import { artifact, type PipelineState, type Stage } from "../stages.js";
import { GO_SCAN_OUTPUTS } from "./go.js";
import { scanStage } from "./shared.js";

export const MAVEN_SBOM_FILE = "sbom.json";
export const MAVEN_SCAN_OUTPUTS = GO_SCAN_OUTPUTS;

export type MavenState = PipelineState & {
  mvnPath: string | null;
  buildSbom: string | null;
};

export function createMavenState(base: PipelineState): MavenState {
  return {
    ...base,
    mvnPath: null,
    buildSbom: null,
    // The build plugin emits no tree view to compare against.
    reconciliation: { status: "unavailable", reason: "no dependency tree for maven projects" },
  };
}

export function mavenStages(
  toolchain: MavenToolchain,
  scanner: VulnerabilityScanner,
): Array<Stage<MavenState>> {
  return [
    {
      name: "acquire-build-tool",
      async run(state, ctx) {
        state.mvnPath = await toolchain.acquireBuildTool(ctx);
        return { artifacts: [artifact("build-tool", state.mvnPath)] };
      },
    },
    {
      name: "generate-sbom",
      async run(state, ctx) {
        if (!state.mvnPath) {
          throw new Error("Maven was not acquired");
        }
        state.buildSbom = await toolchain.generateSbom(state.mvnPath, state.repoPath, ctx);
      },
    },
    {
      name: "copy-sbom",
      async run(state, ctx) {
        if (!state.buildSbom) {
          throw new Error("Maven build produced no SBOM");
        }
        const sbom = path.join(ctx.jobDir, MAVEN_SBOM_FILE);
        await fse.copy(state.buildSbom, sbom, { overwrite: true });
        return { artifacts: [artifact("sbom", sbom)], resultFiles: { sbom } };
      },
    },
    scanStage(scanner, MAVEN_SCAN_OUTPUTS),
  ];
}
