import type { GoToolchain, TreeTool, VulnerabilityScanner } from "../ports.js";
import { artifact, type PipelineState, type Stage } from "../stages.js";
import { reconcileStage, scanStage } from "./shared.js";

export const GO_SCAN_OUTPUTS = {
  structured: "sbom_trivy_cyclonedx.json",
  flat: "sbom_trivy.json",
  table: "sbom_trivy_table.txt",
} as const;

export type GoState = PipelineState & {
  treeTool: TreeTool | null;
};

export function createGoState(base: PipelineState): GoState {
  return { ...base, treeTool: null };
}

export function goStages(toolchain: GoToolchain, scanner: VulnerabilityScanner): Array<Stage<GoState>> {
  return [
    {
      name: "resolve-modules",
      async run(state, ctx) {
        await toolchain.tidy(state.repoPath, ctx);
      },
    },
    {
      name: "upgrade-listing",
      async run(state, ctx) {
        const listing = await toolchain.writeUpgradeListing(state.repoPath, ctx);
        return {
          artifacts: [artifact("upgrade-listing", listing)],
          resultFiles: { upgrade_listing: listing },
        };
      },
    },
    {
      name: "install-tree-tool",
      async run(state, ctx) {
        const tool = await toolchain.installTreeTool(ctx);
        state.treeTool = tool;
        return {
          artifacts: [artifact("tree-tool", tool.path)],
          ...(tool.installed ? {} : { reason: "already installed" }),
        };
      },
    },
    {
      name: "render-dependency-tree",
      async run(state, ctx) {
        if (!state.treeTool) {
          throw new Error("Dependency tree tool was not installed");
        }
        const tree = await toolchain.renderDependencyTree(state.repoPath, state.treeTool, ctx);
        return { artifacts: [artifact("dependency-tree", tree)], resultFiles: { deps_file: tree } };
      },
    },
    {
      name: "generate-sbom",
      async run(state, ctx) {
        const sbom = await toolchain.generateSbom(state.repoPath, ctx);
        return { artifacts: [artifact("sbom", sbom)], resultFiles: { sbom } };
      },
    },
    scanStage(scanner, GO_SCAN_OUTPUTS),
    reconcileStage("sbom"),
  ];
}
