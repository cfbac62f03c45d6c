import path from "node:path";

import fse from "fs-extra";

import { DependencyInstallError, SbomGenerationError, ToolAcquisitionError } from "../core/errors.js";
import type { GoToolchain, StageContext, TreeTool } from "../app/pipeline/ports.js";

import { SharedInstall, type SharedInstallContext, type SharedInstallOptions } from "./shared-install.js";

export const UPGRADE_LISTING_FILE = "upgradefile.txt";
export const GO_TREE_FILE = "t.json";
export const GO_SBOM_FILE = "sbom.json";

export type GoToolchainOptions = {
  goBin: string;
  cyclonedxGomodBin: string;
  deptreeModule: string;
  /** GOBIN for the tree tool; shared across jobs. */
  toolsBinDir: string;
  /** Runner, log and time limit for the tree tool install shared by concurrent jobs. */
  install?: SharedInstallOptions;
};

const resolveError = (message: string, cause?: unknown) => new DependencyInstallError(message, cause);

export function deptreeBinary(binDir: string, platform: NodeJS.Platform = process.platform): string {
  return path.join(binDir, platform === "win32" ? "deptree.exe" : "deptree");
}

export class GoModulesToolchain implements GoToolchain {
  private readonly treeToolInstall: SharedInstall<void>;

  constructor(private readonly opts: GoToolchainOptions) {
    this.treeToolInstall = new SharedInstall<void>(opts.install);
  }

  async tidy(repoPath: string, ctx: StageContext): Promise<void> {
    await ctx.run(
      { command: this.opts.goBin, args: ["mod", "tidy"], cwd: repoPath, signal: ctx.signal },
      resolveError,
    );
  }

  async writeUpgradeListing(repoPath: string, ctx: StageContext): Promise<string> {
    const result = await ctx.run(
      {
        command: this.opts.goBin,
        args: ["list", "-u", "-m", "-json", "all"],
        cwd: repoPath,
        signal: ctx.signal,
      },
      resolveError,
    );

    const target = path.join(ctx.jobDir, UPGRADE_LISTING_FILE);
    await fse.writeFile(target, result.stdout, "utf8");
    return target;
  }

  async installTreeTool(ctx: StageContext): Promise<TreeTool> {
    const binary = deptreeBinary(this.opts.toolsBinDir);
    if (await fse.pathExists(binary)) {
      return { path: binary, installed: false };
    }

    await this.treeToolInstall.acquire((shared) => this.goInstallTreeTool(shared), ctx.signal);
    return { path: binary, installed: true };
  }

  async renderDependencyTree(repoPath: string, treeTool: TreeTool, ctx: StageContext): Promise<string> {
    const graph = await ctx.run(
      { command: this.opts.goBin, args: ["mod", "graph"], cwd: repoPath, signal: ctx.signal },
      resolveError,
    );

    const tree = await ctx.run(
      {
        command: treeTool.path,
        args: ["-json"],
        cwd: repoPath,
        input: graph.stdout,
        signal: ctx.signal,
      },
      resolveError,
    );

    const target = path.join(ctx.jobDir, GO_TREE_FILE);
    await fse.writeFile(target, tree.stdout, "utf8");
    return target;
  }

  async generateSbom(repoPath: string, ctx: StageContext): Promise<string> {
    const output = path.join(ctx.jobDir, GO_SBOM_FILE);
    await ctx.run(
      {
        command: this.opts.cyclonedxGomodBin,
        args: ["mod", "-json", "-output", output, "."],
        cwd: repoPath,
        signal: ctx.signal,
      },
      (message, cause) => new SbomGenerationError(message, cause),
    );
    return output;
  }

  private async goInstallTreeTool(shared: SharedInstallContext): Promise<void> {
    await fse.ensureDir(this.opts.toolsBinDir);
    await shared.run(
      {
        command: this.opts.goBin,
        args: ["install", this.opts.deptreeModule],
        cwd: this.opts.toolsBinDir,
        env: { GOBIN: this.opts.toolsBinDir },
        signal: shared.signal,
      },
      (message, cause) => new ToolAcquisitionError(message, cause),
    );
  }
}
