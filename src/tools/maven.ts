import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { SbomGenerationError, ToolAcquisitionError } from "../core/errors.js";
import type { MavenConfig } from "../core/config.js";
import type { MavenToolchain, StageContext } from "../app/pipeline/ports.js";

import { SharedInstall, type SharedInstallContext, type SharedInstallOptions } from "./shared-install.js";

// =============================================================================
// TYPES
// =============================================================================

export type MavenToolchainOptions = {
  maven: MavenConfig;
  /** Explicit mvn executable; skips discovery when set. */
  mvnBin?: string;
  /** Download and extraction target, shared across jobs. */
  toolsDir: string;
  tarBin?: string;
  env?: NodeJS.ProcessEnv;
  fetchImpl?: typeof fetch;
  /** Runner, log and time limit for the download shared by concurrent jobs. */
  install?: SharedInstallOptions;
};

// =============================================================================
// HELPERS
// =============================================================================

export function mavenExecutableName(platform: NodeJS.Platform = process.platform): string {
  return platform === "win32" ? "mvn.cmd" : "mvn";
}

export function mavenDistribution(maven: MavenConfig): { archive: string; url: string; dirName: string } {
  const archive = `apache-maven-${maven.version}-bin.tar.gz`;
  const base = maven.base_url.replace(/\/+$/, "");
  return {
    archive,
    url: `${base}/${maven.version}/binaries/${archive}`,
    dirName: `apache-maven-${maven.version}`,
  };
}

export async function findOnPath(
  name: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<string | null> {
  const dirs = (env.PATH ?? "").split(path.delimiter).filter(Boolean);
  for (const dir of dirs) {
    const candidate = path.join(dir, name);
    try {
      await fs.promises.access(candidate, fs.constants.X_OK);
      return candidate;
    } catch {
      continue;
    }
  }
  return null;
}

// =============================================================================
// TOOLCHAIN
// =============================================================================

export class MavenCycloneDxToolchain implements MavenToolchain {
  private readonly download: SharedInstall<string>;

  constructor(private readonly opts: MavenToolchainOptions) {
    this.download = new SharedInstall<string>(opts.install);
  }

  /** Configured executable, else PATH, else a cached download under the tools dir. */
  async acquireBuildTool(ctx: StageContext): Promise<string> {
    if (this.opts.mvnBin) {
      return this.opts.mvnBin;
    }

    const onPath = await findOnPath(mavenExecutableName(), this.opts.env);
    if (onPath) {
      return onPath;
    }

    return this.download.acquire((shared) => this.downloadDistribution(shared), ctx.signal);
  }

  async generateSbom(mvnPath: string, repoPath: string, ctx: StageContext): Promise<string> {
    const fail = (message: string, cause?: unknown) => new SbomGenerationError(message, cause);

    await ctx.run(
      {
        command: mvnPath,
        args: ["-B", `${this.opts.maven.cyclonedx_plugin}:makeAggregateBom`, "-DoutputFormat=json"],
        cwd: repoPath,
        signal: ctx.signal,
      },
      fail,
    );

    const bom = path.join(repoPath, "target", "bom.json");
    if (!(await fse.pathExists(bom))) {
      throw fail(`JSON BOM not found at ${bom}`);
    }
    return bom;
  }

  private async downloadDistribution(shared: SharedInstallContext): Promise<string> {
    const { archive, url, dirName } = mavenDistribution(this.opts.maven);
    const installDir = path.join(this.opts.toolsDir, dirName);
    const mvn = path.join(installDir, "bin", mavenExecutableName());

    if (await fse.pathExists(mvn)) {
      return mvn;
    }

    await fse.ensureDir(this.opts.toolsDir);
    const archivePath = path.join(this.opts.toolsDir, archive);

    if (!(await fse.pathExists(archivePath))) {
      const fetchImpl = this.opts.fetchImpl ?? fetch;
      let response: Response;
      try {
        response = await fetchImpl(url, { signal: shared.signal });
      } catch (err) {
        throw new ToolAcquisitionError(`Failed to download Maven from ${url}`, err);
      }
      if (!response.ok) {
        throw new ToolAcquisitionError(
          `Failed to download Maven from ${url}: HTTP ${response.status}`,
        );
      }

      const partial = `${archivePath}.part`;
      await fse.writeFile(partial, Buffer.from(await response.arrayBuffer()));
      await fse.move(partial, archivePath, { overwrite: true });
    }

    await shared.run(
      {
        command: this.opts.tarBin ?? "tar",
        args: ["-xzf", archivePath, "-C", this.opts.toolsDir],
        cwd: this.opts.toolsDir,
        signal: shared.signal,
      },
      (message, cause) => new ToolAcquisitionError(message, cause),
    );

    if (!(await fse.pathExists(mvn))) {
      throw new ToolAcquisitionError(`Maven archive ${archivePath} did not contain ${mvn}`);
    }
    return mvn;
  }
}
