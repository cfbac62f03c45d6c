import path from "node:path";

import fse from "fs-extra";

import { DependencyInstallError, SbomGenerationError } from "../core/errors.js";
import type {
  PythonEnvironment,
  PythonInstallOutputs,
  PythonToolchain,
  StageContext,
} from "../app/pipeline/ports.js";

export const PYTHON_ENV_DIR = "sbom-env";
export const PYTHON_TOOLS_ENV_DIR = "sbom-tools";
export const RESOLVED_DEPENDENCIES_FILE = "all-dep.txt";
export const PIP_TREE_FILE = "dets.json";
export const PYTHON_SBOM_FILE = "sbom.json";

const HELPER_PACKAGES = ["pipdeptree", "cyclonedx-bom"];

const installError = (message: string, cause?: unknown) => new DependencyInstallError(message, cause);

export function venvPython(envDir: string, platform: NodeJS.Platform = process.platform): string {
  return platform === "win32"
    ? path.join(envDir, "Scripts", "python.exe")
    : path.join(envDir, "bin", "python");
}

/** Install arguments for whatever the repository declares, or null when it declares nothing. */
export async function declaredInstallArgs(repoPath: string): Promise<string[] | null> {
  if (await fse.pathExists(path.join(repoPath, "requirements.txt"))) {
    return ["-m", "pip", "install", "-r", path.join(repoPath, "requirements.txt")];
  }
  for (const manifest of ["pyproject.toml", "setup.py"]) {
    if (await fse.pathExists(path.join(repoPath, manifest))) {
      return ["-m", "pip", "install", repoPath];
    }
  }
  return null;
}

export function pipTreeArgs(projectPython: string): string[] {
  return ["-m", "pipdeptree", "--python", projectPython, "--json-tree"];
}

export class PipToolchain implements PythonToolchain {
  constructor(private readonly pythonBin: string = "python3") {}

  async prepareEnvironment(_repoPath: string, ctx: StageContext): Promise<PythonEnvironment> {
    const envDir = path.join(ctx.jobDir, PYTHON_ENV_DIR);
    const toolsEnvDir = path.join(ctx.jobDir, PYTHON_TOOLS_ENV_DIR);

    for (const dir of [envDir, toolsEnvDir]) {
      await fse.remove(dir);
      await ctx.run(
        { command: this.pythonBin, args: ["-m", "venv", dir], cwd: ctx.jobDir, signal: ctx.signal },
        installError,
      );
    }

    return { envDir, python: venvPython(envDir), toolsEnvDir, toolsPython: venvPython(toolsEnvDir) };
  }

  async installDeclaredDependencies(
    env: PythonEnvironment,
    repoPath: string,
    ctx: StageContext,
  ): Promise<PythonInstallOutputs> {
    const run = (python: string, args: string[]) =>
      ctx.run({ command: python, args, cwd: repoPath, signal: ctx.signal }, installError);

    const declared = await declaredInstallArgs(repoPath);
    if (declared) {
      await run(env.python, declared);
    }

    const frozen = await run(env.python, ["-m", "pip", "freeze"]);
    const resolvedFile = path.join(ctx.jobDir, RESOLVED_DEPENDENCIES_FILE);
    await fse.writeFile(resolvedFile, frozen.stdout, "utf8");

    // The helpers and everything they pull in live in the tools environment;
    // pipdeptree inspects the project environment from outside it.
    await run(env.toolsPython, ["-m", "pip", "install", ...HELPER_PACKAGES]);
    const tree = await run(env.toolsPython, pipTreeArgs(env.python));
    const treeFile = path.join(ctx.jobDir, PIP_TREE_FILE);
    await fse.writeFile(treeFile, tree.stdout, "utf8");

    return { resolvedFile, treeFile };
  }

  async generateSbom(env: PythonEnvironment, resolvedFile: string, ctx: StageContext): Promise<string> {
    const output = path.join(ctx.jobDir, PYTHON_SBOM_FILE);
    await ctx.run(
      {
        command: env.toolsPython,
        args: ["-m", "cyclonedx_py", "requirements", resolvedFile, "--of", "JSON", "-o", output],
        cwd: ctx.jobDir,
        signal: ctx.signal,
      },
      (message, cause) => new SbomGenerationError(message, cause),
    );
    return output;
  }
}
