/**
 * Pipeline ports define the boundary between the stage router and the external tools.
 * Purpose: keep every process invocation behind a replaceable capability for testing.
 * Assumptions: every path crossing a port is absolute; nothing reads process.cwd().
 * Usage: default implementations live in src/tools and are wired in `collaborators.ts`.
 */

import type { EventSink } from "../../core/logger.js";
import type { ToolRunner } from "../../tools/exec.js";

// =============================================================================
// CONTEXT
// =============================================================================

export type StageContext = {
  jobId: string;
  /** Private, absolute working directory of the job. */
  jobDir: string;
  signal: AbortSignal;
  run: ToolRunner;
  events: EventSink;
};

// =============================================================================
// DETECTION
// =============================================================================

export type Language = "python" | "java" | "go" | "unknown";

export type DependencyManager =
  | "poetry"
  | "uv"
  | "pipenv"
  | "pip"
  | "setuptools"
  | "flit"
  | "pyproject"
  | "maven"
  | "gradle"
  | "go-modules"
  | "unknown";

export type Detection = {
  language: Language;
  dependencyManager: DependencyManager;
};

// =============================================================================
// PORTS
// =============================================================================

export interface SourceFetcher {
  /** Returns the absolute path of the fresh checkout. */
  fetch(sourceRef: string, ctx: StageContext): Promise<string>;
}

export interface RepositoryDetector {
  detect(repoPath: string): Promise<Detection>;
}

export type PythonEnvironment = {
  /** Holds only what the repository declares. */
  envDir: string;
  python: string;
  /** Separate environment for pipdeptree and the SBOM generator. */
  toolsEnvDir: string;
  toolsPython: string;
};

export type PythonInstallOutputs = {
  /** Frozen requirement list the SBOM generator reads. */
  resolvedFile: string | null;
  /** pipdeptree JSON tree, normalized later into the tree-source shape. */
  treeFile: string | null;
};

export interface PythonToolchain {
  prepareEnvironment(repoPath: string, ctx: StageContext): Promise<PythonEnvironment>;
  installDeclaredDependencies(
    env: PythonEnvironment,
    repoPath: string,
    ctx: StageContext,
  ): Promise<PythonInstallOutputs>;
  generateSbom(env: PythonEnvironment, resolvedFile: string, ctx: StageContext): Promise<string>;
}

export type TreeTool = {
  path: string;
  installed: boolean;
};

export interface GoToolchain {
  tidy(repoPath: string, ctx: StageContext): Promise<void>;
  writeUpgradeListing(repoPath: string, ctx: StageContext): Promise<string>;
  installTreeTool(ctx: StageContext): Promise<TreeTool>;
  renderDependencyTree(repoPath: string, treeTool: TreeTool, ctx: StageContext): Promise<string>;
  generateSbom(repoPath: string, ctx: StageContext): Promise<string>;
}

export interface MavenToolchain {
  acquireBuildTool(ctx: StageContext): Promise<string>;
  /** Runs the SBOM plugin and returns the location of the generated BOM inside the build tree. */
  generateSbom(mvnPath: string, repoPath: string, ctx: StageContext): Promise<string>;
}

export type ScanOutputNames = {
  structured: string;
  flat: string;
  table: string;
};

export type ScanReportLocations = {
  /** CycloneDX document with vulnerabilities attached. */
  structured: string;
  /** Scanner-native JSON report. */
  flat: string;
  table: string;
};

export interface VulnerabilityScanner {
  scan(sbomPath: string, outputs: ScanOutputNames, ctx: StageContext): Promise<ScanReportLocations>;
}

export type PipelineCollaborators = {
  fetcher: SourceFetcher;
  detector: RepositoryDetector;
  python: PythonToolchain;
  go: GoToolchain;
  maven: MavenToolchain;
  scanner: VulnerabilityScanner;
};
