import { stageTimeoutMs, type AppConfig } from "../../core/config.js";
import type { EventSink } from "../../core/logger.js";
import { toolsBinDir, toolsDir, type PathsContext } from "../../core/paths.js";
import { GitSourceFetcher } from "../../tools/git.js";
import { GoModulesToolchain } from "../../tools/go.js";
import { MavenCycloneDxToolchain } from "../../tools/maven.js";
import { PipToolchain } from "../../tools/python.js";
import { TrivyScanner } from "../../tools/trivy.js";

import { FileSystemDetector } from "./detect.js";
import type { PipelineCollaborators } from "./ports.js";

/**
 * Default wiring of every port to the real tools. One instance is shared by
 * all jobs so tool downloads are cached per process; those downloads log to
 * `events` rather than to whichever job asked first.
 */
export function createDefaultCollaborators(
  config: AppConfig,
  paths: PathsContext,
  events?: EventSink,
): PipelineCollaborators {
  const install = { events, timeoutMs: stageTimeoutMs(config) };

  return {
    fetcher: new GitSourceFetcher(config.tools.git),
    detector: new FileSystemDetector(),
    python: new PipToolchain(config.tools.python),
    go: new GoModulesToolchain({
      goBin: config.tools.go,
      cyclonedxGomodBin: config.tools.cyclonedx_gomod,
      deptreeModule: config.tools.deptree_module,
      toolsBinDir: toolsBinDir(paths),
      install,
    }),
    maven: new MavenCycloneDxToolchain({
      maven: config.maven,
      mvnBin: config.tools.mvn,
      toolsDir: toolsDir(paths),
      install,
    }),
    scanner: new TrivyScanner(config.tools.trivy, config.trivy.scanners),
  };
}
