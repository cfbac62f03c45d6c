/**
 * AppContext carries the resolved config and state paths for entrypoints.
 * Purpose: give the CLI and the HTTP service one place to build the registry from.
 * Assumptions: config has already been validated by the loader; home is absolute.
 * Usage: const services = createAppServices(createAppContext({ configPath, config }));
 */

import { stageTimeoutMs, type AppConfig } from "../core/config.js";
import { JsonlLogger, type EventSink } from "../core/logger.js";
import { createPathsContext, serviceLogPath, type PathsContext } from "../core/paths.js";
import { ReportStore } from "../core/report-store.js";

import { JobRegistry } from "./jobs/registry.js";
import { createDefaultCollaborators } from "./pipeline/collaborators.js";
import type { PipelineCollaborators } from "./pipeline/ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppContext = {
  /** Null when no config file was found and the defaults apply. */
  configPath: string | null;
  config: AppConfig;
  paths: PathsContext;
};

export type CreateAppContextInput = {
  configPath: string | null;
  config: AppConfig;
};

export type AppServices = {
  registry: JobRegistry;
  store: ReportStore;
  serviceLog: EventSink;
  close: (opts?: { cancelRunning?: boolean }) => Promise<void>;
};

export type CreateAppServicesOptions = {
  collaborators?: PipelineCollaborators;
  serviceLog?: EventSink;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createAppContext(input: CreateAppContextInput): AppContext {
  return {
    configPath: input.configPath,
    config: input.config,
    paths: createPathsContext({ home: input.config.home }),
  };
}

export function createAppServices(
  appContext: AppContext,
  opts: CreateAppServicesOptions = {},
): AppServices {
  const { config, paths } = appContext;
  const serviceLog = openServiceLog(paths, opts.serviceLog);
  const store = new ReportStore(paths);

  const registry = new JobRegistry({
    paths,
    store,
    serviceLog: serviceLog.sink,
    collaborators: opts.collaborators ?? createDefaultCollaborators(config, paths, serviceLog.sink),
    maxConcurrent: config.jobs.max_concurrent,
    stageTimeoutMs: stageTimeoutMs(config),
  });

  return {
    registry,
    store,
    serviceLog: serviceLog.sink,
    close: async (closeOpts) => {
      try {
        await registry.close(closeOpts);
      } finally {
        serviceLog.close();
      }
    },
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function openServiceLog(
  paths: PathsContext,
  provided: EventSink | undefined,
): { sink: EventSink; close: () => void } {
  if (provided) return { sink: provided, close: () => undefined };

  const logger = new JsonlLogger(serviceLogPath(paths), { jobId: "service" });
  return { sink: logger, close: () => logger.close() };
}
