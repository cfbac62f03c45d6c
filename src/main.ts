export { loadAppContext } from "./app/config/load-app-context.js";
export { createAppContext, createAppServices, type AppContext, type AppServices } from "./app/context.js";
export { JobRegistry, type JobView, type JobCounts, type JobRegistryOptions } from "./app/jobs/registry.js";
export { createDefaultCollaborators } from "./app/pipeline/collaborators.js";
export type { Detection, PipelineCollaborators, StageContext } from "./app/pipeline/ports.js";
export { runPipeline } from "./app/pipeline/run-pipeline.js";
export { compareDependencyFiles, renderComparison } from "./core/comparison.js";
export { loadAppConfig, parseAppConfig } from "./core/config-loader.js";
export type { AppConfig } from "./core/config.js";
export * from "./core/errors.js";
export { parseDependencyTree, parseSbomComponents } from "./core/dependency-sets.js";
export { reconcile, type ReconciliationResult } from "./core/reconcile.js";
export type { JobReport } from "./core/report.js";
export { createApiRouter } from "./server/router.js";
export { startApiServer, type ApiServerHandle } from "./server/server.js";
