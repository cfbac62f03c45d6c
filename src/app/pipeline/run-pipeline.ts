/**
 * runPipeline executes one job end to end and returns its aggregated report.
 * Purpose: fetch, detect, dispatch to the ecosystem variant, then snapshot every artifact.
 * Assumptions: the caller owns jobDir exclusively for the duration of the run.
 * Usage: const report = await runPipeline({ sourceRef, ctx, collaborators });
 */

import os from "node:os";

import fse from "fs-extra";

import { formatErrorMessage } from "../../core/error-format.js";
import { logJobEvent } from "../../core/logger.js";
import {
  findArtifact,
  type ArtifactKind,
  type JobReport,
  type PipelineArtifact,
  type StageOutcome,
  type SystemInfo,
} from "../../core/report.js";
import { isMissingFileError, isoNow } from "../../core/utils.js";

import type { Detection, PipelineCollaborators, StageContext } from "./ports.js";
import { selectVariant } from "./router.js";
import { artifact, runStages, type PipelineState, type Stage } from "./stages.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunPipelineOptions = {
  sourceRef: string;
  ctx: StageContext;
  collaborators: PipelineCollaborators;
  /** Per-stage timeout; undefined disables it. */
  stageTimeoutMs?: number;
  system?: SystemInfo;
  /** Called once the repository's ecosystem is known, before the variant runs. */
  onDetect?: (detection: Detection) => Promise<void> | void;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runPipeline(opts: RunPipelineOptions): Promise<JobReport> {
  const { ctx, collaborators, sourceRef } = opts;
  const stageOpts = { timeoutMs: opts.stageTimeoutMs };

  logJobEvent(ctx.events, "pipeline.start", ctx.jobId, { source_ref: sourceRef });

  const state: PipelineState = {
    repoPath: "",
    detection: { language: "unknown", dependencyManager: "unknown" },
    artifacts: [],
    resultFiles: {},
    reconciliation: { status: "unavailable", reason: "reconciliation not attempted" },
  };

  const prelude = await runStages(preludeStages(sourceRef, collaborators), state, ctx, stageOpts);
  await opts.onDetect?.(state.detection);

  const variant = selectVariant(state.detection, collaborators);
  let finalState = state;
  let stages: StageOutcome[] = prelude;

  if (variant) {
    const run = await variant.execute(state, ctx, stageOpts);
    finalState = run.state;
    stages = [...prelude, ...run.stages];
  } else {
    const reason = `unsupported ecosystem: ${state.detection.language}/${state.detection.dependencyManager}`;
    logJobEvent(ctx.events, "pipeline.unsupported", ctx.jobId, {
      language: state.detection.language,
      dependency_manager: state.detection.dependencyManager,
    });
    finalState.reconciliation = { status: "unavailable", reason };
  }

  return buildReport({
    jobId: ctx.jobId,
    sourceRef,
    state: finalState,
    stages,
    unsupported: variant === null,
    system: opts.system ?? detectSystem(),
    ctx,
  });
}

export function detectSystem(): SystemInfo {
  return { platform: os.platform(), arch: os.arch(), release: os.release() };
}

// =============================================================================
// INTERNALS
// =============================================================================

function preludeStages(sourceRef: string, collaborators: PipelineCollaborators): Stage[] {
  return [
    {
      name: "fetch-source",
      async run(state, ctx) {
        state.repoPath = await collaborators.fetcher.fetch(sourceRef, ctx);
        return { artifacts: [artifact("source", state.repoPath)] };
      },
    },
    {
      name: "detect",
      async run(state) {
        state.detection = await collaborators.detector.detect(state.repoPath);
        return {
          reason: `${state.detection.language}/${state.detection.dependencyManager}`,
        };
      },
    },
  ];
}

async function buildReport(input: {
  jobId: string;
  sourceRef: string;
  state: PipelineState;
  stages: StageOutcome[];
  unsupported: boolean;
  system: SystemInfo;
  ctx: StageContext;
}): Promise<JobReport> {
  const { state, ctx } = input;
  const reconciliation = state.reconciliation;

  return {
    job_id: input.jobId,
    repo: input.sourceRef,
    system: input.system,
    repo_path: state.repoPath,
    language: state.detection.language,
    dependency_manager: state.detection.dependencyManager,
    unsupported: input.unsupported,
    stages: input.stages,
    artifacts: state.artifacts,
    result_files: state.resultFiles,
    results: {
      trivy_report_json: await loadPayload(state.artifacts, "scan-report", ctx),
      trivy_cyclonedx_json: await loadPayload(state.artifacts, "sbom-cyclonedx", ctx),
      reconciliation: reconciliation.status === "available" ? reconciliation.result : null,
    },
    reconciliation,
    generated_at: isoNow(),
  };
}

/** Parsed JSON of the latest artifact of a kind; null when absent or unreadable. */
async function loadPayload(
  artifacts: readonly PipelineArtifact[],
  kind: ArtifactKind,
  ctx: StageContext,
): Promise<unknown> {
  const entry = findArtifact(artifacts, kind);
  if (!entry) return null;

  try {
    return await fse.readJson(entry.location);
  } catch (err) {
    if (!isMissingFileError(err)) {
      logJobEvent(ctx.events, "artifact.unreadable", ctx.jobId, {
        kind,
        location: entry.location,
        message: formatErrorMessage(err),
      });
    }
    return null;
  }
}
