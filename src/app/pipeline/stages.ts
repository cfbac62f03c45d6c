/**
 * Stage runner shared by every ecosystem variant.
 * Purpose: sequence stages, record skipped/completed outcomes, and bound each stage by a timeout.
 * Assumptions: a stage observes cancellation only through the signal on its StageContext.
 * Usage: const outcomes = await runStages(variant.stages, state, ctx, { timeoutMs });
 */

import path from "node:path";

import { BomkeeperError, JobCancelledError, StageTimeoutError } from "../../core/errors.js";
import { formatErrorMessage, normalizeAbortReason } from "../../core/error-format.js";
import { logJobEvent } from "../../core/logger.js";
import type { PipelineArtifact, ReconciliationOutcome, StageOutcome } from "../../core/report.js";

import type { Detection, StageContext } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

/** Mutable state threaded through one variant's stages. */
export type PipelineState = {
  repoPath: string;
  detection: Detection;
  artifacts: PipelineArtifact[];
  resultFiles: Record<string, string>;
  reconciliation: ReconciliationOutcome;
};

export type StageReport = {
  artifacts?: PipelineArtifact[];
  /** Named result files, merged into the report's `result_files`. */
  resultFiles?: Record<string, string>;
  /** A stage may decline after inspecting state it could not check up front. */
  skipped?: boolean;
  reason?: string;
};

export interface Stage<S extends PipelineState = PipelineState> {
  readonly name: string;
  /** Returns why the stage is not attempted, or null when it should run. */
  skipReason?(state: S): Promise<string | null> | string | null;
  run(state: S, ctx: StageContext): Promise<StageReport | void>;
}

export type RunStagesOptions = {
  /** Per-stage limit; undefined disables it. */
  timeoutMs?: number;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runStages<S extends PipelineState>(
  stages: ReadonlyArray<Stage<S>>,
  state: S,
  ctx: StageContext,
  opts: RunStagesOptions = {},
): Promise<StageOutcome[]> {
  const outcomes: StageOutcome[] = [];

  for (const stage of stages) {
    throwIfCancelled(ctx.signal, stage.name);

    const skipReason = stage.skipReason ? await stage.skipReason(state) : null;
    if (skipReason !== null) {
      logJobEvent(ctx.events, "stage.skip", ctx.jobId, { stage: stage.name, reason: skipReason });
      outcomes.push({ name: stage.name, status: "skipped", reason: skipReason, artifacts: [] });
      continue;
    }

    logJobEvent(ctx.events, "stage.start", ctx.jobId, { stage: stage.name });
    const startedAt = Date.now();

    const report = await runBounded(stage, state, ctx, opts.timeoutMs);
    const artifacts = report?.artifacts ?? [];
    state.artifacts.push(...artifacts);
    Object.assign(state.resultFiles, report?.resultFiles ?? {});

    const outcome: StageOutcome = {
      name: stage.name,
      status: report?.skipped ? "skipped" : "completed",
      artifacts: artifacts.map((artifact) => artifact.location),
    };
    if (report?.reason) outcome.reason = report.reason;
    outcomes.push(outcome);

    logJobEvent(ctx.events, report?.skipped ? "stage.skip" : "stage.complete", ctx.jobId, {
      stage: stage.name,
      duration_ms: Date.now() - startedAt,
      artifacts: outcome.artifacts,
      ...(outcome.reason ? { reason: outcome.reason } : {}),
    });
  }

  return outcomes;
}

export function artifact(
  kind: PipelineArtifact["kind"],
  location: string,
  payload?: unknown,
): PipelineArtifact {
  const entry: PipelineArtifact = { kind, location: path.resolve(location) };
  if (payload !== undefined) entry.payload = payload;
  return entry;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function runBounded<S extends PipelineState>(
  stage: Stage<S>,
  state: S,
  ctx: StageContext,
  timeoutMs: number | undefined,
): Promise<StageReport | void> {
  const timeoutSignal = timeoutMs === undefined ? null : AbortSignal.timeout(timeoutMs);
  const signal = timeoutSignal ? AbortSignal.any([ctx.signal, timeoutSignal]) : ctx.signal;

  try {
    return await stage.run(state, { ...ctx, signal });
  } catch (err) {
    const error = classifyStageError(err, stage.name, ctx.signal, timeoutSignal, timeoutMs);
    logJobEvent(ctx.events, "stage.fail", ctx.jobId, {
      stage: stage.name,
      code: error instanceof BomkeeperError ? error.code : "internal",
      message: formatErrorMessage(error),
    });
    throw error;
  }
}

function classifyStageError(
  err: unknown,
  stageName: string,
  jobSignal: AbortSignal,
  timeoutSignal: AbortSignal | null,
  timeoutMs: number | undefined,
): unknown {
  // The job signal wins when both fired.
  if (jobSignal.aborted) {
    return err instanceof JobCancelledError ? err : cancelledError(stageName, jobSignal, err);
  }
  if (timeoutSignal?.aborted && timeoutMs !== undefined) {
    return new StageTimeoutError(stageName, timeoutMs, err);
  }
  return err;
}

function throwIfCancelled(signal: AbortSignal, stageName: string): void {
  if (signal.aborted) {
    throw cancelledError(stageName, signal);
  }
}

function cancelledError(stageName: string, signal: AbortSignal, cause?: unknown): JobCancelledError {
  const reason = normalizeAbortReason(signal.reason);
  const suffix = reason ? `: ${reason}` : "";
  return new JobCancelledError(`Job cancelled before stage ${stageName} finished${suffix}`, cause ?? signal.reason);
}
