import { z } from "zod";

import type { ErrorCode } from "./errors.js";
import { InvalidJobStateError } from "./errors.js";
import { isoNow } from "./utils.js";

export const JobStatusSchema = z.enum(["pending", "running", "completed", "failed"]);
export type JobStatus = z.infer<typeof JobStatusSchema>;

export const JobRecordSchema = z.object({
  id: z.string(),
  source_ref: z.string(),
  status: JobStatusSchema,
  submitted_at: z.string(),
  started_at: z.string().optional(),
  finished_at: z.string().optional(),
  language: z.string().optional(),
  dependency_manager: z.string().optional(),
  error: z.string().optional(),
  error_kind: z.string().optional(),
  result_ref: z.string().optional(),
});

export type JobRecord = z.infer<typeof JobRecordSchema>;

export const JOB_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;

export function isValidJobId(id: string): boolean {
  return JOB_ID_PATTERN.test(id);
}

export function isActiveStatus(status: JobStatus): boolean {
  return status === "pending" || status === "running";
}

export function isTerminalStatus(status: JobStatus): boolean {
  return status === "completed" || status === "failed";
}

export function createJobRecord(args: { id: string; sourceRef: string; now?: string }): JobRecord {
  return {
    id: args.id,
    source_ref: args.sourceRef,
    status: "pending",
    submitted_at: args.now ?? isoNow(),
  };
}

export function markJobRunning(job: JobRecord, now: string = isoNow()): void {
  if (job.status !== "pending") {
    throw new InvalidJobStateError(`Cannot start job ${job.id} from status ${job.status}`);
  }

  job.status = "running";
  job.started_at = now;
}

export function recordDetection(
  job: JobRecord,
  detection: { language: string; dependencyManager: string },
): void {
  if (job.status !== "running") {
    throw new InvalidJobStateError(
      `Cannot record detection for job ${job.id} from status ${job.status}`,
    );
  }

  job.language = detection.language;
  job.dependency_manager = detection.dependencyManager;
}

export function markJobCompleted(
  job: JobRecord,
  resultRef: string,
  now: string = isoNow(),
): void {
  if (job.status !== "running") {
    throw new InvalidJobStateError(`Cannot mark job ${job.id} completed from status ${job.status}`);
  }

  job.status = "completed";
  job.finished_at = clampFinish(job.started_at, now);
  job.result_ref = resultRef;
}

export function markJobFailed(
  job: JobRecord,
  failure: { error: string; kind: ErrorCode },
  now: string = isoNow(),
): void {
  if (job.status !== "running") {
    throw new InvalidJobStateError(`Cannot mark job ${job.id} failed from status ${job.status}`);
  }

  job.status = "failed";
  job.finished_at = clampFinish(job.started_at, now);
  job.error = failure.error;
  job.error_kind = failure.kind;
}

export function assertDeletable(job: JobRecord): void {
  if (isActiveStatus(job.status)) {
    throw new InvalidJobStateError(`Cannot delete job ${job.id} while it is ${job.status}`);
  }
}

export function assertCancellable(job: JobRecord): void {
  if (!isActiveStatus(job.status)) {
    throw new InvalidJobStateError(`Cannot cancel job ${job.id} from status ${job.status}`);
  }
}

// Wall clocks can step backwards; finished_at never precedes started_at.
function clampFinish(startedAt: string | undefined, now: string): string {
  if (startedAt && Date.parse(now) < Date.parse(startedAt)) {
    return startedAt;
  }
  return now;
}
