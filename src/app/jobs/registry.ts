/**
 * JobRegistry admits, schedules, and answers for scan jobs.
 * Purpose: own the job table, hand admitted jobs to workers, and persist their terminal records.
 * Assumptions: one registry per state home; durable records outlive the process, the table does not.
 * Usage: const registry = new JobRegistry({ paths, collaborators }); await registry.submit(id, ref);
 */

import fse from "fs-extra";

import {
  InvalidJobStateError,
  InvalidRequestError,
  JobCancelledError,
  JobConflictError,
  JobNotFoundError,
  RecordUnreadableError,
  resolveErrorCode,
} from "../../core/errors.js";
import { formatErrorMessage, formatErrorTrace } from "../../core/error-format.js";
import {
  assertCancellable,
  assertDeletable,
  createJobRecord,
  isActiveStatus,
  isValidJobId,
  markJobCompleted,
  markJobFailed,
  markJobRunning,
  recordDetection,
  type JobRecord,
  type JobStatus,
} from "../../core/job-state.js";
import { KeyedLock } from "../../core/keyed-lock.js";
import { JsonlLogger, logJobEvent, type EventSink } from "../../core/logger.js";
import { jobDir, jobEventsPath, type PathsContext } from "../../core/paths.js";
import type { JobReport, SystemInfo } from "../../core/report.js";
import { ReportStore } from "../../core/report-store.js";
import { isoNow } from "../../core/utils.js";
import { createToolRunner, type ToolRunner } from "../../tools/exec.js";
import type { PipelineCollaborators } from "../pipeline/ports.js";
import { runPipeline } from "../pipeline/run-pipeline.js";

// =============================================================================
// TYPES
// =============================================================================

export type JobView = {
  id: string;
  status: JobStatus;
  language: string | null;
  dependency_manager: string | null;
  started_at: string | null;
  finished_at: string | null;
  error: string | null;
  error_kind: string | null;
  report: JobReport | null;
};

export type JobCounts = Record<JobStatus, number>;

export type JobLog = EventSink & { close?(): void };

export type JobRegistryOptions = {
  paths: PathsContext;
  collaborators: PipelineCollaborators;
  store?: ReportStore;
  /** Service-wide log of job transitions. */
  serviceLog?: EventSink;
  maxConcurrent?: number;
  stageTimeoutMs?: number;
  system?: SystemInfo;
  createJobLog?: (jobId: string) => JobLog;
  createRunner?: (jobId: string, events: EventSink) => ToolRunner;
  now?: () => string;
};

type JobEntry = {
  record: JobRecord;
  controller: AbortController;
  /** Settles once the worker has written the terminal record; absent until dispatched. */
  done: Promise<void> | null;
};

const NULL_SINK: EventSink = { log: () => undefined };

// =============================================================================
// REGISTRY
// =============================================================================

export class JobRegistry {
  private readonly jobs = new Map<string, JobEntry>();
  private readonly lock = new KeyedLock();
  private readonly queue: string[] = [];
  private readonly store: ReportStore;
  private readonly serviceLog: EventSink;
  private readonly maxConcurrent: number;
  private readonly now: () => string;
  private running = 0;
  private closing = false;

  constructor(private readonly opts: JobRegistryOptions) {
    this.store = opts.store ?? new ReportStore(opts.paths);
    this.serviceLog = opts.serviceLog ?? NULL_SINK;
    this.maxConcurrent = Math.max(1, opts.maxConcurrent ?? 2);
    this.now = opts.now ?? isoNow;
  }

  async submit(id: string, sourceRef: string): Promise<{ id: string; status: "pending" }> {
    assertJobId(id);
    if (!sourceRef.trim()) {
      throw new InvalidRequestError("Source reference must not be empty");
    }
    if (this.closing) {
      throw new InvalidJobStateError(`Cannot submit job ${id} while the registry is shutting down`);
    }

    await this.lock.runExclusive(id, () => {
      const existing = this.jobs.get(id);
      if (existing && isActiveStatus(existing.record.status)) {
        throw new JobConflictError(id, existing.record.status);
      }

      // A terminal record under the same id is replaced.
      this.jobs.set(id, {
        record: createJobRecord({ id, sourceRef, now: this.now() }),
        controller: new AbortController(),
        done: null,
      });
      this.queue.push(id);
      logJobEvent(this.serviceLog, "job.submit", id, { source_ref: sourceRef });
    });

    this.dispatch();
    return { id, status: "pending" };
  }

  async poll(id: string): Promise<JobView> {
    assertJobId(id);

    const entry = this.jobs.get(id);
    if (entry) {
      const record = { ...entry.record };
      if (record.status !== "completed") {
        return viewFromRecord(record, null);
      }
      const report = await this.store.loadReport(id);
      if (!report) {
        throw new RecordUnreadableError(
          `Report for completed job ${id} is missing from ${this.store.reportPath(id)}`,
        );
      }
      return viewFromRecord(record, report);
    }

    const durable = await this.store.lookup(id);
    if (!durable) {
      throw new JobNotFoundError(id);
    }
    if (durable.status === "completed") {
      return {
        ...emptyView(id, "completed"),
        language: durable.report.language,
        dependency_manager: durable.report.dependency_manager,
        finished_at: durable.report.generated_at,
        report: durable.report,
      };
    }
    return { ...emptyView(id, "failed"), error: durable.error };
  }

  async delete(id: string): Promise<void> {
    assertJobId(id);

    await this.lock.runExclusive(id, async () => {
      const entry = this.jobs.get(id);
      if (entry) {
        assertDeletable(entry.record);
      } else if (!(await fse.pathExists(jobDir(this.opts.paths, id)))) {
        throw new JobNotFoundError(id);
      }

      this.jobs.delete(id);
      await this.store.removeJob(id);
      logJobEvent(this.serviceLog, "job.delete", id);
    });
  }

  /** Pending jobs fail at once; running jobs fail when their current stage unwinds. */
  async cancel(id: string): Promise<JobView> {
    assertJobId(id);

    await this.lock.runExclusive(id, async () => {
      const entry = this.jobs.get(id);
      if (!entry) {
        const durable = await this.store.lookup(id);
        if (!durable) throw new JobNotFoundError(id);
        throw new InvalidJobStateError(`Cannot cancel job ${id} from status ${durable.status}`);
      }
      assertCancellable(entry.record);

      const reason = new JobCancelledError(`Job ${id} was cancelled by request`);
      logJobEvent(this.serviceLog, "job.cancel", id, { status: entry.record.status });

      const queued = this.queue.indexOf(id);
      if (queued !== -1) {
        this.queue.splice(queued, 1);
        markJobRunning(entry.record, this.now());
        await this.recordFailure(entry, reason);
        return;
      }
      entry.controller.abort(reason);
    });

    return this.poll(id);
  }

  counts(): JobCounts {
    const counts: JobCounts = { pending: 0, running: 0, completed: 0, failed: 0 };
    for (const entry of this.jobs.values()) {
      counts[entry.record.status] += 1;
    }
    return counts;
  }

  /** Resolves with the job's view once its worker has settled. */
  async waitFor(id: string): Promise<JobView> {
    const entry = this.jobs.get(id);
    if (entry?.done) {
      await entry.done;
    }
    return this.poll(id);
  }

  /**
   * Stops admitting work, fails queued jobs as cancelled, and waits for running
   * workers. With `cancelRunning`, running jobs are aborted first.
   */
  async close(opts: { cancelRunning?: boolean } = {}): Promise<void> {
    this.closing = true;

    for (const id of this.queue.splice(0)) {
      const entry = this.jobs.get(id);
      if (!entry) continue;
      await this.lock.runExclusive(id, async () => {
        markJobRunning(entry.record, this.now());
        await this.recordFailure(entry, new JobCancelledError(`Job ${id} was cancelled by shutdown`));
      });
    }

    const workers: Array<Promise<void>> = [];
    for (const entry of this.jobs.values()) {
      if (!entry.done) continue;
      if (opts.cancelRunning && entry.record.status === "running") {
        entry.controller.abort(new JobCancelledError(`Job ${entry.record.id} was cancelled by shutdown`));
      }
      workers.push(entry.done);
    }
    await Promise.all(workers);
  }

  // ===========================================================================
  // WORKERS
  // ===========================================================================

  private dispatch(): void {
    while (!this.closing && this.running < this.maxConcurrent && this.queue.length > 0) {
      const id = this.queue.shift();
      const entry = id === undefined ? undefined : this.jobs.get(id);
      if (!entry || entry.record.status !== "pending") continue;

      this.running += 1;
      entry.done = this.execute(entry)
        .catch((err: unknown) => {
          logJobEvent(this.serviceLog, "job.worker_error", entry.record.id, {
            message: formatErrorMessage(err),
          });
        })
        .finally(() => {
          this.running -= 1;
          this.dispatch();
        });
    }
  }

  private async execute(entry: JobEntry): Promise<void> {
    const { id, source_ref: sourceRef } = entry.record;

    const started = await this.lock.runExclusive(id, () => {
      if (entry.record.status !== "pending") return false;
      markJobRunning(entry.record, this.now());
      return true;
    });
    if (!started) return;

    const jobLog = this.createJobLog(id);
    logJobEvent(this.serviceLog, "job.start", id, { source_ref: sourceRef });

    try {
      await this.store.clearRecords(id);
      const report = await runPipeline({
        sourceRef,
        ctx: {
          jobId: id,
          jobDir: jobDir(this.opts.paths, id),
          signal: entry.controller.signal,
          run: this.opts.createRunner?.(id, jobLog) ?? createToolRunner({ events: jobLog, jobId: id }),
          events: jobLog,
        },
        collaborators: this.opts.collaborators,
        stageTimeoutMs: this.opts.stageTimeoutMs,
        system: this.opts.system,
        onDetect: (detection) =>
          this.lock.runExclusive(id, () => recordDetection(entry.record, detection)),
      });

      const reportPath = await this.store.saveReport(report);
      await this.lock.runExclusive(id, () => markJobCompleted(entry.record, reportPath, this.now()));
      logJobEvent(this.serviceLog, "job.complete", id, {
        language: report.language,
        dependency_manager: report.dependency_manager,
        unsupported: report.unsupported,
        report_path: reportPath,
      });
    } catch (err) {
      await this.lock.runExclusive(id, () => this.recordFailure(entry, err));
    } finally {
      jobLog.close?.();
    }
  }

  /** Caller holds the job's lock. */
  private async recordFailure(entry: JobEntry, err: unknown): Promise<void> {
    const { id } = entry.record;
    const trace = formatErrorTrace(err);
    const kind = resolveErrorCode(err);

    markJobFailed(entry.record, { error: trace, kind }, this.now());
    logJobEvent(this.serviceLog, "job.fail", id, { kind, message: formatErrorMessage(err) });

    try {
      await this.store.saveError(id, trace);
    } catch (writeErr) {
      // The in-memory record still carries the trace.
      logJobEvent(this.serviceLog, "job.persist_failed", id, { message: formatErrorMessage(writeErr) });
    }
  }

  private createJobLog(id: string): JobLog {
    if (this.opts.createJobLog) return this.opts.createJobLog(id);
    return new JsonlLogger(jobEventsPath(this.opts.paths, id), { jobId: id });
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function assertJobId(id: string): void {
  if (!isValidJobId(id)) {
    throw new InvalidRequestError(`Invalid job id: ${JSON.stringify(id)}`);
  }
}

function emptyView(id: string, status: JobStatus): JobView {
  return {
    id,
    status,
    language: null,
    dependency_manager: null,
    started_at: null,
    finished_at: null,
    error: null,
    error_kind: null,
    report: null,
  };
}

function viewFromRecord(record: JobRecord, report: JobReport | null): JobView {
  return {
    id: record.id,
    status: record.status,
    language: record.language ?? null,
    dependency_manager: record.dependency_manager ?? null,
    started_at: record.started_at ?? null,
    finished_at: record.finished_at ?? null,
    error: record.error ?? null,
    error_kind: record.error_kind ?? null,
    report,
  };
}
