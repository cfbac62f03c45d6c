import { JobCancelledError } from "../core/errors.js";
import { normalizeAbortReason } from "../core/error-format.js";
import type { EventSink } from "../core/logger.js";

import { createToolRunner, type ToolRunner } from "./exec.js";

// =============================================================================
// TYPES
// =============================================================================

/** Context handed to a shared install; owned by the toolchain, never by a job. */
export type SharedInstallContext = {
  signal: AbortSignal | undefined;
  run: ToolRunner;
};

export type SharedInstallOptions = {
  /** Runner for the install's own processes; defaults to one logging to `events`. */
  run?: ToolRunner;
  /** Service-level log; an install never writes into a job's event log. */
  events?: EventSink;
  /** Upper bound on one install attempt; undefined leaves it unbounded. */
  timeoutMs?: number;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * One in-flight install shared by every job that needs the same tool. A caller
 * whose signal aborts stops waiting; the install keeps going for the others.
 */
export class SharedInstall<T> {
  private pending: Promise<T> | null = null;
  private readonly run: ToolRunner;

  constructor(private readonly opts: SharedInstallOptions = {}) {
    this.run = opts.run ?? createToolRunner({ events: opts.events, jobId: "toolchain" });
  }

  acquire(task: (shared: SharedInstallContext) => Promise<T>, signal: AbortSignal): Promise<T> {
    if (signal.aborted) {
      return Promise.reject(waitCancelled(signal));
    }

    if (!this.pending) {
      const shared: SharedInstallContext = {
        signal: this.opts.timeoutMs === undefined ? undefined : AbortSignal.timeout(this.opts.timeoutMs),
        run: this.run,
      };
      this.pending = task(shared).finally(() => {
        this.pending = null;
      });
    }

    return waitWithSignal(this.pending, signal);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function waitWithSignal<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(waitCancelled(signal));
    signal.addEventListener("abort", onAbort, { once: true });

    // Both handlers stay attached after an abort so a later failure is still observed.
    void promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

function waitCancelled(signal: AbortSignal): JobCancelledError {
  const reason = normalizeAbortReason(signal.reason);
  return new JobCancelledError(
    `Stopped waiting for a shared tool install${reason ? `: ${reason}` : ""}`,
    signal.reason,
  );
}
