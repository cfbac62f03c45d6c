import { execa } from "execa";

import { JobCancelledError, type BomkeeperError, type StageErrorFactory } from "../core/errors.js";
import { previewOutput, type EventSink } from "../core/logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type ToolInvocation = {
  command: string;
  args: string[];
  // Always absolute; processes never inherit a job directory from process.cwd().
  cwd: string;
  env?: Record<string, string>;
  input?: string;
  signal?: AbortSignal;
};

export type ToolResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

export type ToolRunner = (invocation: ToolInvocation, fail: StageErrorFactory) => Promise<ToolResult>;

/** Carries the captured output of a failed process as the cause of a stage error. */
export class ToolCommandError extends Error {
  constructor(
    message: string,
    public readonly commandLine: string,
    public readonly cwd: string,
    public readonly exitCode: number | undefined,
    public readonly stdout: string,
    public readonly stderr: string,
  ) {
    super(message);
    this.name = "ToolCommandError";
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function formatCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args].map((part) => (/\s/.test(part) ? JSON.stringify(part) : part)).join(" ");
}

export function createToolRunner(opts: { events?: EventSink; jobId?: string } = {}): ToolRunner {
  const { events, jobId } = opts;

  return async (invocation, fail) => {
    const commandLine = formatCommandLine(invocation.command, invocation.args);
    const startedAt = Date.now();
    events?.log({
      type: "tool.start",
      jobId,
      payload: { command: commandLine, cwd: invocation.cwd },
    });

    const result = await execa(invocation.command, invocation.args, {
      cwd: invocation.cwd,
      env: invocation.env,
      input: invocation.input,
      cancelSignal: invocation.signal,
      reject: false,
      stripFinalNewline: false,
    });

    const stdout = typeof result.stdout === "string" ? result.stdout : "";
    const stderr = typeof result.stderr === "string" ? result.stderr : "";
    const durationMs = Date.now() - startedAt;

    if (result.isCanceled) {
      events?.log({
        type: "tool.fail",
        jobId,
        payload: { command: commandLine, cancelled: true, duration_ms: durationMs },
      });
      throw new JobCancelledError(`${commandLine} was cancelled`, invocation.signal?.reason);
    }

    if (result.failed || result.exitCode !== 0) {
      const exitCode = result.exitCode;
      const detail = stderr.trim() || (result instanceof Error ? result.message : "no output");
      const cause = new ToolCommandError(
        `Command failed with exit code ${exitCode ?? "unknown"}: ${commandLine}`,
        commandLine,
        invocation.cwd,
        exitCode,
        stdout,
        stderr,
      );

      events?.log({
        type: "tool.fail",
        jobId,
        payload: {
          command: commandLine,
          exit_code: exitCode ?? null,
          duration_ms: durationMs,
          stderr: previewOutput(stderr),
        },
      });

      throw fail(
        `${commandLine} failed (cwd=${invocation.cwd}, exit=${exitCode ?? "unknown"}): ${detail}`,
        cause,
      );
    }

    events?.log({
      type: "tool.complete",
      jobId,
      payload: {
        command: commandLine,
        exit_code: 0,
        duration_ms: durationMs,
        stdout: previewOutput(stdout),
      },
    });

    return { stdout, stderr, exitCode: 0 };
  };
}

export function isCancellation(error: unknown): error is BomkeeperError {
  return error instanceof JobCancelledError;
}
