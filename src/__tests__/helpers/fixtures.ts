import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { StageContext } from "../../app/pipeline/ports.js";
import { MemoryEventSink } from "../../core/logger.js";
import { createPathsContext, type PathsContext } from "../../core/paths.js";
import type { JobReport } from "../../core/report.js";
import type { ToolInvocation, ToolResult, ToolRunner } from "../../tools/exec.js";

// =============================================================================
// TYPES
// =============================================================================

export type TempHome = {
  paths: PathsContext;
  root: string;
  cleanup: () => void;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createTempHome(prefix = "bomkeeper-home-"): TempHome {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  return {
    root,
    paths: createPathsContext({ home: root }),
    cleanup: () => fs.rmSync(root, { recursive: true, force: true }),
  };
}

export function buildReport(overrides: Partial<JobReport> = {}): JobReport {
  return {
    job_id: "x",
    repo: "https://example.test/org/repo.git",
    system: { platform: "linux", arch: "x64", release: "6.0.0" },
    repo_path: "/tmp/jobs/x/repo",
    language: "go",
    dependency_manager: "go-modules",
    unsupported: false,
    stages: [],
    artifacts: [],
    result_files: {},
    results: {
      trivy_report_json: null,
      trivy_cyclonedx_json: null,
      reconciliation: null,
    },
    reconciliation: { status: "unavailable", reason: "no dependency tree" },
    generated_at: "2024-01-01T00:00:00.000Z",
    ...overrides,
  };
}

// =============================================================================
// STAGE CONTEXT
// =============================================================================

export type RecordedInvocation = ToolInvocation;

/**
 * A tool runner that records invocations and answers from a handler instead of
 * spawning anything. The default handler succeeds with empty output.
 */
export function createRecordingRunner(
  handler: (invocation: ToolInvocation) => Partial<ToolResult> | Promise<Partial<ToolResult>> = () => ({}),
): { run: ToolRunner; calls: RecordedInvocation[] } {
  const calls: RecordedInvocation[] = [];
  const run: ToolRunner = async (invocation) => {
    calls.push(invocation);
    const result = await handler(invocation);
    return { stdout: "", stderr: "", exitCode: 0, ...result };
  };
  return { run, calls };
}

export function createStageContext(
  jobDir: string,
  overrides: Partial<StageContext> = {},
): StageContext {
  return {
    jobId: "job-1",
    jobDir,
    signal: new AbortController().signal,
    run: createRecordingRunner().run,
    events: new MemoryEventSink(),
    ...overrides,
  };
}
