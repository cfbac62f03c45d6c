import { describe, expect, it } from "vitest";

import type { JobView } from "../app/jobs/registry.js";
import { buildReport } from "../__tests__/helpers/fixtures.js";

import { formatJobSummary } from "./job-summary.js";

function view(overrides: Partial<JobView> = {}): JobView {
  return {
    id: "x",
    status: "completed",
    language: "go",
    dependency_manager: "go-modules",
    started_at: "2024-01-01T00:00:00.000Z",
    finished_at: "2024-01-01T00:01:00.000Z",
    error: null,
    error_kind: null,
    report: null,
    ...overrides,
  };
}

describe("formatJobSummary", () => {
  it("lists stages, reconciliation counts and result files of a completed job", () => {
    const report = buildReport({
      stages: [
        { name: "fetch-source", status: "completed", artifacts: [] },
        { name: "install-tree-tool", status: "completed", reason: "already installed", artifacts: [] },
      ],
      result_files: { sbom: "/tmp/jobs/x/sbom.json" },
      reconciliation: {
        status: "available",
        result: {
          missing_in_b: [{ name: "app", version: "v0.0.0" }],
          version_mismatch: [],
          same: [
            { name: "text", version: "v0.3.0" },
            { name: "sys", version: "v0.1.0" },
          ],
          extra_in_b: [],
        },
        conflicts: [],
      },
    });

    expect(formatJobSummary(view({ report }))).toEqual([
      "Job: x",
      "Status: completed",
      "Language: go (go-modules)",
      "Started: 2024-01-01T00:00:00.000Z",
      "Finished: 2024-01-01T00:01:00.000Z",
      "Stages:",
      "  fetch-source       completed",
      "  install-tree-tool  completed  already installed",
      "Reconciliation: 1 missing, 0 mismatched, 2 same, 0 extra",
      "Result files:",
      "  sbom: /tmp/jobs/x/sbom.json",
    ]);
  });

  it("flags unsupported ecosystems and unavailable reconciliation", () => {
    const report = buildReport({
      language: "java",
      dependency_manager: "gradle",
      unsupported: true,
      reconciliation: { status: "unavailable", reason: "unsupported ecosystem: java/gradle" },
    });

    const lines = formatJobSummary(
      view({ language: "java", dependency_manager: "gradle", report, started_at: null, finished_at: null }),
    );

    expect(lines).toEqual([
      "Job: x",
      "Status: completed",
      "Language: java (gradle)",
      "Unsupported ecosystem: no SBOM was produced",
      "Reconciliation unavailable: unsupported ecosystem: java/gradle",
    ]);
  });

  it("shows the first line of a failure trace with its kind", () => {
    const lines = formatJobSummary(
      view({
        status: "failed",
        language: null,
        dependency_manager: null,
        finished_at: null,
        error: "FetchError: repository not found\n    at clone (git.ts:1:1)\n",
        error_kind: "fetch_failed",
      }),
    );

    expect(lines).toEqual([
      "Job: x",
      "Status: failed",
      "Started: 2024-01-01T00:00:00.000Z",
      "Error [fetch_failed]: FetchError: repository not found",
    ]);
  });
});
