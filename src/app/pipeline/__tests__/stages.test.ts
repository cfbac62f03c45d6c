import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { JobCancelledError, ScanError, StageTimeoutError } from "../../../core/errors.js";
import { MemoryEventSink } from "../../../core/logger.js";
import { createStageContext } from "../../../__tests__/helpers/fixtures.js";
import { artifact, runStages, type PipelineState, type Stage } from "../stages.js";

import { Gate } from "./fakes.js";

function createState(): PipelineState {
  return {
    repoPath: "/repo",
    detection: { language: "go", dependencyManager: "go-modules" },
    artifacts: [],
    resultFiles: {},
    reconciliation: { status: "unavailable", reason: "reconciliation not attempted" },
  };
}

function waitingStage(name: string, gate: Gate): Stage {
  return {
    name,
    async run(_state, ctx) {
      await gate.wait(ctx.signal);
    },
  };
}

describe("runStages", () => {
  let jobDir: string;
  let events: MemoryEventSink;

  beforeEach(() => {
    jobDir = fs.mkdtempSync(path.join(os.tmpdir(), "stages-"));
    events = new MemoryEventSink();
  });

  afterEach(() => {
    fs.rmSync(jobDir, { recursive: true, force: true });
  });

  it("runs stages in order and records artifacts and result files", async () => {
    const order: string[] = [];
    const stages: Stage[] = [
      {
        name: "first",
        async run() {
          order.push("first");
          return {
            artifacts: [artifact("sbom", path.join(jobDir, "sbom.json"))],
            resultFiles: { sbom: path.join(jobDir, "sbom.json") },
          };
        },
      },
      {
        name: "second",
        async run() {
          order.push("second");
        },
      },
    ];
    const state = createState();

    const outcomes = await runStages(stages, state, createStageContext(jobDir, { events }));

    expect(order).toEqual(["first", "second"]);
    expect(outcomes).toEqual([
      { name: "first", status: "completed", artifacts: [path.join(jobDir, "sbom.json")] },
      { name: "second", status: "completed", artifacts: [] },
    ]);
    expect(state.artifacts).toEqual([{ kind: "sbom", location: path.join(jobDir, "sbom.json") }]);
    expect(state.resultFiles).toEqual({ sbom: path.join(jobDir, "sbom.json") });
    expect(events.types()).toEqual(["stage.start", "stage.complete", "stage.start", "stage.complete"]);
  });

  it("skips a stage whose precondition is missing without running it", async () => {
    let ran = false;
    const stages: Stage[] = [
      {
        name: "normalize-manifest",
        skipReason: () => "no dependency manifest",
        async run() {
          ran = true;
        },
      },
    ];

    const outcomes = await runStages(stages, createState(), createStageContext(jobDir, { events }));

    expect(ran).toBe(false);
    expect(outcomes).toEqual([
      { name: "normalize-manifest", status: "skipped", reason: "no dependency manifest", artifacts: [] },
    ]);
    expect(events.events[0]).toMatchObject({
      type: "stage.skip",
      job_id: "job-1",
      payload: { stage: "normalize-manifest", reason: "no dependency manifest" },
    });
  });

  it("records a stage that declines after running as skipped", async () => {
    const stages: Stage[] = [
      {
        name: "reconcile",
        async run() {
          return { skipped: true, reason: "no dependency tree" };
        },
      },
    ];

    const outcomes = await runStages(stages, createState(), createStageContext(jobDir, { events }));

    expect(outcomes).toEqual([
      { name: "reconcile", status: "skipped", reason: "no dependency tree", artifacts: [] },
    ]);
    expect(events.types()).toEqual(["stage.start", "stage.skip"]);
  });

  it("propagates a tool failure unchanged and stops the sequence", async () => {
    const failure = new ScanError("trivy failed");
    let reachedNext = false;
    const stages: Stage[] = [
      {
        name: "scan-sbom",
        async run() {
          throw failure;
        },
      },
      {
        name: "reconcile",
        async run() {
          reachedNext = true;
        },
      },
    ];

    const error = await runStages(stages, createState(), createStageContext(jobDir, { events })).catch(
      (err: unknown) => err,
    );

    expect(error).toBe(failure);
    expect(reachedNext).toBe(false);
    expect(events.events.at(-1)).toMatchObject({
      type: "stage.fail",
      payload: { stage: "scan-sbom", code: "scan_failed", message: "trivy failed" },
    });
  });

  it("fails a stage that outlives its timeout with a stage timeout error", async () => {
    const stages = [waitingStage("slow", new Gate())];

    const error = await runStages(stages, createState(), createStageContext(jobDir, { events }), {
      timeoutMs: 20,
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(StageTimeoutError);
    expect(error).toMatchObject({
      code: "stage_timeout",
      stage: "slow",
      message: "Stage slow timed out after 20ms",
    });
    expect(events.events.at(-1)).toMatchObject({
      type: "stage.fail",
      payload: { stage: "slow", code: "stage_timeout" },
    });
  });

  it("maps an abort of the job signal to a cancellation", async () => {
    const controller = new AbortController();
    const gate = new Gate();
    const stages = [waitingStage("slow", gate)];

    const pending = runStages(
      stages,
      createState(),
      createStageContext(jobDir, { events, signal: controller.signal }),
      { timeoutMs: 60_000 },
    ).catch((err: unknown) => err);
    controller.abort("user request");
    const error = await pending;

    expect(error).toBeInstanceOf(JobCancelledError);
    expect(error).toMatchObject({
      code: "cancelled",
      message: "Job cancelled before stage slow finished: user request",
    });
  });

  it("does not start any stage once the job signal has fired", async () => {
    const controller = new AbortController();
    controller.abort("shutdown");
    let ran = false;
    const stages: Stage[] = [
      {
        name: "fetch-source",
        async run() {
          ran = true;
        },
      },
    ];

    const error = await runStages(
      stages,
      createState(),
      createStageContext(jobDir, { events, signal: controller.signal }),
    ).catch((err: unknown) => err);

    expect(ran).toBe(false);
    expect(error).toBeInstanceOf(JobCancelledError);
    expect(events.events).toEqual([]);
  });
});
