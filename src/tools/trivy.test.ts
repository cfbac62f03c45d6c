import path from "node:path";

import { describe, expect, it } from "vitest";

import { ScanError } from "../core/errors.js";
import { createRecordingRunner, createStageContext } from "../__tests__/helpers/fixtures.js";
import { buildTrivyArgs, TrivyScanner } from "./trivy.js";

describe("buildTrivyArgs", () => {
  it("joins scanners into one flag", () => {
    expect(buildTrivyArgs("/job/sbom.json", "json", "/job/out.json", ["vuln", "license"])).toEqual([
      "sbom",
      "/job/sbom.json",
      "--format",
      "json",
      "--scanners",
      "vuln,license",
      "-o",
      "/job/out.json",
    ]);
  });
});

describe("TrivyScanner", () => {
  it("writes the three report formats into the job directory", async () => {
    const { run, calls } = createRecordingRunner();
    const ctx = createStageContext("/jobs/a", { run });

    const locations = await new TrivyScanner("trivy-bin").scan(
      "/jobs/a/sbom.json",
      { structured: "s.json", flat: "f.json", table: "t.txt" },
      ctx,
    );

    expect(locations).toEqual({
      structured: path.join("/jobs/a", "s.json"),
      flat: path.join("/jobs/a", "f.json"),
      table: path.join("/jobs/a", "t.txt"),
    });
    expect(calls.map((call) => call.args[3])).toEqual(["cyclonedx", "json", "table"]);
    expect(calls.every((call) => call.command === "trivy-bin" && call.cwd === "/jobs/a")).toBe(true);
  });

  it("reports a failed pass as a scan error", async () => {
    const { run } = createRecordingRunner();
    const failing = createStageContext("/jobs/a", {
      run: async (invocation, fail) => {
        if (invocation.args[3] === "json") throw fail("trivy exited 1");
        return run(invocation, fail);
      },
    });

    const error = await new TrivyScanner()
      .scan("/jobs/a/sbom.json", { structured: "s.json", flat: "f.json", table: "t.txt" }, failing)
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ScanError);
    expect(error).toMatchObject({ message: "trivy exited 1" });
  });
});
