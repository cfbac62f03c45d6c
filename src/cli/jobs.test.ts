import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createAppContext, createAppServices, type AppContext } from "../app/context.js";
import { createFakeCollaborators, type FakeCollaborators } from "../app/pipeline/__tests__/fakes.js";
import { parseAppConfig } from "../core/config-loader.js";
import { FetchError, JobNotFoundError } from "../core/errors.js";
import { MemoryEventSink } from "../core/logger.js";
import { createTempHome, type TempHome } from "../__tests__/helpers/fixtures.js";

import { deleteCommand, reportCommand, scanCommand, type JobCommandDeps } from "./jobs.js";

const SOURCE = "https://example.test/org/repo.git";

describe("job commands", () => {
  let home: TempHome;
  let appContext: AppContext;
  let collaborators: FakeCollaborators;
  let deps: JobCommandDeps;
  let logs: string[];

  beforeEach(() => {
    home = createTempHome("cli-jobs-");
    appContext = createAppContext({
      configPath: null,
      config: parseAppConfig({ home: home.root }, { file: "<defaults>", cwd: home.root }),
    });
    collaborators = createFakeCollaborators();
    deps = {
      createServices: (ctx) => createAppServices(ctx, { collaborators, serviceLog: new MemoryEventSink() }),
    };
    logs = [];
    vi.spyOn(console, "log").mockImplementation((line: unknown) => {
      logs.push(String(line));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    home.cleanup();
  });

  it("runs a scan in the foreground and prints its summary", async () => {
    const code = await scanCommand(appContext, SOURCE, { id: "x" }, deps);

    expect(code).toBe(0);
    expect(logs[0]).toBe(`Submitted job x for ${SOURCE}`);
    expect(logs).toContain("Status: completed");
    expect(logs).toContain("Language: go (go-modules)");
  });

  it("exits with 1 when the scan fails", async () => {
    collaborators.fetcher.error = new FetchError("repository not found");

    const code = await scanCommand(appContext, SOURCE, { id: "x" }, deps);

    expect(code).toBe(1);
    expect(logs).toContain("Status: failed");
    expect(logs.at(-1)).toMatch(/^Error \[fetch_failed\]: \w*Error: repository not found$/);
  });

  it("reads a finished job back from its durable record and deletes it", async () => {
    await scanCommand(appContext, SOURCE, { id: "x" }, deps);
    logs.length = 0;

    await reportCommand(appContext, "x", { json: true }, deps);
    const printed = JSON.parse(logs[0] ?? "null");
    expect(printed.status).toBe("completed");
    expect(printed.report.job_id).toBe("x");

    await deleteCommand(appContext, "x", deps);
    expect(logs.at(-1)).toBe("Deleted job x");

    await expect(reportCommand(appContext, "x", {}, deps)).rejects.toBeInstanceOf(JobNotFoundError);
  });
});
