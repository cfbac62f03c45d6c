import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { loadAppContext } from "../app/config/load-app-context.js";
import { createAppServices } from "../app/context.js";
import { createFakeCollaborators } from "../app/pipeline/__tests__/fakes.js";
import { serviceLogPath } from "../core/paths.js";

const ENV_VARS = ["BOMKEEPER_HOME", "BOMKEEPER_CONFIG"] as const;
const originalEnv = new Map(ENV_VARS.map((key) => [key, process.env[key]]));

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;

  for (const [key, value] of originalEnv) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
});

// =============================================================================
// HELPERS
// =============================================================================

function makeDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "app-context-"));
  tempDirs.push(dir);
  return dir;
}

// =============================================================================
// TESTS
// =============================================================================

describe("loadAppContext", () => {
  it("falls back to defaults under the working directory", () => {
    const dir = makeDir();
    delete process.env.BOMKEEPER_HOME;
    delete process.env.BOMKEEPER_CONFIG;

    const { appContext } = loadAppContext({ cwd: dir });

    expect(appContext.configPath).toBeNull();
    expect(appContext.paths.home).toBe(path.join(dir, ".bomkeeper"));
    expect(appContext.config.jobs.max_concurrent).toBe(2);
  });

  it("respects BOMKEEPER_HOME overrides without touching the environment", () => {
    const dir = makeDir();
    const override = path.join(dir, "state-home");
    process.env.BOMKEEPER_HOME = override;
    delete process.env.BOMKEEPER_CONFIG;

    const { appContext } = loadAppContext({ cwd: dir });

    expect(appContext.paths.home).toBe(override);
    expect(process.env.BOMKEEPER_HOME).toBe(override);
  });

  it("discovers bomkeeper.yaml in the working directory", () => {
    const dir = makeDir();
    delete process.env.BOMKEEPER_CONFIG;
    const configPath = path.join(dir, "bomkeeper.yaml");
    fs.writeFileSync(configPath, "home: ./jobs-home\njobs:\n  max_concurrent: 4\n", "utf8");

    const { appContext } = loadAppContext({ cwd: dir });

    expect(appContext.configPath).toBe(configPath);
    expect(appContext.paths.home).toBe(path.join(dir, "jobs-home"));
    expect(appContext.config.jobs.max_concurrent).toBe(4);
  });
});

describe("createAppServices", () => {
  it("writes the service log under the state home", async () => {
    const dir = makeDir();
    delete process.env.BOMKEEPER_CONFIG;
    fs.writeFileSync(path.join(dir, "bomkeeper.yaml"), "home: ./state\n", "utf8");
    const { appContext } = loadAppContext({ cwd: dir });

    const services = createAppServices(appContext, { collaborators: createFakeCollaborators() });
    await services.registry.submit("x", "https://example.test/org/repo.git");
    await services.registry.waitFor("x");
    await services.close();

    const events = fs
      .readFileSync(serviceLogPath(appContext.paths), "utf8")
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line));
    expect(events.map((event) => event.type)).toEqual(["job.submit", "job.start", "job.complete"]);
    expect(events.every((event) => event.job_id === "x")).toBe(true);
  });
});
