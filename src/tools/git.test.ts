import { describe, expect, it } from "vitest";

import { FetchError } from "../core/errors.js";
import { buildCloneArgs, parseSourceRef } from "./git.js";

describe("parseSourceRef", () => {
  it("splits a trailing branch from an https url", () => {
    expect(parseSourceRef("https://example.test/org/repo.git@dev")).toEqual({
      url: "https://example.test/org/repo.git",
      branch: "dev",
    });
  });

  it("leaves a url without a branch alone", () => {
    expect(parseSourceRef("https://example.test/org/repo.git")).toEqual({
      url: "https://example.test/org/repo.git",
    });
  });

  it("does not treat the user part of an scp-style url as a branch", () => {
    expect(parseSourceRef("git@example.test:org/repo.git")).toEqual({
      url: "git@example.test:org/repo.git",
    });
    expect(parseSourceRef("git@example.test:org/repo.git@release/1.x")).toEqual({
      url: "git@example.test:org/repo.git",
      branch: "release/1.x",
    });
  });

  it("keeps credentials in the authority", () => {
    expect(parseSourceRef("https://token@example.test/org/repo.git")).toEqual({
      url: "https://token@example.test/org/repo.git",
    });
  });

  it("rejects empty references and empty branches", () => {
    expect(() => parseSourceRef("  ")).toThrow(FetchError);
    expect(() => parseSourceRef("https://example.test/org/repo.git@")).toThrow(
      "names an empty branch",
    );
  });
});

describe("buildCloneArgs", () => {
  it("passes the branch and guards the url", () => {
    expect(buildCloneArgs({ url: "https://example.test/r.git", branch: "main" }, "/jobs/x/repo")).toEqual([
      "clone",
      "-b",
      "main",
      "--",
      "https://example.test/r.git",
      "/jobs/x/repo",
    ]);
  });
});
