import path from "node:path";

import fse from "fs-extra";

import { FetchError } from "../core/errors.js";
import type { SourceFetcher, StageContext } from "../app/pipeline/ports.js";

export type SourceRef = {
  url: string;
  branch?: string;
};

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Splits `url@branch`. The `@` only separates a branch when it follows a `/`
 * of the scheme-less URL, so `git@host:org/repo.git` carries no branch while
 * `https://host/org/repo.git@dev` selects `dev`.
 */
export function parseSourceRef(sourceRef: string): SourceRef {
  const trimmed = sourceRef.trim();
  if (!trimmed) {
    throw new FetchError("Source reference is empty");
  }

  const scheme = SCHEME_PATTERN.exec(trimmed)?.[0] ?? "";
  const rest = trimmed.slice(scheme.length);
  const slash = rest.indexOf("/");
  const at = rest.lastIndexOf("@");

  if (slash === -1 || at < slash) {
    return { url: trimmed };
  }

  const url = scheme + rest.slice(0, at);
  const branch = rest.slice(at + 1);
  if (!branch) {
    throw new FetchError(`Source reference ${sourceRef} names an empty branch`);
  }
  return { url, branch };
}

export function buildCloneArgs(ref: SourceRef, targetDir: string): string[] {
  const args = ["clone"];
  if (ref.branch) {
    args.push("-b", ref.branch);
  }
  args.push("--", ref.url, targetDir);
  return args;
}

export class GitSourceFetcher implements SourceFetcher {
  constructor(private readonly gitBin: string = "git") {}

  async fetch(sourceRef: string, ctx: StageContext): Promise<string> {
    const ref = parseSourceRef(sourceRef);
    const targetDir = path.join(ctx.jobDir, "repo");

    // A checkout left by an earlier run of the same id is never reused.
    await fse.remove(targetDir);
    await fse.ensureDir(ctx.jobDir);

    await ctx.run(
      {
        command: this.gitBin,
        args: buildCloneArgs(ref, targetDir),
        cwd: ctx.jobDir,
        env: { GIT_TERMINAL_PROMPT: "0" },
        signal: ctx.signal,
      },
      (message, cause) => new FetchError(message, cause),
    );

    return targetDir;
  }
}
