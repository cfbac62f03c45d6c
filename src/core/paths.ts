import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  home: string;
};

export type ResolveHomeOptions = {
  home?: string;
  cwd?: string;
};

// =============================================================================
// CONTEXT
// =============================================================================

export function resolveBomkeeperHome(opts: ResolveHomeOptions = {}): string {
  if (opts.home) {
    return path.resolve(opts.home);
  }

  if (process.env.BOMKEEPER_HOME) {
    return path.resolve(process.env.BOMKEEPER_HOME);
  }

  return path.join(path.resolve(opts.cwd ?? process.cwd()), ".bomkeeper");
}

export function createPathsContext(opts: ResolveHomeOptions = {}): PathsContext {
  return { home: resolveBomkeeperHome(opts) };
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function jobsDir(paths: PathsContext): string {
  return path.join(paths.home, "jobs");
}

export function jobDir(paths: PathsContext, jobId: string): string {
  return path.join(jobsDir(paths), jobId);
}

export function jobReportPath(paths: PathsContext, jobId: string): string {
  return path.join(jobDir(paths, jobId), "report.json");
}

export function jobErrorPath(paths: PathsContext, jobId: string): string {
  return path.join(jobDir(paths, jobId), "error.txt");
}

export function jobEventsPath(paths: PathsContext, jobId: string): string {
  return path.join(jobDir(paths, jobId), "events.jsonl");
}

export function logsDir(paths: PathsContext): string {
  return path.join(paths.home, "logs");
}

export function serviceLogPath(paths: PathsContext): string {
  return path.join(logsDir(paths), "service.jsonl");
}

export function toolsDir(paths: PathsContext): string {
  return path.join(paths.home, "tools");
}

export function toolsBinDir(paths: PathsContext): string {
  return path.join(toolsDir(paths), "bin");
}
