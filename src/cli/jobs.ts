import { createAppServices, type AppContext, type AppServices } from "../app/context.js";
import type { JobView } from "../app/jobs/registry.js";

import { formatJobSummary } from "./job-summary.js";

// =============================================================================
// TYPES
// =============================================================================

export type ScanCommandOptions = {
  id?: string;
  json?: boolean;
};

export type ReportCommandOptions = {
  json?: boolean;
};

export type JobCommandDeps = {
  createServices?: (appContext: AppContext) => AppServices;
};

// =============================================================================
// SCAN
// =============================================================================

/** Runs one job in the foreground. Returns 1 when the job failed. */
export async function scanCommand(
  appContext: AppContext,
  sourceRef: string,
  opts: ScanCommandOptions,
  deps: JobCommandDeps = {},
): Promise<number> {
  const services = (deps.createServices ?? createAppServices)(appContext);
  const id = opts.id ?? defaultJobId();

  let view: JobView;
  try {
    await services.registry.submit(id, sourceRef);
    console.log(`Submitted job ${id} for ${sourceRef}`);
    view = await services.registry.waitFor(id);
  } finally {
    await services.close();
  }

  printView(view, opts.json);
  return view.status === "failed" ? 1 : 0;
}

// =============================================================================
// REPORT / DELETE
// =============================================================================

export async function reportCommand(
  appContext: AppContext,
  id: string,
  opts: ReportCommandOptions,
  deps: JobCommandDeps = {},
): Promise<void> {
  const services = (deps.createServices ?? createAppServices)(appContext);
  try {
    printView(await services.registry.poll(id), opts.json);
  } finally {
    await services.close();
  }
}

export async function deleteCommand(
  appContext: AppContext,
  id: string,
  deps: JobCommandDeps = {},
): Promise<void> {
  const services = (deps.createServices ?? createAppServices)(appContext);
  try {
    await services.registry.delete(id);
    console.log(`Deleted job ${id}`);
  } finally {
    await services.close();
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function printView(view: JobView, json?: boolean): void {
  if (json) {
    console.log(JSON.stringify(view, null, 2));
    return;
  }
  for (const line of formatJobSummary(view)) {
    console.log(line);
  }
}

function defaultJobId(): string {
  return `scan-${new Date().toISOString().replace(/[:.]/g, "-")}`;
}
