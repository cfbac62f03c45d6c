/*
 * Serve command: runs the HTTP API over a job registry until the process is signalled.
 * Assumptions: one service per state home; running jobs are allowed to settle on shutdown.
 * Common usage: `bomkeeper serve --port 5000`.
 */

import { createAppServices, type AppContext } from "../app/context.js";
import { startApiServer } from "../server/server.js";

// =============================================================================
// TYPES
// =============================================================================

export type ServeCommandOptions = {
  host?: string;
  port?: number;
};

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

// =============================================================================
// SERVE COMMAND
// =============================================================================

export async function serveCommand(appContext: AppContext, opts: ServeCommandOptions): Promise<void> {
  const { config } = appContext;
  const services = createAppServices(appContext);

  const handle = await startApiServer({
    registry: services.registry,
    host: opts.host ?? config.server.host,
    port: opts.port ?? config.server.port,
  });
  console.log(`Listening on ${handle.url} (state in ${appContext.paths.home})`);
  services.serviceLog.log({ type: "service.start", payload: { url: handle.url } });

  const signal = await waitForShutdownSignal();
  console.log(`Received ${signal}; waiting for running jobs to settle.`);

  try {
    await handle.close();
  } finally {
    services.serviceLog.log({ type: "service.stop", payload: { signal } });
    await services.close();
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals): void => {
      for (const name of SHUTDOWN_SIGNALS) process.off(name, onSignal);
      resolve(signal);
    };
    for (const name of SHUTDOWN_SIGNALS) process.once(name, onSignal);
  });
}
