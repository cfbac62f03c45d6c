import { Command, InvalidArgumentError } from "commander";

import { loadAppContext } from "../app/config/load-app-context.js";
import type { AppContext } from "../app/context.js";

import { compareCommand } from "./compare.js";
import { deleteCommand, reportCommand, scanCommand } from "./jobs.js";
import { serveCommand } from "./serve.js";

export function buildCli(): Command {
  const program = new Command();

  const resolveContext = (): AppContext => {
    const globals = program.opts<{ config?: string }>();
    return loadAppContext({ explicitConfigPath: globals.config }).appContext;
  };

  program
    .name("bomkeeper")
    .description("SBOM generation, vulnerability scanning and dependency reconciliation jobs")
    .version("0.1.0")
    .option(
      "--config <path>",
      "Config file (defaults to $BOMKEEPER_CONFIG, then ./bomkeeper.yaml)",
    )
    .option("--debug", "Print stack traces for errors", false)
    .option("--no-debug", "Disable stack traces");

  program
    .command("serve")
    .description("Run the HTTP job service until SIGINT/SIGTERM")
    .option("--host <host>", "Interface to bind (default from config)")
    .option("--port <n>", "Port to listen on (default from config)", parsePort)
    .action(async (opts: { host?: string; port?: number }) => {
      await serveCommand(resolveContext(), { host: opts.host, port: opts.port });
    });

  program
    .command("scan")
    .description("Run one scan job in the foreground and print its summary")
    .argument("<sourceRef>", "Repository URL, optionally suffixed with @branch")
    .option("--id <id>", "Job id (default: timestamp)")
    .option("--json", "Print the job view as JSON", false)
    .action(async (sourceRef: string, opts: { id?: string; json: boolean }) => {
      process.exitCode = await scanCommand(resolveContext(), sourceRef, opts);
    });

  program
    .command("compare")
    .description("Reconcile a dependency tree document against a CycloneDX SBOM")
    .requiredOption("--tree <file>", "Dependency tree JSON ({packages:[{name, children}]})")
    .requiredOption("--sbom <file>", "CycloneDX JSON SBOM")
    .option("--json", "Print the comparison as JSON", false)
    .action(async (opts: { tree: string; sbom: string; json: boolean }) => {
      process.exitCode = await compareCommand(opts);
    });

  program
    .command("report")
    .description("Show the durable record of a job")
    .argument("<id>", "Job id")
    .option("--json", "Print the job view as JSON", false)
    .action(async (id: string, opts: { json: boolean }) => {
      await reportCommand(resolveContext(), id, opts);
    });

  program
    .command("delete")
    .description("Remove a finished job and its records")
    .argument("<id>", "Job id")
    .action(async (id: string) => {
      await deleteCommand(resolveContext(), id);
    });

  return program;
}

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535 || String(port) !== value.trim()) {
    throw new InvalidArgumentError("Port must be an integer between 0 and 65535.");
  }
  return port;
}
