/**
 * CLI rendering of failures. A domain error shows the same kind a job view
 * reports; a failed external tool shows its command line, exit code and the
 * tail of its stderr, wherever it sits in the cause chain.
 */

import { BomkeeperError } from "../core/errors.js";
import {
  createAnsiFormatter,
  formatErrorMessage,
  resolveColorEnabled,
  type AnsiFormatter,
} from "../core/error-format.js";
import { ToolCommandError } from "../tools/exec.js";

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

const STDERR_TAIL_LINES = 10;
const MAX_CAUSE_DEPTH = 8;

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const stream = options.stream ?? process.stderr;
  const format = createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));

  const lines = [`${format("Error:", ["red", "bold"])} ${format(formatErrorMessage(error), ["bold"])}`];
  if (error instanceof BomkeeperError) {
    lines.push(field(format, "Kind", error.code));
  }

  const tool = findToolFailure(error);
  if (tool) {
    lines.push(field(format, "Command", tool.commandLine));
    lines.push(field(format, "Directory", tool.cwd));
    lines.push(field(format, "Exit code", tool.exitCode === undefined ? "unknown" : String(tool.exitCode)));
    const tail = stderrTail(tool.stderr);
    if (tail) {
      lines.push(`${format("Stderr:", ["dim"])}\n${indent(tail)}`);
    }
  }

  if (!options.debug) {
    return lines.join("\n");
  }

  for (const cause of causeChain(error)) {
    const text = cause instanceof Error ? `${cause.name}: ${cause.message}` : formatErrorMessage(cause);
    lines.push(field(format, "Caused by", text));
  }
  if (error instanceof Error && error.stack) {
    lines.push(`${format("Stack:", ["dim"])}\n${format(indent(error.stack), ["dim"])}`);
  }

  return lines.join("\n");
}

// =============================================================================
// INTERNALS
// =============================================================================

function field(format: AnsiFormatter, label: string, value: string): string {
  return `${format(`${label}:`, ["dim"])} ${value}`;
}

function causeChain(error: unknown): unknown[] {
  const causes: unknown[] = [];
  let current = error instanceof Error ? error.cause : undefined;
  while (current !== undefined && current !== null && causes.length < MAX_CAUSE_DEPTH) {
    causes.push(current);
    current = current instanceof Error ? current.cause : undefined;
  }
  return causes;
}

function findToolFailure(error: unknown): ToolCommandError | null {
  if (error instanceof ToolCommandError) return error;
  return causeChain(error).find((cause): cause is ToolCommandError => cause instanceof ToolCommandError) ?? null;
}

function stderrTail(stderr: string): string | null {
  const lines = stderr.trimEnd().split("\n");
  if (lines.length === 1 && lines[0] === "") return null;

  const dropped = lines.length - STDERR_TAIL_LINES;
  if (dropped <= 0) return lines.join("\n");
  return [`... ${dropped} earlier lines`, ...lines.slice(dropped)].join("\n");
}

function indent(value: string): string {
  return value
    .split("\n")
    .map((line) => `  ${line}`)
    .join("\n");
}
