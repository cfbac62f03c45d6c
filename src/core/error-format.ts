/*
Purpose: shared error formatting for job traces, logs and CLI output.
Assumptions: tool errors attach { stdout, stderr } on their cause.
Usage: formatErrorTrace(err) for durable traces; the CLI renders its own lines with the ANSI helpers.
*/

import type { ZodIssue } from "zod";

// =============================================================================
// TYPES
// =============================================================================

type AnsiStyle = "red" | "yellow" | "cyan" | "bold" | "dim";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  bold: [1, 22],
  dim: [2, 22],
};

const MAX_CAUSE_DEPTH = 8;

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function normalizeAbortReason(reason: unknown): string | undefined {
  if (reason === undefined || reason === null) return undefined;
  if (typeof reason === "string") return reason;
  if (reason instanceof Error) return reason.message;
  return String(reason);
}

/**
 * Full diagnostic trace: the stack of the error, then every cause in turn, then
 * any captured tool output. Stored verbatim as a failed job's error record.
 */
export function formatErrorTrace(error: unknown): string {
  const sections: string[] = [];
  let current: unknown = error;
  let depth = 0;

  while (current !== undefined && current !== null && depth < MAX_CAUSE_DEPTH) {
    const prefix = depth === 0 ? "" : "Caused by: ";
    sections.push(prefix + describeError(current));

    const output = readToolOutput(current);
    if (output) sections.push(output);

    current = current instanceof Error ? current.cause : undefined;
    depth += 1;
  }

  return sections.join("\n") + "\n";
}

export function formatZodIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

// =============================================================================
// COLOR
// =============================================================================

export function resolveColorEnabled(options: {
  stream: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (!options.stream.isTTY) return false;
  if (options.useColor !== undefined) return options.useColor;
  return process.env.NO_COLOR === undefined;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\u001b[${open}m${acc}\u001b[${close}m`;
    }, text);
}

// =============================================================================
// INTERNALS
// =============================================================================

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  if (typeof error === "object" && error !== null) {
    return JSON.stringify(error);
  }
  return String(error);
}

function readToolOutput(value: unknown): string | null {
  if (!value || typeof value !== "object") return null;

  const parts: string[] = [];
  if ("stdout" in value && typeof value.stdout === "string" && value.stdout.trim()) {
    parts.push(`--- stdout ---\n${value.stdout.trimEnd()}`);
  }
  if ("stderr" in value && typeof value.stderr === "string" && value.stderr.trim()) {
    parts.push(`--- stderr ---\n${value.stderr.trimEnd()}`);
  }

  return parts.length > 0 ? parts.join("\n") : null;
}
