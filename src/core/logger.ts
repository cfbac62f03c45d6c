import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "./error-format.js";
import { isoNow, limitText } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  job_id?: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  jobId?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

type EventDefaults = {
  jobId?: string;
};

type LogFailureAction = "write" | "close";

/** Sink shared by the service log and per-job logs. Tests pass an in-memory one. */
export interface EventSink {
  log(event: LogEventInput): void;
}

export const OUTPUT_PREVIEW_LIMIT = 4000;

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger implements EventSink {
  private readonly fileDescriptor: number;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.isDebugEnabled = resolveLoggerDebugEnabled();
  }

  log(event: LogEventInput): void {
    this.append(eventWithTs(event, this.defaults));
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

export class MemoryEventSink implements EventSink {
  readonly events: LogEvent[] = [];

  log(event: LogEventInput): void {
    this.events.push(eventWithTs(event));
  }

  types(): string[] {
    return this.events.map((event) => event.type);
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { jobId: providedJobId, payload, ts, type } = event;

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const result: LogEvent = { ts: normalizedTs, type };

  const jobId = providedJobId ?? defaults.jobId;
  if (jobId) {
    result.job_id = jobId;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

export function logJobEvent(
  sink: EventSink,
  type: string,
  jobId: string,
  payload: JsonObject = {},
): void {
  sink.log({ type, jobId, payload });
}

export function previewOutput(text: string): string {
  return limitText(text, OUTPUT_PREVIEW_LIMIT);
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stack = error instanceof Error ? error.stack : undefined;
  return stack ? `${message}\n${stack}` : message;
}

function resolveLoggerDebugEnabled(): boolean {
  let debugFlag = false;

  for (const arg of process.argv) {
    if (arg === "--") break;
    if (arg === "--debug") debugFlag = true;
    if (arg === "--no-debug") debugFlag = false;
  }

  return debugFlag;
}
