import type { IncomingMessage, ServerResponse } from "node:http";

import { z } from "zod";

import { InvalidRequestError } from "../core/errors.js";
import { formatZodIssues } from "../core/error-format.js";
import type { JobRegistry } from "../app/jobs/registry.js";

import { buildApiErrorPayload, resolveApiError } from "./http/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ApiRouterOptions = {
  registry: JobRegistry;
  /** Largest accepted request body, in bytes. */
  maxBodyBytes?: number;
};

type ApiRouteMatch =
  | { type: "scan" }
  | { type: "report"; source: "query" }
  | { type: "report"; source: "path"; id: string }
  | { type: "delete"; id: string }
  | { type: "cancel"; id: string }
  | { type: "health" }
  | { type: "method_not_allowed" }
  | { type: "bad_request" }
  | { type: "not_found" };

const ScanRequestSchema = z.object({
  id: z.string().min(1),
  giturl: z.string().min(1),
});

const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

// =============================================================================
// PUBLIC API
// =============================================================================

export function createApiRouter(options: ApiRouterOptions): (req: IncomingMessage, res: ServerResponse) => void {
  return (req, res) => {
    void routeRequest(req, res, options);
  };
}

// =============================================================================
// ROUTING
// =============================================================================

async function routeRequest(req: IncomingMessage, res: ServerResponse, options: ApiRouterOptions): Promise<void> {
  const method = (req.method ?? "GET").toUpperCase();

  let url: URL;
  try {
    url = new URL(req.url ?? "/", "http://127.0.0.1");
  } catch {
    sendApiError(res, 400, buildApiErrorPayload({ code: "bad_request", message: "Malformed request URL." }));
    return;
  }

  try {
    await handleApiRequest(req, res, method, url, options);
  } catch (err) {
    if (res.headersSent) {
      res.end();
      return;
    }
    const { status, payload } = resolveApiError(err);
    sendApiError(res, status, payload);
  }
}

async function handleApiRequest(
  req: IncomingMessage,
  res: ServerResponse,
  method: string,
  url: URL,
  options: ApiRouterOptions,
): Promise<void> {
  const { registry } = options;
  const route = matchApiRoute(method, url.pathname);

  switch (route.type) {
    case "not_found":
      sendApiError(res, 404, buildApiErrorPayload({ code: "not_found", message: "Endpoint not found." }));
      return;
    case "method_not_allowed":
      sendApiError(
        res,
        400,
        buildApiErrorPayload({ code: "bad_request", message: `Method ${method} not allowed.` }),
      );
      return;
    case "bad_request":
      sendApiError(res, 400, buildApiErrorPayload({ code: "bad_request", message: "Malformed job id." }));
      return;
    case "scan": {
      const body = await readJsonBody(req, options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES);
      const parsed = ScanRequestSchema.safeParse(body);
      if (!parsed.success) {
        throw new InvalidRequestError(`Invalid scan request:\n${formatZodIssues(parsed.error.issues)}`);
      }
      sendApiOk(res, 202, await registry.submit(parsed.data.id, parsed.data.giturl));
      return;
    }
    case "report": {
      const id = route.source === "path" ? route.id : url.searchParams.get("ID");
      if (!id) {
        throw new InvalidRequestError("Query parameter ID is required");
      }
      sendApiOk(res, 200, await registry.poll(id));
      return;
    }
    case "delete":
      await registry.delete(route.id);
      sendApiOk(res, 200, { id: route.id, deleted: true });
      return;
    case "cancel":
      sendApiOk(res, 200, await registry.cancel(route.id));
      return;
    case "health":
      sendApiOk(res, 200, { status: "ok", jobs: registry.counts() });
      return;
  }
}

function matchApiRoute(method: string, pathname: string): ApiRouteMatch {
  const segments = pathname.split("/").filter(Boolean);
  if (segments[0] !== "api") {
    return { type: "not_found" };
  }

  const only = (allowed: string, match: ApiRouteMatch): ApiRouteMatch =>
    method === allowed ? match : { type: "method_not_allowed" };

  if (segments.length === 2) {
    switch (segments[1]) {
      case "scan_repo":
        return only("POST", { type: "scan" });
      case "getReport":
        return only("GET", { type: "report", source: "query" });
      case "health":
        return only("GET", { type: "health" });
      default:
        return { type: "not_found" };
    }
  }

  const [, collection, idSegment, action] = segments;
  if (idSegment === undefined) {
    return { type: "not_found" };
  }
  const id = safeDecodeSegment(idSegment);
  if (!id) {
    return { type: "bad_request" };
  }

  if (segments.length === 3 && collection === "jobs") {
    return only("GET", { type: "report", source: "path", id });
  }
  if (segments.length === 3 && collection === "job") {
    return only("DELETE", { type: "delete", id });
  }
  if (segments.length === 4 && collection === "job" && action === "cancel") {
    return only("POST", { type: "cancel", id });
  }

  return { type: "not_found" };
}

// =============================================================================
// RESPONSES
// =============================================================================

function sendApiOk(res: ServerResponse, status: number, result: unknown): void {
  sendJson(res, status, { ok: true, result });
}

function sendApiError(res: ServerResponse, status: number, payload: unknown): void {
  sendJson(res, status, payload);
}

function sendJson(res: ServerResponse, status: number, payload: unknown): void {
  const body = JSON.stringify(payload);
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.setHeader("Cache-Control", "no-store");
  res.setHeader("Content-Length", Buffer.byteLength(body));
  res.end(body);
}

// =============================================================================
// UTILITIES
// =============================================================================

async function readJsonBody(req: IncomingMessage, limit: number): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > limit) {
      throw new InvalidRequestError(`Request body exceeds ${limit} bytes`);
    }
    chunks.push(buffer);
  }

  const raw = Buffer.concat(chunks).toString("utf8");
  if (!raw.trim()) {
    throw new InvalidRequestError("Request body is empty");
  }

  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new InvalidRequestError("Request body is not valid JSON", err);
  }
}

function safeDecodeSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}
