// API error helpers.
// Purpose: centralize the error envelope and the mapping from domain error codes to HTTP statuses.
// Assumes API failures respond with { ok: false, error: { code, message, details? } }.
// Usage: const { status, payload } = resolveApiError(err).

import { BomkeeperError, type ErrorCode } from "../../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ApiErrorDetails = Record<string, unknown>;

export type ApiErrorCode =
  | "conflict"
  | "not_found"
  | "invalid_state"
  | "bad_request"
  | "record_unreadable"
  | "internal_error";

export type ApiErrorPayload = {
  ok: false;
  error: {
    code: ApiErrorCode;
    message: string;
    details?: ApiErrorDetails;
  };
};

export type ApiErrorResponse = {
  status: number;
  payload: ApiErrorPayload;
};

// =============================================================================
// ERROR BUILDERS
// =============================================================================

const STATUS_BY_CODE: Partial<Record<ErrorCode, { status: number; code: ApiErrorCode }>> = {
  conflict: { status: 409, code: "conflict" },
  not_found: { status: 404, code: "not_found" },
  invalid_state: { status: 400, code: "invalid_state" },
  bad_request: { status: 400, code: "bad_request" },
  record_unreadable: { status: 500, code: "record_unreadable" },
};

export function buildApiErrorPayload(params: {
  code: ApiErrorCode;
  message: string;
  details?: ApiErrorDetails;
}): ApiErrorPayload {
  const error = {
    code: params.code,
    message: params.message,
    ...(params.details ? { details: params.details } : {}),
  };

  return { ok: false, error };
}

/** Registry errors keep their message; anything else is an opaque internal error. */
export function resolveApiError(err: unknown): ApiErrorResponse {
  if (err instanceof BomkeeperError) {
    const mapped = STATUS_BY_CODE[err.code];
    if (mapped) {
      return {
        status: mapped.status,
        payload: buildApiErrorPayload({ code: mapped.code, message: err.message }),
      };
    }
  }

  return {
    status: 500,
    payload: buildApiErrorPayload({
      code: "internal_error",
      message: "Unexpected server error.",
      details: buildInternalErrorDetails(err),
    }),
  };
}

export function buildInternalErrorDetails(cause: unknown): ApiErrorDetails {
  const details: ApiErrorDetails = { reason: "unexpected_error" };

  if (cause instanceof BomkeeperError) {
    details.error_code = cause.code;
  }

  return details;
}
