/**
 * Standardized Error Handling
 *
 * Error classes raised by the monitoring core and its collaborators, plus the
 * consistent error response format used by the API routes.
 * Format: { error: string, code: string, details?: unknown }
 */

import type { Context } from "hono";

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

/**
 * A collaborator (decision history, runtime configuration) could not be read.
 * The monitor skips the iteration and keeps its previous snapshot.
 */
export class DataAccessError extends Error {
  readonly code = "data_access_failed";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DataAccessError";
  }
}

/** Lookup of an alert (or trader) by id found nothing. */
export class NotFoundError extends Error {
  readonly code: string;

  constructor(message: string, code = "alert_not_found") {
    super(message);
    this.name = "NotFoundError";
    this.code = code;
  }
}

/** An alert handler failed to deliver. Logged, never propagated. */
export class HandlerError extends Error {
  readonly code = "alert_handler_failed";
  readonly handler: string;
  readonly alertId: string;

  constructor(
    handler: string,
    alertId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${handler}: ${message}`, options);
    this.name = "HandlerError";
    this.handler = handler;
    this.alertId = alertId;
  }
}

/**
 * Render any thrown value as a message string.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

// ---------------------------------------------------------------------------
// API responses
// ---------------------------------------------------------------------------

export interface ApiError {
  error: string;
  code: string;
  details?: unknown;
}

/**
 * Standard error codes mapped to HTTP status codes
 */
export const ErrorCodes = {
  // 404 Not Found
  TRADER_NOT_FOUND: { status: 404, code: "trader_not_found" },
  ALERT_NOT_FOUND: { status: 404, code: "alert_not_found" },

  // 500 Internal Server Error
  INTERNAL_ERROR: { status: 500, code: "internal_error" },

  // 503 Service Unavailable
  DATA_ACCESS_FAILED: { status: 503, code: "data_access_failed" },
} as const;

export type ErrorCodeKey = keyof typeof ErrorCodes;

/**
 * Create a standardized API error response
 */
export function apiError(
  c: Context,
  errorCode: ErrorCodeKey,
  details?: unknown,
) {
  const { status, code } = ErrorCodes[errorCode];
  const response: ApiError = {
    error: code,
    code,
    ...(details !== undefined && { details }),
  };
  return c.json(response, status);
}

/**
 * Map a caught exception onto the matching API error.
 */
export function handleError(c: Context, err: unknown): Response {
  if (err instanceof NotFoundError) {
    return apiError(
      c,
      err.code === "trader_not_found" ? "TRADER_NOT_FOUND" : "ALERT_NOT_FOUND",
      err.message,
    );
  }
  if (err instanceof DataAccessError) {
    return apiError(c, "DATA_ACCESS_FAILED", err.message);
  }
  return apiError(c, "INTERNAL_ERROR", errorMessage(err));
}
