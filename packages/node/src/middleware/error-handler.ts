/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps ProtocolError and StoreError codes to HTTP status codes.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { StoreError } from "@warden/store";
import type { StoreErrorCode } from "@warden/store";
import { ProtocolError } from "@warden/types";
import type { ProtocolErrorCode } from "@warden/types";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Record<ProtocolErrorCode | StoreErrorCode, ContentfulStatusCode> = {
  // Protocol errors
  ALREADY_EXISTS: 409,
  NOT_FOUND: 404,
  INSUFFICIENT_BALANCE: 422,
  NOT_OWNER: 403,
  INVALID_AUTHORIZATION: 403,
  CLAWBACK_DISABLED: 422,
  NOT_MANAGED_TREASURY: 422,
  CANNOT_CLAWBACK_MANAGED: 422,
  SUPPLY_MUST_BE_ZERO: 422,
  INSUFFICIENT_SUPPLY: 422,
  INVALID_AMOUNT: 400,
  AMOUNT_OVERFLOW: 422,
  INVALID_IDENTITY: 400,
  INVALID_DESCRIPTOR: 400,
  REQUEST_CONSUMED: 409,
  BALANCE_CONSUMED: 409,
  FOREIGN_OBJECT: 400,
  ASSET_MISMATCH: 400,
  AUTHORITY_LOCKED: 409,

  // Store errors
  CONCURRENCY_CONFLICT: 409,
  UNIT_CLOSED: 409,
  UNRESOLVED_OBLIGATION: 422,
  UNKNOWN_RECORD: 500,
  ASYNC_UNIT: 500,
};

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof ProtocolError || err instanceof StoreError) {
    const status = STATUS_MAP[err.code];
    // Don't leak internal details
    const message = status === 500 ? "Internal server error" : err.message;
    return c.json(createErrorEnvelope(err.code, message), status);
  }

  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}
