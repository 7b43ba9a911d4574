/**
 * Global error handler.
 *
 * Maps domain errors to HTTP status codes and wraps every failure in the
 * error envelope. Anything that is not a DomainError becomes a 500
 * without its message.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { isDomainError } from "@commitlock/types";
import type { DomainErrorCode } from "@commitlock/types";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<DomainErrorCode, ContentfulStatusCode>> = {
  // Validation
  INVALID_AMOUNT: 400,
  INVALID_DURATION: 400,
  INVALID_MAX_LOSS: 400,
  INVALID_PENALTY: 400,
  INVALID_COMMITMENT_TYPE: 400,
  INVALID_ATTESTATION_TYPE: 400,
  INVALID_PERCENT: 400,
  SELF_TRANSFER: 400,
  EMPTY_BATCH: 400,
  BATCH_TOO_LARGE: 400,

  // Lookups
  NOT_FOUND: 404,
  TOKEN_NOT_FOUND: 404,

  // State conflicts
  NOT_INITIALIZED: 409,
  ALREADY_INITIALIZED: 409,
  NOT_OWNER: 409,
  ALREADY_SETTLED: 409,
  ALREADY_EXITED: 409,
  TABLE_ALREADY_OPEN: 409,
  NOT_EXPIRED: 422,

  // Concurrency
  REENTRANCY_DETECTED: 409,

  // Authorization
  UNAUTHORIZED: 403,
};

// =============================================================================
// Handler
// =============================================================================

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (isDomainError(err)) {
    return c.json(createErrorEnvelope(err.code, err.message), STATUS_MAP[err.code]);
  }

  // Malformed JSON bodies are rejected by Hono's validator before ours runs
  if (err instanceof HTTPException && err.status === 400) {
    return c.json(createErrorEnvelope("VALIDATION_ERROR", err.message), 400);
  }

  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}
