/**
 * Per-request context: request id and the request log.
 *
 * An incoming X-Request-Id is kept when it is a short token (letters,
 * digits, `.`, `_`, `:` or `-`, at most 128 characters); anything else is
 * replaced with a fresh UUID. The id is echoed on every response.
 *
 * When a sink is given, one entry per request is handed to it after the
 * response is built, including the principal the auth layer resolved.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const REQUEST_ID_PATTERN = /^[\w.:-]{1,128}$/;

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** Null for routes outside the API (health, readiness) and rejected credentials. */
  readonly principal: string | null;
}

export type RequestLogSink = (entry: RequestLogEntry) => void;

export function requestContextMiddleware(log?: RequestLogSink): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const startedAt = performance.now();
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const requestId =
      incoming !== undefined && REQUEST_ID_PATTERN.test(incoming) ? incoming : randomUUID();
    c.set("requestId", requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
    log?.({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - startedAt),
      requestId,
      principal: c.get("principal") ?? null,
    });
  };
}
