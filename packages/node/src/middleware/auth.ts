/**
 * Authentication middleware.
 *
 * Two modes:
 * 1. Secured: X-Api-Key is looked up in the configured key registry and
 *    the request runs as the key's principal
 * 2. Unsecured (no keys configured): the principal comes from the
 *    X-Principal header, falling back to a default principal
 *
 * On success, sets `c.set("auth", authContext)`. On failure, returns 401.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, AuthContext, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const PRINCIPAL_HEADER = "X-Principal";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    const auth: AuthContext = {
      type: "api-key",
      principal: record.principal,
      role: record.role,
    };
    c.set("auth", auth);
    c.set("principal", auth.principal);
    return next();
  };
}

/**
 * Unsecured mode for tests and local development. Every caller may act
 * as any principal.
 */
export function principalHeaderMiddleware(defaultPrincipal: string): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const principal = c.req.header(PRINCIPAL_HEADER) ?? defaultPrincipal;
    const auth: AuthContext = { type: "header", principal, role: "admin" };
    c.set("auth", auth);
    c.set("principal", principal);
    return next();
  };
}

// =============================================================================
// Permission Guard
// =============================================================================

/**
 * Must run AFTER an auth middleware. Returns 403 if the authenticated
 * role lacks the required permission.
 */
export function requirePermission(permission: Permission): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (!hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope(
          "FORBIDDEN",
          `Role '${auth.role}' lacks '${permission}' permission`,
        ),
        403,
      );
    }
    return next();
  };
}

/**
 * Reads are open to every role; anything else needs `write`.
 */
export function requireWriteForMutations(): MiddlewareHandler<AppEnv> {
  const guard = requirePermission("write");
  return async (c, next) => {
    if (c.req.method === "GET" || c.req.method === "HEAD") {
      return next();
    }
    return guard(c, next);
  };
}
