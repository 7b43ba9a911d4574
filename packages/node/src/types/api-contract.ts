/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */

import type { CommitlockService } from "../services/commitlock-service.js";
import type { AuthContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    /** Request identifier (set by the request-context middleware) */
    requestId: string;

    /** Acting principal, once an auth middleware has accepted the caller */
    principal?: string;

    /** The composed domain service */
    service: CommitlockService;

    /** Authenticated caller (set by auth middleware) */
    auth: AuthContext;
  };
}
