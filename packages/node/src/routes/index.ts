/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createCommitmentRoutes } from "./commitments.js";
export { createTokenRoutes } from "./tokens.js";
export { createComplianceRoutes } from "./compliance.js";
