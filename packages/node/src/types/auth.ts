/**
 * Authentication and authorization types.
 *
 * A request is authenticated as a principal, either through an API key
 * (X-Api-Key) or, when no keys are configured, through the X-Principal
 * header. The principal is what the domain components authorize against;
 * the role only gates which routes may be called.
 *
 * Role hierarchy: admin > operator > viewer
 */

import type { ApiKeyRole } from "../config.js";

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = ApiKeyRole;

/** Permission levels for role-based access control */
export type Permission = "read" | "write";

export const ROLE_PERMISSIONS: Readonly<Record<Role, readonly Permission[]>> = {
  viewer: ["read"],
  operator: ["read", "write"],
  admin: ["read", "write"],
};

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

export interface AuthContext {
  readonly type: "api-key" | "header";
  readonly principal: string;
  readonly role: Role;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly principal: string;
}
