/**
 * Authentication and authorization types.
 *
 * API keys map to a role and to the caller's on-domain address, which is
 * the address the protocol sees for owner-gated operations.
 *
 * Role hierarchy: owner > operator > viewer. The relayer sits beside
 * them: it delivers envelopes and reads, nothing else.
 */

import type { Address } from "@linked-token/types";

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "owner" | "operator" | "relayer" | "viewer";

export type Permission = "read" | "transfer" | "relay" | "admin";

export const ROLES: readonly Role[] = ["owner", "operator", "relayer", "viewer"];

export const ROLE_PERMISSIONS: Readonly<Record<Role, readonly Permission[]>> = {
  viewer: ["read"],
  relayer: ["read", "relay"],
  operator: ["read", "transfer"],
  owner: ["read", "transfer", "admin"],
};

export function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

export interface ApiKeyAuthContext {
  readonly type: "api-key";
  readonly identity: string;
  readonly role: Role;
  readonly address: Address;
}

/** Set when no API keys are configured (tests, local development). */
export interface UnsecuredAuthContext {
  readonly type: "unsecured";
  /** From the X-Caller-Address header, when present */
  readonly address: Address | undefined;
}

export type AuthContext = ApiKeyAuthContext | UnsecuredAuthContext;

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly address: Address;
}
