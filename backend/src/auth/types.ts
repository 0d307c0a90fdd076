export const AUTH_ROLES = ["admin", "operator", "viewer"] as const;

/**
 * admin: everything, including registering clouds.
 * operator: the scheduler; provisions capacity and reports task signals.
 * viewer: read-only.
 */
export type AuthRole = (typeof AUTH_ROLES)[number];

export interface AuthPrincipal {
  subject: string;
  role: AuthRole;
}
