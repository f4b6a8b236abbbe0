import { UnauthorizedError } from '../errors';

export type Role = 'owner' | 'guardian';

/**
 * Resolved identity of a caller, passed explicitly into privileged operations.
 */
export interface AuthContext {
  caller: string;
  roles: ReadonlySet<Role>;
}

export interface RoleRoster {
  owner: string;
  guardians: readonly string[];
}

export function resolveAuthContext(caller: string, roster: RoleRoster): AuthContext {
  const roles = new Set<Role>();
  if (caller === roster.owner) {
    roles.add('owner');
  }
  if (roster.guardians.includes(caller)) {
    roles.add('guardian');
  }
  return { caller, roles };
}

export function hasRole(ctx: AuthContext, ...roles: Role[]): boolean {
  return roles.some((role) => ctx.roles.has(role));
}

export function requireRole(ctx: AuthContext, ...roles: Role[]): void {
  if (!hasRole(ctx, ...roles)) {
    throw new UnauthorizedError(ctx.caller, roles);
  }
}
