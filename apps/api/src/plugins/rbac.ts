/**
 * Role-Based Access Control (RBAC) Plugin
 *
 * Roles are read from the user directory rather than trusted from the token,
 * so revoking a role takes effect immediately.
 *
 * Usage:
 *   app.post('/api/badges', { preHandler: [app.authenticate, app.requireRole(['admin'])] }, handler)
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

import { ForbiddenError, UnauthorizedError } from '../lib/errors';
import type { UserDirectory, UserRole } from '../lib/user-directory';

declare module 'fastify' {
  interface FastifyRequest {
    userRoles?: UserRole[];
  }
  interface FastifyInstance {
    requireRole: (roles: UserRole[]) => (request: FastifyRequest) => Promise<void>;
  }
}

/**
 * Create a role check preHandler. Must run after authenticate.
 */
function createRequireRole(users: UserDirectory, allowedRoles: UserRole[]) {
  return async function requireRoleHandler(request: FastifyRequest): Promise<void> {
    if (!request.userRoles) {
      const user = await users.get(request.user.id);
      if (!user) {
        throw new UnauthorizedError('User not found');
      }
      request.userRoles = user.roles.length > 0 ? user.roles : ['user'];
    }

    const userRoles = request.userRoles;
    if (!allowedRoles.some((role) => userRoles.includes(role))) {
      throw new ForbiddenError(`Access denied. Required role: ${allowedRoles.join(' or ')}`);
    }
  };
}

export async function registerRbac(app: FastifyInstance, users: UserDirectory): Promise<void> {
  app.decorate('requireRole', (roles: UserRole[]) => createRequireRole(users, roles));
}

export function hasRole(userRoles: UserRole[] | undefined, role: UserRole): boolean {
  return userRoles?.includes(role) ?? false;
}

export function isAdmin(userRoles: UserRole[] | undefined): boolean {
  return hasRole(userRoles, 'admin');
}
