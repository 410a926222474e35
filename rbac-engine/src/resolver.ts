/**
 * rbac-engine - Resolver
 *
 * Graph-based resolution of a role's effective permissions across the
 * role hierarchy and the permission hierarchy.
 */

import { isRbacError } from './errors.js';
import { createChildLogger, type Logger } from './logger.js';
import { requireIds } from './validation.js';
import type { EffectivePermissions, Permission, RbacStore, Role } from './types.js';

/**
 * Permission Resolver
 *
 * Read-only: every call re-reads the store.
 *
 * @example
 * ```typescript
 * const resolver = new PermissionResolver(store);
 * const { permissionIds } = await resolver.resolve('acme', 'owner');
 * permissionIds.has('post:read'); // true when inherited via member → guest
 * ```
 */
export class PermissionResolver {
  private log: Logger;

  constructor(private store: RbacStore, logger?: Logger) {
    this.log = logger ?? createChildLogger({ service: 'rbac-engine', metadata: { component: 'resolver' } });
  }

  /**
   * Resolve all effective roles and permissions for a role
   */
  async resolve(workspaceId: string, roleId: string): Promise<EffectivePermissions> {
    requireIds({ workspaceId, roleId });

    const roleIds = new Set<string>();
    const permissionIds = new Set<string>();

    const role = await this.store.getRole(workspaceId, roleId);
    await this.resolveRolePermissions(workspaceId, role, roleIds, permissionIds);

    // Each direct permission gets its own visited set so a shared ancestor
    // reached from one branch is still walked from another
    const direct = Array.from(permissionIds);
    for (const permissionId of direct) {
      await this.resolvePermissionAncestors(workspaceId, permissionId, permissionIds, new Set());
    }

    this.log.debug('Effective permissions resolved', {
      workspaceId,
      roleId,
      roles: roleIds.size,
      permissions: permissionIds.size,
    });

    return {
      workspaceId,
      roleId,
      roleIds,
      permissionIds,
      computedAt: Date.now(),
    };
  }

  /**
   * Recursively collect direct permissions of a role and its ancestors
   */
  private async resolveRolePermissions(
    workspaceId: string,
    role: Role,
    visited: Set<string>,
    permissionIds: Set<string>
  ): Promise<void> {
    if (visited.has(role.id)) {
      return;
    }
    visited.add(role.id);

    for (const permissionId of role.directPermissionIds) {
      permissionIds.add(permissionId);
    }

    for (const parentId of role.parentIds) {
      if (visited.has(parentId)) continue;
      const parent = await this.findRole(workspaceId, parentId);
      if (!parent) continue;
      await this.resolveRolePermissions(workspaceId, parent, visited, permissionIds);
    }
  }

  /**
   * Recursively collect every ancestor of a permission
   */
  private async resolvePermissionAncestors(
    workspaceId: string,
    permissionId: string,
    into: Set<string>,
    visited: Set<string>
  ): Promise<void> {
    if (visited.has(permissionId)) {
      return;
    }
    visited.add(permissionId);

    const permission = await this.findPermission(workspaceId, permissionId);
    if (!permission) {
      into.delete(permissionId);
      return;
    }

    for (const parentId of permission.parentIds) {
      into.add(parentId);
      await this.resolvePermissionAncestors(workspaceId, parentId, into, visited);
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Lookups
  // ─────────────────────────────────────────────────────────────────

  /**
   * An edge read earlier in the walk may point at an entity deleted since;
   * the delete cascades the edge away, so the walk skips it.
   */
  private async findRole(workspaceId: string, roleId: string): Promise<Role | undefined> {
    try {
      return await this.store.getRole(workspaceId, roleId);
    } catch (error) {
      if (!isRbacError(error, 'NotFound')) throw error;
      this.log.debug('Skipped deleted role', { workspaceId, roleId });
      return undefined;
    }
  }

  private async findPermission(workspaceId: string, permissionId: string): Promise<Permission | undefined> {
    try {
      return await this.store.getPermission(workspaceId, permissionId);
    } catch (error) {
      if (!isRbacError(error, 'NotFound')) throw error;
      this.log.debug('Skipped deleted permission', { workspaceId, permissionId });
      return undefined;
    }
  }
}
