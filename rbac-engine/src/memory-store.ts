/**
 * rbac-engine - MemoryStore
 *
 * In-memory RbacStore. Roles and permissions live in two separate adjacency
 * maps per workspace; every mutation re-checks references and acyclicity.
 *
 * Methods never await: each one validates and writes in a single turn of
 * the event loop, so no caller observes a half-applied mutation and no two
 * writers validate against the same stale graph.
 */

import { RbacError, RBAC_ERRORS } from './errors.js';
import { createChildLogger, type Logger } from './logger.js';
import { assertValidPermission, assertValidRole, requireIds } from './validation.js';
import type { Permission, RbacStore, Role } from './types.js';

interface WorkspaceGraph {
  roles: Map<string, Role>;
  permissions: Map<string, Permission>;
}

export interface MemoryStoreOptions {
  logger?: Logger;
}

// ═══════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════

function cloneRole(role: Role): Role {
  return {
    workspaceId: role.workspaceId,
    id: role.id,
    name: role.name,
    parentIds: [...role.parentIds],
    directPermissionIds: [...role.directPermissionIds],
  };
}

function clonePermission(permission: Permission): Permission {
  return {
    workspaceId: permission.workspaceId,
    id: permission.id,
    name: permission.name,
    parentIds: [...permission.parentIds],
  };
}

function unique(ids: readonly string[]): string[] {
  return [...new Set(ids)];
}

function without(ids: readonly string[], removed: string): string[] {
  return ids.filter(id => id !== removed);
}

/**
 * Would giving `entityId` the parents `candidateParentIds` make it its own ancestor?
 *
 * Walks existing parent edges depth-first from each candidate with a fresh
 * visited set per candidate.
 */
export function wouldCreateCycle(
  parentsOf: (id: string) => readonly string[] | undefined,
  entityId: string,
  candidateParentIds: readonly string[]
): boolean {
  for (const candidate of candidateParentIds) {
    const visited = new Set<string>();
    const stack = [candidate];

    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      if (current === entityId) return true;
      if (visited.has(current)) continue;
      visited.add(current);

      for (const parentId of parentsOf(current) ?? []) {
        stack.push(parentId);
      }
    }
  }

  return false;
}

// ═══════════════════════════════════════════════════════════════════
// Memory Store
// ═══════════════════════════════════════════════════════════════════

export class MemoryStore implements RbacStore {
  private workspaces = new Map<string, WorkspaceGraph>();
  private log: Logger;

  constructor(options: MemoryStoreOptions = {}) {
    this.log = options.logger ?? createChildLogger({ service: 'rbac-engine', metadata: { component: 'memory-store' } });
  }

  // ─────────────────────────────────────────────────────────────────
  // Workspace Access
  // ─────────────────────────────────────────────────────────────────

  private graph(workspaceId: string): WorkspaceGraph {
    let graph = this.workspaces.get(workspaceId);
    if (!graph) {
      graph = { roles: new Map(), permissions: new Map() };
      this.workspaces.set(workspaceId, graph);
    }
    return graph;
  }

  private role(workspaceId: string, roleId: string): Role {
    const role = this.workspaces.get(workspaceId)?.roles.get(roleId);
    if (!role) {
      throw new RbacError(RBAC_ERRORS.RoleNotFound, { workspaceId, roleId });
    }
    return role;
  }

  private permission(workspaceId: string, permissionId: string): Permission {
    const permission = this.workspaces.get(workspaceId)?.permissions.get(permissionId);
    if (!permission) {
      throw new RbacError(RBAC_ERRORS.PermissionNotFound, { workspaceId, permissionId });
    }
    return permission;
  }

  private pruneWorkspace(workspaceId: string): void {
    const graph = this.workspaces.get(workspaceId);
    if (graph && graph.roles.size === 0 && graph.permissions.size === 0) {
      this.workspaces.delete(workspaceId);
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Validation
  // ─────────────────────────────────────────────────────────────────

  private validateRoleReferences(role: Role): void {
    for (const parentId of role.parentIds) {
      this.role(role.workspaceId, parentId);
    }
    for (const permissionId of role.directPermissionIds) {
      this.permission(role.workspaceId, permissionId);
    }

    const roles = this.workspaces.get(role.workspaceId)?.roles;
    if (wouldCreateCycle(id => roles?.get(id)?.parentIds, role.id, role.parentIds)) {
      throw new RbacError(RBAC_ERRORS.CyclicInheritance, {
        workspaceId: role.workspaceId,
        roleId: role.id,
        parentIds: role.parentIds,
      });
    }
  }

  private validatePermissionReferences(permission: Permission): void {
    for (const parentId of permission.parentIds) {
      this.permission(permission.workspaceId, parentId);
    }

    const permissions = this.workspaces.get(permission.workspaceId)?.permissions;
    if (wouldCreateCycle(id => permissions?.get(id)?.parentIds, permission.id, permission.parentIds)) {
      throw new RbacError(RBAC_ERRORS.CyclicInheritance, {
        workspaceId: permission.workspaceId,
        permissionId: permission.id,
        parentIds: permission.parentIds,
      });
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Role Operations
  // ─────────────────────────────────────────────────────────────────

  async createRole(input: Role): Promise<void> {
    assertValidRole(input);
    const role = cloneRole(input);
    role.parentIds = unique(role.parentIds);
    role.directPermissionIds = unique(role.directPermissionIds);

    if (this.workspaces.get(role.workspaceId)?.roles.has(role.id)) {
      throw new RbacError(RBAC_ERRORS.RoleAlreadyExists, { workspaceId: role.workspaceId, roleId: role.id });
    }

    this.validateRoleReferences(role);
    this.graph(role.workspaceId).roles.set(role.id, role);
    this.log.debug('Role created', { workspaceId: role.workspaceId, roleId: role.id });
  }

  async getRole(workspaceId: string, roleId: string): Promise<Role> {
    requireIds({ workspaceId, roleId });
    return cloneRole(this.role(workspaceId, roleId));
  }

  async getRoles(workspaceId: string): Promise<Role[]> {
    requireIds({ workspaceId });
    const roles = this.workspaces.get(workspaceId)?.roles.values() ?? [];
    return Array.from(roles, cloneRole);
  }

  async updateRole(input: Role): Promise<void> {
    assertValidRole(input);
    const role = cloneRole(input);
    role.parentIds = unique(role.parentIds);
    role.directPermissionIds = unique(role.directPermissionIds);

    this.role(role.workspaceId, role.id);
    this.validateRoleReferences(role);
    this.graph(role.workspaceId).roles.set(role.id, role);
    this.log.debug('Role updated', { workspaceId: role.workspaceId, roleId: role.id });
  }

  async deleteRole(workspaceId: string, roleId: string): Promise<void> {
    requireIds({ workspaceId, roleId });
    this.role(workspaceId, roleId);

    const roles = this.graph(workspaceId).roles;
    roles.delete(roleId);

    let detached = 0;
    for (const role of roles.values()) {
      if (role.parentIds.includes(roleId)) {
        role.parentIds = without(role.parentIds, roleId);
        detached++;
      }
    }

    this.pruneWorkspace(workspaceId);
    this.log.debug('Role deleted', { workspaceId, roleId, detachedChildren: detached });
  }

  async addRoleParent(workspaceId: string, roleId: string, parentRoleId: string): Promise<void> {
    requireIds({ workspaceId, roleId, parentRoleId });
    const role = this.role(workspaceId, roleId);
    this.role(workspaceId, parentRoleId);

    if (role.parentIds.includes(parentRoleId)) return;

    const roles = this.graph(workspaceId).roles;
    if (wouldCreateCycle(id => roles.get(id)?.parentIds, roleId, [parentRoleId])) {
      throw new RbacError(RBAC_ERRORS.CyclicInheritance, { workspaceId, roleId, parentRoleId });
    }

    role.parentIds = [...role.parentIds, parentRoleId];
    this.log.debug('Role parent added', { workspaceId, roleId, parentRoleId });
  }

  async removeRoleParent(workspaceId: string, roleId: string, parentRoleId: string): Promise<void> {
    requireIds({ workspaceId, roleId, parentRoleId });
    const role = this.role(workspaceId, roleId);

    if (!role.parentIds.includes(parentRoleId)) return;

    role.parentIds = without(role.parentIds, parentRoleId);
    this.log.debug('Role parent removed', { workspaceId, roleId, parentRoleId });
  }

  async getRoleParents(workspaceId: string, roleId: string): Promise<Role[]> {
    requireIds({ workspaceId, roleId });
    const role = this.role(workspaceId, roleId);
    return role.parentIds.map(parentId => cloneRole(this.role(workspaceId, parentId)));
  }

  async getRoleChildren(workspaceId: string, roleId: string): Promise<Role[]> {
    requireIds({ workspaceId, roleId });
    this.role(workspaceId, roleId);

    const children: Role[] = [];
    for (const role of this.graph(workspaceId).roles.values()) {
      if (role.parentIds.includes(roleId)) {
        children.push(cloneRole(role));
      }
    }
    return children;
  }

  async addPermissionToRole(workspaceId: string, roleId: string, permissionId: string): Promise<void> {
    requireIds({ workspaceId, roleId, permissionId });
    const role = this.role(workspaceId, roleId);
    this.permission(workspaceId, permissionId);

    if (role.directPermissionIds.includes(permissionId)) return;

    role.directPermissionIds = [...role.directPermissionIds, permissionId];
    this.log.debug('Permission attached to role', { workspaceId, roleId, permissionId });
  }

  async removePermissionFromRole(workspaceId: string, roleId: string, permissionId: string): Promise<void> {
    requireIds({ workspaceId, roleId, permissionId });
    const role = this.role(workspaceId, roleId);

    if (!role.directPermissionIds.includes(permissionId)) return;

    role.directPermissionIds = without(role.directPermissionIds, permissionId);
    this.log.debug('Permission detached from role', { workspaceId, roleId, permissionId });
  }

  async getRolePermissions(workspaceId: string, roleId: string): Promise<Permission[]> {
    requireIds({ workspaceId, roleId });
    const role = this.role(workspaceId, roleId);
    return role.directPermissionIds.map(permissionId => clonePermission(this.permission(workspaceId, permissionId)));
  }

  // ─────────────────────────────────────────────────────────────────
  // Permission Operations
  // ─────────────────────────────────────────────────────────────────

  async createPermission(input: Permission): Promise<void> {
    assertValidPermission(input);
    const permission = clonePermission(input);
    permission.parentIds = unique(permission.parentIds);

    if (this.workspaces.get(permission.workspaceId)?.permissions.has(permission.id)) {
      throw new RbacError(RBAC_ERRORS.PermissionAlreadyExists, {
        workspaceId: permission.workspaceId,
        permissionId: permission.id,
      });
    }

    this.validatePermissionReferences(permission);
    this.graph(permission.workspaceId).permissions.set(permission.id, permission);
    this.log.debug('Permission created', { workspaceId: permission.workspaceId, permissionId: permission.id });
  }

  async getPermission(workspaceId: string, permissionId: string): Promise<Permission> {
    requireIds({ workspaceId, permissionId });
    return clonePermission(this.permission(workspaceId, permissionId));
  }

  async getPermissions(workspaceId: string): Promise<Permission[]> {
    requireIds({ workspaceId });
    const permissions = this.workspaces.get(workspaceId)?.permissions.values() ?? [];
    return Array.from(permissions, clonePermission);
  }

  async updatePermission(input: Permission): Promise<void> {
    assertValidPermission(input);
    const permission = clonePermission(input);
    permission.parentIds = unique(permission.parentIds);

    this.permission(permission.workspaceId, permission.id);
    this.validatePermissionReferences(permission);
    this.graph(permission.workspaceId).permissions.set(permission.id, permission);
    this.log.debug('Permission updated', { workspaceId: permission.workspaceId, permissionId: permission.id });
  }

  async deletePermission(workspaceId: string, permissionId: string): Promise<void> {
    requireIds({ workspaceId, permissionId });
    this.permission(workspaceId, permissionId);

    const graph = this.graph(workspaceId);
    graph.permissions.delete(permissionId);

    for (const permission of graph.permissions.values()) {
      if (permission.parentIds.includes(permissionId)) {
        permission.parentIds = without(permission.parentIds, permissionId);
      }
    }

    for (const role of graph.roles.values()) {
      if (role.directPermissionIds.includes(permissionId)) {
        role.directPermissionIds = without(role.directPermissionIds, permissionId);
      }
    }

    this.pruneWorkspace(workspaceId);
    this.log.debug('Permission deleted', { workspaceId, permissionId });
  }

  async addPermissionParent(workspaceId: string, permissionId: string, parentPermissionId: string): Promise<void> {
    requireIds({ workspaceId, permissionId, parentPermissionId });
    const permission = this.permission(workspaceId, permissionId);
    this.permission(workspaceId, parentPermissionId);

    if (permission.parentIds.includes(parentPermissionId)) return;

    const permissions = this.graph(workspaceId).permissions;
    if (wouldCreateCycle(id => permissions.get(id)?.parentIds, permissionId, [parentPermissionId])) {
      throw new RbacError(RBAC_ERRORS.CyclicInheritance, { workspaceId, permissionId, parentPermissionId });
    }

    permission.parentIds = [...permission.parentIds, parentPermissionId];
    this.log.debug('Permission parent added', { workspaceId, permissionId, parentPermissionId });
  }

  async removePermissionParent(workspaceId: string, permissionId: string, parentPermissionId: string): Promise<void> {
    requireIds({ workspaceId, permissionId, parentPermissionId });
    const permission = this.permission(workspaceId, permissionId);

    if (!permission.parentIds.includes(parentPermissionId)) return;

    permission.parentIds = without(permission.parentIds, parentPermissionId);
    this.log.debug('Permission parent removed', { workspaceId, permissionId, parentPermissionId });
  }

  async getPermissionParents(workspaceId: string, permissionId: string): Promise<Permission[]> {
    requireIds({ workspaceId, permissionId });
    const permission = this.permission(workspaceId, permissionId);
    return permission.parentIds.map(parentId => clonePermission(this.permission(workspaceId, parentId)));
  }

  async getPermissionChildren(workspaceId: string, permissionId: string): Promise<Permission[]> {
    requireIds({ workspaceId, permissionId });
    this.permission(workspaceId, permissionId);

    const children: Permission[] = [];
    for (const permission of this.graph(workspaceId).permissions.values()) {
      if (permission.parentIds.includes(permissionId)) {
        children.push(clonePermission(permission));
      }
    }
    return children;
  }

  // ─────────────────────────────────────────────────────────────────
  // Maintenance
  // ─────────────────────────────────────────────────────────────────

  /**
   * Drop every role and permission of a workspace
   * @returns number of removed entities
   */
  async clearWorkspace(workspaceId: string): Promise<number> {
    requireIds({ workspaceId });
    const graph = this.workspaces.get(workspaceId);
    if (!graph) return 0;

    const removed = graph.roles.size + graph.permissions.size;
    this.workspaces.delete(workspaceId);
    this.log.debug('Workspace cleared', { workspaceId, removed });
    return removed;
  }
}
