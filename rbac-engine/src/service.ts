/**
 * rbac-engine - RbacService
 *
 * Public query surface plus cache-aware mutation pass-throughs:
 * - Boolean and set queries over a role's effective permissions
 * - Optional TTL caching of effective permissions
 * - Role, workspace and global cache invalidation
 */

import { PermissionCache } from './cache.js';
import { isCachingEnabled, resolveRbacConfig } from './config.js';
import { RbacError, RBAC_ERRORS, getErrorMessage, isRbacError } from './errors.js';
import { createChildLogger, type Logger } from './logger.js';
import { PermissionResolver } from './resolver.js';
import { requireIds } from './validation.js';
import type {
  CacheStats,
  EffectivePermissions,
  Permission,
  Rbac,
  RbacConfig,
  RbacStore,
  ResolvedRbacConfig,
  Role,
} from './types.js';

/**
 * RbacService - workspace-scoped authorization queries
 *
 * Mutations that should be visible to cached queries right away must go
 * through the service; writes made on the store directly stay hidden until
 * the affected entries expire.
 *
 * @example
 * ```typescript
 * const rbac = new RbacService(new MemoryStore(), withCaching(60_000));
 *
 * await rbac.createPermission({ workspaceId: 'acme', id: 'post:read', name: 'Read post', parentIds: [] });
 * await rbac.createRole({
 *   workspaceId: 'acme',
 *   id: 'guest',
 *   name: 'Guest',
 *   parentIds: [],
 *   directPermissionIds: ['post:read'],
 * });
 *
 * await rbac.hasPermission('acme', 'guest', 'post:read'); // true
 * ```
 */
export class RbacService implements Rbac {
  private config: ResolvedRbacConfig;
  private resolver: PermissionResolver;
  private cache: PermissionCache | null = null;
  private log: Logger;

  constructor(private store: RbacStore, config: RbacConfig = {}) {
    this.config = resolveRbacConfig(config);
    this.log = createChildLogger({ service: 'rbac-engine', level: this.config.logLevel, metadata: { component: 'service' } });
    this.resolver = new PermissionResolver(
      store,
      createChildLogger({ service: 'rbac-engine', level: this.config.logLevel, metadata: { component: 'resolver' } })
    );

    if (isCachingEnabled(this.config)) {
      this.cache = new PermissionCache(
        this.config,
        createChildLogger({ service: 'rbac-engine', level: this.config.logLevel, metadata: { component: 'cache' } })
      );
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Queries
  // ─────────────────────────────────────────────────────────────────────────────

  async hasPermission(workspaceId: string, roleId: string, permissionId: string): Promise<boolean> {
    requireIds({ workspaceId, roleId, permissionId });
    const { permissionIds } = await this.getEffective(workspaceId, roleId);
    return permissionIds.has(permissionId);
  }

  /**
   * True if the role holds at least one of the permissions
   */
  async hasAnyPermission(workspaceId: string, roleId: string, permissionIds: string[]): Promise<boolean> {
    requireIds({ workspaceId, roleId });
    this.requirePermissionList(permissionIds);

    const effective = await this.getEffective(workspaceId, roleId);
    return permissionIds.some(permissionId => effective.permissionIds.has(permissionId));
  }

  /**
   * True if the role holds every one of the permissions
   */
  async hasAllPermissions(workspaceId: string, roleId: string, permissionIds: string[]): Promise<boolean> {
    requireIds({ workspaceId, roleId });
    this.requirePermissionList(permissionIds);

    const effective = await this.getEffective(workspaceId, roleId);
    return permissionIds.every(permissionId => effective.permissionIds.has(permissionId));
  }

  /**
   * Full permission records of the role's effective set
   */
  async getEffectivePermissions(workspaceId: string, roleId: string): Promise<Permission[]> {
    requireIds({ workspaceId, roleId });
    const { permissionIds } = await this.getEffective(workspaceId, roleId);

    const permissions: Permission[] = [];
    for (const permissionId of permissionIds) {
      permissions.push(await this.store.getPermission(workspaceId, permissionId));
    }
    return permissions;
  }

  getStore(): RbacStore {
    return this.store;
  }

  private requirePermissionList(permissionIds: string[]): void {
    if (permissionIds.length === 0) {
      throw new RbacError(RBAC_ERRORS.EmptyPermissionList, {}, `${RBAC_ERRORS.EmptyPermissionList}: at least one permission is required`);
    }
  }

  /**
   * Cached effective permissions, computed on a miss
   *
   * Two concurrent misses for the same role both resolve; the later write wins.
   */
  private async getEffective(workspaceId: string, roleId: string): Promise<EffectivePermissions> {
    const cached = this.cache?.get(workspaceId, roleId);
    if (cached) {
      this.log.debug('Cache hit', { workspaceId, roleId });
      return cached;
    }

    const resolved = await this.resolve(workspaceId, roleId);
    this.cache?.set(resolved);
    return resolved;
  }

  /**
   * Resolve through the store; foreign store errors surface as StoreFailure
   */
  private async resolve(workspaceId: string, roleId: string): Promise<EffectivePermissions> {
    try {
      return await this.resolver.resolve(workspaceId, roleId);
    } catch (error) {
      if (isRbacError(error)) throw error;
      throw new RbacError(
        RBAC_ERRORS.StoreFailure,
        { workspaceId, roleId, cause: getErrorMessage(error) },
        `${RBAC_ERRORS.StoreFailure}: ${getErrorMessage(error)}`
      );
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Caching
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Compute and cache a role's effective permissions ahead of the first query
   */
  async warmCache(workspaceId: string, roleId: string): Promise<void> {
    requireIds({ workspaceId, roleId });
    if (!this.cache) return;
    this.cache.set(await this.resolve(workspaceId, roleId));
  }

  invalidateCache(workspaceId: string, roleId: string): void {
    this.cache?.invalidateRole(workspaceId, roleId);
  }

  invalidateWorkspaceCache(workspaceId: string): void {
    this.cache?.invalidateWorkspace(workspaceId);
  }

  invalidateAllCache(): void {
    this.cache?.invalidateAll();
  }

  /**
   * Get cache statistics (null when caching is disabled)
   */
  getCacheStats(): CacheStats | null {
    return this.cache?.getStats() ?? null;
  }

  private invalidateForRole(workspaceId: string, roleId: string): void {
    if (this.config.invalidationScope === 'workspace') {
      this.invalidateWorkspaceCache(workspaceId);
    } else {
      this.invalidateCache(workspaceId, roleId);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Role Mutations
  // ─────────────────────────────────────────────────────────────────────────────

  async createRole(role: Role): Promise<void> {
    await this.store.createRole(role);
    this.invalidateForRole(role.workspaceId, role.id);
  }

  async updateRole(role: Role): Promise<void> {
    await this.store.updateRole(role);
    this.invalidateForRole(role.workspaceId, role.id);
  }

  /**
   * Deleting a role detaches it from its children, so the whole workspace is invalidated
   */
  async deleteRole(workspaceId: string, roleId: string): Promise<void> {
    await this.store.deleteRole(workspaceId, roleId);
    this.invalidateWorkspaceCache(workspaceId);
  }

  async addRoleParent(workspaceId: string, roleId: string, parentRoleId: string): Promise<void> {
    await this.store.addRoleParent(workspaceId, roleId, parentRoleId);
    this.invalidateForRole(workspaceId, roleId);
  }

  async removeRoleParent(workspaceId: string, roleId: string, parentRoleId: string): Promise<void> {
    await this.store.removeRoleParent(workspaceId, roleId, parentRoleId);
    this.invalidateForRole(workspaceId, roleId);
  }

  async addPermissionToRole(workspaceId: string, roleId: string, permissionId: string): Promise<void> {
    await this.store.addPermissionToRole(workspaceId, roleId, permissionId);
    this.invalidateForRole(workspaceId, roleId);
  }

  async removePermissionFromRole(workspaceId: string, roleId: string, permissionId: string): Promise<void> {
    await this.store.removePermissionFromRole(workspaceId, roleId, permissionId);
    this.invalidateForRole(workspaceId, roleId);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Permission Mutations
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * No role references a new permission yet, so nothing is invalidated
   */
  async createPermission(permission: Permission): Promise<void> {
    await this.store.createPermission(permission);
  }

  async updatePermission(permission: Permission): Promise<void> {
    await this.store.updatePermission(permission);
    this.invalidateWorkspaceCache(permission.workspaceId);
  }

  async deletePermission(workspaceId: string, permissionId: string): Promise<void> {
    await this.store.deletePermission(workspaceId, permissionId);
    this.invalidateWorkspaceCache(workspaceId);
  }

  async addPermissionParent(workspaceId: string, permissionId: string, parentPermissionId: string): Promise<void> {
    await this.store.addPermissionParent(workspaceId, permissionId, parentPermissionId);
    this.invalidateWorkspaceCache(workspaceId);
  }

  async removePermissionParent(workspaceId: string, permissionId: string, parentPermissionId: string): Promise<void> {
    await this.store.removePermissionParent(workspaceId, permissionId, parentPermissionId);
    this.invalidateWorkspaceCache(workspaceId);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create a new RbacService instance
 */
export function createRbacService(store: RbacStore, config?: RbacConfig): RbacService {
  return new RbacService(store, config);
}
