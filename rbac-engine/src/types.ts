/**
 * rbac-engine - Type Definitions
 *
 * Core types for the workspace-scoped RBAC engine.
 */

import type { LogLevel } from './logger.js';

/**
 * Permission definition
 */
export interface Permission {
  /** Workspace (tenant) the permission belongs to */
  workspaceId: string;
  /** Unique within the workspace (e.g., 'post:write') */
  id: string;
  /** Human-readable label (e.g., 'Write post') */
  name: string;
  /** Permissions this permission inherits from */
  parentIds: string[];
}

/**
 * Role definition
 */
export interface Role {
  /** Workspace (tenant) the role belongs to */
  workspaceId: string;
  /** Unique within the workspace (e.g., 'member') */
  id: string;
  /** Human-readable label (e.g., 'Member') */
  name: string;
  /** Roles this role inherits from */
  parentIds: string[];
  /** Permissions attached to this role directly (not inherited) */
  directPermissionIds: string[];
}

// ═══════════════════════════════════════════════════════════════════
// Store Contract
// ═══════════════════════════════════════════════════════════════════

/**
 * Role storage operations.
 *
 * Implementations must signal NotFound / AlreadyExists / CyclicInheritance
 * exactly as documented, since resolution and cache invalidation rely on them.
 */
export interface RoleStore {
  createRole(role: Role): Promise<void>;
  getRole(workspaceId: string, roleId: string): Promise<Role>;
  getRoles(workspaceId: string): Promise<Role[]>;
  /** Full overwrite of an existing role */
  updateRole(role: Role): Promise<void>;
  /** Removes the role and strips it from every child's parentIds */
  deleteRole(workspaceId: string, roleId: string): Promise<void>;
  addRoleParent(workspaceId: string, roleId: string, parentRoleId: string): Promise<void>;
  removeRoleParent(workspaceId: string, roleId: string, parentRoleId: string): Promise<void>;
  /** Direct parents only */
  getRoleParents(workspaceId: string, roleId: string): Promise<Role[]>;
  /** Direct children only */
  getRoleChildren(workspaceId: string, roleId: string): Promise<Role[]>;
  addPermissionToRole(workspaceId: string, roleId: string, permissionId: string): Promise<void>;
  removePermissionFromRole(workspaceId: string, roleId: string, permissionId: string): Promise<void>;
  /** Direct permissions only */
  getRolePermissions(workspaceId: string, roleId: string): Promise<Permission[]>;
}

/**
 * Permission storage operations.
 */
export interface PermissionStore {
  createPermission(permission: Permission): Promise<void>;
  getPermission(workspaceId: string, permissionId: string): Promise<Permission>;
  getPermissions(workspaceId: string): Promise<Permission[]>;
  updatePermission(permission: Permission): Promise<void>;
  /** Removes the permission, strips it from child permissions and from roles */
  deletePermission(workspaceId: string, permissionId: string): Promise<void>;
  addPermissionParent(workspaceId: string, permissionId: string, parentPermissionId: string): Promise<void>;
  removePermissionParent(workspaceId: string, permissionId: string, parentPermissionId: string): Promise<void>;
  getPermissionParents(workspaceId: string, permissionId: string): Promise<Permission[]>;
  getPermissionChildren(workspaceId: string, permissionId: string): Promise<Permission[]>;
}

export type RbacStore = RoleStore & PermissionStore;

// ═══════════════════════════════════════════════════════════════════
// Service Contract
// ═══════════════════════════════════════════════════════════════════

/**
 * Authorization queries exposed to callers (middleware, RPC handlers).
 * Any rejection from a has* query must be treated as a deny.
 */
export interface Rbac {
  hasPermission(workspaceId: string, roleId: string, permissionId: string): Promise<boolean>;
  hasAnyPermission(workspaceId: string, roleId: string, permissionIds: string[]): Promise<boolean>;
  hasAllPermissions(workspaceId: string, roleId: string, permissionIds: string[]): Promise<boolean>;
  getEffectivePermissions(workspaceId: string, roleId: string): Promise<Permission[]>;
  getStore(): RbacStore;
}

/**
 * Resolved permissions of a role (flattened across both hierarchies)
 */
export interface EffectivePermissions {
  workspaceId: string;
  roleId: string;
  /** The role itself plus every ancestor role */
  roleIds: ReadonlySet<string>;
  /** Direct permissions of every role in roleIds, plus their ancestors */
  permissionIds: ReadonlySet<string>;
  /** When this set was computed (epoch ms) */
  computedAt: number;
}

// ═══════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════

/**
 * Which cache entries a role-scoped mutation clears
 */
export type InvalidationScope = 'role' | 'workspace';

/**
 * Configuration for the RbacService
 */
export interface RbacConfig {
  /** Enable caching of effective permissions */
  enableCache?: boolean;
  /** Cache TTL in milliseconds (0 disables caching) */
  cacheTtl?: number;
  /** Maximum cache entries */
  maxCacheSize?: number;
  /** Invalidation granularity for role-scoped mutations */
  invalidationScope?: InvalidationScope;
  /** Minimum log level for engine traces */
  logLevel?: LogLevel;
}

export type ResolvedRbacConfig = Required<RbacConfig>;

/**
 * Cache statistics
 */
export interface CacheStats {
  size: number;
  validEntries: number;
  expiredEntries: number;
  maxSize: number;
  ttlMs: number;
}
