/**
 * Permission Cache
 *
 * In-memory TTL cache of effective permissions, keyed by (workspace, role).
 *
 * Entries are not tracked against the roles and permissions they were
 * derived from: editing a shared parent role or a permission leaves
 * descendants' entries stale until they expire or a workspace-wide / global
 * invalidation clears them.
 */

import { createChildLogger, type Logger } from './logger.js';
import type { CacheStats, EffectivePermissions, ResolvedRbacConfig } from './types.js';

interface CacheEntry {
  data: EffectivePermissions;
  expiresAt: number;
}

export class PermissionCache {
  private config: ResolvedRbacConfig;
  private log: Logger;

  // workspaceId → roleId → entry
  private workspaces = new Map<string, Map<string, CacheEntry>>();

  constructor(config: ResolvedRbacConfig, logger?: Logger) {
    this.config = config;
    this.log = logger ?? createChildLogger({ service: 'rbac-engine', metadata: { component: 'cache' } });
  }

  get size(): number {
    let size = 0;
    for (const roles of this.workspaces.values()) {
      size += roles.size;
    }
    return size;
  }

  // ─────────────────────────────────────────────────────────────────
  // Get / Set
  // ─────────────────────────────────────────────────────────────────

  /**
   * Fresh entry for (workspace, role), or undefined. Expired entries are dropped.
   */
  get(workspaceId: string, roleId: string): EffectivePermissions | undefined {
    const roles = this.workspaces.get(workspaceId);
    const entry = roles?.get(roleId);
    if (!roles || !entry) return undefined;

    if (entry.expiresAt > Date.now()) {
      return entry.data;
    }

    roles.delete(roleId);
    if (roles.size === 0) this.workspaces.delete(workspaceId);
    return undefined;
  }

  set(permissions: EffectivePermissions): void {
    const { workspaceId, roleId } = permissions;

    if (!this.workspaces.get(workspaceId)?.has(roleId) && this.size >= this.config.maxCacheSize) {
      this.evictOldest();
    }

    // Eviction may have dropped this workspace's map
    let roles = this.workspaces.get(workspaceId);
    if (!roles) {
      roles = new Map();
      this.workspaces.set(workspaceId, roles);
    }

    roles.set(roleId, {
      data: permissions,
      expiresAt: Date.now() + this.config.cacheTtl,
    });
  }

  /**
   * Free a slot: expired entries first, else the entry closest to expiry
   */
  private evictOldest(): void {
    if (this.cleanupExpired() > 0) return;

    let oldest: { workspaceId: string; roleId: string; expiresAt: number } | undefined;
    for (const [workspaceId, roles] of this.workspaces) {
      for (const [roleId, entry] of roles) {
        if (!oldest || entry.expiresAt < oldest.expiresAt) {
          oldest = { workspaceId, roleId, expiresAt: entry.expiresAt };
        }
      }
    }

    if (oldest) {
      this.invalidateRole(oldest.workspaceId, oldest.roleId);
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Invalidation
  // ─────────────────────────────────────────────────────────────────

  invalidateRole(workspaceId: string, roleId: string): number {
    const roles = this.workspaces.get(workspaceId);
    if (!roles?.delete(roleId)) return 0;

    if (roles.size === 0) this.workspaces.delete(workspaceId);
    this.log.debug('Cache invalidated', { scope: 'role', workspaceId, roleId });
    return 1;
  }

  invalidateWorkspace(workspaceId: string): number {
    const removed = this.workspaces.get(workspaceId)?.size ?? 0;
    this.workspaces.delete(workspaceId);

    if (removed > 0) {
      this.log.debug('Cache invalidated', { scope: 'workspace', workspaceId, removed });
    }
    return removed;
  }

  invalidateAll(): number {
    const removed = this.size;
    this.workspaces.clear();

    if (removed > 0) {
      this.log.debug('Cache invalidated', { scope: 'all', removed });
    }
    return removed;
  }

  // ─────────────────────────────────────────────────────────────────
  // Stats
  // ─────────────────────────────────────────────────────────────────

  getStats(): CacheStats {
    let validEntries = 0;
    let expiredEntries = 0;
    const now = Date.now();

    for (const roles of this.workspaces.values()) {
      for (const entry of roles.values()) {
        if (entry.expiresAt > now) {
          validEntries++;
        } else {
          expiredEntries++;
        }
      }
    }

    return {
      size: validEntries + expiredEntries,
      validEntries,
      expiredEntries,
      maxSize: this.config.maxCacheSize,
      ttlMs: this.config.cacheTtl,
    };
  }

  // ─────────────────────────────────────────────────────────────────
  // Cleanup
  // ─────────────────────────────────────────────────────────────────

  cleanupExpired(): number {
    const now = Date.now();
    let cleaned = 0;

    for (const [workspaceId, roles] of this.workspaces) {
      for (const [roleId, entry] of roles) {
        if (entry.expiresAt <= now) {
          roles.delete(roleId);
          cleaned++;
        }
      }
      if (roles.size === 0) this.workspaces.delete(workspaceId);
    }

    return cleaned;
  }
}
