/**
 * RbacService - queries, caching and invalidating pass-throughs
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  MemoryStore,
  RBAC_ERRORS,
  RbacService,
  createRbacService,
  isRbacError,
  subscribeToLogs,
  withCaching,
  type LogEntry,
} from '../src/index.js';
import { WS, expectRbacError, permission, seedBlog } from './fixtures.js';

// ═══════════════════════════════════════════════════════════════════
// QUERIES
// ═══════════════════════════════════════════════════════════════════

describe('RbacService queries', () => {
  let rbac: RbacService;

  beforeEach(async () => {
    rbac = createRbacService(new MemoryStore());
    await seedBlog(rbac);
  });

  it('should answer single permission checks through both hierarchies', async () => {
    expect(await rbac.hasPermission(WS, 'guest', 'read')).toBe(true);
    expect(await rbac.hasPermission(WS, 'guest', 'write')).toBe(false);
    expect(await rbac.hasPermission(WS, 'owner', 'read')).toBe(true);
    expect(await rbac.hasPermission(WS, 'member', 'admin')).toBe(false);
    expect(await rbac.hasPermission(WS, 'owner', 'delete')).toBe(false);
  });

  it('should return the full effective permission records', async () => {
    const permissions = await rbac.getEffectivePermissions(WS, 'owner');

    expect(permissions.map(p => p.id).sort()).toEqual(['admin', 'read', 'write']);
    expect(permissions.find(p => p.id === 'write')).toEqual({
      workspaceId: WS,
      id: 'write',
      name: 'Write',
      parentIds: ['read'],
    });
  });

  it('should check any and all of a list', async () => {
    expect(await rbac.hasAnyPermission(WS, 'guest', ['admin', 'read'])).toBe(true);
    expect(await rbac.hasAnyPermission(WS, 'guest', ['admin', 'write'])).toBe(false);
    expect(await rbac.hasAllPermissions(WS, 'member', ['read', 'write'])).toBe(true);
    expect(await rbac.hasAllPermissions(WS, 'member', ['read', 'admin'])).toBe(false);
  });

  it('should reject an empty permission list', async () => {
    const error = await expectRbacError(rbac.hasAnyPermission(WS, 'guest', []), RBAC_ERRORS.EmptyPermissionList);
    expect(error.kind).toBe('InvalidArgument');

    await expectRbacError(rbac.hasAllPermissions(WS, 'guest', []), RBAC_ERRORS.EmptyPermissionList);
  });

  it('should reject empty identifiers', async () => {
    await expectRbacError(rbac.hasPermission('', 'guest', 'read'), RBAC_ERRORS.InvalidArgument);
    await expectRbacError(rbac.getEffectivePermissions(WS, ''), RBAC_ERRORS.InvalidArgument);
    await expectRbacError(rbac.hasAnyPermission('', 'guest', ['read']), RBAC_ERRORS.InvalidArgument);
    await expectRbacError(rbac.hasAnyPermission(WS, '', ['read']), RBAC_ERRORS.InvalidArgument);
    await expectRbacError(rbac.hasAllPermissions('', 'guest', ['read']), RBAC_ERRORS.InvalidArgument);
    await expectRbacError(rbac.hasAllPermissions(WS, '', ['read']), RBAC_ERRORS.InvalidArgument);

    const error = await expectRbacError(rbac.hasPermission(WS, 'guest', ''), RBAC_ERRORS.InvalidArgument);
    expect(error.details).toEqual({ field: 'permissionId' });
    expect(error.message).toBe('MSRbacInvalidArgument: permissionId is required');
  });

  it('should fail for an unknown role', async () => {
    const error = await expectRbacError(rbac.hasPermission(WS, 'ghost', 'read'), RBAC_ERRORS.RoleNotFound);
    expect(error.kind).toBe('NotFound');
    expect(error.details).toEqual({ workspaceId: WS, roleId: 'ghost' });
  });

  it('should expose the underlying store', async () => {
    const store = new MemoryStore();
    const service = new RbacService(store);

    expect(service.getStore()).toBe(store);
  });

  it('should report a foreign store error as StoreFailure', async () => {
    const store = new MemoryStore();
    vi.spyOn(store, 'getRole').mockRejectedValue(new Error('connection reset'));
    const service = new RbacService(store);

    const error = await expectRbacError(service.hasPermission(WS, 'guest', 'read'), RBAC_ERRORS.StoreFailure);
    expect(error.kind).toBe('StoreFailure');
    expect(error.details).toEqual({ workspaceId: WS, roleId: 'guest', cause: 'connection reset' });
  });

  it('should see direct store writes immediately without a cache', async () => {
    await rbac.getStore().createPermission(permission('comment'));
    expect(await rbac.hasPermission(WS, 'guest', 'comment')).toBe(false);

    await rbac.getStore().addPermissionToRole(WS, 'guest', 'comment');

    expect(await rbac.hasPermission(WS, 'guest', 'comment')).toBe(true);
    expect(rbac.getCacheStats()).toBeNull();
  });

  it('should let one of two racing creates win', async () => {
    const results = await Promise.allSettled([
      rbac.createRole({ workspaceId: WS, id: 'editor', name: 'Editor', parentIds: [], directPermissionIds: [] }),
      rbac.createRole({ workspaceId: WS, id: 'editor', name: 'Editor', parentIds: [], directPermissionIds: [] }),
    ]);

    expect(results.map(r => r.status)).toEqual(['fulfilled', 'rejected']);
    const loser = results[1];
    expect(loser.status === 'rejected' && isRbacError(loser.reason) ? loser.reason.code : undefined).toBe(
      RBAC_ERRORS.RoleAlreadyExists
    );
  });
});

// ═══════════════════════════════════════════════════════════════════
// CACHING
// ═══════════════════════════════════════════════════════════════════

describe('RbacService caching', () => {
  let store: MemoryStore;
  let rbac: RbacService;

  beforeEach(async () => {
    vi.useFakeTimers();
    vi.setSystemTime(0);

    store = new MemoryStore();
    rbac = new RbacService(store, withCaching(1000));
    await seedBlog(rbac);
    await rbac.createPermission(permission('comment'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should hide direct store writes until the entry expires', async () => {
    expect(await rbac.hasPermission(WS, 'guest', 'comment')).toBe(false);

    await store.addPermissionToRole(WS, 'guest', 'comment');

    vi.setSystemTime(999);
    expect(await rbac.hasPermission(WS, 'guest', 'comment')).toBe(false);

    vi.setSystemTime(1000);
    expect(await rbac.hasPermission(WS, 'guest', 'comment')).toBe(true);
  });

  it('should show writes made through the service immediately', async () => {
    expect(await rbac.hasPermission(WS, 'guest', 'comment')).toBe(false);

    await rbac.addPermissionToRole(WS, 'guest', 'comment');
    expect(await rbac.hasPermission(WS, 'guest', 'comment')).toBe(true);

    await rbac.removePermissionFromRole(WS, 'guest', 'comment');
    expect(await rbac.hasPermission(WS, 'guest', 'comment')).toBe(false);
  });

  it('should serve a repeated query from the cache', async () => {
    const getRole = vi.spyOn(store, 'getRole');

    await rbac.hasPermission(WS, 'owner', 'read');
    await rbac.hasAllPermissions(WS, 'owner', ['read', 'admin']);

    expect(getRole).toHaveBeenCalledTimes(3);
  });

  it('should leave descendants stale when only the edited role is invalidated', async () => {
    await rbac.warmCache(WS, 'owner');
    await rbac.addPermissionToRole(WS, 'guest', 'comment');

    expect(await rbac.hasPermission(WS, 'guest', 'comment')).toBe(true);
    expect(await rbac.hasPermission(WS, 'owner', 'comment')).toBe(false);

    rbac.invalidateCache(WS, 'owner');
    expect(await rbac.hasPermission(WS, 'owner', 'comment')).toBe(true);
  });

  it('should clear descendants with workspace-scoped invalidation', async () => {
    const scoped = new RbacService(store, withCaching(1000, { invalidationScope: 'workspace' }));

    await scoped.warmCache(WS, 'owner');
    await scoped.addPermissionToRole(WS, 'guest', 'comment');

    expect(await scoped.hasPermission(WS, 'owner', 'comment')).toBe(true);
  });

  it('should clear the workspace when a permission gains a parent', async () => {
    await rbac.warmCache(WS, 'owner');
    await rbac.addPermissionParent(WS, 'read', 'comment');

    expect(await rbac.hasPermission(WS, 'owner', 'comment')).toBe(true);

    await rbac.removePermissionParent(WS, 'read', 'comment');
    expect(await rbac.hasPermission(WS, 'owner', 'comment')).toBe(false);
  });

  it('should clear the workspace when a role is deleted', async () => {
    await rbac.addPermissionToRole(WS, 'guest', 'comment');
    expect(await rbac.hasPermission(WS, 'owner', 'comment')).toBe(true);

    await rbac.deleteRole(WS, 'guest');

    expect(await rbac.hasPermission(WS, 'owner', 'comment')).toBe(false);
    await expectRbacError(rbac.hasPermission(WS, 'guest', 'read'), RBAC_ERRORS.RoleNotFound);
  });

  it('should clear the workspace when a permission is deleted', async () => {
    await rbac.addPermissionToRole(WS, 'guest', 'comment');
    expect(await rbac.hasPermission(WS, 'member', 'comment')).toBe(true);

    await rbac.deletePermission(WS, 'comment');

    expect(await rbac.hasPermission(WS, 'member', 'comment')).toBe(false);
  });

  it('should keep the cache when a mutation fails', async () => {
    await rbac.warmCache(WS, 'guest');

    await expectRbacError(rbac.addRoleParent(WS, 'guest', 'owner'), RBAC_ERRORS.CyclicInheritance);

    expect(rbac.getCacheStats()?.size).toBe(1);
  });

  it('should warm, report and drop entries', async () => {
    await rbac.warmCache(WS, 'owner');
    await rbac.warmCache(WS, 'guest');

    expect(rbac.getCacheStats()).toEqual({
      size: 2,
      validEntries: 2,
      expiredEntries: 0,
      maxSize: 10000,
      ttlMs: 1000,
    });

    rbac.invalidateWorkspaceCache('other');
    expect(rbac.getCacheStats()?.size).toBe(2);

    rbac.invalidateAllCache();
    expect(rbac.getCacheStats()?.size).toBe(0);

    await expectRbacError(rbac.warmCache(WS, 'ghost'), RBAC_ERRORS.RoleNotFound);
  });

  it('should not cache when the TTL is zero', async () => {
    const uncached = new RbacService(store, { enableCache: true, cacheTtl: 0 });

    await uncached.warmCache(WS, 'owner');

    expect(uncached.getCacheStats()).toBeNull();
  });

  it('should trace cache hits at debug level', async () => {
    const traced = new RbacService(store, withCaching(1000, { logLevel: 'debug' }));
    const entries: LogEntry[] = [];
    const unsubscribe = subscribeToLogs(entry => entries.push(entry));

    try {
      await traced.hasPermission(WS, 'guest', 'read');
      await traced.hasPermission(WS, 'guest', 'read');
    } finally {
      unsubscribe();
    }

    const hits = entries.filter(entry => entry.message === 'Cache hit');
    expect(hits).toHaveLength(1);
    expect(hits[0].level).toBe('debug');
    expect(hits[0].service).toBe('rbac-engine');
    expect(hits[0].data).toEqual({ component: 'service', workspaceId: WS, roleId: 'guest' });

    const resolved = entries.filter(entry => entry.message === 'Effective permissions resolved');
    expect(resolved).toHaveLength(1);
    expect(resolved[0].data).toEqual({ component: 'resolver', workspaceId: WS, roleId: 'guest', roles: 1, permissions: 1 });
  });
});
