/**
 * PermissionCache - TTL, eviction and invalidation
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { PermissionCache, resolveRbacConfig, type EffectivePermissions } from '../src/index.js';

function entry(workspaceId: string, roleId: string, permissionIds: string[] = []): EffectivePermissions {
  return {
    workspaceId,
    roleId,
    roleIds: new Set([roleId]),
    permissionIds: new Set(permissionIds),
    computedAt: Date.now(),
  };
}

let cache: PermissionCache;

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(0);
  cache = new PermissionCache(resolveRbacConfig({ enableCache: true, cacheTtl: 1000, maxCacheSize: 2 }));
});

afterEach(() => {
  vi.useRealTimers();
});

describe('PermissionCache', () => {
  describe('get / set', () => {
    it('should return a stored entry', () => {
      cache.set(entry('acme', 'guest', ['read']));

      const cached = cache.get('acme', 'guest');
      expect(cached?.roleId).toBe('guest');
      expect(cached?.permissionIds.has('read')).toBe(true);
      expect(cache.get('acme', 'member')).toBeUndefined();
      expect(cache.get('other', 'guest')).toBeUndefined();
    });

    it('should expire an entry exactly at its TTL', () => {
      cache.set(entry('acme', 'guest'));

      vi.setSystemTime(999);
      expect(cache.get('acme', 'guest')).toBeDefined();

      vi.setSystemTime(1000);
      expect(cache.get('acme', 'guest')).toBeUndefined();
      expect(cache.size).toBe(0);
    });

    it('should restart the TTL when an entry is replaced', () => {
      cache.set(entry('acme', 'guest', ['read']));
      vi.setSystemTime(800);
      cache.set(entry('acme', 'guest', ['write']));

      vi.setSystemTime(1500);
      expect(cache.get('acme', 'guest')?.permissionIds.has('write')).toBe(true);
      expect(cache.size).toBe(1);
    });
  });

  describe('eviction', () => {
    it('should evict the entry closest to expiry when full', () => {
      cache.set(entry('acme', 'guest'));
      vi.setSystemTime(100);
      cache.set(entry('acme', 'member'));
      vi.setSystemTime(200);
      cache.set(entry('other', 'owner'));

      expect(cache.size).toBe(2);
      expect(cache.get('acme', 'guest')).toBeUndefined();
      expect(cache.get('acme', 'member')).toBeDefined();
      expect(cache.get('other', 'owner')).toBeDefined();
    });

    it('should prefer dropping expired entries', () => {
      cache.set(entry('acme', 'guest'));
      vi.setSystemTime(500);
      cache.set(entry('acme', 'member'));
      vi.setSystemTime(1200);
      cache.set(entry('acme', 'owner'));

      expect(cache.size).toBe(2);
      expect(cache.get('acme', 'member')).toBeDefined();
      expect(cache.get('acme', 'owner')).toBeDefined();
    });

    it('should not evict when replacing an existing key', () => {
      cache.set(entry('acme', 'guest'));
      cache.set(entry('acme', 'member'));
      cache.set(entry('acme', 'guest'));

      expect(cache.size).toBe(2);
      expect(cache.get('acme', 'member')).toBeDefined();
    });

    it('should store into a workspace whose only entry was just evicted', () => {
      cache.set(entry('acme', 'guest'));
      vi.setSystemTime(100);
      cache.set(entry('other', 'member'));
      vi.setSystemTime(200);
      cache.set(entry('acme', 'owner'));

      expect(cache.get('acme', 'owner')).toBeDefined();
      expect(cache.get('acme', 'guest')).toBeUndefined();
    });
  });

  describe('invalidation', () => {
    beforeEach(() => {
      cache = new PermissionCache(resolveRbacConfig({ enableCache: true, cacheTtl: 1000 }));
      cache.set(entry('acme', 'guest'));
      cache.set(entry('acme', 'member'));
      cache.set(entry('other', 'guest'));
    });

    it('should drop a single role', () => {
      expect(cache.invalidateRole('acme', 'guest')).toBe(1);
      expect(cache.invalidateRole('acme', 'guest')).toBe(0);

      expect(cache.get('acme', 'member')).toBeDefined();
      expect(cache.get('other', 'guest')).toBeDefined();
    });

    it('should drop every role of a workspace', () => {
      expect(cache.invalidateWorkspace('acme')).toBe(2);
      expect(cache.invalidateWorkspace('acme')).toBe(0);

      expect(cache.get('other', 'guest')).toBeDefined();
    });

    it('should drop everything', () => {
      expect(cache.invalidateAll()).toBe(3);
      expect(cache.size).toBe(0);
    });
  });

  describe('stats and cleanup', () => {
    it('should count valid and expired entries', () => {
      cache.set(entry('acme', 'guest'));
      vi.setSystemTime(600);
      cache.set(entry('acme', 'member'));
      vi.setSystemTime(1100);

      expect(cache.getStats()).toEqual({
        size: 2,
        validEntries: 1,
        expiredEntries: 1,
        maxSize: 2,
        ttlMs: 1000,
      });

      expect(cache.cleanupExpired()).toBe(1);
      expect(cache.getStats()).toEqual({
        size: 1,
        validEntries: 1,
        expiredEntries: 0,
        maxSize: 2,
        ttlMs: 1000,
      });
    });
  });
});
