/**
 * Shared test fixtures
 */

import { expect } from 'vitest';
import {
  RbacError,
  type Permission,
  type RbacErrorCode,
  type RbacStore,
  type Role,
} from '../src/index.js';

export const WS = 'acme';

export function role(id: string, overrides: Partial<Role> = {}): Role {
  return {
    workspaceId: WS,
    id,
    name: id.charAt(0).toUpperCase() + id.slice(1),
    parentIds: [],
    directPermissionIds: [],
    ...overrides,
  };
}

export function permission(id: string, overrides: Partial<Permission> = {}): Permission {
  return {
    workspaceId: WS,
    id,
    name: id.charAt(0).toUpperCase() + id.slice(1),
    parentIds: [],
    ...overrides,
  };
}

/**
 * read ← write ← admin (permissions), guest ← member ← owner (roles)
 *
 * guest: read, member: write, owner: admin
 */
export async function seedBlog(store: Pick<RbacStore, 'createRole' | 'createPermission'>, workspaceId = WS): Promise<void> {
  await store.createPermission(permission('read', { workspaceId }));
  await store.createPermission(permission('write', { workspaceId, parentIds: ['read'] }));
  await store.createPermission(permission('admin', { workspaceId, parentIds: ['write'] }));

  await store.createRole(role('guest', { workspaceId, directPermissionIds: ['read'] }));
  await store.createRole(role('member', { workspaceId, parentIds: ['guest'], directPermissionIds: ['write'] }));
  await store.createRole(role('owner', { workspaceId, parentIds: ['member'], directPermissionIds: ['admin'] }));
}

/**
 * Await a promise that must reject with an RbacError of the given code
 */
export async function expectRbacError(promise: Promise<unknown>, code: RbacErrorCode): Promise<RbacError> {
  const error = await promise.then(
    () => undefined,
    (reason: unknown) => reason
  );

  expect(error).toBeInstanceOf(RbacError);
  if (!(error instanceof RbacError)) {
    throw new Error(`expected ${code} but the promise resolved or rejected with something else`);
  }
  expect(error.code).toBe(code);
  return error;
}
