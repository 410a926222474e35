/**
 * Validation Utilities
 *
 * arktype schemas for entity input, plus identifier checks shared by the
 * store, resolver and service.
 */

import { type } from 'arktype';
import { RbacError, RBAC_ERRORS, type RbacErrorCode } from './errors.js';
import type { Permission, Role } from './types.js';

const identifier = 'string > 0';

export const roleSchema = type({
  workspaceId: identifier,
  id: identifier,
  name: identifier,
  parentIds: 'string[]',
  directPermissionIds: 'string[]',
});

export const permissionSchema = type({
  workspaceId: identifier,
  id: identifier,
  name: identifier,
  parentIds: 'string[]',
});

/**
 * Validates input using an arktype schema validator and returns standardized error format
 *
 * @example
 * ```typescript
 * const result = validateInput(roleSchema(input));
 * if ('errors' in result) {
 *   // reject
 * }
 * ```
 */
export function validateInput<T extends object>(
  schemaResult: T | InstanceType<typeof type.errors>
): T | { errors: string[] } {
  if (schemaResult instanceof type.errors) {
    return { errors: [schemaResult.summary] };
  }
  return schemaResult;
}

function invalid(code: RbacErrorCode, errors: string[], key: Record<string, unknown>): RbacError {
  return new RbacError(code, { ...key, errors }, `${code}: ${errors.join('; ')}`);
}

export function assertValidRole(role: Role): void {
  const result = validateInput(roleSchema(role));
  if ('errors' in result) {
    throw invalid(RBAC_ERRORS.InvalidRole, result.errors, { workspaceId: role.workspaceId, roleId: role.id });
  }
}

export function assertValidPermission(permission: Permission): void {
  const result = validateInput(permissionSchema(permission));
  if ('errors' in result) {
    throw invalid(RBAC_ERRORS.InvalidPermission, result.errors, {
      workspaceId: permission.workspaceId,
      permissionId: permission.id,
    });
  }
}

/**
 * Throw InvalidArgument naming the first empty identifier
 *
 * @example
 * ```typescript
 * requireIds({ workspaceId, roleId });
 * ```
 */
export function requireIds(ids: Record<string, string>): void {
  for (const [field, value] of Object.entries(ids)) {
    if (!value) {
      throw new RbacError(RBAC_ERRORS.InvalidArgument, { field }, `${RBAC_ERRORS.InvalidArgument}: ${field} is required`);
    }
  }
}
