/**
 * rbac-engine - Errors
 *
 * Error codes follow the pattern: MS{Service}{ErrorName}
 * Every code maps to one of five kinds; callers branch on the kind,
 * clients and i18n use the code.
 */

export type RbacErrorKind =
  | 'InvalidArgument'
  | 'NotFound'
  | 'AlreadyExists'
  | 'CyclicInheritance'
  | 'StoreFailure';

// ═══════════════════════════════════════════════════════════════════
// Error Codes
// ═══════════════════════════════════════════════════════════════════

export const RBAC_ERRORS = {
  // Arguments
  InvalidArgument: 'MSRbacInvalidArgument',
  InvalidRole: 'MSRbacInvalidRole',
  InvalidPermission: 'MSRbacInvalidPermission',
  InvalidConfig: 'MSRbacInvalidConfig',
  EmptyPermissionList: 'MSRbacEmptyPermissionList',

  // Roles
  RoleNotFound: 'MSRbacRoleNotFound',
  RoleAlreadyExists: 'MSRbacRoleAlreadyExists',

  // Permissions
  PermissionNotFound: 'MSRbacPermissionNotFound',
  PermissionAlreadyExists: 'MSRbacPermissionAlreadyExists',

  // Graph
  CyclicInheritance: 'MSRbacCyclicInheritance',

  // Backing store
  StoreFailure: 'MSRbacStoreFailure',
} as const;

export type RbacErrorCode = (typeof RBAC_ERRORS)[keyof typeof RBAC_ERRORS];

const ERROR_KINDS: Record<RbacErrorCode, RbacErrorKind> = {
  MSRbacInvalidArgument: 'InvalidArgument',
  MSRbacInvalidRole: 'InvalidArgument',
  MSRbacInvalidPermission: 'InvalidArgument',
  MSRbacInvalidConfig: 'InvalidArgument',
  MSRbacEmptyPermissionList: 'InvalidArgument',
  MSRbacRoleNotFound: 'NotFound',
  MSRbacRoleAlreadyExists: 'AlreadyExists',
  MSRbacPermissionNotFound: 'NotFound',
  MSRbacPermissionAlreadyExists: 'AlreadyExists',
  MSRbacCyclicInheritance: 'CyclicInheritance',
  MSRbacStoreFailure: 'StoreFailure',
};

/**
 * All error codes, sorted (for docs and client-side discovery)
 */
export function getAllErrorCodes(): string[] {
  return Object.values(RBAC_ERRORS).sort();
}

// ═══════════════════════════════════════════════════════════════════
// Error Class
// ═══════════════════════════════════════════════════════════════════

/**
 * Error raised by the store, resolver and service.
 *
 * @example
 * ```typescript
 * throw new RbacError(RBAC_ERRORS.RoleNotFound, { workspaceId, roleId });
 * ```
 */
export class RbacError extends Error {
  public readonly code: RbacErrorCode;
  public readonly kind: RbacErrorKind;
  public readonly details: Record<string, unknown>;

  constructor(code: RbacErrorCode, details: Record<string, unknown> = {}, message?: string) {
    super(message ?? code);

    this.name = 'RbacError';
    this.code = code;
    this.kind = ERROR_KINDS[code];
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RbacError);
    }
  }
}

/**
 * Narrow an unknown error to RbacError, optionally of a given kind
 *
 * @example
 * ```typescript
 * try {
 *   allowed = await rbac.hasPermission(workspaceId, roleId, 'post:write');
 * } catch (error) {
 *   if (isRbacError(error, 'NotFound')) allowed = false;
 *   else throw error;
 * }
 * ```
 */
export function isRbacError(error: unknown, kind?: RbacErrorKind): error is RbacError {
  return error instanceof RbacError && (kind === undefined || error.kind === kind);
}

/**
 * Extract error message from any error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}
