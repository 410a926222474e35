/**
 * rbac-engine
 *
 * A workspace-scoped RBAC authorization engine with two inheritance graphs.
 *
 * Features:
 * - Role inheritance (role → parent roles)
 * - Permission inheritance (permission → parent permissions)
 * - Cycle detection on every graph edit
 * - Cascading deletes
 * - Multi-tenancy by workspace
 * - Optional TTL caching with role, workspace and global invalidation
 *
 * @example
 * ```typescript
 * import { MemoryStore, RbacService, withCaching } from 'rbac-engine';
 *
 * const store = new MemoryStore();
 * const rbac = new RbacService(store, withCaching(60_000));
 *
 * await rbac.createPermission({ workspaceId: 'acme', id: 'read', name: 'Read', parentIds: [] });
 * await rbac.createPermission({ workspaceId: 'acme', id: 'write', name: 'Write', parentIds: ['read'] });
 * await rbac.createRole({
 *   workspaceId: 'acme',
 *   id: 'member',
 *   name: 'Member',
 *   parentIds: [],
 *   directPermissionIds: ['write'],
 * });
 *
 * await rbac.hasPermission('acme', 'member', 'read'); // true (write → read)
 * ```
 *
 * @packageDocumentation
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  Role,
  Permission,
  RoleStore,
  PermissionStore,
  RbacStore,
  Rbac,
  EffectivePermissions,
  InvalidationScope,
  RbacConfig,
  ResolvedRbacConfig,
  CacheStats,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Engine
// ─────────────────────────────────────────────────────────────────────────────

export {
  RbacService,
  createRbacService,
} from './service.js';

export {
  PermissionResolver,
} from './resolver.js';

export {
  PermissionCache,
} from './cache.js';

export {
  MemoryStore,
  wouldCreateCycle,
  type MemoryStoreOptions,
} from './memory-store.js';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

export {
  RBAC_CONFIG_DEFAULTS,
  resolveRbacConfig,
  withCaching,
  isCachingEnabled,
} from './config.js';

// ─────────────────────────────────────────────────────────────────────────────
// Errors & Validation
// ─────────────────────────────────────────────────────────────────────────────

export {
  RbacError,
  RBAC_ERRORS,
  isRbacError,
  getErrorMessage,
  getAllErrorCodes,
  type RbacErrorKind,
  type RbacErrorCode,
} from './errors.js';

export {
  roleSchema,
  permissionSchema,
  validateInput,
  requireIds,
} from './validation.js';

// ─────────────────────────────────────────────────────────────────────────────
// Logging
// ─────────────────────────────────────────────────────────────────────────────

export {
  logger,
  createChildLogger,
  configureLogger,
  setLogLevel,
  setLogFormat,
  subscribeToLogs,
  type Logger,
  type LoggerConfig,
  type LogEntry,
  type LogLevel,
  type LogFormat,
  type LogSubscriber,
} from './logger.js';
