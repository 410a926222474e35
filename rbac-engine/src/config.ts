/**
 * rbac-engine Configuration
 *
 * Every key read by RbacService must exist in RBAC_CONFIG_DEFAULTS.
 * No process.env: deployments pass overrides explicitly.
 */

import { type } from 'arktype';
import { RbacError, RBAC_ERRORS } from './errors.js';
import type { RbacConfig, ResolvedRbacConfig } from './types.js';

export const RBAC_CONFIG_DEFAULTS = {
  enableCache: { value: false, description: 'Memoize effective permissions per (workspace, role)' },
  cacheTtl: { value: 5 * 60 * 1000, description: 'Cache entry lifetime in milliseconds; 0 disables caching' },
  maxCacheSize: { value: 10000, description: 'Maximum cached roles before the oldest entry is evicted' },
  invalidationScope: {
    value: 'role',
    description: "Entries cleared by a role mutation: 'role' (that role only) or 'workspace'",
  },
  logLevel: { value: 'info', description: 'Minimum level for engine traces' },
} as const;

const configSchema = type({
  enableCache: 'boolean',
  cacheTtl: 'number >= 0',
  maxCacheSize: 'number > 0',
  invalidationScope: "'role' | 'workspace'",
  logLevel: "'debug' | 'info' | 'warn' | 'error'",
});

/**
 * Merge overrides over the defaults and validate the result
 *
 * @example
 * ```typescript
 * const config = resolveRbacConfig({ enableCache: true, cacheTtl: 30_000 });
 * ```
 */
export function resolveRbacConfig(overrides: RbacConfig = {}): ResolvedRbacConfig {
  const merged: ResolvedRbacConfig = {
    enableCache: overrides.enableCache ?? RBAC_CONFIG_DEFAULTS.enableCache.value,
    cacheTtl: overrides.cacheTtl ?? RBAC_CONFIG_DEFAULTS.cacheTtl.value,
    maxCacheSize: overrides.maxCacheSize ?? RBAC_CONFIG_DEFAULTS.maxCacheSize.value,
    invalidationScope: overrides.invalidationScope ?? RBAC_CONFIG_DEFAULTS.invalidationScope.value,
    logLevel: overrides.logLevel ?? RBAC_CONFIG_DEFAULTS.logLevel.value,
  };

  const result = configSchema(merged);
  if (result instanceof type.errors) {
    throw new RbacError(
      RBAC_ERRORS.InvalidConfig,
      { errors: [result.summary] },
      `${RBAC_ERRORS.InvalidConfig}: ${result.summary}`
    );
  }

  return merged;
}

/**
 * Enable caching of effective permissions with the given TTL (ms)
 */
export function withCaching(ttl: number, config: RbacConfig = {}): RbacConfig {
  return { ...config, enableCache: true, cacheTtl: ttl };
}

/**
 * Whether a resolved config actually caches (enabled and a positive TTL)
 */
export function isCachingEnabled(config: ResolvedRbacConfig): boolean {
  return config.enableCache && config.cacheTtl > 0;
}
