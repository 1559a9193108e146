import type { Logger } from 'pino';
import { SystemCache } from '../authorizer/system-cache.js';
import { secondsToTimerMs } from './durations.js';
import type { SettingName, Settings } from './settings.js';

export const DEFAULT_CACHE_TTL_SECONDS = 300;
export const DEFAULT_CACHE_REFRESH_SECONDS = 180;
export const DEFAULT_CACHE_ENTRIES_MAX = 1000;
export const DEFAULT_CACHE_REFRESH_RETRIES = 1;

export interface CacheConfig {
  maxSize: number;
  ttlMs: number;
  refreshIntervalMs: number;
  refreshRetries: number;
}

// Negative values are clamped to zero
function intOrDefault(settings: Settings, name: SettingName, fallback: number): number {
  if (!settings.isSet(name)) {
    return fallback;
  }
  return Math.max(0, settings.getInt(name));
}

export function resolveCacheConfig(settings: Settings, logger?: Logger): CacheConfig {
  const ttlSeconds = intOrDefault(settings, 'cache_ttl_seconds', DEFAULT_CACHE_TTL_SECONDS);
  const refreshSeconds = intOrDefault(
    settings,
    'cache_refresh_seconds',
    DEFAULT_CACHE_REFRESH_SECONDS
  );

  return {
    maxSize: intOrDefault(settings, 'cache_entries_max', DEFAULT_CACHE_ENTRIES_MAX),
    ttlMs: ttlSeconds * 1000,
    refreshIntervalMs: secondsToTimerMs(refreshSeconds, 'cache_refresh_seconds', logger),
    refreshRetries: intOrDefault(settings, 'cache_refresh_retries', DEFAULT_CACHE_REFRESH_RETRIES),
  };
}

/**
 * Build the system cache with its own stop signal. The caller hands the cache
 * to the authorizer and never aborts the signal itself.
 */
export function createSystemCache(settings: Settings, logger: Logger): SystemCache {
  const cacheLogger = logger.child({ component: 'system-cache' });
  return new SystemCache(resolveCacheConfig(settings, cacheLogger), new AbortController(), cacheLogger);
}
