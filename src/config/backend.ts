import type { Logger } from 'pino';
import { secondsToTimerMs } from './durations.js';
import type { Settings } from './settings.js';

export const DEFAULT_BACKEND_CACHE_FLUSH_INTERVAL_SECONDS = 15;

export const FailurePolicy = {
  FailOpen: 'fail-open',
  FailClosed: 'fail-closed',
} as const;

export type FailurePolicy = (typeof FailurePolicy)[keyof typeof FailurePolicy];

export type BackendConfig =
  | {
      enableCaching: false;
      logger: Logger;
    }
  | {
      enableCaching: true;
      logger: Logger;
      cacheFlushIntervalMs: number;
      policy: FailurePolicy;
    };

/**
 * Fail-closed unless `backend_cache_policy_fail_closed` is present and false.
 */
export function resolveFailurePolicy(settings: Settings, logger: Logger): FailurePolicy {
  if (
    settings.isSet('backend_cache_policy_fail_closed') &&
    !settings.getBool('backend_cache_policy_fail_closed')
  ) {
    logger.info('backend cache fail policy set to open');
    return FailurePolicy.FailOpen;
  }

  logger.info('backend cache fail policy set to closed');
  return FailurePolicy.FailClosed;
}

export function resolveBackendConfig(settings: Settings, logger: Logger): BackendConfig {
  if (!settings.getBool('use_cached_backend')) {
    return { enableCaching: false, logger };
  }

  let intervalSeconds = settings.getInt('backend_cache_flush_interval_seconds');
  if (intervalSeconds <= 0) {
    intervalSeconds = DEFAULT_BACKEND_CACHE_FLUSH_INTERVAL_SECONDS;
  }

  logger.info(
    { flushIntervalSeconds: intervalSeconds },
    `backend cache set to flush at ${intervalSeconds}s intervals`
  );

  return {
    enableCaching: true,
    logger,
    cacheFlushIntervalMs: secondsToTimerMs(
      intervalSeconds,
      'backend_cache_flush_interval_seconds',
      logger
    ),
    policy: resolveFailurePolicy(settings, logger),
  };
}
