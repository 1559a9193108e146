import type { Logger } from 'pino';
import type { CacheConfig } from '../config/cache.js';
import { LRUCache } from './memory-cache.js';
import type { ServiceConfig } from './types.js';

export interface SystemCacheKey {
  systemUrl: string;
  serviceId: string;
  accessToken: string;
}

export type ServiceConfigLoader = (key: SystemCacheKey) => Promise<ServiceConfig>;

interface CachedServiceConfig {
  key: SystemCacheKey;
  value: ServiceConfig;
  expiresAt: Date;
}

export interface CacheLookup {
  config: ServiceConfig;
  hit: boolean;
}

function cacheKey(key: SystemCacheKey): string {
  return `${key.systemUrl}_${key.serviceId}`;
}

/**
 * Service configurations fetched from the system, kept for `ttlMs` and
 * refreshed in the background every `refreshIntervalMs`.
 *
 * The cache owns `stopController`: aborting it (through `stop()`) cancels the
 * refresh task.
 */
export class SystemCache {
  readonly config: CacheConfig;
  private readonly entries: LRUCache<CachedServiceConfig>;
  private readonly stopController: AbortController;
  private readonly logger: Logger;
  private loader: ServiceConfigLoader | undefined;
  private timer: NodeJS.Timeout | undefined;

  constructor(config: CacheConfig, stopController: AbortController, logger: Logger) {
    this.config = config;
    this.entries = new LRUCache(config.maxSize);
    this.stopController = stopController;
    this.logger = logger;
  }

  get stopped(): boolean {
    return this.stopController.signal.aborted;
  }

  get size(): number {
    return this.entries.size();
  }

  /**
   * Return the cached configuration, or load and cache it.
   */
  async getOrLoad(key: SystemCacheKey, loader: ServiceConfigLoader): Promise<CacheLookup> {
    this.loader = loader;

    const cached = this.entries.get(cacheKey(key));
    if (cached && cached.expiresAt > new Date()) {
      return { config: cached.value, hit: true };
    }

    const value = await loader(key);
    this.store(key, value);
    return { config: value, hit: false };
  }

  /**
   * Start the background refresh task. A non-positive interval disables it.
   */
  start(): void {
    if (this.timer || this.stopped || this.config.refreshIntervalMs <= 0) {
      return;
    }

    const timer = setInterval(() => {
      this.refresh().catch((err: unknown) => {
        this.logger.error({ err }, 'System cache refresh failed');
      });
    }, this.config.refreshIntervalMs);
    timer.unref();
    this.timer = timer;

    this.stopController.signal.addEventListener(
      'abort',
      () => {
        clearInterval(timer);
        this.timer = undefined;
      },
      { once: true }
    );
  }

  stop(): void {
    this.stopController.abort();
  }

  /**
   * Refetch every cached entry. A failed refetch is retried `refreshRetries`
   * times; if every attempt fails the previous value is kept.
   */
  async refresh(): Promise<number> {
    const loader = this.loader;
    if (!loader) {
      return 0;
    }

    let refreshed = 0;
    for (const [, entry] of this.entries.entries()) {
      if (this.stopped) {
        break;
      }
      if (await this.refreshEntry(entry.key, loader)) {
        refreshed++;
      }
    }

    this.logger.debug({ refreshed, size: this.entries.size() }, 'System cache refreshed');
    return refreshed;
  }

  private async refreshEntry(key: SystemCacheKey, loader: ServiceConfigLoader): Promise<boolean> {
    const attempts = 1 + Math.max(0, this.config.refreshRetries);
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        this.store(key, await loader(key));
        return true;
      } catch (err) {
        lastError = err;
      }
    }

    this.logger.warn(
      { err: lastError, serviceId: key.serviceId, attempts },
      'Failed to refresh cached service configuration, keeping previous value'
    );
    return false;
  }

  private store(key: SystemCacheKey, value: ServiceConfig): void {
    this.entries.set(cacheKey(key), {
      key,
      value,
      expiresAt: new Date(Date.now() + this.config.ttlMs),
    });
  }
}
