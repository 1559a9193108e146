import { minimatch } from 'minimatch';
import type { Logger } from 'pino';
import type { HttpClient } from '../config/client.js';
import type { BackendConfig } from '../config/backend.js';
import { errorMessage } from '../errors.js';
import { BackendClient } from './backend.js';
import { reportedFetch } from './reporting.js';
import type { SystemCache, SystemCacheKey } from './system-cache.js';
import {
  ServiceConfigSchema,
  type AuthorizationRequest,
  type AuthorizationResult,
  type MappingRule,
  type MetricsReporter,
  type ServiceConfig,
  type Usage,
} from './types.js';

export type {
  AuthorizationRequest,
  AuthorizationResult,
  MetricsReporter,
  ResponseReport,
} from './types.js';

function hasCredentials(request: AuthorizationRequest): boolean {
  const { userKey, appId } = request.credentials;
  return Boolean(userKey) || Boolean(appId);
}

function matchesRule(rule: MappingRule, method: string, path: string): boolean {
  if (rule.method.toUpperCase() !== method.toUpperCase()) {
    return false;
  }
  return minimatch(path, rule.pattern, { dot: true });
}

/**
 * Compute the usage a request generates from the service's mapping rules.
 * Returns undefined when no rule matches.
 */
export function computeUsage(service: ServiceConfig, method: string, path: string): Usage | undefined {
  const pathname = path.split('?')[0] ?? path;
  const usage: Usage = {};
  let matched = false;

  for (const rule of service.mapping_rules) {
    if (matchesRule(rule, method, pathname)) {
      usage[rule.metric] = (usage[rule.metric] ?? 0) + rule.delta;
      matched = true;
    }
  }

  return matched ? usage : undefined;
}

/**
 * Makes authorization decisions from service configurations held in the
 * system cache and the backend's verdict.
 */
export class Authorizer {
  private readonly client: HttpClient;
  private readonly systemCache: SystemCache;
  private readonly backend: BackendClient;
  private readonly metrics: MetricsReporter | undefined;
  private readonly logger: Logger;

  constructor(
    client: HttpClient,
    systemCache: SystemCache,
    backendConfig: BackendConfig,
    metrics?: MetricsReporter
  ) {
    this.client = client;
    this.systemCache = systemCache;
    this.backend = new BackendClient(client, backendConfig, metrics);
    this.metrics = metrics;
    this.logger = backendConfig.logger.child({ component: 'authorizer' });

    this.systemCache.start();
    this.backend.start();
  }

  async authorize(request: AuthorizationRequest): Promise<AuthorizationResult> {
    if (!hasCredentials(request)) {
      return { allowed: false, reason: 'no_credentials' };
    }

    let service: ServiceConfig;
    try {
      service = await this.serviceConfig(request);
    } catch (err) {
      this.logger.error(
        { serviceId: request.serviceId, error: errorMessage(err) },
        'Failed to obtain service configuration'
      );
      return { allowed: false, reason: 'system_error' };
    }

    const usage = computeUsage(service, request.method, request.path);
    if (!usage) {
      this.logger.debug(
        { serviceId: service.id, method: request.method, path: request.path },
        'No mapping rule matched'
      );
      return { allowed: false, reason: 'no_matching_rule' };
    }

    return this.backend.authorize({ service, credentials: request.credentials, usage });
  }

  /**
   * Stop background work: the system cache refresh, the backend flush (after a
   * final flush) and the client's connections.
   */
  async shutdown(): Promise<void> {
    this.systemCache.stop();
    await this.backend.close();
    await this.client.close();
    this.logger.info('Authorizer shut down');
  }

  private async serviceConfig(request: AuthorizationRequest): Promise<ServiceConfig> {
    const key: SystemCacheKey = {
      systemUrl: request.systemUrl,
      serviceId: request.serviceId,
      accessToken: request.accessToken,
    };

    const { config, hit } = await this.systemCache.getOrLoad(key, (k) => this.fetchServiceConfig(k));
    if (hit) {
      this.metrics?.cacheHitCallback(request.serviceId);
    }
    return config;
  }

  private async fetchServiceConfig(key: SystemCacheKey): Promise<ServiceConfig> {
    const base = key.systemUrl.replace(/\/+$/, '');
    const params = new URLSearchParams({ access_token: key.accessToken });
    const url = `${base}/admin/api/services/${encodeURIComponent(key.serviceId)}/proxy/config.json?${params.toString()}`;

    const response = await reportedFetch(
      this.client,
      url,
      { method: 'GET', headers: { accept: 'application/json' } },
      'system',
      key.serviceId,
      this.metrics
    );
    if (!response.ok) {
      throw new Error(`system returned status ${response.status}`);
    }

    return ServiceConfigSchema.parse(await response.json());
  }
}
