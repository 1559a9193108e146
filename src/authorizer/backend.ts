import type { Logger } from 'pino';
import type { HttpClient } from '../config/client.js';
import { FailurePolicy, type BackendConfig } from '../config/backend.js';
import { errorMessage } from '../errors.js';
import { reportedFetch } from './reporting.js';
import type {
  AuthorizationResult,
  Credentials,
  MetricsReporter,
  ServiceConfig,
  Usage,
} from './types.js';

export interface BackendRequest {
  service: ServiceConfig;
  credentials: Credentials;
  usage: Usage;
}

interface PendingReport {
  service: ServiceConfig;
  credentials: Credentials;
  usage: Usage;
}

function credentialParams(params: URLSearchParams, credentials: Credentials): void {
  if (credentials.userKey) {
    params.set('user_key', credentials.userKey);
  }
  if (credentials.appId) {
    params.set('app_id', credentials.appId);
  }
  if (credentials.appKey) {
    params.set('app_key', credentials.appKey);
  }
}

function applicationKey(service: ServiceConfig, credentials: Credentials): string {
  return [service.id, credentials.userKey ?? '', credentials.appId ?? '', credentials.appKey ?? ''].join(
    '|'
  );
}

function mergeUsage(target: Usage, usage: Usage): void {
  for (const [metric, delta] of Object.entries(usage)) {
    target[metric] = (target[metric] ?? 0) + delta;
  }
}

/**
 * Client of the backend that authorizes and reports traffic.
 *
 * Without caching each request is an `authrep` call and any backend failure
 * denies. With caching, authorization results are remembered per application,
 * usage accumulates locally and is flushed every `cacheFlushIntervalMs`; the
 * failure policy decides requests that cannot be authorized because the
 * backend is unavailable.
 */
export class BackendClient {
  private readonly client: HttpClient;
  private readonly config: BackendConfig;
  private readonly reporter: MetricsReporter | undefined;
  private readonly logger: Logger;
  private readonly authorizations = new Map<string, boolean>();
  private readonly pending = new Map<string, PendingReport>();
  private timer: NodeJS.Timeout | undefined;

  constructor(client: HttpClient, config: BackendConfig, reporter?: MetricsReporter) {
    this.client = client;
    this.config = config;
    this.reporter = reporter;
    this.logger = config.logger.child({ component: 'backend' });
  }

  get pendingReports(): number {
    return this.pending.size;
  }

  start(): void {
    if (!this.config.enableCaching || this.timer || this.config.cacheFlushIntervalMs <= 0) {
      return;
    }

    const timer = setInterval(() => {
      this.flush().catch((err: unknown) => {
        this.logger.error({ err }, 'Backend cache flush failed');
      });
    }, this.config.cacheFlushIntervalMs);
    timer.unref();
    this.timer = timer;
  }

  async authorize(request: BackendRequest): Promise<AuthorizationResult> {
    if (!this.config.enableCaching) {
      return this.authrep(request);
    }
    return this.authorizeCached(request, this.config.policy);
  }

  private async authrep(request: BackendRequest): Promise<AuthorizationResult> {
    try {
      const status = await this.call('authrep', request);
      return this.toResult(status);
    } catch (err) {
      this.logger.error(
        { err, serviceId: request.service.id },
        'Backend call failed, rejecting request'
      );
      return { allowed: false, reason: 'backend_error_failclosed' };
    }
  }

  private async authorizeCached(
    request: BackendRequest,
    policy: FailurePolicy
  ): Promise<AuthorizationResult> {
    const key = applicationKey(request.service, request.credentials);
    const cached = this.authorizations.get(key);

    if (cached !== undefined) {
      if (cached) {
        this.record(key, request);
        return { allowed: true, reason: 'authorized' };
      }
      return { allowed: false, reason: 'denied' };
    }

    let result: AuthorizationResult;
    try {
      result = this.toResult(await this.call('authorize', request));
    } catch (err) {
      if (policy === FailurePolicy.FailOpen) {
        this.logger.warn(
          { serviceId: request.service.id, error: errorMessage(err) },
          'Backend unavailable, allowing request (fail-open)'
        );
        this.record(key, request);
        return { allowed: true, reason: 'backend_error_failopen' };
      }

      this.logger.error(
        { serviceId: request.service.id, error: errorMessage(err) },
        'Backend unavailable, rejecting request (fail-closed)'
      );
      return { allowed: false, reason: 'backend_error_failclosed' };
    }

    this.authorizations.set(key, result.allowed);
    if (result.allowed) {
      this.record(key, request);
    }
    return result;
  }

  /**
   * Report accumulated usage. Reports that fail to send are kept for the next
   * flush, along with their cached authorization; every other cached
   * authorization is dropped so it is re-checked.
   */
  async flush(): Promise<number> {
    let sent = 0;

    for (const [key, report] of [...this.pending.entries()]) {
      try {
        const status = await this.call('report', report);
        if (status < 200 || status >= 300) {
          throw new Error(`backend returned status ${status}`);
        }
        this.pending.delete(key);
        sent++;
      } catch (err) {
        this.logger.warn(
          { serviceId: report.service.id, error: errorMessage(err) },
          'Failed to report usage to backend, will retry on next flush'
        );
      }
    }

    for (const key of [...this.authorizations.keys()]) {
      if (!this.pending.has(key)) {
        this.authorizations.delete(key);
      }
    }

    if (sent > 0) {
      this.logger.debug({ sent }, 'Flushed usage reports to backend');
    }
    return sent;
  }

  async close(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    if (this.config.enableCaching) {
      await this.flush();
    }
  }

  private record(key: string, request: BackendRequest): void {
    const existing = this.pending.get(key);
    if (existing) {
      mergeUsage(existing.usage, request.usage);
      return;
    }
    this.pending.set(key, {
      service: request.service,
      credentials: request.credentials,
      usage: { ...request.usage },
    });
  }

  private toResult(status: number): AuthorizationResult {
    if (status >= 200 && status < 300) {
      return { allowed: true, reason: 'authorized' };
    }
    if (status === 403 || status === 409) {
      return { allowed: false, reason: 'denied' };
    }
    throw new Error(`backend returned status ${status}`);
  }

  private async call(
    endpoint: 'authrep' | 'authorize' | 'report',
    request: BackendRequest
  ): Promise<number> {
    const { service, credentials, usage } = request;
    const params = new URLSearchParams({
      service_id: service.id,
      service_token: service.service_token,
    });
    credentialParams(params, credentials);
    for (const [metric, delta] of Object.entries(usage)) {
      params.set(`usage[${metric}]`, String(delta));
    }

    const base = service.backend_url.replace(/\/+$/, '');
    const url =
      endpoint === 'report'
        ? `${base}/transactions.json`
        : `${base}/transactions/${endpoint}.json?${params.toString()}`;
    const init =
      endpoint === 'report'
        ? {
            method: 'POST',
            headers: { 'content-type': 'application/x-www-form-urlencoded' },
            body: params.toString(),
          }
        : { method: 'GET' };

    const response = await reportedFetch(
      this.client,
      url,
      init,
      'backend',
      service.id,
      this.reporter
    );
    return response.status;
  }
}
