import { describe, it, expect, vi, afterEach } from 'vitest';
import { Authorizer, computeUsage } from '../src/authorizer/index.js';
import { BackendClient } from '../src/authorizer/backend.js';
import { SystemCache } from '../src/authorizer/system-cache.js';
import type { AuthorizationRequest, MetricsReporter, ServiceConfig } from '../src/authorizer/types.js';
import { FailurePolicy, resolveBackendConfig, type BackendConfig } from '../src/config/backend.js';
import { HttpClient, type FetchLike, type HttpRequestInit } from '../src/config/client.js';
import { Settings } from '../src/config/settings.js';
import { jsonResponse, silentLogger } from './helpers.js';

const SERVICE: ServiceConfig = {
  id: 'svc-1',
  backend_url: 'https://backend.test/',
  service_token: 'test-token',
  mapping_rules: [
    { method: 'GET', pattern: '/api/**', metric: 'hits', delta: 1 },
    { method: 'GET', pattern: '/api/reports/*', metric: 'reports', delta: 2 },
  ],
};

const SYSTEM_URL =
  'https://system.test/admin/api/services/svc-1/proxy/config.json?access_token=test-access';
const AUTHREP_URL =
  'https://backend.test/transactions/authrep.json?service_id=svc-1&service_token=test-token&user_key=key-1&usage%5Bhits%5D=1';

function request(overrides: Partial<AuthorizationRequest> = {}): AuthorizationRequest {
  return {
    serviceId: 'svc-1',
    systemUrl: 'https://system.test',
    accessToken: 'test-access',
    credentials: { userKey: 'key-1' },
    method: 'GET',
    path: '/api/users',
    ...overrides,
  };
}

function systemCache(): SystemCache {
  return new SystemCache(
    { maxSize: 10, ttlMs: 60_000, refreshIntervalMs: 0, refreshRetries: 0 },
    new AbortController(),
    silentLogger()
  );
}

type Route = (url: string, init: HttpRequestInit) => ReturnType<FetchLike>;

function routedFetch(backend: Route) {
  return vi.fn<FetchLike>(async (url, init) => {
    if (url.startsWith('https://system.test/')) {
      return jsonResponse(200, SERVICE);
    }
    return backend(url, init);
  });
}

function reporter() {
  return {
    responseCallback: vi.fn<MetricsReporter['responseCallback']>(),
    cacheHitCallback: vi.fn<MetricsReporter['cacheHitCallback']>(),
  };
}

describe('computeUsage', () => {
  it('should sum the deltas of every matching rule', () => {
    expect(computeUsage(SERVICE, 'get', '/api/reports/daily?format=csv')).toEqual({
      hits: 1,
      reports: 2,
    });
  });

  it('should return undefined when no rule matches', () => {
    expect(computeUsage(SERVICE, 'POST', '/api/users')).toBeUndefined();
    expect(computeUsage(SERVICE, 'GET', '/health')).toBeUndefined();
  });
});

describe('Authorizer', () => {
  const authorizers: Authorizer[] = [];

  function createAuthorizer(
    fetchImpl: FetchLike,
    backendConfig: BackendConfig = { enableCaching: false, logger: silentLogger() },
    metrics?: MetricsReporter
  ): Authorizer {
    const authorizer = new Authorizer(
      new HttpClient({ timeoutMs: 1000 }, fetchImpl),
      systemCache(),
      backendConfig,
      metrics
    );
    authorizers.push(authorizer);
    return authorizer;
  }

  afterEach(async () => {
    await Promise.all(authorizers.splice(0).map((authorizer) => authorizer.shutdown()));
  });

  it('should reject requests without credentials before calling anything', async () => {
    const fetchMock = routedFetch(async () => jsonResponse(200));
    const authorizer = createAuthorizer(fetchMock);

    const result = await authorizer.authorize(request({ credentials: {} }));

    expect(result).toEqual({ allowed: false, reason: 'no_credentials' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should authorize through the backend with the service configuration', async () => {
    const fetchMock = routedFetch(async () => jsonResponse(200));
    const authorizer = createAuthorizer(fetchMock);

    const result = await authorizer.authorize(request());

    expect(result).toEqual({ allowed: true, reason: 'authorized' });
    expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([SYSTEM_URL, AUTHREP_URL]);
  });

  it('should deny when the backend denies', async () => {
    const authorizer = createAuthorizer(routedFetch(async () => jsonResponse(409)));

    expect(await authorizer.authorize(request())).toEqual({ allowed: false, reason: 'denied' });
  });

  it('should deny when the backend is unreachable without caching', async () => {
    const authorizer = createAuthorizer(
      routedFetch(async () => {
        throw new Error('connection refused');
      })
    );

    expect(await authorizer.authorize(request())).toEqual({
      allowed: false,
      reason: 'backend_error_failclosed',
    });
  });

  it('should deny when no mapping rule matches', async () => {
    const fetchMock = routedFetch(async () => jsonResponse(200));
    const authorizer = createAuthorizer(fetchMock);

    const result = await authorizer.authorize(request({ path: '/other' }));

    expect(result).toEqual({ allowed: false, reason: 'no_matching_rule' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should deny when the service configuration cannot be fetched', async () => {
    const authorizer = createAuthorizer(vi.fn<FetchLike>().mockResolvedValue(jsonResponse(500)));

    expect(await authorizer.authorize(request())).toEqual({
      allowed: false,
      reason: 'system_error',
    });
  });

  it('should deny when the service configuration is malformed', async () => {
    const authorizer = createAuthorizer(
      vi.fn<FetchLike>().mockResolvedValue(jsonResponse(200, { id: 'svc-1' }))
    );

    expect(await authorizer.authorize(request())).toEqual({
      allowed: false,
      reason: 'system_error',
    });
  });

  it('should report responses and cache hits to the metrics reporter', async () => {
    const metrics = reporter();
    const fetchMock = routedFetch(async () => jsonResponse(200));
    const authorizer = createAuthorizer(
      fetchMock,
      { enableCaching: false, logger: silentLogger() },
      metrics
    );

    await authorizer.authorize(request());
    await authorizer.authorize(request());

    expect(fetchMock.mock.calls.filter(([url]) => url === SYSTEM_URL)).toHaveLength(1);
    expect(metrics.cacheHitCallback).toHaveBeenCalledTimes(1);
    expect(metrics.cacheHitCallback).toHaveBeenCalledWith('svc-1');
    expect(metrics.responseCallback.mock.calls.map(([report]) => [report.target, report.status])).toEqual([
      ['system', 200],
      ['backend', 200],
      ['backend', 200],
    ]);
  });

  it('should report a zero status when no response arrives', async () => {
    const metrics = reporter();
    const authorizer = createAuthorizer(
      routedFetch(async () => {
        throw new Error('timeout');
      }),
      { enableCaching: false, logger: silentLogger() },
      metrics
    );

    await authorizer.authorize(request());

    const backendReport = metrics.responseCallback.mock.calls[1][0];
    expect(backendReport).toMatchObject({ target: 'backend', serviceId: 'svc-1', status: 0 });
  });
});

describe('BackendClient with caching', () => {
  function cachedConfig(policy: FailurePolicy): BackendConfig {
    return { enableCaching: true, logger: silentLogger(), cacheFlushIntervalMs: 1000, policy };
  }

  function backendRequest() {
    return { service: SERVICE, credentials: { userKey: 'key-1' }, usage: { hits: 1 } };
  }

  it('should reuse a cached authorization and accumulate usage', async () => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(jsonResponse(200));
    const backend = new BackendClient(
      new HttpClient({ timeoutMs: 1000 }, fetchMock),
      cachedConfig(FailurePolicy.FailClosed)
    );

    await backend.authorize(backendRequest());
    const second = await backend.authorize(backendRequest());

    expect(second).toEqual({ allowed: true, reason: 'authorized' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe(
      'https://backend.test/transactions/authorize.json?service_id=svc-1&service_token=test-token&user_key=key-1&usage%5Bhits%5D=1'
    );
    expect(backend.pendingReports).toBe(1);
  });

  it('should flush accumulated usage as one report', async () => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(jsonResponse(200));
    const backend = new BackendClient(
      new HttpClient({ timeoutMs: 1000 }, fetchMock),
      cachedConfig(FailurePolicy.FailClosed)
    );

    await backend.authorize(backendRequest());
    await backend.authorize(backendRequest());

    expect(await backend.flush()).toBe(1);
    expect(backend.pendingReports).toBe(0);
    const [url, init] = fetchMock.mock.calls[1];
    expect(url).toBe('https://backend.test/transactions.json');
    expect(init.method).toBe('POST');
    expect(init.body).toBe(
      'service_id=svc-1&service_token=test-token&user_key=key-1&usage%5Bhits%5D=2'
    );
  });

  it('should re-check authorization after a flush', async () => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(jsonResponse(200));
    const backend = new BackendClient(
      new HttpClient({ timeoutMs: 1000 }, fetchMock),
      cachedConfig(FailurePolicy.FailClosed)
    );

    await backend.authorize(backendRequest());
    await backend.flush();
    await backend.authorize(backendRequest());

    expect(fetchMock.mock.calls.map(([url]) => url.split('?')[0])).toEqual([
      'https://backend.test/transactions/authorize.json',
      'https://backend.test/transactions.json',
      'https://backend.test/transactions/authorize.json',
    ]);
  });

  it('should keep reports that fail to send', async () => {
    const fetchMock = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(jsonResponse(200))
      .mockResolvedValueOnce(jsonResponse(503));
    const backend = new BackendClient(
      new HttpClient({ timeoutMs: 1000 }, fetchMock),
      cachedConfig(FailurePolicy.FailClosed)
    );

    await backend.authorize(backendRequest());

    expect(await backend.flush()).toBe(0);
    expect(backend.pendingReports).toBe(1);
  });

  it('should allow requests when the backend is down and the policy is fail-open', async () => {
    const fetchMock = vi.fn<FetchLike>().mockRejectedValue(new Error('connection refused'));
    const backend = new BackendClient(
      new HttpClient({ timeoutMs: 1000 }, fetchMock),
      cachedConfig(FailurePolicy.FailOpen)
    );

    expect(await backend.authorize(backendRequest())).toEqual({
      allowed: true,
      reason: 'backend_error_failopen',
    });
    expect(backend.pendingReports).toBe(1);
  });

  it('should deny requests when the backend is down and the policy is fail-closed', async () => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(jsonResponse(500));
    const backend = new BackendClient(
      new HttpClient({ timeoutMs: 1000 }, fetchMock),
      cachedConfig(FailurePolicy.FailClosed)
    );

    expect(await backend.authorize(backendRequest())).toEqual({
      allowed: false,
      reason: 'backend_error_failclosed',
    });
    expect(backend.pendingReports).toBe(0);
  });

  it('should not flush early when the configured interval is negative', async () => {
    vi.useFakeTimers();
    try {
      const fetchMock = vi.fn<FetchLike>().mockResolvedValue(jsonResponse(200));
      const backend = new BackendClient(
        new HttpClient({ timeoutMs: 0 }, fetchMock),
        resolveBackendConfig(
          new Settings({ use_cached_backend: 'true', backend_cache_flush_interval_seconds: '-5' }),
          silentLogger()
        )
      );
      backend.start();

      await backend.authorize(backendRequest());
      await vi.advanceTimersByTimeAsync(100);

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(backend.pendingReports).toBe(1);

      await vi.advanceTimersByTimeAsync(15_000);

      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(backend.pendingReports).toBe(0);
      await backend.close();
    } finally {
      vi.useRealTimers();
    }
  });

  it('should flush pending usage on close', async () => {
    const fetchMock = vi.fn<FetchLike>().mockResolvedValue(jsonResponse(200));
    const backend = new BackendClient(
      new HttpClient({ timeoutMs: 1000 }, fetchMock),
      cachedConfig(FailurePolicy.FailClosed)
    );
    backend.start();

    await backend.authorize(backendRequest());
    await backend.close();

    expect(backend.pendingReports).toBe(0);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});
