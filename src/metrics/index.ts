import Fastify from 'fastify';
import type { Logger } from 'pino';
import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import type { MetricsReporter, ResponseReport } from '../authorizer/types.js';
import type { Settings } from '../config/settings.js';
import { FatalError, errorMessage } from '../errors.js';

export const METRICS_ENDPOINT = '/metrics';
export const DEFAULT_METRICS_PORT = 8080;

export const LATENCY_METRIC_NAME = 'authz_adapter_latency_seconds';
export const RESPONSES_METRIC_NAME = 'authz_adapter_http_responses_total';
export const CACHE_HITS_METRIC_NAME = 'authz_adapter_system_cache_hits_total';

const LATENCY_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

export interface AdapterMetrics {
  registry: Registry;
  reporter: MetricsReporter;
}

export interface MetricsSideband {
  reporter: MetricsReporter;
  registry: Registry;
  port: number;
  close(): Promise<void>;
}

export interface MetricsSidebandOptions {
  host?: string;
}

/**
 * Register the adapter's collectors on a dedicated registry and return the
 * callbacks that feed them.
 */
export function createMetrics(): AdapterMetrics {
  const registry = new Registry();
  collectDefaultMetrics({ register: registry });

  const latency = new Histogram({
    name: LATENCY_METRIC_NAME,
    help: 'Latency of outbound requests to the system and backend',
    labelNames: ['target', 'service_id'],
    buckets: LATENCY_BUCKETS,
    registers: [registry],
  });

  const responses = new Counter({
    name: RESPONSES_METRIC_NAME,
    help: 'Outbound responses by target and status code',
    labelNames: ['target', 'service_id', 'code'],
    registers: [registry],
  });

  const cacheHits = new Counter({
    name: CACHE_HITS_METRIC_NAME,
    help: 'Service configurations served from the system cache',
    labelNames: ['service_id'],
    registers: [registry],
  });

  const reporter: MetricsReporter = {
    responseCallback(report: ResponseReport): void {
      const labels = { target: report.target, service_id: report.serviceId };
      latency.observe(labels, report.durationMs / 1000);
      responses.inc({ ...labels, code: String(report.status) });
    },
    cacheHitCallback(serviceId: string): void {
      cacheHits.inc({ service_id: serviceId });
    },
  };

  return { registry, reporter };
}

export function metricsEnabled(settings: Settings): boolean {
  return settings.isSet('report_metrics') && settings.getBool('report_metrics');
}

export function resolveMetricsPort(settings: Settings): number {
  return settings.isSet('metrics_port') ? settings.getInt('metrics_port') : DEFAULT_METRICS_PORT;
}

/**
 * Start the metrics listener when `report_metrics` is enabled. Returns
 * undefined when it is not, in which case nothing listens and no callbacks
 * exist.
 */
export async function startMetricsSideband(
  settings: Settings,
  logger: Logger,
  options: MetricsSidebandOptions = {}
): Promise<MetricsSideband | undefined> {
  if (!metricsEnabled(settings)) {
    return undefined;
  }

  const requestedPort = resolveMetricsPort(settings);
  const { registry, reporter } = createMetrics();

  const app = Fastify({ logger: false });
  app.get(METRICS_ENDPOINT, async (_request, reply) => {
    reply.header('content-type', registry.contentType);
    return registry.metrics();
  });

  try {
    await app.listen({ port: requestedPort, host: options.host ?? '0.0.0.0' });
  } catch (err) {
    await app.close();
    throw new FatalError(`failed to start metrics server ${errorMessage(err)}`, { cause: err });
  }

  const address = app.server.address();
  const port = typeof address === 'object' && address !== null ? address.port : requestedPort;
  logger.info({ port, endpoint: METRICS_ENDPOINT }, `Serving metrics on port ${port}`);

  return {
    reporter,
    registry,
    port,
    close: () => app.close(),
  };
}
