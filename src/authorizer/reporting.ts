import type { HttpClient, HttpRequestInit, HttpResponse } from '../config/client.js';
import type { MetricsReporter, ResponseTarget } from './types.js';

/**
 * Perform an outbound call and report its status and latency, including
 * calls that fail before a response arrives.
 */
export async function reportedFetch(
  client: HttpClient,
  url: string,
  init: HttpRequestInit,
  target: ResponseTarget,
  serviceId: string,
  reporter: MetricsReporter | undefined
): Promise<HttpResponse> {
  const started = performance.now();
  let status = 0;
  try {
    const response = await client.fetch(url, init);
    status = response.status;
    return response;
  } finally {
    reporter?.responseCallback({
      target,
      serviceId,
      status,
      durationMs: performance.now() - started,
    });
  }
}
