import type { Logger } from 'pino';
import { Authorizer } from '../authorizer/index.js';
import type { SystemCache } from '../authorizer/system-cache.js';
import { resolveBackendConfig, type BackendConfig } from '../config/backend.js';
import { createSystemCache } from '../config/cache.js';
import { buildHttpClient, type ClientBuilderDeps, type HttpClient } from '../config/client.js';
import type { Settings } from '../config/settings.js';
import { FatalError, errorMessage } from '../errors.js';
import { resolveLoggingOptions } from '../logger.js';
import {
  startMetricsSideband,
  type MetricsSideband,
  type MetricsSidebandOptions,
} from '../metrics/index.js';
import { AdapterServer } from '../server/adapter.js';
import { resolveVersion } from '../version.js';
import {
  SHUTDOWN_SIGNALS,
  ShutdownEvents,
  processSignals,
  type ShutdownEvent,
  type SignalSource,
} from './events.js';

export { ShutdownEvents, processSignals } from './events.js';
export type { ShutdownEvent, SignalSource } from './events.js';

export const DEFAULT_LISTEN_ADDR = '3333';
export const DEFAULT_KEEP_ALIVE_MAX_AGE_SECONDS = 60;

export type LifecycleState = 'starting' | 'running' | 'shutting-down' | 'stopped' | 'fatal';

export interface ShutdownHook {
  shutdown(): Promise<void> | void;
}

export interface ServingLoop {
  /** Settles when serving ends: resolves on a clean exit, rejects otherwise. */
  run(): Promise<void>;
  close(): Promise<void>;
}

export interface LifecycleOptions {
  signals?: SignalSource;
  version?: string;
}

export interface StartOptions extends LifecycleOptions {
  client?: ClientBuilderDeps;
  metrics?: MetricsSidebandOptions;
}

export interface AdapterComponents {
  client: HttpClient;
  systemCache: SystemCache;
  backendConfig: BackendConfig;
  metrics: MetricsSideband | undefined;
  authorizer: Authorizer;
  server: AdapterServer;
}

export interface StartedAdapter {
  controller: LifecycleController<Authorizer, AdapterServer>;
  components: AdapterComponents;
}

export function resolveListenAddr(settings: Settings): string {
  return settings.isSet('listen_addr') ? settings.getString('listen_addr') : DEFAULT_LISTEN_ADDR;
}

export function resolveKeepAliveMaxAgeMs(settings: Settings): number {
  const seconds = settings.isSet('grpc_conn_max_seconds')
    ? settings.getInt('grpc_conn_max_seconds')
    : DEFAULT_KEEP_ALIVE_MAX_AGE_SECONDS;
  return seconds * 1000;
}

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}

/**
 * Supervises the serving loop until it ends.
 *
 * Two producers feed one queue: the process signal handler and the server
 * task. A signal shuts the authorizer down and then closes the server, after
 * which the controller keeps waiting for the server task to report its exit.
 * Signals are not deduplicated: each one repeats the shutdown sequence.
 */
export class LifecycleController<
  A extends ShutdownHook = ShutdownHook,
  S extends ServingLoop = ServingLoop,
> {
  readonly authorizer: A;
  readonly server: S;
  private readonly logger: Logger;
  private readonly signals: SignalSource;
  private readonly version: string;
  private currentState: LifecycleState = 'starting';

  constructor(authorizer: A, server: S, logger: Logger, options: LifecycleOptions = {}) {
    this.authorizer = authorizer;
    this.server = server;
    this.logger = logger;
    this.signals = options.signals ?? processSignals;
    this.version = resolveVersion(options.version);
  }

  get state(): LifecycleState {
    return this.currentState;
  }

  /**
   * Run until the server reports a clean exit. Throws FatalError when the
   * server fails, or when closing it after a signal fails.
   */
  async run(): Promise<void> {
    const events = new ShutdownEvents();
    const unsubscribe = this.signals.subscribe(SHUTDOWN_SIGNALS, (signal) => {
      events.push({ kind: 'signal', signal });
    });

    this.logger.info({ version: this.version }, `Starting server version ${this.version}`);
    this.currentState = 'running';
    void this.server.run().then(
      () => events.push({ kind: 'server-terminated', error: null }),
      (reason: unknown) => events.push({ kind: 'server-terminated', error: toError(reason) })
    );

    try {
      for (;;) {
        const event = await events.next();
        if (await this.handle(event)) {
          return;
        }
      }
    } catch (err) {
      this.currentState = 'fatal';
      throw err;
    } finally {
      unsubscribe();
    }
  }

  /** Returns true once the controller has stopped. */
  private async handle(event: ShutdownEvent): Promise<boolean> {
    if (event.kind === 'signal') {
      this.currentState = 'shutting-down';
      this.logger.info(
        { signal: event.signal },
        `${event.signal} received. Attempting graceful shutdown`
      );
      await this.shutdownAuthorizer();
      try {
        await this.server.close();
      } catch (err) {
        throw new FatalError('Error calling graceful shutdown', { cause: err });
      }
      return false;
    }

    if (event.error) {
      throw new FatalError(`server has shut down: err ${event.error.message}`, {
        cause: event.error,
      });
    }

    this.logger.info('server has shut down gracefully');
    this.currentState = 'stopped';
    return true;
  }

  private async shutdownAuthorizer(): Promise<void> {
    try {
      await this.authorizer.shutdown();
    } catch (err) {
      this.logger.error({ error: errorMessage(err) }, 'Authorizer shutdown failed');
    }
  }
}

/**
 * Resolve every setting into its component, in dependency order, and return
 * a controller ready to run. Configuration errors surface as FatalError.
 */
export async function startAdapter(
  settings: Settings,
  logger: Logger,
  options: StartOptions = {}
): Promise<StartedAdapter> {
  const listenAddr = resolveListenAddr(settings);
  const keepAliveMaxAgeMs = resolveKeepAliveMaxAgeMs(settings);

  const client = buildHttpClient(settings, logger, options.client);
  const systemCache = createSystemCache(settings, logger);
  const backendConfig = resolveBackendConfig(settings, logger);
  const metrics = await startMetricsSideband(settings, logger, options.metrics);

  const authorizer = new Authorizer(client, systemCache, backendConfig, metrics?.reporter);

  const server = new AdapterServer(listenAddr, {
    authorizer,
    keepAliveMaxAgeMs,
    logServer: resolveLoggingOptions(settings).logServer,
    logger,
  });

  const controller = new LifecycleController(authorizer, server, logger, {
    signals: options.signals,
    version: options.version,
  });

  return {
    controller,
    components: { client, systemCache, backendConfig, metrics, authorizer, server },
  };
}
