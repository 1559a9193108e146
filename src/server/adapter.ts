import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import type { Socket } from 'net';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { AuthorizationRequest, AuthorizationResult } from '../authorizer/index.js';
import { FatalError, errorMessage } from '../errors.js';

export interface Authorizing {
  authorize(request: AuthorizationRequest): Promise<AuthorizationResult>;
}

export interface AdapterConfig {
  authorizer: Authorizing;
  /** Connections older than this are closed after their next response. 0 disables. */
  keepAliveMaxAgeMs: number;
  /** Per-request logging by the server itself. */
  logServer: boolean;
  logger: Logger;
}

export interface ListenAddress {
  host: string;
  port: number;
}

const AuthorizeBodySchema = z.object({
  service_id: z.string().min(1),
  system_url: z.string().url(),
  access_token: z.string().min(1),
  method: z.string().min(1),
  path: z.string().startsWith('/'),
  user_key: z.string().min(1).optional(),
  app_id: z.string().min(1).optional(),
  app_key: z.string().min(1).optional(),
});

const PortSchema = z.coerce.number().int().min(0).max(65535);

/**
 * Accepts `"3333"`, `":3333"`, `"host:3333"` and `"[::1]:3333"`. A missing
 * host listens on every interface.
 */
export function parseListenAddr(addr: string): ListenAddress {
  const trimmed = addr.trim();
  const separator = trimmed.lastIndexOf(':');
  const rawHost = separator === -1 ? '' : trimmed.slice(0, separator);
  const rawPort = separator === -1 ? trimmed : trimmed.slice(separator + 1);

  const port = PortSchema.safeParse(rawPort);
  if (!/^\d+$/.test(rawPort) || !port.success) {
    throw new Error(`invalid port in listen address "${addr}"`);
  }
  const host = rawHost.replace(/^\[(.*)\]$/, '$1');

  return { host: host || '0.0.0.0', port: port.data };
}

export function connectionExpired(startedAt: number, now: number, maxAgeMs: number): boolean {
  return maxAgeMs > 0 && now - startedAt >= maxAgeMs;
}

function toAuthorizationRequest(body: z.infer<typeof AuthorizeBodySchema>): AuthorizationRequest {
  return {
    serviceId: body.service_id,
    systemUrl: body.system_url,
    accessToken: body.access_token,
    method: body.method,
    path: body.path,
    credentials: {
      userKey: body.user_key,
      appId: body.app_id,
      appKey: body.app_key,
    },
  };
}

/**
 * HTTP server answering authorization checks.
 *
 * `run()` listens and settles when the serving loop ends: it resolves once the
 * server has been closed and rejects if it could not listen.
 */
export class AdapterServer {
  readonly address: ListenAddress;
  readonly app: FastifyInstance;
  private readonly logger: Logger;

  constructor(addr: string, config: AdapterConfig) {
    try {
      this.address = parseListenAddr(addr);
    } catch (err) {
      throw new FatalError(`Unable to start server: ${errorMessage(err)}`, { cause: err });
    }
    this.logger = config.logger.child({ component: 'server' });
    this.app = this.createApp(config);
  }

  async run(): Promise<void> {
    await this.app.listen({ port: this.address.port, host: this.address.host });

    const server = this.app.server;
    if (!server.listening) {
      return;
    }

    const address = server.address();
    this.logger.info(
      { address: typeof address === 'object' && address !== null ? address : this.address },
      'Adapter server listening'
    );

    await new Promise<void>((resolve) => {
      server.once('close', () => resolve());
    });
  }

  async close(): Promise<void> {
    await this.app.close();
  }

  private createApp(config: AdapterConfig): FastifyInstance {
    const { authorizer, keepAliveMaxAgeMs, logServer } = config;
    const logger = this.logger;

    const app = Fastify({
      logger: false, // We use our own logger
      bodyLimit: 65536,
    });

    const connectionStarted = new WeakMap<Socket, number>();
    app.server.on('connection', (socket: Socket) => {
      connectionStarted.set(socket, Date.now());
    });

    app.addHook('onSend', async (request, reply, payload) => {
      const startedAt = connectionStarted.get(request.raw.socket);
      if (startedAt !== undefined && connectionExpired(startedAt, Date.now(), keepAliveMaxAgeMs)) {
        reply.header('connection', 'close');
      }
      return payload;
    });

    if (logServer) {
      app.addHook('onResponse', async (request, reply) => {
        logger.info(
          {
            method: request.method,
            url: request.url,
            statusCode: reply.statusCode,
            responseTime: reply.elapsedTime,
          },
          'Request completed'
        );
      });
    }

    app.setErrorHandler((error: FastifyError, request, reply) => {
      logger.error(
        {
          err: error,
          method: request.method,
          url: request.url,
        },
        'Request error'
      );

      // Don't expose internal errors to clients
      reply.code(error.statusCode || 500).send({
        error: error.statusCode ? error.message : 'Internal Server Error',
      });
    });

    app.get('/health', async () => {
      return { status: 'ok', timestamp: new Date().toISOString() };
    });

    app.post('/authorize', async (request, reply) => {
      const parsed = AuthorizeBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.code(400).send({
          error: 'Invalid request',
          details: parsed.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          })),
        });
      }

      const result = await authorizer.authorize(toAuthorizationRequest(parsed.data));
      return reply.code(result.allowed ? 200 : 403).send(result);
    });

    return app;
  }
}
