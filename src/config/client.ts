import { readFileSync } from 'fs';
import { X509Certificate } from 'crypto';
import { createSecureContext, rootCertificates } from 'tls';
import type { Logger } from 'pino';
import { Agent, fetch, type Dispatcher } from 'undici';
import { FatalError, errorMessage } from '../errors.js';
import { secondsToTimerMs } from './durations.js';
import type { Settings } from './settings.js';

export const DEFAULT_CLIENT_TIMEOUT_SECONDS = 10;

const PEM_CERTIFICATE_BLOCK = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

export interface ClientCertificate {
  cert: string;
  key: string;
}

export interface TlsMaterial {
  insecureSkipVerify: boolean;
  /** PEM encoded certificates trusted for server verification. */
  trustPool?: string[];
  clientCertificate?: ClientCertificate;
}

export interface ClientConfig {
  timeoutMs: number;
  /** Absent when no TLS setting applied: the platform default transport is used. */
  tls?: TlsMaterial;
}

export interface ClientBuilderDeps {
  systemCertificates?: () => readonly string[];
  readFile?: (path: string) => string;
}

export interface HttpRequestInit {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
  dispatcher?: Dispatcher;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

const undiciFetch: FetchLike = (url, init) => fetch(url, init);

function readTextFile(path: string): string {
  return readFileSync(path, 'utf-8');
}

function isCertificate(block: string): boolean {
  try {
    new X509Certificate(block);
    return true;
  } catch {
    return false;
  }
}

/**
 * Extract every PEM certificate block that parses. Blocks that fail to parse
 * are skipped.
 */
export function parsePemCertificates(pem: string): string[] {
  const blocks = pem.match(PEM_CERTIFICATE_BLOCK) ?? [];
  return blocks.filter(isCertificate);
}

function buildTrustPool(
  rootCAPath: string,
  logger: Logger,
  systemCertificates: () => readonly string[],
  readFile: (path: string) => string
): string[] {
  let pool: string[];
  try {
    pool = [...systemCertificates()];
  } catch (err) {
    logger.warn({ err }, 'failed to read system certificates, trying to read CA certs anyway');
    pool = [];
  }

  let pem: string;
  try {
    pem = readFile(rootCAPath);
  } catch (err) {
    throw new FatalError(`failed to read root CA file ${rootCAPath} - ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const certificates = parsePemCertificates(pem);
  if (certificates.length === 0) {
    throw new FatalError(`failed to parse root CA certificates from ${rootCAPath}`);
  }

  return [...pool, ...certificates];
}

function loadKeyPair(
  certPath: string,
  keyPath: string,
  readFile: (path: string) => string
): ClientCertificate {
  try {
    const cert = readFile(certPath);
    const key = readFile(keyPath);
    // Rejects unparsable PEM and keys that do not belong to the certificate
    createSecureContext({ cert, key });
    return { cert, key };
  } catch (err) {
    throw new FatalError(
      `error creating X509 key pair from ${certPath} and ${keyPath} - ${errorMessage(err)}`,
      { cause: err }
    );
  }
}

/**
 * Resolve the outbound client configuration. Each step layers onto the TLS
 * material built by the previous ones; the material is only attached when at
 * least one step applied.
 */
export function resolveClientConfig(
  settings: Settings,
  logger: Logger,
  deps: ClientBuilderDeps = {}
): ClientConfig {
  const systemCertificates = deps.systemCertificates ?? (() => rootCertificates);
  const readFile = deps.readFile ?? readTextFile;

  let timeoutSeconds = DEFAULT_CLIENT_TIMEOUT_SECONDS;
  if (settings.isSet('client_timeout_seconds')) {
    timeoutSeconds = settings.getInt('client_timeout_seconds');
  }

  const tls: TlsMaterial = { insecureSkipVerify: false };
  let useTlsConfig = false;

  if (settings.isSet('allow_insecure_conn')) {
    tls.insecureSkipVerify = settings.getBool('allow_insecure_conn');
    useTlsConfig = true;
  }

  if (settings.isSet('root_ca')) {
    const rootCAPath = settings.getString('root_ca');
    if (rootCAPath !== '') {
      tls.trustPool = buildTrustPool(rootCAPath, logger, systemCertificates, readFile);
      useTlsConfig = true;
    }
  }

  const certPath = settings.getString('client_cert');
  const keyPath = settings.getString('client_key');
  if (certPath !== '' || keyPath !== '') {
    if (certPath === '' || !settings.isSet('client_key')) {
      throw new FatalError('both client_cert and client_key must be provided if you set any of them');
    }
    if (keyPath === '') {
      throw new FatalError('empty client_key path');
    }
    tls.clientCertificate = loadKeyPair(certPath, keyPath, readFile);
    useTlsConfig = true;
  }

  const timeoutMs = secondsToTimerMs(timeoutSeconds, 'client_timeout_seconds', logger);
  if (!useTlsConfig) {
    return { timeoutMs };
  }

  logger.debug(
    {
      insecureSkipVerify: tls.insecureSkipVerify,
      trustedCertificates: tls.trustPool?.length ?? 0,
      clientCertificate: tls.clientCertificate !== undefined,
    },
    'Outbound TLS configuration in use'
  );
  return { timeoutMs, tls };
}

function createDispatcher(tls: TlsMaterial): Agent {
  return new Agent({
    connect: {
      rejectUnauthorized: !tls.insecureSkipVerify,
      ca: tls.trustPool,
      cert: tls.clientCertificate?.cert,
      key: tls.clientCertificate?.key,
    },
  });
}

/**
 * Outbound HTTP client shared by the authorizer's system and backend calls.
 */
export class HttpClient {
  readonly timeoutMs: number;
  readonly dispatcher: Agent | undefined;
  private readonly fetchImpl: FetchLike;

  constructor(config: ClientConfig, fetchImpl: FetchLike = undiciFetch) {
    this.timeoutMs = config.timeoutMs;
    this.dispatcher = config.tls ? createDispatcher(config.tls) : undefined;
    this.fetchImpl = fetchImpl;
  }

  fetch(url: string, init: HttpRequestInit = {}): Promise<HttpResponse> {
    const request: HttpRequestInit = { ...init };
    // A zero timeout disables it
    if (this.timeoutMs > 0) {
      request.signal = AbortSignal.timeout(this.timeoutMs);
    }
    if (this.dispatcher) {
      request.dispatcher = this.dispatcher;
    }
    return this.fetchImpl(url, request);
  }

  async close(): Promise<void> {
    if (this.dispatcher) {
      await this.dispatcher.close();
    }
  }
}

export function buildHttpClient(
  settings: Settings,
  logger: Logger,
  deps: ClientBuilderDeps = {}
): HttpClient {
  return new HttpClient(resolveClientConfig(settings, logger, deps));
}
