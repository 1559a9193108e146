import { join } from 'path';
import pino, { type Logger } from 'pino';
import type { HttpResponse } from '../src/config/client.js';

export const FIXTURES_DIR = join(process.cwd(), 'tests', 'fixtures');

export function fixture(name: string): string {
  return join(FIXTURES_DIR, name);
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export function jsonResponse(status: number, body: unknown = {}): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
    text: async () => JSON.stringify(body),
  };
}
