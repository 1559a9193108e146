import { z } from 'zod';

export const ENV_PREFIX = 'THREESCALE';

export const SETTING_NAMES = [
  'log_level',
  'log_json',
  'log_grpc',
  'listen_addr',
  'report_metrics',
  'metrics_port',
  'cache_ttl_seconds',
  'cache_refresh_seconds',
  'cache_entries_max',
  'cache_refresh_retries',
  'client_timeout_seconds',
  'allow_insecure_conn',
  'root_ca',
  'client_cert',
  'client_key',
  'grpc_conn_max_seconds',
  'use_cached_backend',
  'backend_cache_flush_interval_seconds',
  'backend_cache_policy_fail_closed',
] as const;

export type SettingName = (typeof SETTING_NAMES)[number];

export type RawSettings = Partial<Record<SettingName, string>>;

const TRUE_VALUES = ['1', 't', 'T', 'TRUE', 'true', 'True'] as const;
const FALSE_VALUES = ['0', 'f', 'F', 'FALSE', 'false', 'False'] as const;

const BoolSchema = z
  .string()
  .trim()
  .pipe(
    z.union([
      z.enum(TRUE_VALUES).transform(() => true),
      z.enum(FALSE_VALUES).transform(() => false),
    ])
  );

// Decimal, or 0x / 0o / 0b prefixed, with an optional sign
const IntSchema = z
  .string()
  .trim()
  .regex(/^[+-]?(0x[0-9a-f]+|0o[0-7]+|0b[01]+|\d+)$/i)
  .transform((value) => {
    const negative = value.startsWith('-');
    const body = value.replace(/^[+-]/, '');
    const parsed = Number(body);
    return negative ? -parsed : parsed;
  })
  .pipe(z.number().int().safe());

/**
 * Immutable view over the settings bound at startup.
 *
 * A setting is either unset, or set to a raw string (possibly empty). The typed
 * getters return the zero value of their type when a setting is unset or does
 * not parse, so callers that need a non-zero default must check `isSet` first.
 */
export class Settings {
  private readonly values: ReadonlyMap<SettingName, string>;

  constructor(values: RawSettings = {}) {
    const entries: Array<[SettingName, string]> = [];
    for (const name of SETTING_NAMES) {
      const value = values[name];
      if (value !== undefined) {
        entries.push([name, value]);
      }
    }
    this.values = new Map(entries);
  }

  isSet(name: SettingName): boolean {
    return this.values.has(name);
  }

  getString(name: SettingName): string {
    return this.values.get(name) ?? '';
  }

  getInt(name: SettingName): number {
    const result = IntSchema.safeParse(this.values.get(name));
    return result.success ? result.data : 0;
  }

  getBool(name: SettingName): boolean {
    const result = BoolSchema.safeParse(this.values.get(name));
    return result.success ? result.data : false;
  }

  /**
   * Names and raw values of every set setting, for startup diagnostics.
   */
  entries(): Array<[SettingName, string]> {
    return [...this.values.entries()];
  }
}

export function envName(name: SettingName, prefix: string = ENV_PREFIX): string {
  const upper = name.toUpperCase();
  return prefix ? `${prefix}_${upper}` : upper;
}

/**
 * Bind every known setting to its environment variable. Variables present with
 * an empty value count as set.
 */
export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  prefix: string = ENV_PREFIX
): Settings {
  const raw: RawSettings = {};
  for (const name of SETTING_NAMES) {
    const value = env[envName(name, prefix)];
    if (typeof value === 'string') {
      raw[name] = value;
    }
  }
  return new Settings(raw);
}
