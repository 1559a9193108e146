import { z } from 'zod';

export const MappingRuleSchema = z.object({
  method: z.string().min(1),
  pattern: z.string().min(1),
  metric: z.string().min(1),
  delta: z.number().int().positive().default(1),
});

export type MappingRule = z.infer<typeof MappingRuleSchema>;

export const ServiceConfigSchema = z.object({
  id: z.string().min(1),
  backend_url: z.string().url(),
  service_token: z.string().min(1),
  mapping_rules: z.array(MappingRuleSchema).default([]),
});

export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;

export interface Credentials {
  userKey?: string;
  appId?: string;
  appKey?: string;
}

export interface AuthorizationRequest {
  serviceId: string;
  systemUrl: string;
  accessToken: string;
  credentials: Credentials;
  method: string;
  path: string;
}

export type AuthorizationReason =
  | 'authorized'
  | 'denied'
  | 'no_credentials'
  | 'no_matching_rule'
  | 'system_error'
  | 'backend_error_failopen'
  | 'backend_error_failclosed';

export interface AuthorizationResult {
  allowed: boolean;
  reason: AuthorizationReason;
}

/** Usage deltas keyed by metric name. */
export type Usage = Record<string, number>;

export type ResponseTarget = 'system' | 'backend';

export interface ResponseReport {
  target: ResponseTarget;
  serviceId: string;
  /** HTTP status, or 0 when no response was received. */
  status: number;
  durationMs: number;
}

/**
 * Hooks invoked by the authorizer. Only exists when metrics reporting is
 * enabled.
 */
export interface MetricsReporter {
  responseCallback(report: ResponseReport): void;
  cacheHitCallback(serviceId: string): void;
}
