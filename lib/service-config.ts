/**
 * @fileoverview Service configuration read from the environment.
 *
 * PUBLIC_BASE_URL  absolute origin used in tool-registry URLs
 *                  (falls back to the incoming request's origin)
 * LOG_LEVEL        debug | info | warn | error
 *
 * @module lib/service-config
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const SERVICE_NAME = 'Sustainability & Waste KPI API';
export const SERVICE_DESCRIPTION = 'Mock sustainability KPI API for AI-agent tool demos';
export const SERVICE_VERSION = '1.0.0';

export interface ServiceConfig {
  publicBaseUrl: string | null;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function normalizeBaseUrl(value: string): string {
  return value.trim().replace(/\/+$/, '');
}

export function getServiceConfig(env: Env = process.env): ServiceConfig {
  const rawBase = (env.PUBLIC_BASE_URL || '').trim();
  const rawLevel = (env.LOG_LEVEL || '').trim().toLowerCase();
  const defaultLevel: LogLevel = env.NODE_ENV === 'development' ? 'debug' : 'info';

  return {
    publicBaseUrl: rawBase ? normalizeBaseUrl(rawBase) : null,
    logLevel: isLogLevel(rawLevel) ? rawLevel : defaultLevel,
  };
}
