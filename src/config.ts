/**
 * Shared Application Configuration
 *
 * Centralizes environment variable access for the server process.
 * Classification settings live in src/classification/config.ts.
 *
 * Environment variables:
 * - CLASSIFIER_SOCKET_PATH: Unix domain socket the server binds (default /tmp/file-classifier.sock)
 * - CLASSIFIER_PORT: If set, listen on 127.0.0.1:<port> instead of the socket
 * - APP_ENV: 'production' or anything else for development
 */

import 'dotenv/config';

/** Local endpoint the server owns while running */
export type Endpoint =
  | { kind: 'socket'; path: string }
  | { kind: 'tcp'; host: string; port: number };

export interface AppConfig {
  isDev: boolean;
  endpoint: Endpoint;
}

function optionalEnv(key: string, fallback = ''): string {
  return process.env[key] ?? fallback;
}

/**
 * Read a whole-number setting. Unset or blank yields `fallback`; anything that
 * is not an integer in [1, max] throws so a bad value fails startup instead of
 * turning into NaN.
 */
export function positiveIntEnv(key: string, fallback: number, max?: number): number {
  const raw = optionalEnv(key).trim();
  if (raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1 || (max !== undefined && value > max)) {
    const range = max === undefined ? 'a positive integer' : `an integer between 1 and ${max}`;
    throw new Error(`Invalid environment variable ${key}: expected ${range}, got "${raw}"`);
  }
  return value;
}

const isDev = (optionalEnv('APP_ENV', 'development')) !== 'production';

export function resolveEndpoint(): Endpoint {
  if (optionalEnv('CLASSIFIER_PORT').trim() !== '') {
    return { kind: 'tcp', host: '127.0.0.1', port: positiveIntEnv('CLASSIFIER_PORT', 0, 65535) };
  }
  return { kind: 'socket', path: optionalEnv('CLASSIFIER_SOCKET_PATH', '/tmp/file-classifier.sock') };
}

/** Human-readable form for logs */
export function describeEndpoint(endpoint: Endpoint): string {
  return endpoint.kind === 'socket'
    ? `unix:${endpoint.path}`
    : `http://${endpoint.host}:${endpoint.port}`;
}

export const appConfig: AppConfig = {
  isDev,
  endpoint: resolveEndpoint(),
};
