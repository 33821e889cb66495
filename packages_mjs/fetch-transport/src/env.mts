/**
 * Environment-based configuration
 *
 * Unset or unparseable variables leave the default in place.
 */

import process from 'node:process';
import { CacheConfig, NetworkConfig } from './config.mjs';
import { logger } from './logger.mjs';

const log = logger.child({ component: 'env' });

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    log.warn({ variable: name, value: raw }, 'Ignoring non-numeric environment value');
    return undefined;
  }
  return value;
}

function readBoolean(env: Env, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return undefined;
  if (raw === 'true' || raw === '1' || raw === 'yes') return true;
  if (raw === 'false' || raw === '0' || raw === 'no') return false;
  log.warn({ variable: name, value: raw }, 'Ignoring non-boolean environment value');
  return undefined;
}

/**
 * Build a NetworkConfig from FLAGWIRE_* variables
 */
export function loadNetworkConfigFromEnv(env: Env = process.env): NetworkConfig {
  return new NetworkConfig({
    requestTimeoutMs: readNumber(env, 'FLAGWIRE_REQUEST_TIMEOUT_MS'),
    resourceTimeoutMs: readNumber(env, 'FLAGWIRE_RESOURCE_TIMEOUT_MS'),
    maxConnectionsPerHost: readNumber(env, 'FLAGWIRE_MAX_CONNECTIONS_PER_HOST'),
    waitsForConnectivity: readBoolean(env, 'FLAGWIRE_WAITS_FOR_CONNECTIVITY'),
    usePipelining: readBoolean(env, 'FLAGWIRE_USE_PIPELINING'),
    shouldSetCookies: readBoolean(env, 'FLAGWIRE_SET_COOKIES'),
  });
}

/**
 * Build a CacheConfig from FLAGWIRE_* variables
 */
export function loadCacheConfigFromEnv(env: Env = process.env): CacheConfig {
  return new CacheConfig({
    useCache: readBoolean(env, 'FLAGWIRE_USE_CACHE'),
    cacheTtlMs: readNumber(env, 'FLAGWIRE_CACHE_TTL_MS'),
    skipAPI: readBoolean(env, 'FLAGWIRE_SKIP_API'),
  });
}
