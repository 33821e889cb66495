/**
 * Session factory
 */

import { Agent, type Dispatcher } from 'undici';
import { sharedCookieJar, type CookieJar } from './cookie-jar.mjs';
import { logger } from './logger.mjs';
import { Session } from './session.mjs';
import type { CachePolicySource, NetworkSettings } from './types.mjs';

const log = logger.child({ component: 'factory' });

/**
 * undici's own headers/body timeout, used when the configured one is not positive
 */
export const DEFAULT_TRANSPORT_TIMEOUT_MS = 300_000;

/**
 * Pipelining depth when pipelining is on
 */
export const PIPELINING_DEPTH = 10;

/**
 * Anything that can hand out a frozen copy of its network settings
 */
export interface NetworkSettingsSource {
  snapshot(): NetworkSettings;
}

/**
 * Options for createSession
 */
export interface CreateSessionOptions {
  /** Send through this dispatcher instead of a new Agent. The caller closes it. */
  dispatcher?: Dispatcher;
  /** Jar for Set-Cookie handling. Default: the process-wide jar */
  cookieJar?: CookieJar;
}

/**
 * Map network settings onto undici Agent options
 */
export function toAgentOptions(settings: NetworkSettings): Agent.Options {
  const timeout =
    settings.requestTimeoutMs > 0 ? settings.requestTimeoutMs : DEFAULT_TRANSPORT_TIMEOUT_MS;

  return {
    connections: settings.maxConnectionsPerHost > 0 ? settings.maxConnectionsPerHost : null,
    pipelining: settings.usePipelining ? PIPELINING_DEPTH : 1,
    headersTimeout: timeout,
    bodyTimeout: timeout,
  };
}

/**
 * Build a session from the current configuration.
 *
 * The network settings are copied, so mutating the config afterwards does
 * not reach this session.
 */
export function createSession(
  network: NetworkSettingsSource,
  cache: CachePolicySource,
  options: CreateSessionOptions = {}
): Session {
  const settings = network.snapshot();
  const agentOptions = toAgentOptions(settings);
  const owned = options.dispatcher === undefined;
  const dispatcher = options.dispatcher ?? new Agent(agentOptions);

  const session = new Session({
    settings,
    agentOptions,
    cache,
    dispatcher,
    ownsDispatcher: owned,
    cookieJar: settings.shouldSetCookies ? (options.cookieJar ?? sharedCookieJar()) : undefined,
  });

  log.debug(
    {
      sessionId: session.id,
      connections: agentOptions.connections,
      pipelining: agentOptions.pipelining,
      timeoutMs: agentOptions.headersTimeout,
      ownsDispatcher: owned,
    },
    'Created session'
  );

  return session;
}

/**
 * Signature of createSession, for injecting a different factory
 */
export type SessionFactory = typeof createSession;
