/**
 * Routes of the flag API and the builder that turns them into requests
 */
import type { TransportRequest } from '@flagwire/fetch-transport';
import { RequestBuildError } from '../errors.mjs';

export const DEFAULT_BASE_URL = 'https://edge.flagwire.io/api/v1/';

/**
 * Header carrying the environment key
 */
export const ENVIRONMENT_KEY_HEADER = 'X-Environment-Key';

export type TraitValue = string | number | boolean | null;

/**
 * A trait to send with an identity
 */
export interface TraitInput {
  key: string;
  value: TraitValue;
  transient?: boolean;
}

/**
 * Logical API operations
 */
export type Route =
  | { type: 'getFlags' }
  | { type: 'getIdentity'; identifier: string; traits?: TraitInput[]; transient?: boolean }
  | { type: 'postTraits'; identifier: string; traits: TraitInput[] }
  | { type: 'postAnalytics'; events: Record<string, number> };

/**
 * Parse the base URL, making sure relative paths resolve beneath it
 */
function parseBaseUrl(baseUrl: string): URL {
  let url: URL;
  try {
    url = new URL(baseUrl);
  } catch (error) {
    throw new RequestBuildError(`Invalid base URL: ${baseUrl}`, { cause: error });
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new RequestBuildError(`Unsupported base URL protocol: ${url.protocol}`);
  }
  if (!url.pathname.endsWith('/')) {
    url.pathname = `${url.pathname}/`;
  }
  return url;
}

function requireIdentifier(identifier: string): string {
  if (!identifier.trim()) {
    throw new RequestBuildError('Identity identifier must not be empty');
  }
  return identifier;
}

function toWireTraits(traits: readonly TraitInput[]): Array<Record<string, unknown>> {
  return traits.map((trait) => ({
    trait_key: trait.key,
    trait_value: trait.value,
    ...(trait.transient !== undefined && { transient: trait.transient }),
  }));
}

/**
 * Build the request for a route
 *
 * @throws RequestBuildError for an invalid base URL or an empty identifier
 */
export function buildRequest(baseUrl: string, credential: string, route: Route): TransportRequest {
  const base = parseBaseUrl(baseUrl);
  const headers: Record<string, string> = {
    [ENVIRONMENT_KEY_HEADER]: credential,
    Accept: 'application/json',
  };

  const post = (path: string, payload: unknown): TransportRequest => ({
    url: new URL(path, base).toString(),
    method: 'POST',
    headers: { ...headers, 'Content-Type': 'application/json' },
    body: JSON.stringify(payload),
    cacheDirective: 'default',
  });

  switch (route.type) {
    case 'getFlags':
      return {
        url: new URL('flags/', base).toString(),
        method: 'GET',
        headers,
        cacheDirective: 'default',
      };

    case 'getIdentity': {
      const identifier = requireIdentifier(route.identifier);
      if (route.traits && route.traits.length > 0) {
        return post('identities/', {
          identifier,
          traits: toWireTraits(route.traits),
          ...(route.transient && { transient: true }),
        });
      }

      const url = new URL('identities/', base);
      url.searchParams.set('identifier', identifier);
      if (route.transient) {
        url.searchParams.set('transient', 'true');
      }
      return { url: url.toString(), method: 'GET', headers, cacheDirective: 'default' };
    }

    case 'postTraits':
      return post('identities/', {
        identifier: requireIdentifier(route.identifier),
        traits: toWireTraits(route.traits),
      });

    case 'postAnalytics':
      return post('analytics/flags/', route.events);
  }
}
