/**
 * Minimal cookie jar: name/value pairs per host
 */

import { parseHttpDate } from '@flagwire/response-cache';

interface CookieEntry {
  value: string;
  /** ms epoch, or Infinity for a session cookie */
  expires: number;
}

export class CookieJar {
  private readonly hosts: Map<string, Map<string, CookieEntry>> = new Map();

  /**
   * Store the cookies of a response's Set-Cookie headers
   */
  setCookies(url: string, setCookieHeaders: readonly string[], now: number = Date.now()): void {
    const host = new URL(url).host;
    for (const header of setCookieHeaders) {
      this.setCookie(host, header, now);
    }
  }

  private setCookie(host: string, header: string, now: number): void {
    const [pair, ...attributes] = header.split(';').map((part) => part.trim());
    const eq = pair.indexOf('=');
    if (eq <= 0) return;

    const name = pair.slice(0, eq).trim();
    const value = pair.slice(eq + 1).trim();
    let expires = Infinity;

    for (const attribute of attributes) {
      const [attrName, attrValue = ''] = attribute.split(/=(.*)/s, 2);
      const key = attrName.trim().toLowerCase();
      if (key === 'max-age' && /^-?\d+$/.test(attrValue.trim())) {
        // Max-Age takes precedence over Expires
        expires = now + parseInt(attrValue.trim(), 10) * 1000;
        break;
      }
      if (key === 'expires') {
        const at = parseHttpDate(attrValue.trim(), now);
        if (at !== undefined) expires = at;
      }
    }

    let cookies = this.hosts.get(host);
    if (!cookies) {
      cookies = new Map();
      this.hosts.set(host, cookies);
    }

    if (expires <= now) {
      cookies.delete(name);
      return;
    }
    cookies.set(name, { value, expires });
  }

  /**
   * Cookie header value for a request, or undefined when there is none
   */
  cookieHeader(url: string, now: number = Date.now()): string | undefined {
    const cookies = this.hosts.get(new URL(url).host);
    if (!cookies) return undefined;

    const parts: string[] = [];
    for (const [name, entry] of cookies) {
      if (entry.expires <= now) {
        cookies.delete(name);
        continue;
      }
      parts.push(`${name}=${entry.value}`);
    }
    return parts.length > 0 ? parts.join('; ') : undefined;
  }

  clear(): void {
    this.hosts.clear();
  }
}

let sharedJar: CookieJar | undefined;

/**
 * The process-wide jar used by sessions that set cookies
 */
export function sharedCookieJar(): CookieJar {
  if (!sharedJar) {
    sharedJar = new CookieJar();
  }
  return sharedJar;
}
