/**
 * Cookie codec
 *
 * Wire shape follows the engine's cookie objects:
 * `{ name, value, domain, path, expires, expiry, secure, httponly }`
 * where `expires` is an HTTP date string and `expiry` is unix seconds.
 */

import { z } from 'zod';
import { parseWire, type Codec, type WireValue } from './codec.js';

export interface Cookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  /** Expiry instant; absent for session cookies. Sent in whole seconds, so milliseconds are dropped */
  expires?: Date;
  /** HTTP date form of the expiry as reported by the engine */
  rawExpires?: string;
  secure: boolean;
  httpOnly: boolean;
}

/**
 * Format a Date in the HTTP cookie-expiry form (IMF-fixdate),
 * e.g. `Thu, 02 Jan 2020 03:04:05 GMT`.
 */
export function formatCookieExpiry(date: Date): string {
  return date.toUTCString();
}

/**
 * Parse an HTTP date string. Returns undefined for unparseable input.
 */
export function parseCookieExpiry(value: string): Date | undefined {
  const time = Date.parse(value);
  return Number.isNaN(time) ? undefined : new Date(time);
}

/**
 * Whether the cookie lives only for the browsing session.
 */
export function isSessionCookie(cookie: Cookie): boolean {
  return cookie.expires === undefined && !cookie.rawExpires;
}

const wireCookieSchema = z.object({
  name: z.string(),
  value: z.string().default(''),
  domain: z.string().default(''),
  path: z.string().default(''),
  expires: z.string().nullish(),
  expiry: z.number().nullish(),
  secure: z.boolean().default(false),
  httponly: z.boolean().default(false),
});

type WireCookie = z.output<typeof wireCookieSchema>;

function encodeCookie(cookie: Cookie): WireValue {
  const wire: Record<string, WireValue> = {
    name: cookie.name,
    value: cookie.value,
    domain: cookie.domain,
    path: cookie.path,
    secure: cookie.secure,
    httponly: cookie.httpOnly,
  };

  if (cookie.expires) {
    wire.expires = cookie.rawExpires || formatCookieExpiry(cookie.expires);
    wire.expiry = Math.floor(cookie.expires.getTime() / 1000);
  } else if (cookie.rawExpires) {
    wire.expires = cookie.rawExpires;
    const parsed = parseCookieExpiry(cookie.rawExpires);
    if (parsed) {
      wire.expiry = Math.floor(parsed.getTime() / 1000);
    }
  }

  return wire;
}

function toCookie(wire: WireCookie): Cookie {
  const cookie: Cookie = {
    name: wire.name,
    value: wire.value,
    domain: wire.domain,
    path: wire.path,
    secure: wire.secure,
    httpOnly: wire.httponly,
  };

  const expires =
    typeof wire.expiry === 'number'
      ? new Date(wire.expiry * 1000)
      : wire.expires
        ? parseCookieExpiry(wire.expires)
        : undefined;

  if (expires) {
    cookie.expires = expires;
  }

  // The engine's string form wins over one derived from the timestamp.
  if (wire.expires) {
    cookie.rawExpires = wire.expires;
  } else if (expires) {
    cookie.rawExpires = formatCookieExpiry(expires);
  }

  return cookie;
}

export const cookieCodec: Codec<Cookie> = {
  type: 'cookie',
  encode: encodeCookie,
  decode: (wire) => toCookie(parseWire(wireCookieSchema, 'cookie', wire)),
};

export const cookieListCodec: Codec<Cookie[]> = {
  type: 'cookie list',
  encode: (cookies) => cookies.map(encodeCookie),
  decode: (wire) =>
    parseWire(z.array(wireCookieSchema).nullish(), 'cookie list', wire)?.map(toCookie) ?? [],
};
