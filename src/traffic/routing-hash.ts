import type { IncomingHttpHeaders } from 'http';
import { headerValue } from '../router/router';

export const USER_ID_HEADER = 'x-user-id';
export const USER_ID_COOKIE = 'user_id';

function cookieValue(headers: IncomingHttpHeaders, name: string): string | undefined {
  const header = headerValue(headers, 'cookie');
  for (const pair of header.split(';')) {
    const separator = pair.indexOf('=');
    if (separator === -1) {
      continue;
    }
    if (pair.slice(0, separator).trim() === name) {
      return pair.slice(separator + 1).trim().replace(/^"(.*)"$/, '$1');
    }
  }
  return undefined;
}

/** X-User-ID header, else the user_id cookie, else the empty string. */
export function routingIdentifier(req: { headers: IncomingHttpHeaders }): string {
  const fromHeader = headerValue(req.headers, USER_ID_HEADER);
  if (fromHeader) {
    return fromHeader;
  }
  return cookieValue(req.headers, USER_ID_COOKIE) ?? '';
}

/** Base-31 polynomial hash over code points, wrapping at signed 64 bits, folded to non-negative. */
export function hashString(value: string): bigint {
  let hash = 0n;
  for (const char of value) {
    hash = BigInt.asIntN(64, hash * 31n + BigInt(char.codePointAt(0) ?? 0));
  }
  return hash < 0n ? -hash : hash;
}

/** Stable bucket in [0, 100) for an identifier. */
export function routingBucket(identifier: string): number {
  return Number(hashString(identifier) % 100n);
}
