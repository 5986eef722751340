import type { Request } from 'express';
import { GLOBAL_KEY } from './constants';
import { getClientId } from './client-identity';

/**
 * Extracts a rate limiting key from a request.
 * Requests with the same key share the same token bucket.
 *
 * @example
 * ```typescript
 * RateLimitModule.forRoot({
 *   rate: 100,
 *   capacity: 200,
 *   keyFunc: keyFuncByIpAndPath(), // 1.2.3.4:/api/users != 1.2.3.4:/api/orders
 * })
 * ```
 */
export type KeyFunc = (req: Request) => string;

const FORWARDED_FOR_HEADER = 'x-forwarded-for';

function headerValue(req: Request, name: string): string {
  const value = req.headers[name.toLowerCase()];
  if (Array.isArray(value)) {
    return value.join(', ');
  }
  return value ?? '';
}

function clientIp(req: Request): string {
  const forwarded = headerValue(req, FORWARDED_FOR_HEADER);
  if (forwarded !== '') {
    return forwarded;
  }
  return req.socket?.remoteAddress ?? '';
}

function requestPath(req: Request): string {
  const url = req.originalUrl || req.url || '';
  const queryStart = url.indexOf('?');
  return queryStart === -1 ? url : url.slice(0, queryStart);
}

/**
 * All requests share one bucket
 */
export function keyFuncGlobal(): KeyFunc {
  return () => GLOBAL_KEY;
}

/**
 * One bucket per client address.
 *
 * Uses the X-Forwarded-For header verbatim when present, otherwise the socket
 * address. Only use this behind a proxy you trust to set that header: a client
 * talking to the service directly can forge it to get a fresh bucket.
 */
export function keyFuncByIp(): KeyFunc {
  return clientIp;
}

/**
 * One bucket per request path, shared by ALL clients of that path.
 * For per-client per-path budgets use keyFuncByIpAndPath or keyFuncByClientIdAndPath.
 */
export function keyFuncByPath(): KeyFunc {
  return requestPath;
}

/**
 * One bucket per client address per path
 */
export function keyFuncByIpAndPath(): KeyFunc {
  return (req) => `${clientIp(req)}:${requestPath(req)}`;
}

/**
 * One bucket per authenticated client, as recorded with setClientId().
 * Without authentication the key is '' and all anonymous requests share a bucket.
 */
export function keyFuncByClientId(): KeyFunc {
  return getClientId;
}

/**
 * One bucket per authenticated client per path
 */
export function keyFuncByClientIdAndPath(): KeyFunc {
  return (req) => `${getClientId(req)}:${requestPath(req)}`;
}

/**
 * One bucket per value of a header, e.g. a tenant id. A missing header yields ''.
 */
export function keyFuncByHeader(header: string): KeyFunc {
  return (req) => headerValue(req, header);
}

/**
 * Resolve a key function from its configuration name:
 * 'global', 'ip', 'path', 'ip-path', 'client-id', 'client-id-path' or 'header:<Name>'
 */
export function keyFuncFromName(name: string): KeyFunc {
  if (name.startsWith('header:')) {
    const header = name.slice('header:'.length);
    if (!header) {
      throw new Error('Rate limit key "header:" must name a header');
    }
    return keyFuncByHeader(header);
  }

  switch (name) {
    case 'global':
      return keyFuncGlobal();
    case 'ip':
      return keyFuncByIp();
    case 'path':
      return keyFuncByPath();
    case 'ip-path':
      return keyFuncByIpAndPath();
    case 'client-id':
      return keyFuncByClientId();
    case 'client-id-path':
      return keyFuncByClientIdAndPath();
    default:
      throw new Error(`Unsupported rate limit key: ${name}`);
  }
}
