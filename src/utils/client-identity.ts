import type { Request } from 'express';

const clientIds = new WeakMap<Request, string>();

/**
 * Record the client identity established by an upstream authentication step.
 * Call this from your auth guard or middleware before the rate limiter runs.
 */
export function setClientId(req: Request, clientId: string): void {
  clientIds.set(req, clientId);
}

/**
 * Client identity recorded for the request, or '' if authentication has not run
 */
export function getClientId(req: Request): string {
  return clientIds.get(req) ?? '';
}
