import type { Request } from 'express';
import { randomUUID } from 'crypto';
import { ProxyMiddleware } from './chain';
import { headerValue } from '../router/router';

export const REQUEST_ID_HEADER = 'x-request-id';

export function getRequestId(req: Request): string | undefined {
  return headerValue(req.headers, REQUEST_ID_HEADER) || undefined;
}

/**
 * Reuses the caller's X-Request-ID or assigns one. The id is written back
 * onto the incoming headers so it travels to the backend with the request.
 */
export const requestIdMiddleware: ProxyMiddleware = (req, res) => {
  const requestId = getRequestId(req) || randomUUID();
  req.headers[REQUEST_ID_HEADER] = requestId;
  res.setHeader('X-Request-ID', requestId);
};
