import type { Request } from 'express';
import jwt from 'jsonwebtoken';
import { ProxyMiddleware } from './chain';
import { AuthType } from '../types';
import { logger } from '../utils/logger';
import { constantTimeCompare } from '../utils/security';
import { ConfigurationError, ForbiddenError, UnauthorizedError, errorMessage } from '../utils/errors';
import { headerValue } from '../router/router';

export interface AuthOptions {
  type: AuthType;
  secret?: string;
}

function bearerToken(req: Request): string | undefined {
  const authHeader = headerValue(req.headers, 'authorization');
  return authHeader.startsWith('Bearer ') ? authHeader.substring(7) : undefined;
}

function extractCredential(req: Request, type: AuthType): string | undefined {
  switch (type) {
    case 'token':
      return headerValue(req.headers, 'authorization') || undefined;
    case 'api-key':
      return bearerToken(req) || headerValue(req.headers, 'x-api-key') || undefined;
    case 'jwt':
      return bearerToken(req);
  }
}

/**
 * Authentication for proxied traffic.
 * - token: any non-empty Authorization header is accepted
 * - api-key: Bearer token or X-API-Key equal to the secret
 * - jwt: Bearer token signed with the secret
 *
 * Missing credentials get 401, rejected ones 403. The middleware writes the
 * response itself and then throws so the pipeline records the failure.
 */
export function createAuthMiddleware(options: AuthOptions): ProxyMiddleware {
  const { type, secret } = options;
  if (type !== 'token' && !secret) {
    throw new ConfigurationError(`Auth type "${type}" requires a secret`);
  }

  const validate = (credential: string, req: Request): boolean => {
    if (type === 'token' || !secret) {
      return true;
    }
    if (type === 'api-key') {
      return constantTimeCompare(credential, secret);
    }
    try {
      jwt.verify(credential, secret);
      return true;
    } catch (error) {
      logger.debug('JWT verification failed', { path: req.path, error: errorMessage(error) });
      return false;
    }
  };

  return (req, res) => {
    const credential = extractCredential(req, type);

    if (!credential) {
      logger.warn('Request rejected - missing credentials', {
        ip: req.socket.remoteAddress,
        path: req.path,
        method: req.method,
        authType: type
      });
      res.status(401).json({
        error: 'Unauthorized',
        message: 'Missing credentials'
      });
      throw new UnauthorizedError();
    }

    if (!validate(credential, req)) {
      logger.warn('Request rejected - invalid credentials', {
        ip: req.socket.remoteAddress,
        path: req.path,
        method: req.method,
        authType: type
      });
      res.status(403).json({
        error: 'Forbidden',
        message: 'Invalid credentials'
      });
      throw new ForbiddenError();
    }
  };
}
