import cors from 'cors';
import { ProxyMiddleware } from './chain';

/**
 * Reflects allowed origins ("*" allows any) and answers OPTIONS preflights
 * with 200, which ends the pipeline.
 */
export function createCorsMiddleware(allowedOrigins: string[]): ProxyMiddleware {
  const allowAny = allowedOrigins.includes('*');
  const handler = cors({
    origin: (origin, callback) => {
      callback(null, origin !== undefined && (allowAny || allowedOrigins.includes(origin)));
    },
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    preflightContinue: true
  });

  return async (req, res) => {
    await new Promise<void>((resolve, reject) => {
      handler(req, res, (error?: unknown) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });

    if (req.method === 'OPTIONS') {
      res.status(200).end();
    }
  };
}
