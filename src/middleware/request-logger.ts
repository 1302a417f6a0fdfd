import { ProxyMiddleware } from './chain';
import { LogSink, defaultLogSink } from '../utils/logger';

export function createRequestLogger(sink: LogSink = defaultLogSink): ProxyMiddleware {
  return (req, res) => {
    const start = Date.now();
    sink(`${req.method} ${req.path} from ${req.socket.remoteAddress ?? 'unknown'}`);
    res.once('finish', () => {
      sink(`Request completed in ${Date.now() - start}ms`);
    });
  };
}
