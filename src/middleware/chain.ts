import type { Request, Response } from 'express';

/**
 * A step of the proxy pipeline. Throwing aborts the request; writing a
 * response ends the pipeline without forwarding.
 */
export type ProxyMiddleware = (req: Request, res: Response) => void | Promise<void>;

export type ChainResult = 'continue' | 'handled';

export class MiddlewareChain {
  private handlers: ProxyMiddleware[] = [];

  add(handler: ProxyMiddleware): this {
    this.handlers = [...this.handlers, handler];
    return this;
  }

  get length(): number {
    return this.handlers.length;
  }

  async execute(req: Request, res: Response): Promise<ChainResult> {
    for (const handler of this.handlers) {
      await handler(req, res);
      if (res.headersSent || res.writableEnded) {
        return 'handled';
      }
    }
    return 'continue';
  }
}
