import { BackendPool } from '../backend/pool';
import { Router, RoutableRequest, headerValue } from './router';

export type ContentTypeRoutes = Map<string, BackendPool> | Record<string, BackendPool>;

/**
 * Picks a pool by exact Content-Type, independent of the priority table.
 * "application/json; charset=utf-8" does not match "application/json".
 * The owned Router is a separate table the caller fills through getRouter();
 * routeByContentType never consults it.
 */
export class ContentRouter {
  private readonly router = new Router();

  routeByContentType(req: RoutableRequest, routes: ContentTypeRoutes): BackendPool | null {
    const contentType = headerValue(req.headers, 'content-type');
    if (routes instanceof Map) {
      return routes.get(contentType) ?? null;
    }
    return Object.prototype.hasOwnProperty.call(routes, contentType) ? routes[contentType] : null;
  }

  getRouter(): Router {
    return this.router;
  }
}
