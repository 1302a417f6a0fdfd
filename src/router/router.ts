import type { IncomingHttpHeaders } from 'http';
import { BackendPool } from '../backend/pool';
import { InvalidPatternError, errorMessage } from '../utils/errors';

/** The parts of a request the router looks at. Express requests satisfy it. */
export interface RoutableRequest {
  method: string;
  path: string;
  headers: IncomingHttpHeaders;
}

export interface RouteDefinition {
  name: string;
  pattern?: string;
  pathPrefix?: string;
  subdomain?: string;
  headers?: Record<string, string>;
  methods?: string[];
  backend: BackendPool;
  priority?: number;
}

export interface Route {
  readonly name: string;
  readonly pattern?: string;
  readonly pathPrefix?: string;
  readonly subdomain?: string;
  readonly headers?: Readonly<Record<string, string>>;
  readonly methods?: readonly string[];
  readonly backend: BackendPool;
  readonly priority: number;
  readonly regex: RegExp | null;
}

export function headerValue(headers: IncomingHttpHeaders, name: string): string {
  const value = headers[name.toLowerCase()];
  if (Array.isArray(value)) {
    return value[0] ?? '';
  }
  return value ?? '';
}

/** First label of the Host header with any port removed. */
export function subdomainOf(host: string): string {
  const hostname = host.replace(/:\d+$/, '');
  return hostname.split('.')[0];
}

/**
 * Priority-ordered route table. Matching walks every route in order, so the
 * cost is linear in the number of routes.
 */
export class Router {
  private routes: Route[] = [];

  addRoute(definition: RouteDefinition): Route {
    let regex: RegExp | null = null;
    if (definition.pattern) {
      try {
        regex = new RegExp(definition.pattern);
      } catch (error) {
        throw new InvalidPatternError(definition.pattern, errorMessage(error));
      }
    }

    const route: Route = {
      name: definition.name,
      pattern: definition.pattern,
      pathPrefix: definition.pathPrefix,
      subdomain: definition.subdomain,
      headers: definition.headers ? { ...definition.headers } : undefined,
      methods: definition.methods?.map(method => method.toUpperCase()),
      backend: definition.backend,
      priority: definition.priority ?? 0,
      regex
    };

    // Array.prototype.sort is stable: equal priorities keep insertion order
    this.routes = [...this.routes, route].sort((a, b) => b.priority - a.priority);
    return route;
  }

  match(req: RoutableRequest): Route | null {
    for (const route of this.routes) {
      if (this.matchRoute(route, req)) {
        return route;
      }
    }
    return null;
  }

  removeRoute(name: string): boolean {
    const index = this.routes.findIndex(route => route.name === name);
    if (index === -1) {
      return false;
    }
    this.routes = [...this.routes.slice(0, index), ...this.routes.slice(index + 1)];
    return true;
  }

  listRoutes(): readonly Route[] {
    return this.routes;
  }

  get size(): number {
    return this.routes.length;
  }

  private matchRoute(route: Route, req: RoutableRequest): boolean {
    if (route.methods && route.methods.length > 0) {
      if (!route.methods.includes(req.method.toUpperCase())) {
        return false;
      }
    }

    if (route.subdomain) {
      if (subdomainOf(headerValue(req.headers, 'host')) !== route.subdomain) {
        return false;
      }
    }

    if (route.headers) {
      for (const [name, expected] of Object.entries(route.headers)) {
        if (headerValue(req.headers, name) !== expected) {
          return false;
        }
      }
    }

    if (route.pathPrefix && !req.path.startsWith(route.pathPrefix)) {
      return false;
    }

    if (route.regex && !route.regex.test(req.path)) {
      return false;
    }

    return true;
  }
}
