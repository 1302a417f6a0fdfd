/**
 * Appends a request path (with optional query) to a server base URL,
 * keeping any base path the server was registered with.
 */
export function joinUrl(base: URL, pathAndQuery: string): string {
  const basePath = base.pathname.endsWith('/') ? base.pathname.slice(0, -1) : base.pathname;
  const suffix = pathAndQuery.startsWith('/') ? pathAndQuery : `/${pathAndQuery}`;
  return `${base.origin}${basePath}${suffix}`;
}
