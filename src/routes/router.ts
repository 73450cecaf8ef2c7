/**
 * Route table for one collection path and its numeric member ids
 */

/** Router: a response for matched routes, null otherwise */
export type RouterFn = (
  request: Request,
  path: string,
  method: string,
) => Promise<Response | null>;

/** A compiled route: method, anchored path regex and the call it makes */
export type Route = {
  method: string;
  regex: RegExp;
  handle: (request: Request, match: RegExpMatchArray) => Response | Promise<Response>;
};

const escapePath = (path: string): string =>
  path.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/** Route on the collection path itself, e.g. "GET /items" */
export const collection = (
  method: string,
  path: string,
  handler: (request: Request) => Response | Promise<Response>,
): Route => ({
  method,
  regex: new RegExp(`^${escapePath(path)}$`),
  handle: (request) => handler(request),
});

/**
 * Route on one member of the collection, e.g. "GET /items/42".
 * Ids match digits only, so "/items/abc" falls through to 404.
 */
export const member = (
  method: string,
  path: string,
  handler: (request: Request, id: number) => Response | Promise<Response>,
): Route => ({
  method,
  regex: new RegExp(`^${escapePath(path)}/(\\d+)$`),
  handle: (request, match) => handler(request, Number(match[1])),
});

/**
 * Create a router that answers with the first route matching method and path
 */
export const createRouter = (routes: Route[]): RouterFn =>
  (request, path, method) => {
    for (const route of routes) {
      if (route.method !== method) continue;
      const match = path.match(route.regex);
      if (match) return Promise.resolve(route.handle(request, match));
    }
    return Promise.resolve(null);
  };
