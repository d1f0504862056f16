/**
 * Dynamic route table for extension-contributed routes.
 *
 * A started Fastify instance cannot drop routes, so extension routes live
 * in their own find-my-way router and the host forwards a wildcard route
 * into `dispatch()`.
 */

import Router from 'find-my-way';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { sendError } from '../utils/errors.js';
import { RouteConflictError } from './errors.js';
import type {
  ExtensionRoute,
  HttpMethod,
  MountedRoute,
  MountedRouteSet,
  RouteBridge,
  RouteParams,
} from './types.js';

const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'];

function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value);
}

interface RouteStore {
  key: string;
}

function isRouteStore(value: unknown): value is RouteStore {
  return typeof value === 'object' && value !== null && 'key' in value && typeof value.key === 'string';
}

function routeKey(method: HttpMethod, path: string): string {
  return `${method} ${path}`;
}

/** `prefix` ends with a slash; route paths may or may not start with one. */
export function joinRoutePath(prefix: string, path: string): string {
  const base = prefix.endsWith('/') ? prefix : `${prefix}/`;
  return base + path.replace(/^\/+/, '');
}

export interface RouteMatch {
  route: ExtensionRoute;
  path: string;
  params: RouteParams;
}

export class ExtensionRouteTable implements RouteBridge {
  private readonly router = Router();
  private readonly routes = new Map<string, ExtensionRoute>();
  private readonly mounted: MountedRoute[] = [];

  /** All-or-nothing: a conflict removes whatever this call already added. */
  addRoutes(prefix: string, routes: readonly ExtensionRoute[]): MountedRouteSet {
    const added: MountedRoute[] = [];
    try {
      for (const route of routes) {
        const path = joinRoutePath(prefix, route.path);
        const key = routeKey(route.method, path);
        if (this.routes.has(key)) {
          throw new RouteConflictError(route.method, path);
        }
        this.router.on(route.method, path, () => undefined, { key });
        this.routes.set(key, route);
        const entry = { method: route.method, path };
        this.mounted.push(entry);
        added.push(entry);
      }
    } catch (err) {
      this.remove(added);
      throw err;
    }
    return { prefix, routes: added };
  }

  removeRoutes(set: MountedRouteSet): void {
    this.remove(set.routes);
  }

  lookup(method: string, url: string): RouteMatch | null {
    const upper = method.toUpperCase();
    if (!isHttpMethod(upper)) return null;

    const path = url.split('?', 1)[0] ?? url;
    const found = this.router.find(upper, path);
    if (!found) return null;

    const store: unknown = found.store;
    if (!isRouteStore(store)) return null;
    const route = this.routes.get(store.key);
    if (!route) return null;

    return { route, path, params: { ...found.params } };
  }

  async dispatch(request: FastifyRequest, reply: FastifyReply): Promise<unknown> {
    const match = this.lookup(request.method, request.url);
    if (!match) {
      return sendError(reply, 404, `Route ${request.method}:${request.url} not found`);
    }
    return match.route.handler(request, reply, match.params);
  }

  list(): MountedRoute[] {
    return this.mounted.map((route) => ({ ...route }));
  }

  private remove(routes: readonly MountedRoute[]): void {
    for (const route of routes) {
      const key = routeKey(route.method, route.path);
      if (!this.routes.delete(key)) continue;
      this.router.off(route.method, route.path);
      const index = this.mounted.findIndex((m) => m.method === route.method && m.path === route.path);
      if (index !== -1) this.mounted.splice(index, 1);
    }
  }
}
