import { compile } from 'path-to-regexp';

import {
  DuplicateRouteError,
  DuplicateRouteNameError,
  RouteNotFoundError,
} from '@/shared/errors/routing.errors';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

/**
 * Fixed parameters attached to a route at declaration time, e.g. `{ target_type: 'users' }`
 */
export type RouteDefaults = Readonly<Record<string, string>>;

export interface DeclaredRoute {
  /** Undefined when an earlier route on the same path already holds the name */
  name: string | undefined;
  method: HttpMethod;
  /** Hono path syntax: `/users/:user_id/notifications/:id` */
  path: string;
  controller: string;
  action: string;
  defaults: RouteDefaults;
  /** Unrecognised resource options, carried for the handlers that want them */
  extras: Readonly<Record<string, unknown>>;
}

export type RouteInput = Omit<DeclaredRoute, 'name'> & { name?: string };

export interface RouteSet {
  readonly routes: readonly DeclaredRoute[];
  add: (route: RouteInput) => DeclaredRoute;
  find: (name: string) => DeclaredRoute | undefined;
  pathFor: (name: string, params?: Record<string, string>) => string;
  format: () => string;
}

const formatRow = (route: DeclaredRoute): string[] => [
  route.name ?? '',
  route.method,
  route.path,
  `${route.controller}#${route.action}`,
  JSON.stringify(route.defaults),
];

/**
 * Create the table of declared routes.
 *
 * Rejects a second declaration of the same method and path, and a name that
 * is already bound to a different path. A name reused on the same path (show
 * and destroy, index and create) is left off the later route.
 */
export const createRouteSet = (): RouteSet => {
  const routes: DeclaredRoute[] = [];
  const named = new Map<string, DeclaredRoute>();
  const signatures = new Set<string>();

  const add = (input: RouteInput): DeclaredRoute => {
    const signature = `${input.method} ${input.path}`;
    if (signatures.has(signature)) {
      throw new DuplicateRouteError(input.method, input.path);
    }

    let name = input.name;
    if (name !== undefined) {
      const existing = named.get(name);
      if (existing && existing.path !== input.path) {
        throw new DuplicateRouteNameError(name, existing.path, input.path);
      }
      if (existing) {
        name = undefined;
      }
    }

    const route: DeclaredRoute = Object.freeze({ ...input, name });
    signatures.add(signature);
    routes.push(route);
    if (name !== undefined) {
      named.set(name, route);
    }
    return route;
  };

  const find = (name: string): DeclaredRoute | undefined => named.get(name);

  const pathFor = (name: string, params: Record<string, string> = {}): string => {
    const route = named.get(name);
    if (!route) {
      throw new RouteNotFoundError(name);
    }
    return compile(route.path)(params);
  };

  const format = (): string => {
    const rows = routes.map(formatRow);
    const widths = [0, 1, 2, 3].map((column) => Math.max(0, ...rows.map((row) => row[column].length)));

    return rows
      .map(([name, method, path, endpoint, defaults]) => [
        name.padStart(widths[0]),
        method.padEnd(widths[1]),
        path.padEnd(widths[2]),
        endpoint.padEnd(widths[3]),
        defaults,
      ].join('  '))
      .join('\n');
  };

  return {
    routes,
    add,
    find,
    pathFor,
    format,
  };
};
