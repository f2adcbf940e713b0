import { createRoute, z } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { Env } from 'hono';

import type { DeclaredRoute, HttpMethod } from '@/shared/router/route-set';

const OPENAPI_METHODS = {
  GET: 'get',
  POST: 'post',
  PATCH: 'patch',
  PUT: 'put',
  DELETE: 'delete',
} as const satisfies Record<HttpMethod, string>;

const PATH_PARAM = /:([A-Za-z0-9_]+)/g;

/**
 * `/users/:user_id/notifications/:id` -> `/users/{user_id}/notifications/{id}`
 */
export const toOpenApiPath = (path: string): string => path.replace(PATH_PARAM, '{$1}');

export const pathParamNames = (path: string): string[] =>
  Array.from(path.matchAll(PATH_PARAM), (match) => match[1]);

/**
 * Register a declared route in the app's OpenAPI registry
 */
export const registerOpenApiRoute = <E extends Env>(
  app: OpenAPIHono<E>,
  route: DeclaredRoute,
): void => {
  const params = pathParamNames(route.path);

  app.openAPIRegistry.registerPath(createRoute({
    method: OPENAPI_METHODS[route.method],
    path: toOpenApiPath(route.path),
    tags: [route.controller],
    summary: `${route.controller}#${route.action}`,
    ...(route.name !== undefined && { operationId: `${route.method.toLowerCase()}_${route.name}` }),
    request: params.length > 0
      ? { params: z.object(Object.fromEntries(params.map((param) => [param, z.string()]))) }
      : undefined,
    responses: {
      200: {
        description: `Handled by ${route.controller}#${route.action}`,
      },
    },
  }));
};
