import type { OpenAPIHono } from '@hono/zod-openapi';
import type { DeclaredRoute, RouteDefaults } from '@/shared/router/route-set';

export type Variables = {
  requestId?: string;
  route: DeclaredRoute;
  routeDefaults: RouteDefaults;
};

export type AppContext = {
  Variables: Variables;
};

export type AppType = OpenAPIHono<AppContext>;
