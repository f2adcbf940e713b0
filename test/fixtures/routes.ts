import { OpenAPIHono } from '@hono/zod-openapi';

import { createActivityRoutes } from '@/modules/activity-routes/activity-routes';
import type { ActivityRoutes } from '@/modules/activity-routes/activity-routes';
import { createTargetRegistry } from '@/modules/activity-routes/targets/target-registry';
import type { NotificationTarget } from '@/modules/activity-routes/targets/target-registry';
import { createRouteMapper } from '@/shared/router/route-mapper';
import type { DeclaredRoute } from '@/shared/router/route-set';
import type { AppContext } from '@/shared/types/hono';

export const buildRoutes = (targets: NotificationTarget[] = []): ActivityRoutes => {
  const mapper = createRouteMapper(new OpenAPIHono<AppContext>());
  return createActivityRoutes(mapper, { targets: createTargetRegistry(targets) });
};

export const summarize = (routes: readonly DeclaredRoute[]): string[] =>
  routes.map((route) => `${route.method} ${route.path} ${route.action}`);

export const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
};
