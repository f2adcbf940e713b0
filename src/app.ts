/**
 * Application Factory
 *
 * Builds a Hono app serving the declared notification and subscription routes
 */

import { OpenAPIHono } from '@hono/zod-openapi';
import { requestId } from 'hono/request-id';

import { createActivityRoutes } from '@/modules/activity-routes/activity-routes';
import type { ActivityRoutes } from '@/modules/activity-routes/activity-routes';
import { declareFromConfig } from '@/modules/activity-routes/services/declarations.service';
import { createTargetRegistry } from '@/modules/activity-routes/targets/target-registry';
import type { NotificationTarget } from '@/modules/activity-routes/targets/target-registry';
import { loadAppConfig } from '@/shared/config/app.config';
import type { AppConfig } from '@/shared/config/app.config';
import { errorHandler } from '@/shared/middleware/errorHandler';
import { notFoundHandler } from '@/shared/middleware/notFoundHandler';
import type { ControllerRegistry } from '@/shared/router/controller-registry';
import { createRouteMapper } from '@/shared/router/route-mapper';
import type { RouteSet } from '@/shared/router/route-set';
import type { AppContext } from '@/shared/types/hono';

export interface ActivityAppOptions {
  /** Declarations as data, see `activityRoutesConfigSchema` */
  declarations?: unknown;
  /** Declarations as code, applied after `declarations` */
  declare?: (routes: ActivityRoutes) => void;
  controllers?: ControllerRegistry;
  targets?: readonly NotificationTarget[];
  config?: AppConfig;
}

export interface ActivityApp {
  app: OpenAPIHono<AppContext>;
  routes: ActivityRoutes;
  routeSet: RouteSet;
  config: AppConfig;
}

export const createActivityApp = (options: ActivityAppOptions = {}): ActivityApp => {
  const config = options.config ?? loadAppConfig();
  const app = new OpenAPIHono<AppContext>();
  const routesApp = new OpenAPIHono<AppContext>();

  const mapper = createRouteMapper(routesApp, { controllers: options.controllers });
  const routes = createActivityRoutes(mapper, {
    targets: createTargetRegistry(options.targets),
    settings: { controllerNamespace: config.controllerNamespace },
  });

  if (options.declarations !== undefined) {
    declareFromConfig(routes, options.declarations);
  }
  options.declare?.(routes);

  app.use(requestId());
  // Hono copies routes on mount, so everything is declared before this point
  app.route(config.basePath, routesApp);

  if (config.openApiPath) {
    app.doc(config.openApiPath, {
      openapi: '3.0.0',
      info: {
        title: 'Activity routes',
        version: '1.0.0',
      },
    });
  }

  app.onError(errorHandler);
  app.notFound(notFoundHandler);

  return {
    app,
    routes,
    routeSet: mapper.routeSet,
    config,
  };
};
