import { getLogger } from '@logtape/logtape';

import type { ActivityRoutes } from '@/modules/activity-routes/activity-routes';
import { activityRoutesConfigSchema } from '@/modules/activity-routes/validations/activity-routes.validation';
import { InvalidRouteDeclarationError } from '@/shared/errors/routing.errors';

const logger = getLogger(['app', 'activity-routes', 'declarations']);

/**
 * Apply route declarations loaded from data (a JSON file, a config module).
 * `notifyTo` entries are applied before `subscribedBy` entries, each in order.
 */
export const declareFromConfig = (routes: ActivityRoutes, data: unknown): ActivityRoutes => {
  const parsed = activityRoutesConfigSchema.safeParse(data);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
      code: issue.code,
    }));
    logger.warn('Invalid route declarations: {issues}', { issues });
    throw new InvalidRouteDeclarationError(issues);
  }

  for (const declaration of parsed.data.notifyTo) {
    routes.notifyTo(declaration.targets, declaration.options);
  }
  for (const declaration of parsed.data.subscribedBy) {
    routes.subscribedBy(declaration.targets, declaration.options);
  }

  return routes;
};
