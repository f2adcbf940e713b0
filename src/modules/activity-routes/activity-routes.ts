import { castArray } from 'es-toolkit/compat';

import { declareNotificationRoutes } from '@/modules/activity-routes/services/notify-to.service';
import { declareSubscriptionRoutes } from '@/modules/activity-routes/services/subscribed-by.service';
import { createTargetRegistry } from '@/modules/activity-routes/targets/target-registry';
import type {
  ActivityRouteDeps,
  NotifyToOptions,
  SubscribedByOptions,
} from '@/modules/activity-routes/types/activity-routes.types';
import type { RouteMapper } from '@/shared/router/route-mapper';

export interface ActivityRoutes {
  readonly mapper: RouteMapper;
  notifyTo: (targets: string | readonly string[], options?: NotifyToOptions) => ActivityRoutes;
  subscribedBy: (targets: string | readonly string[], options?: SubscribedByOptions) => ActivityRoutes;
}

/**
 * Bind the notification and subscription declarators to a route mapper.
 *
 * @example
 * createActivityRoutes(mapper, { targets })
 *   .notifyTo('users', { withDevise: 'users', withSubscription: true })
 *   .subscribedBy('admins', { except: ['subscribe_to_email'] });
 */
export const createActivityRoutes = (
  mapper: RouteMapper,
  deps: Partial<ActivityRouteDeps> = {},
): ActivityRoutes => {
  const resolvedDeps: ActivityRouteDeps = {
    targets: deps.targets ?? createTargetRegistry(),
    settings: deps.settings ?? {},
  };

  const routes: ActivityRoutes = {
    mapper,
    notifyTo: (targets, options = {}) => {
      declareNotificationRoutes(mapper, castArray(targets), options, resolvedDeps);
      return routes;
    },
    subscribedBy: (targets, options = {}) => {
      declareSubscriptionRoutes(mapper, castArray(targets), options, resolvedDeps);
      return routes;
    },
  };

  return routes;
};
