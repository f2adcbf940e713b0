import { getLogger } from '@logtape/logtape';

import {
  NOTIFICATION_FORCED_EXCLUDES,
  isPresent,
  resolveRouteOptions,
} from '@/modules/activity-routes/services/option-resolver.service';
import { declareSubscriptionRoutes } from '@/modules/activity-routes/services/subscribed-by.service';
import { supportsSubscriptions } from '@/modules/activity-routes/targets/target-registry';
import type {
  ActivityRouteDeps,
  NotifyToOptions,
} from '@/modules/activity-routes/types/activity-routes.types';
import { ignorePath } from '@/modules/activity-routes/utils/path-filter';
import { standardActionsWithout, toResourcesOptions } from '@/modules/activity-routes/utils/resource-options';
import type { RouteMapper } from '@/shared/router/route-mapper';

const logger = getLogger(['app', 'activity-routes', 'notifications']);

const NOTIFICATION_STANDARD_ACTIONS = standardActionsWithout(NOTIFICATION_FORCED_EXCLUDES);

/**
 * Declare notification routes under each target.
 *
 * For `users`:
 *   GET    /users/:user_id/notifications               index
 *   GET    /users/:user_id/notifications/:id           show
 *   DELETE /users/:user_id/notifications/:id           destroy
 *   POST   /users/:user_id/notifications/open_all      open_all
 *   GET    /users/:user_id/notifications/:id/move      move
 *   POST   /users/:user_id/notifications/:id/open      open
 *
 * `open_all`, `move` and `open` are subject to `except` / `only`. With
 * `withSubscription`, subscription routes follow for every target whose
 * registry entry enables subscriptions; other targets are skipped.
 */
export const declareNotificationRoutes = (
  mapper: RouteMapper,
  targets: readonly string[],
  rawOptions: NotifyToOptions,
  deps: ActivityRouteDeps,
): void => {
  const options = resolveRouteOptions('notifications', rawOptions, NOTIFICATION_FORCED_EXCLUDES, deps.settings);

  for (const target of targets) {
    mapper.resources(target, { only: [] }, (targetScope) => {
      targetScope.resources(
        options.model,
        toResourcesOptions(target, options, NOTIFICATION_STANDARD_ACTIONS),
        (notifications) => {
          notifications.collection((collection) => {
            if (!ignorePath('open_all', options)) {
              collection.post('open_all');
            }
          });
          notifications.member((member) => {
            if (!ignorePath('move', options)) {
              member.get('move');
            }
            if (!ignorePath('open', options)) {
              member.post('open');
            }
          });
        },
      );
    });

    logger.debug('Declared notification routes for {target} with {controller}', {
      target,
      controller: options.controller,
    });

    if (!isPresent(options.withSubscription)) {
      continue;
    }

    if (supportsSubscriptions(deps.targets, target)) {
      declareSubscriptionRoutes(mapper, [target], options.subscriptionOption ?? {}, deps);
    } else {
      logger.debug('Skipping subscription routes for {target}: subscriptions are not enabled', { target });
    }
  }
};
