import { getLogger } from '@logtape/logtape';

import {
  SUBSCRIPTION_FORCED_EXCLUDES,
  resolveRouteOptions,
} from '@/modules/activity-routes/services/option-resolver.service';
import { SUBSCRIPTION_ACTIONS } from '@/modules/activity-routes/types/activity-routes.types';
import type {
  ActivityRouteDeps,
  SubscribedByOptions,
} from '@/modules/activity-routes/types/activity-routes.types';
import { ignorePath } from '@/modules/activity-routes/utils/path-filter';
import { standardActionsWithout, toResourcesOptions } from '@/modules/activity-routes/utils/resource-options';
import type { RouteMapper } from '@/shared/router/route-mapper';

const logger = getLogger(['app', 'activity-routes', 'subscriptions']);

// `create` is declared by hand so that it is named `open_all_*`
const SUBSCRIPTION_STANDARD_ACTIONS = standardActionsWithout([...SUBSCRIPTION_FORCED_EXCLUDES, 'create']);

/**
 * Declare subscription management routes under each target.
 *
 * For `users`:
 *   GET    /users/:user_id/subscriptions                                      index
 *   POST   /users/:user_id/subscriptions                                      create (open_all_user_subscriptions)
 *   GET    /users/:user_id/subscriptions/:id                                  show
 *   DELETE /users/:user_id/subscriptions/:id                                  destroy
 *   POST   /users/:user_id/subscriptions/:id/subscribe                        subscribe
 *   POST   /users/:user_id/subscriptions/:id/unsubscribe                      unsubscribe
 *   POST   /users/:user_id/subscriptions/:id/subscribe_to_email               subscribe_to_email
 *   POST   /users/:user_id/subscriptions/:id/unsubscribe_to_email             unsubscribe_to_email
 *   POST   /users/:user_id/subscriptions/:id/subscribe_to_optional_target     subscribe_to_optional_target
 *   POST   /users/:user_id/subscriptions/:id/unsubscribe_to_optional_target   unsubscribe_to_optional_target
 *
 * The member routes are subject to `except` / `only`; the others are always declared.
 */
export const declareSubscriptionRoutes = (
  mapper: RouteMapper,
  targets: readonly string[],
  rawOptions: SubscribedByOptions,
  deps: ActivityRouteDeps,
): void => {
  const options = resolveRouteOptions('subscriptions', rawOptions, SUBSCRIPTION_FORCED_EXCLUDES, deps.settings);

  for (const target of targets) {
    mapper.resources(target, { only: [] }, (targetScope) => {
      targetScope.resources(
        options.model,
        toResourcesOptions(target, options, SUBSCRIPTION_STANDARD_ACTIONS),
        (subscriptions) => {
          subscriptions.collection((collection) => {
            collection.post('create', { path: '', as: 'open_all' });
          });
          subscriptions.member((member) => {
            for (const action of SUBSCRIPTION_ACTIONS) {
              if (!ignorePath(action, options)) {
                member.post(action);
              }
            }
          });
        },
      );
    });

    logger.debug('Declared subscription routes for {target} with {controller}', {
      target,
      controller: options.controller,
    });
  }
};
