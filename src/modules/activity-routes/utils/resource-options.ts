import type { ResolvedRouteOptions } from '@/modules/activity-routes/types/activity-routes.types';
import { REST_ACTIONS } from '@/shared/router/route-mapper';
import type { ResourcesOptions, RestAction } from '@/shared/router/route-mapper';
import type { RouteDefaults } from '@/shared/router/route-set';

/**
 * Defaults every route under `target` carries
 */
export const routeDefaultsFor = (target: string, options: ResolvedRouteOptions): RouteDefaults => ({
  target_type: target,
  ...options.deviseDefaults,
});

/**
 * Standard actions left once the forced exclusions are removed
 */
export const standardActionsWithout = (forcedExcludes: readonly string[]): RestAction[] =>
  REST_ACTIONS.filter((action) => !forcedExcludes.includes(action));

/**
 * `resources` options for the notification / subscription block of one target.
 * Caller `except` / `only` gate the custom actions only, so the standard
 * actions are passed explicitly. A passthrough `path` renames the path
 * segment; other passthrough keys are carried as route extras.
 */
export const toResourcesOptions = (
  target: string,
  options: ResolvedRouteOptions,
  standardActions: readonly RestAction[],
): ResourcesOptions => {
  const { path, ...extras } = options.passthrough;

  return {
    only: standardActions,
    controller: options.controller,
    as: options.as,
    ...(typeof path === 'string' ? { path, extras } : { extras: options.passthrough }),
    defaults: routeDefaultsFor(target, options),
  };
};
