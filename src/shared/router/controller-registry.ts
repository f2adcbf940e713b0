import type { Handler } from 'hono';

import { ActionNotFoundError, ControllerNotFoundError } from '@/shared/errors/routing.errors';
import type { DeclaredRoute } from '@/shared/router/route-set';
import type { AppContext } from '@/shared/types/hono';

export type ActionHandler = Handler<AppContext>;

/**
 * Action handlers keyed by action name (`index`, `open_all`, ...)
 */
export type Controller = Readonly<Partial<Record<string, ActionHandler>>>;

/**
 * Controllers keyed by the controller name routes are declared with,
 * e.g. `activity_notification/notifications`
 */
export type ControllerRegistry = Readonly<Partial<Record<string, Controller>>>;

const lookup = <T>(record: Readonly<Partial<Record<string, T>>>, key: string): T | undefined => {
  return Object.hasOwn(record, key) ? record[key] : undefined;
};

/**
 * Build the Hono handler for a declared route.
 *
 * Controllers are resolved per request, so a route may be declared before its
 * controller is registered. Route defaults are exposed as `routeDefaults`.
 */
export const dispatchTo = (controllers: ControllerRegistry, route: DeclaredRoute): ActionHandler => {
  return async (c, next) => {
    const controller = lookup(controllers, route.controller);
    if (!controller) {
      throw new ControllerNotFoundError(route.controller);
    }

    const action = lookup(controller, route.action);
    if (!action) {
      throw new ActionNotFoundError(route.controller, route.action);
    }

    c.set('route', route);
    c.set('routeDefaults', route.defaults);
    return action(c, next);
  };
};
