import { getLogger } from '@logtape/logtape';

import { dispatchTo } from '@/shared/router/controller-registry';
import type { ControllerRegistry } from '@/shared/router/controller-registry';
import { singularize } from '@/shared/router/inflection';
import { registerOpenApiRoute } from '@/shared/router/openapi-docs';
import { createRouteSet } from '@/shared/router/route-set';
import type { DeclaredRoute, HttpMethod, RouteDefaults, RouteSet } from '@/shared/router/route-set';
import type { AppType } from '@/shared/types/hono';

const logger = getLogger(['app', 'router']);

/**
 * Standard actions a plural resource declares, in declaration order
 */
export const REST_ACTIONS = ['index', 'create', 'new', 'edit', 'show', 'update', 'destroy'] as const;

export type RestAction = typeof REST_ACTIONS[number];

export interface ResourcesOptions {
  /** Standard actions to declare; all of them when omitted */
  only?: readonly string[];
  except?: readonly string[];
  /** Defaults to the resource name */
  controller?: string;
  /** Replaces the resource name in route names */
  as?: string;
  /** Replaces the resource name in paths */
  path?: string;
  defaults?: RouteDefaults;
  extras?: Readonly<Record<string, unknown>>;
}

export interface ActionRouteOptions {
  /** Path segment; defaults to the action name, `''` maps to the scope root */
  path?: string;
  /** Name prefix; defaults to the action name */
  as?: string;
}

type ActionDeclarer = (action: string, options?: ActionRouteOptions) => DeclaredRoute;

export interface ActionScope {
  get: ActionDeclarer;
  post: ActionDeclarer;
  patch: ActionDeclarer;
  put: ActionDeclarer;
  delete: ActionDeclarer;
}

export type ResourceBlock = (scope: ResourceScope) => void;

export interface ResourceScope {
  resources: (name: string, options?: ResourcesOptions, block?: ResourceBlock) => void;
  collection: (block: (scope: ActionScope) => void) => void;
  member: (block: (scope: ActionScope) => void) => void;
}

export interface RouteMapper {
  readonly app: AppType;
  readonly routeSet: RouteSet;
  resources: (name: string, options?: ResourcesOptions, block?: ResourceBlock) => RouteMapper;
}

export interface RouteMapperOptions {
  controllers?: ControllerRegistry;
  routeSet?: RouteSet;
}

interface ScopeFrame {
  pathPrefix: string;
  namePrefix: string;
}

const ROOT_FRAME: ScopeFrame = { pathPrefix: '', namePrefix: '' };

const joinPath = (base: string, segment: string): string => (segment === '' ? base : `${base}/${segment}`);

const isDeclared = (action: RestAction, options: ResourcesOptions): boolean => {
  if (options.only && !options.only.includes(action)) {
    return false;
  }
  return !options.except?.includes(action);
};

/**
 * Create a route mapper that declares resourceful routes on a Hono app.
 *
 * `resources('users', { only: [] }, (users) => users.resources('notifications'))`
 * declares `/users/:user_id/notifications` and `/users/:user_id/notifications/:id`
 * with route names `user_notifications` and `user_notification`. Every route is
 * recorded in the route set, registered on the app through the controller
 * registry, and documented in the app's OpenAPI registry.
 */
export const createRouteMapper = (app: AppType, options: RouteMapperOptions = {}): RouteMapper => {
  const controllers = options.controllers ?? {};
  const routeSet = options.routeSet ?? createRouteSet();

  const declare = (
    method: HttpMethod,
    path: string,
    name: string,
    controller: string,
    action: string,
    resource: ResourcesOptions,
  ): DeclaredRoute => {
    const route = routeSet.add({
      name,
      method,
      path,
      controller,
      action,
      defaults: resource.defaults ?? {},
      extras: resource.extras ?? {},
    });

    app.on(method, path, dispatchTo(controllers, route));
    registerOpenApiRoute(app, route);

    logger.debug('Declared route {method} {path} -> {controller}#{action}', {
      method,
      path,
      controller,
      action,
      name: route.name,
    });
    return route;
  };

  const declareResources = (
    frame: ScopeFrame,
    name: string,
    resource: ResourcesOptions,
    block?: ResourceBlock,
  ): void => {
    const singular = singularize(name);
    const as = resource.as ?? name;
    const controller = resource.controller ?? name;
    const collectionPath = `${frame.pathPrefix}/${resource.path ?? name}`;
    const memberPath = `${collectionPath}/:id`;
    const collectionName = `${frame.namePrefix}${as}`;
    const memberName = `${frame.namePrefix}${singularize(as)}`;

    const actionScope = (basePath: string, baseName: string): ActionScope => {
      const declarer = (method: HttpMethod): ActionDeclarer => (action, routeOptions = {}) => declare(
        method,
        joinPath(basePath, routeOptions.path ?? action),
        `${routeOptions.as ?? action}_${baseName}`,
        controller,
        action,
        resource,
      );

      return {
        get: declarer('GET'),
        post: declarer('POST'),
        patch: declarer('PATCH'),
        put: declarer('PUT'),
        delete: declarer('DELETE'),
      };
    };

    // Custom routes go first so that `/:id` does not shadow them
    block?.({
      resources: (childName, childOptions = {}, childBlock) => declareResources(
        {
          pathPrefix: `${collectionPath}/:${singular}_id`,
          namePrefix: `${memberName}_`,
        },
        childName,
        childOptions,
        childBlock,
      ),
      collection: (collectionBlock) => collectionBlock(actionScope(collectionPath, collectionName)),
      member: (memberBlock) => memberBlock(actionScope(memberPath, memberName)),
    });

    const standard: Record<RestAction, () => void> = {
      index: () => declare('GET', collectionPath, collectionName, controller, 'index', resource),
      create: () => declare('POST', collectionPath, collectionName, controller, 'create', resource),
      new: () => declare('GET', `${collectionPath}/new`, `new_${memberName}`, controller, 'new', resource),
      edit: () => declare('GET', `${memberPath}/edit`, `edit_${memberName}`, controller, 'edit', resource),
      show: () => declare('GET', memberPath, memberName, controller, 'show', resource),
      update: () => {
        declare('PATCH', memberPath, memberName, controller, 'update', resource);
        declare('PUT', memberPath, memberName, controller, 'update', resource);
      },
      destroy: () => declare('DELETE', memberPath, memberName, controller, 'destroy', resource),
    };

    for (const action of REST_ACTIONS) {
      if (isDeclared(action, resource)) {
        standard[action]();
      }
    }
  };

  const mapper: RouteMapper = {
    app,
    routeSet,
    resources: (name, resource = {}, block) => {
      declareResources(ROOT_FRAME, name, resource, block);
      return mapper;
    },
  };

  return mapper;
};
