import type { AppError } from '@/shared/types/result';

/**
 * Base class for errors raised while declaring or dispatching routes.
 * Carries the AppError fields the global error handler renders.
 */
export class RoutingError extends Error implements AppError {
  readonly status: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(message: string, status: number, code: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export class DuplicateRouteError extends RoutingError {
  constructor(method: string, path: string) {
    super(`Route ${method} ${path} is already declared`, 500, 'DUPLICATE_ROUTE', { method, path });
  }
}

export class DuplicateRouteNameError extends RoutingError {
  constructor(name: string, existingPath: string, path: string) {
    super(
      `Route name '${name}' is already in use by ${existingPath}, cannot reuse it for ${path}`,
      500,
      'DUPLICATE_ROUTE_NAME',
      { name, existingPath, path },
    );
  }
}

export class RouteNotFoundError extends RoutingError {
  constructor(name: string) {
    super(`No route named '${name}'`, 500, 'ROUTE_NOT_FOUND', { name });
  }
}

export class ControllerNotFoundError extends RoutingError {
  constructor(controller: string) {
    super(`Uninitialized controller ${controller}`, 404, 'CONTROLLER_NOT_FOUND', { controller });
  }
}

export class ActionNotFoundError extends RoutingError {
  constructor(controller: string, action: string) {
    super(
      `The action '${action}' could not be found for ${controller}`,
      404,
      'ACTION_NOT_FOUND',
      { controller, action },
    );
  }
}

export class InvalidRouteDeclarationError extends RoutingError {
  constructor(details: unknown) {
    super('Invalid route declarations', 400, 'INVALID_ROUTE_DECLARATION', details);
  }
}

export class InvalidConfigurationError extends RoutingError {
  constructor(details: unknown) {
    super('Invalid environment configuration', 500, 'INVALID_CONFIGURATION', details);
  }
}
