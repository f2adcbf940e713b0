export { createActivityApp } from '@/app';
export type { ActivityApp, ActivityAppOptions } from '@/app';
export { createActivityRoutes } from '@/modules/activity-routes/activity-routes';
export type { ActivityRoutes } from '@/modules/activity-routes/activity-routes';
export { declareFromConfig } from '@/modules/activity-routes/services/declarations.service';
export {
  DEFAULT_CONTROLLER_NAMESPACE,
  NOTIFICATION_FORCED_EXCLUDES,
  SUBSCRIPTION_FORCED_EXCLUDES,
  resolveRouteOptions,
} from '@/modules/activity-routes/services/option-resolver.service';
export { createTargetRegistry, supportsSubscriptions } from '@/modules/activity-routes/targets/target-registry';
export type { NotificationTarget, TargetRegistry } from '@/modules/activity-routes/targets/target-registry';
export * from '@/modules/activity-routes/types/activity-routes.types';
export { ignorePath } from '@/modules/activity-routes/utils/path-filter';
export { activityRoutesConfigSchema } from '@/modules/activity-routes/validations/activity-routes.validation';
export type { ActivityRoutesConfig } from '@/modules/activity-routes/validations/activity-routes.validation';
export { loadAppConfig } from '@/shared/config/app.config';
export type { AppConfig } from '@/shared/config/app.config';
export * from '@/shared/errors/routing.errors';
export { initializeLogging } from '@/shared/logging/config';
export type { ActionHandler, Controller, ControllerRegistry } from '@/shared/router/controller-registry';
export { pluralize, singularize, underscore } from '@/shared/router/inflection';
export { createRouteMapper, REST_ACTIONS } from '@/shared/router/route-mapper';
export type { ResourcesOptions, RouteMapper } from '@/shared/router/route-mapper';
export { createRouteSet } from '@/shared/router/route-set';
export type { DeclaredRoute, RouteDefaults, RouteSet } from '@/shared/router/route-set';
export type { AppContext } from '@/shared/types/hono';
