import { isEmpty, isNil } from 'es-toolkit/compat';

import type {
  ResolvedRouteOptions,
  ResolverSettings,
  ResourceKind,
  SubscribedByOptions,
} from '@/modules/activity-routes/types/activity-routes.types';
import { pluralize, underscore } from '@/shared/router/inflection';
import type { RouteDefaults } from '@/shared/router/route-set';

export const DEFAULT_CONTROLLER_NAMESPACE = 'activity_notification';

/**
 * Actions notifications never expose: they are created by application code
 */
export const NOTIFICATION_FORCED_EXCLUDES = ['new', 'create', 'edit', 'update'] as const;

/**
 * Subscriptions keep `create`; it backs the collection POST route
 */
export const SUBSCRIPTION_FORCED_EXCLUDES = ['new', 'edit', 'update'] as const;

const isOptionRecord = (value: unknown): value is SubscribedByOptions => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

/**
 * Whether an option value counts as set: not nil, not `false`, not blank, not an empty collection
 */
export const isPresent = (value: unknown): boolean => {
  if (isNil(value) || value === false) {
    return false;
  }
  if (typeof value === 'string') {
    return value.trim() !== '';
  }
  if (typeof value === 'object') {
    return !isEmpty(value);
  }
  return true;
};

const withoutDevise = ({ withDevise: _withDevise, ...rest }: SubscribedByOptions): SubscribedByOptions => rest;

// Any other present value (`'yes'`, `1`) from an untyped caller turns the cascade on
const toSubscriptionSetting = (value: unknown): boolean | SubscribedByOptions | undefined => {
  if (typeof value === 'boolean' || isOptionRecord(value)) {
    return value;
  }
  return isPresent(value) ? true : undefined;
};

/**
 * Resolve caller options for `notifyTo` / `subscribedBy`.
 *
 * Returns a new frozen value and leaves `raw` untouched, so one options
 * object can be reused across declarations. Never throws: missing keys get
 * defaults and unknown keys are kept in `passthrough`.
 */
export const resolveRouteOptions = (
  kind: ResourceKind,
  raw: SubscribedByOptions,
  forcedExcludes: readonly string[],
  settings: ResolverSettings = {},
): ResolvedRouteOptions => {
  const {
    model,
    controller,
    as,
    withDevise,
    withSubscription,
    except,
    only,
    ...passthrough
  } = raw;

  const namespace = settings.controllerNamespace ?? DEFAULT_CONTROLLER_NAMESPACE;
  const resourcesName = pluralize(underscore(kind));
  const devise = isPresent(withDevise) ? withDevise : undefined;
  const subscription = kind === 'notifications' ? toSubscriptionSetting(withSubscription) : undefined;

  let subscriptionOption: SubscribedByOptions | undefined;
  if (isPresent(subscription)) {
    // Cascaded routes share the authentication scope of the notification routes
    const inherited = isOptionRecord(subscription) ? withoutDevise(subscription) : {};
    subscriptionOption = Object.freeze(withDevise === undefined ? inherited : { ...inherited, withDevise });
  }

  const deviseDefaults: RouteDefaults = devise === undefined ? {} : { devise_type: String(devise) };

  return Object.freeze({
    kind,
    model: model ?? resourcesName,
    controller: controller
      ?? (devise === undefined ? `${namespace}/${resourcesName}` : `${namespace}/${resourcesName}_with_devise`),
    as: as ?? (devise === undefined ? undefined : resourcesName),
    withDevise: devise,
    deviseDefaults: Object.freeze(deviseDefaults),
    except: Object.freeze([...(except ?? []), ...forcedExcludes]),
    only: only === undefined ? undefined : Object.freeze([...only]),
    withSubscription: subscription,
    subscriptionOption,
    passthrough: Object.freeze(passthrough),
  });
};
