/**
 * Activity Routes Types
 *
 * Option records accepted by `notifyTo` / `subscribedBy` and their resolved form
 */

import type { TargetRegistry } from '@/modules/activity-routes/targets/target-registry';
import type { RouteDefaults } from '@/shared/router/route-set';

export type ResourceKind = 'notifications' | 'subscriptions';

export const SUBSCRIPTION_ACTIONS = [
  'subscribe',
  'unsubscribe',
  'subscribe_to_email',
  'unsubscribe_to_email',
  'subscribe_to_optional_target',
  'unsubscribe_to_optional_target',
] as const;

/**
 * Options shared by both entry points. Keys not listed here are handed to the
 * underlying `resources` declaration untouched.
 */
export type SubscribedByOptions = {
  /** Resource name used for paths; defaults to `notifications` / `subscriptions` */
  model?: string;
  /** Defaults to `<namespace>/<resources>` or `<namespace>/<resources>_with_devise` */
  controller?: string;
  /** Resource name used for route names */
  as?: string;
  /** Authentication scope; switches to the `_with_devise` controller and adds `devise_type` */
  withDevise?: string;
  except?: readonly string[];
  only?: readonly string[];
  [option: string]: unknown;
};

export type NotifyToOptions = SubscribedByOptions & {
  /** Also declare subscription routes, optionally with their own options */
  withSubscription?: boolean | SubscribedByOptions;
};

export type ResolvedRouteOptions = {
  readonly kind: ResourceKind;
  readonly model: string;
  readonly controller: string;
  readonly as: string | undefined;
  readonly withDevise: string | undefined;
  readonly deviseDefaults: RouteDefaults;
  /** Caller exclusions followed by the forced ones */
  readonly except: readonly string[];
  readonly only: readonly string[] | undefined;
  readonly withSubscription: boolean | SubscribedByOptions | undefined;
  /** Options for cascaded subscription routes; set only when `withSubscription` is present */
  readonly subscriptionOption: SubscribedByOptions | undefined;
  readonly passthrough: Readonly<Record<string, unknown>>;
};

export type ResolverSettings = {
  /** Controller namespace; `activity_notification` by default */
  controllerNamespace?: string;
};

export type ActivityRouteDeps = {
  targets: TargetRegistry;
  settings: ResolverSettings;
};
