/**
 * Notification Targets
 *
 * Capability lookup for the resources notifications are nested under
 */

export interface NotificationTarget {
  /** Plural resource name the target is declared under, e.g. `users` */
  readonly resourceName: string;
  /** Whether the target manages subscriptions; treated as `false` when absent */
  readonly subscriptionEnabled?: () => boolean;
}

export type TargetRegistry = ReadonlyMap<string, NotificationTarget>;

export const createTargetRegistry = (targets: readonly NotificationTarget[] = []): TargetRegistry => {
  return new Map(targets.map((target) => [target.resourceName, target]));
};

export const supportsSubscriptions = (registry: TargetRegistry, resourceName: string): boolean => {
  return registry.get(resourceName)?.subscriptionEnabled?.() ?? false;
};
