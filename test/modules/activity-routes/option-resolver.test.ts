import { test } from 'tap';
import {
  NOTIFICATION_FORCED_EXCLUDES,
  SUBSCRIPTION_FORCED_EXCLUDES,
  isPresent,
  resolveRouteOptions,
} from '@/modules/activity-routes/services/option-resolver.service';
import type { NotifyToOptions } from '@/modules/activity-routes/types/activity-routes.types';

test('resolveRouteOptions', async (t) => {
  t.test('derives notification defaults', async (t) => {
    const options = resolveRouteOptions('notifications', {}, NOTIFICATION_FORCED_EXCLUDES);

    t.equal(options.model, 'notifications');
    t.equal(options.controller, 'activity_notification/notifications');
    t.equal(options.as, undefined);
    t.equal(options.withDevise, undefined);
    t.strictSame(options.deviseDefaults, {});
    t.strictSame(options.except, ['new', 'create', 'edit', 'update']);
    t.equal(options.only, undefined);
    t.equal(options.subscriptionOption, undefined);
    t.strictSame(options.passthrough, {});
  });

  t.test('derives subscription defaults', async (t) => {
    const options = resolveRouteOptions('subscriptions', {}, SUBSCRIPTION_FORCED_EXCLUDES);

    t.equal(options.model, 'subscriptions');
    t.equal(options.controller, 'activity_notification/subscriptions');
    t.strictSame(options.except, ['new', 'edit', 'update']);
  });

  t.test('switches controller and defaults with devise integration', async (t) => {
    const options = resolveRouteOptions('notifications', { withDevise: 'admins' }, NOTIFICATION_FORCED_EXCLUDES);

    t.equal(options.controller, 'activity_notification/notifications_with_devise');
    t.equal(options.as, 'notifications');
    t.equal(options.withDevise, 'admins');
    t.strictSame(options.deviseDefaults, { devise_type: 'admins' });
  });

  t.test('treats a blank devise scope as absent', async (t) => {
    const options = resolveRouteOptions('notifications', { withDevise: ' ' }, NOTIFICATION_FORCED_EXCLUDES);

    t.equal(options.controller, 'activity_notification/notifications');
    t.strictSame(options.deviseDefaults, {});
  });

  t.test('keeps explicit model and controller', async (t) => {
    const options = resolveRouteOptions(
      'notifications',
      { model: 'alerts', controller: 'inbox/alerts', withDevise: 'users' },
      NOTIFICATION_FORCED_EXCLUDES,
    );

    t.equal(options.model, 'alerts');
    t.equal(options.controller, 'inbox/alerts');
  });

  t.test('names the controller after the resource kind, not the model', async (t) => {
    const options = resolveRouteOptions('notifications', { model: 'alerts' }, NOTIFICATION_FORCED_EXCLUDES);

    t.equal(options.controller, 'activity_notification/notifications');
  });

  t.test('uses the configured controller namespace', async (t) => {
    const options = resolveRouteOptions('subscriptions', { withDevise: 'users' }, SUBSCRIPTION_FORCED_EXCLUDES, {
      controllerNamespace: 'inbox',
    });

    t.equal(options.controller, 'inbox/subscriptions_with_devise');
  });

  t.test('appends forced excludes after caller excludes', async (t) => {
    const options = resolveRouteOptions(
      'notifications',
      { except: ['open'], only: ['open', 'create'] },
      NOTIFICATION_FORCED_EXCLUDES,
    );

    t.strictSame(options.except, ['open', 'new', 'create', 'edit', 'update']);
    t.strictSame(options.only, ['open', 'create']);
  });

  t.test('derives subscription options from withSubscription', async (t) => {
    const fromTrue = resolveRouteOptions('notifications', { withSubscription: true }, NOTIFICATION_FORCED_EXCLUDES);
    t.strictSame(fromTrue.subscriptionOption, {});

    const withDevise = resolveRouteOptions(
      'notifications',
      { withSubscription: true, withDevise: 'admins' },
      NOTIFICATION_FORCED_EXCLUDES,
    );
    t.strictSame(withDevise.subscriptionOption, { withDevise: 'admins' });

    const fromRecord = resolveRouteOptions(
      'notifications',
      { withSubscription: { except: ['subscribe'], withDevise: 'others' }, withDevise: 'admins' },
      NOTIFICATION_FORCED_EXCLUDES,
    );
    t.strictSame(fromRecord.subscriptionOption, { except: ['subscribe'], withDevise: 'admins' });

    const withoutOuterDevise = resolveRouteOptions(
      'notifications',
      { withSubscription: { only: ['subscribe'], withDevise: 'others' } },
      NOTIFICATION_FORCED_EXCLUDES,
    );
    t.strictSame(withoutOuterDevise.subscriptionOption, { only: ['subscribe'] });
  });

  t.test('ignores absent, false and empty withSubscription', async (t) => {
    const settings: Array<NotifyToOptions['withSubscription']> = [undefined, false, {}];
    for (const withSubscription of settings) {
      const options = resolveRouteOptions('notifications', { withSubscription }, NOTIFICATION_FORCED_EXCLUDES);
      t.equal(options.subscriptionOption, undefined);
    }
  });

  t.test('cascades on any other present withSubscription value', async (t) => {
    const fromString = resolveRouteOptions('notifications', { withSubscription: 'yes' }, NOTIFICATION_FORCED_EXCLUDES);
    t.equal(fromString.withSubscription, true);
    t.strictSame(fromString.subscriptionOption, {});
    t.strictSame(fromString.passthrough, {});

    const fromNumber = resolveRouteOptions(
      'notifications',
      { withSubscription: 1, withDevise: 'admins' },
      NOTIFICATION_FORCED_EXCLUDES,
    );
    t.strictSame(fromNumber.subscriptionOption, { withDevise: 'admins' });

    const fromBlank = resolveRouteOptions('notifications', { withSubscription: ' ' }, NOTIFICATION_FORCED_EXCLUDES);
    t.equal(fromBlank.withSubscription, undefined);
    t.equal(fromBlank.subscriptionOption, undefined);
  });

  t.test('ignores withSubscription for subscription routes', async (t) => {
    const options = resolveRouteOptions('subscriptions', { withSubscription: true }, SUBSCRIPTION_FORCED_EXCLUDES);

    t.equal(options.withSubscription, undefined);
    t.equal(options.subscriptionOption, undefined);
    t.strictSame(options.passthrough, {});
  });

  t.test('passes unknown keys through', async (t) => {
    const options = resolveRouteOptions(
      'notifications',
      { format: 'json', constraints: { id: '[0-9]+' }, except: ['move'] },
      NOTIFICATION_FORCED_EXCLUDES,
    );

    t.strictSame(options.passthrough, { format: 'json', constraints: { id: '[0-9]+' } });
  });

  t.test('is pure and repeatable', async (t) => {
    const raw: NotifyToOptions = { except: ['open'], withSubscription: { only: ['subscribe'] }, withDevise: 'users' };
    const snapshot = structuredClone(raw);

    const first = resolveRouteOptions('notifications', raw, NOTIFICATION_FORCED_EXCLUDES);
    const second = resolveRouteOptions('notifications', raw, NOTIFICATION_FORCED_EXCLUDES);

    t.strictSame(first, second);
    t.strictSame(raw, snapshot);
    t.ok(Object.isFrozen(first));
    t.ok(Object.isFrozen(first.except));
  });
});

test('isPresent', async (t) => {
  t.equal(isPresent(undefined), false);
  t.equal(isPresent(null), false);
  t.equal(isPresent(false), false);
  t.equal(isPresent(''), false);
  t.equal(isPresent({}), false);
  t.equal(isPresent([]), false);
  t.equal(isPresent(true), true);
  t.equal(isPresent('users'), true);
  t.equal(isPresent({ except: [] }), true);
});
