import { test } from 'tap';
import { buildRoutes, captureError, summarize } from '../../fixtures/routes';

test('subscribedBy', async (t) => {
  t.test('declares the subscription routes for a target', async (t) => {
    const routes = buildRoutes().subscribedBy('users');
    const declared = routes.mapper.routeSet.routes;

    t.strictSame(summarize(declared), [
      'POST /users/:user_id/subscriptions create',
      'POST /users/:user_id/subscriptions/:id/subscribe subscribe',
      'POST /users/:user_id/subscriptions/:id/unsubscribe unsubscribe',
      'POST /users/:user_id/subscriptions/:id/subscribe_to_email subscribe_to_email',
      'POST /users/:user_id/subscriptions/:id/unsubscribe_to_email unsubscribe_to_email',
      'POST /users/:user_id/subscriptions/:id/subscribe_to_optional_target subscribe_to_optional_target',
      'POST /users/:user_id/subscriptions/:id/unsubscribe_to_optional_target unsubscribe_to_optional_target',
      'GET /users/:user_id/subscriptions index',
      'GET /users/:user_id/subscriptions/:id show',
      'DELETE /users/:user_id/subscriptions/:id destroy',
    ]);
    t.equal(declared[0].name, 'open_all_user_subscriptions');
    t.equal(declared[1].name, 'subscribe_user_subscription');
    t.equal(declared[7].name, 'user_subscriptions');
    for (const route of declared) {
      t.equal(route.controller, 'activity_notification/subscriptions');
      t.strictSame(route.defaults, { target_type: 'users' });
    }
  });

  t.test('filters the member routes only', async (t) => {
    const routes = buildRoutes().subscribedBy('users', { only: ['subscribe'], except: ['index'] });

    t.strictSame(summarize(routes.mapper.routeSet.routes), [
      'POST /users/:user_id/subscriptions create',
      'POST /users/:user_id/subscriptions/:id/subscribe subscribe',
      'GET /users/:user_id/subscriptions index',
      'GET /users/:user_id/subscriptions/:id show',
      'DELETE /users/:user_id/subscriptions/:id destroy',
    ]);
  });

  t.test('binds routes to the devise controller', async (t) => {
    const routes = buildRoutes().subscribedBy(['users'], { withDevise: 'users' });

    for (const route of routes.mapper.routeSet.routes) {
      t.equal(route.controller, 'activity_notification/subscriptions_with_devise');
      t.strictSame(route.defaults, { target_type: 'users', devise_type: 'users' });
    }
  });

  t.test('conflicts with routes already cascaded from notifyTo', async (t) => {
    const routes = buildRoutes([{ resourceName: 'users', subscriptionEnabled: () => true }])
      .notifyTo('users', { withSubscription: true });

    t.match(captureError(() => routes.subscribedBy('users')), {
      name: 'DuplicateRouteError',
      details: { method: 'POST', path: '/users/:user_id/subscriptions' },
    });
  });
});
