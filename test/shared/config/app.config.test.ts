import { test } from 'tap';
import { loadAppConfig } from '@/shared/config/app.config';
import { captureError } from '../../fixtures/routes';

test('loadAppConfig', async (t) => {
  t.test('falls back to defaults', async (t) => {
    t.strictSame(loadAppConfig({}), {
      environment: 'development',
      controllerNamespace: 'activity_notification',
      basePath: '/',
      openApiPath: '/openapi.json',
    });
  });

  t.test('reads overrides from the environment', async (t) => {
    t.strictSame(loadAppConfig({
      APP_ENV: 'staging',
      NODE_ENV: 'production',
      ACTIVITY_ROUTES_CONTROLLER_NAMESPACE: 'inbox',
      ACTIVITY_ROUTES_BASE_PATH: '/api',
      ACTIVITY_ROUTES_OPENAPI_PATH: '/docs.json',
    }), {
      environment: 'staging',
      controllerNamespace: 'inbox',
      basePath: '/api',
      openApiPath: '/docs.json',
    });
  });

  t.test('disables the OpenAPI document with an empty path', async (t) => {
    t.equal(loadAppConfig({ ACTIVITY_ROUTES_OPENAPI_PATH: '' }).openApiPath, undefined);
  });

  t.test('uses NODE_ENV when APP_ENV is unset', async (t) => {
    t.equal(loadAppConfig({ NODE_ENV: 'production' }).environment, 'production');
    t.equal(loadAppConfig({ NODE_ENV: 'test' }).environment, 'development');
  });

  t.test('rejects a relative base path', async (t) => {
    t.match(captureError(() => loadAppConfig({ ACTIVITY_ROUTES_BASE_PATH: 'api' })), {
      name: 'InvalidConfigurationError',
      code: 'INVALID_CONFIGURATION',
      details: [{ field: 'ACTIVITY_ROUTES_BASE_PATH' }],
    });
  });
});
