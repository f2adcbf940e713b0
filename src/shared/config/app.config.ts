/**
 * Application Configuration
 *
 * Environment-driven settings for mounting the declared routes
 */

import { z } from 'zod';

import { InvalidConfigurationError } from '@/shared/errors/routing.errors';
import { getAppEnv } from '@/shared/utils/env';
import type { AppEnvironment } from '@/shared/utils/env';

const envSchema = z.object({
  ACTIVITY_ROUTES_CONTROLLER_NAMESPACE: z.string().min(1).default('activity_notification'),
  ACTIVITY_ROUTES_BASE_PATH: z.string().startsWith('/').default('/'),
  // Empty string disables the document
  ACTIVITY_ROUTES_OPENAPI_PATH: z.string().default('/openapi.json'),
});

export type AppConfig = {
  environment: AppEnvironment;
  controllerNamespace: string;
  basePath: string;
  openApiPath: string | undefined;
};

export const loadAppConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new InvalidConfigurationError(parsed.error.issues.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
    })));
  }

  return {
    environment: getAppEnv(env),
    controllerNamespace: parsed.data.ACTIVITY_ROUTES_CONTROLLER_NAMESPACE,
    basePath: parsed.data.ACTIVITY_ROUTES_BASE_PATH,
    openApiPath: parsed.data.ACTIVITY_ROUTES_OPENAPI_PATH === '' ? undefined : parsed.data.ACTIVITY_ROUTES_OPENAPI_PATH,
  };
};
