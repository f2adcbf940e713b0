/**
 * Environment Utilities
 *
 * Separates APP_ENV (application environment) from NODE_ENV (Node.js runtime environment).
 */

export type AppEnvironment = 'development' | 'staging' | 'production';

/**
 * Get the application environment
 * Falls back to NODE_ENV if APP_ENV is not set
 */
export const getAppEnv = (env: NodeJS.ProcessEnv = process.env): AppEnvironment => {
  const appEnv = env.APP_ENV?.toLowerCase();
  const nodeEnv = env.NODE_ENV?.toLowerCase();

  if (appEnv === 'development' || appEnv === 'staging' || appEnv === 'production') {
    return appEnv;
  }

  // Fallback to NODE_ENV
  if (nodeEnv === 'development' || nodeEnv === 'production') {
    return nodeEnv;
  }

  return 'development';
};

/**
 * Check if running in production environment
 */
export const isProduction = (env: NodeJS.ProcessEnv = process.env): boolean => {
  return getAppEnv(env) === 'production';
};
