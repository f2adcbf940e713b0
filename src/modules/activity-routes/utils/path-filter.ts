import { isEmpty } from 'es-toolkit/compat';

import type { ResolvedRouteOptions } from '@/modules/activity-routes/types/activity-routes.types';

/**
 * Whether an optional action route is left out by `except` / `only`.
 * `except` is consulted first and wins over `only`.
 */
export const ignorePath = (
  action: string,
  options: Pick<ResolvedRouteOptions, 'except' | 'only'>,
): boolean => {
  if (!isEmpty(options.except) && options.except.includes(action)) {
    return true;
  }
  if (options.only && !isEmpty(options.only) && !options.only.includes(action)) {
    return true;
  }
  return false;
};
