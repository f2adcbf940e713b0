import type { NotFoundHandler } from 'hono';

import type { AppContext } from '@/shared/types/hono';
import { response } from '@/shared/utils/responseUtils';

export const notFoundHandler: NotFoundHandler<AppContext> = (c) => {
  return response.notFound(c, `No route matches ${c.req.method} ${c.req.path}`);
};
