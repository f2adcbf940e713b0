import { getLogger } from '@logtape/logtape';
import type { ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { randomUUID } from 'node:crypto';

import type { AppContext } from '@/shared/types/hono';
import { isAppError } from '@/shared/types/result';
import { toSnakeCase } from '@/shared/utils/responseUtils';

const logger = getLogger(['app', 'error-handler']);

const CONTENTFUL_STATUSES: ReadonlySet<number> = new Set<ContentfulStatusCode>([
  400, 401, 403, 404, 405, 409, 422, 429, 500, 501, 502, 503,
]);

const isContentfulStatus = (status: number): status is ContentfulStatusCode => CONTENTFUL_STATUSES.has(status);

/**
 * Global Error Handler for Hono Application
 *
 * Routing errors carry their own status and code; anything else is a 500.
 */
export const errorHandler: ErrorHandler<AppContext> = (error, c) => {
  const requestId = c.get('requestId') ?? randomUUID();
  const appError = isAppError(error) ? error : undefined;
  const rawStatus = appError?.status ?? 500;
  const status = isContentfulStatus(rawStatus) ? rawStatus : 500;
  const code = appError?.code ?? 'INTERNAL_SERVER_ERROR';

  logger.error(
    "Unexpected error occurred: {message} [{code}] ({status}) {method} {url}",
    {
      message: error.message,
      code,
      status,
      method: c.req.method,
      url: c.req.url,
      requestId,
      error,
    }
  );

  return c.json(toSnakeCase({
    error: code,
    message: status === 500 ? 'An unexpected error occurred' : error.message,
    details: appError?.details,
    request_id: requestId,
  }), status);
};
