import { snakeCase } from 'es-toolkit/compat';
import type { Context } from 'hono';

/**
 * Recursively converts object keys from camelCase to snake_case
 */
export const toSnakeCase = (obj: unknown): unknown => {
  if (obj === null || obj === undefined) {
    return obj;
  }

  // Handle Date objects - return as-is (will be serialized to ISO string by JSON.stringify)
  if (obj instanceof Date) {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(toSnakeCase);
  }

  if (typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[snakeCase(key)] = toSnakeCase(value);
    }
    return result;
  }

  return obj;
};

/**
 * Response utilities for consistent API responses
 * All responses are automatically converted to snake_case
 */
export const response = {
  /**
   * 200 OK - Success response
   */
  ok: (c: Context, data: unknown): Response => c.json(toSnakeCase(data), 200),

  /**
   * 404 Not Found - Resource not found
   */
  notFound: (c: Context, message = 'Resource not found'): Response => c.json(toSnakeCase({
    error: 'Not Found',
    message,
    request_id: c.get('requestId'),
  }), 404),
};
