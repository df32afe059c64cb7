import type { Context } from 'hono';
import { statusFor, toErrorResponse, ValidationError } from '../lib/errors.js';
import { errorFields, type Logger } from '../lib/logger.js';

/**
 * Parse a JSON request body; an empty body yields undefined
 */
export async function readJson(c: Context): Promise<unknown> {
  const text = await c.req.text();
  if (text.trim().length === 0) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }
}

/**
 * JSON error response with the status carried by the error
 */
export function jsonError(c: Context, error: unknown, logger: Logger) {
  const status = statusFor(error);
  if (status >= 500) {
    logger.error('request_failed', {
      method: c.req.method,
      path: c.req.path,
      ...errorFields(error),
    });
  }
  return c.json(toErrorResponse(error), status);
}
