import { Hono } from 'hono';
import { CartService } from '../services/cart.service.js';
import type { Logger } from '../lib/logger.js';
import { validateQuoteRequest } from '../lib/validation.js';
import { jsonError, readJson } from './http.js';

/**
 * Create pricing routes
 */
export function createPricingRoutes(service: CartService, logger: Logger): Hono {
  const app = new Hono();

  /**
   * POST /pricing/quote - Price a cart snapshot without storing it
   */
  app.post('/quote', async (c) => {
    try {
      const command = validateQuoteRequest(await readJson(c));
      const result = await service.quote(command);
      return c.json(result);
    } catch (error) {
      return jsonError(c, error, logger);
    }
  });

  return app;
}
