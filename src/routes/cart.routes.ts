import { Hono } from 'hono';
import { CartService } from '../services/cart.service.js';
import type { Logger } from '../lib/logger.js';
import {
  validateAddItemRequest,
  validateAddressesRequest,
  validateCreateCartRequest,
  validateEstimateRequest,
  validatePromotionRequest,
} from '../lib/validation.js';
import { jsonError, readJson } from './http.js';

/**
 * Create cart routes
 */
export function createCartRoutes(service: CartService, logger: Logger): Hono {
  const app = new Hono();

  /**
   * POST /cart - Create a new cart
   */
  app.post('/', async (c) => {
    try {
      const input = validateCreateCartRequest(await readJson(c));
      const result = await service.createCart(input);
      return c.json(result, 201);
    } catch (error) {
      return jsonError(c, error, logger);
    }
  });

  /**
   * GET /cart/:id - Get a cart by ID
   */
  app.get('/:id', async (c) => {
    try {
      const cart = await service.getCart(c.req.param('id'));
      return c.json({ cart });
    } catch (error) {
      return jsonError(c, error, logger);
    }
  });

  /**
   * POST /cart/:id/items - Add an item to the cart
   */
  app.post('/:id/items', async (c) => {
    try {
      const { sku, quantity } = validateAddItemRequest(await readJson(c));
      const result = await service.addItem(c.req.param('id'), sku, quantity);
      return c.json(result);
    } catch (error) {
      return jsonError(c, error, logger);
    }
  });

  /**
   * DELETE /cart/:id/items/:itemId - Remove an item from the cart
   */
  app.delete('/:id/items/:itemId', async (c) => {
    try {
      const result = await service.removeItem(c.req.param('id'), c.req.param('itemId'));
      return c.json(result);
    } catch (error) {
      return jsonError(c, error, logger);
    }
  });

  /**
   * PUT /cart/:id/addresses - Set shipping and/or billing address
   */
  app.put('/:id/addresses', async (c) => {
    try {
      const addresses = validateAddressesRequest(await readJson(c));
      const result = await service.updateAddresses(c.req.param('id'), addresses);
      return c.json(result);
    } catch (error) {
      return jsonError(c, error, logger);
    }
  });

  /**
   * PUT /cart/:id/promotion - Attach a promotion code
   */
  app.put('/:id/promotion', async (c) => {
    try {
      const { code } = validatePromotionRequest(await readJson(c));
      const result = await service.applyPromotion(c.req.param('id'), code);
      return c.json(result);
    } catch (error) {
      return jsonError(c, error, logger);
    }
  });

  /**
   * DELETE /cart/:id/promotion - Detach the promotion code
   */
  app.delete('/:id/promotion', async (c) => {
    try {
      const result = await service.removePromotion(c.req.param('id'));
      return c.json(result);
    } catch (error) {
      return jsonError(c, error, logger);
    }
  });

  /**
   * POST /cart/:id/estimate - Reprice the cart and refresh its estimate
   */
  app.post('/:id/estimate', async (c) => {
    try {
      const options = validateEstimateRequest(await readJson(c));
      const result = await service.estimate(c.req.param('id'), options);
      return c.json(result);
    } catch (error) {
      return jsonError(c, error, logger);
    }
  });

  return app;
}
