import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createApplication, type Application } from '../src/app.js';
import { loadConfig } from '../src/config/pricing.js';
import { silentLogger } from '../src/lib/logger.js';
import { createCartRoutes } from '../src/routes/cart.routes.js';
import { jsonRequest, readBody, type CartPricingJson, type ErrorJson } from './helpers/http.js';

const tokyo = {
  recipient: 'Test Buyer',
  line1: '1-1 Marunouchi',
  city: 'Chiyoda',
  postalCode: '100-0001',
  country: 'jp',
};

describe('Cart Routes', () => {
  let application: Application;
  let app: ReturnType<typeof createCartRoutes>;

  beforeEach(() => {
    vi.useFakeTimers();
    application = createApplication(loadConfig({}), silentLogger);
    app = createCartRoutes(application.service, silentLogger);
  });

  afterEach(() => {
    application.stop();
    application.store.clear();
    vi.useRealTimers();
  });

  async function createCart(): Promise<CartPricingJson> {
    const res = await app.fetch(new Request('http://localhost/', { method: 'POST' }));
    return readBody<CartPricingJson>(res);
  }

  describe('POST /cart', () => {
    it('creates a new cart', async () => {
      const res = await app.fetch(new Request('http://localhost/', { method: 'POST' }));

      expect(res.status).toBe(201);
      const body = await readBody<CartPricingJson>(res);
      expect(body.cart.currency).toBe('JPY');
      expect(body.pricing.estimate.total).toBe(0);
    });

    it('accepts a currency', async () => {
      const res = await app.fetch(jsonRequest('http://localhost/', 'POST', { currency: 'usd' }));

      const body = await readBody<CartPricingJson>(res);
      expect(body.cart.currency).toBe('USD');
    });

    it('returns 400 for an invalid currency', async () => {
      const res = await app.fetch(jsonRequest('http://localhost/', 'POST', { currency: 'yen!' }));

      expect(res.status).toBe(400);
      const body = await readBody<ErrorJson>(res);
      expect(body.error).toEqual({ code: 'VALIDATION_ERROR', message: 'currency must be a three-letter code' });
    });
  });

  describe('GET /cart/:id', () => {
    it('retrieves an existing cart', async () => {
      const { cart } = await createCart();

      const res = await app.fetch(new Request(`http://localhost/${cart.id}`));

      expect(res.status).toBe(200);
      const body = await readBody<{ cart: { id: string } }>(res);
      expect(body.cart.id).toBe(cart.id);
    });

    it('returns 404 for non-existent cart', async () => {
      const res = await app.fetch(new Request('http://localhost/non-existent'));

      expect(res.status).toBe(404);
      const body = await readBody<ErrorJson>(res);
      expect(body.error).toEqual({ code: 'NOT_FOUND', message: 'Cart not found or expired' });
    });
  });

  describe('POST /cart/:id/items', () => {
    it('adds item to cart', async () => {
      const { cart } = await createCart();

      const res = await app.fetch(
        jsonRequest(`http://localhost/${cart.id}/items`, 'POST', { sku: 'SEAL-KURO-15', quantity: 1 })
      );

      expect(res.status).toBe(200);
      const body = await readBody<CartPricingJson>(res);
      expect(body.cart.items).toHaveLength(1);
      expect(body.cart.estimate).toEqual({ subtotal: 9800, discount: 0, tax: 980, shipping: 0, total: 10780 });
    });

    it('returns 400 for invalid quantity', async () => {
      const { cart } = await createCart();

      const res = await app.fetch(
        jsonRequest(`http://localhost/${cart.id}/items`, 'POST', { sku: 'SEAL-KURO-15', quantity: 0 })
      );

      expect(res.status).toBe(400);
    });

    it('returns 400 for malformed JSON', async () => {
      const { cart } = await createCart();
      const req = new Request(`http://localhost/${cart.id}/items`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"sku":',
      });

      const res = await app.fetch(req);

      expect(res.status).toBe(400);
      const body = await readBody<ErrorJson>(res);
      expect(body.error.message).toBe('Request body must be valid JSON');
    });

    it('returns 409 when stock runs out', async () => {
      const { cart } = await createCart();

      const res = await app.fetch(
        jsonRequest(`http://localhost/${cart.id}/items`, 'POST', { sku: 'SEAL-TITAN-18', quantity: 6 })
      );

      expect(res.status).toBe(409);
      const body = await readBody<ErrorJson>(res);
      expect(body.error).toEqual({
        code: 'INSUFFICIENT_INVENTORY',
        message: 'Insufficient inventory for SEAL-TITAN-18. Available: 5, Requested: 6',
      });
    });

    it('returns 404 for an unknown product', async () => {
      const { cart } = await createCart();

      const res = await app.fetch(
        jsonRequest(`http://localhost/${cart.id}/items`, 'POST', { sku: 'SEAL-GOLD-30', quantity: 1 })
      );

      expect(res.status).toBe(404);
    });
  });

  describe('DELETE /cart/:id/items/:itemId', () => {
    it('removes item from cart', async () => {
      const { cart } = await createCart();
      const added = await readBody<CartPricingJson>(
        await app.fetch(jsonRequest(`http://localhost/${cart.id}/items`, 'POST', { sku: 'CASE-LEATHER', quantity: 1 }))
      );

      const res = await app.fetch(
        new Request(`http://localhost/${cart.id}/items/${added.cart.items[0].id}`, { method: 'DELETE' })
      );

      expect(res.status).toBe(200);
      const body = await readBody<CartPricingJson>(res);
      expect(body.cart.items).toEqual([]);
      expect(body.cart.estimate?.total).toBe(0);
    });
  });

  describe('PUT /cart/:id/addresses', () => {
    it('sets the shipping address and reprices', async () => {
      const { cart } = await createCart();
      await app.fetch(jsonRequest(`http://localhost/${cart.id}/items`, 'POST', { sku: 'SEAL-KURO-15', quantity: 1 }));

      const res = await app.fetch(jsonRequest(`http://localhost/${cart.id}/addresses`, 'PUT', { shippingAddress: tokyo }));

      expect(res.status).toBe(200);
      const body = await readBody<CartPricingJson>(res);
      expect(body.cart.shippingAddress?.country).toBe('JP');
      // tax on 9800 + 800
      expect(body.cart.estimate).toEqual({ subtotal: 9800, discount: 0, tax: 1060, shipping: 800, total: 11660 });
    });

    it('returns 400 without any address', async () => {
      const { cart } = await createCart();

      const res = await app.fetch(jsonRequest(`http://localhost/${cart.id}/addresses`, 'PUT', {}));

      expect(res.status).toBe(400);
    });
  });

  describe('/cart/:id/promotion', () => {
    it('applies and removes a promotion', async () => {
      const { cart } = await createCart();
      await app.fetch(jsonRequest(`http://localhost/${cart.id}/items`, 'POST', { sku: 'SEAL-KURO-15', quantity: 1 }));

      const applied = await readBody<CartPricingJson>(
        await app.fetch(jsonRequest(`http://localhost/${cart.id}/promotion`, 'PUT', { code: 'spring1000' }))
      );
      expect(applied.cart.promotion).toEqual({ code: 'SPRING1000', discountAmount: 1000, applied: true });
      expect(applied.cart.estimate).toEqual({ subtotal: 9800, discount: 1000, tax: 880, shipping: 0, total: 9680 });

      const res = await app.fetch(new Request(`http://localhost/${cart.id}/promotion`, { method: 'DELETE' }));
      const removed = await readBody<CartPricingJson>(res);
      expect(res.status).toBe(200);
      expect(removed.cart.promotion).toBeUndefined();
      expect(removed.cart.estimate?.discount).toBe(0);
    });
  });

  describe('POST /cart/:id/estimate', () => {
    it('reprices with an empty body', async () => {
      const { cart } = await createCart();

      const res = await app.fetch(new Request(`http://localhost/${cart.id}/estimate`, { method: 'POST' }));

      expect(res.status).toBe(200);
      const body = await readBody<CartPricingJson>(res);
      expect(body.pricing.breakdown.metadata).toEqual({ netSubtotal: 0 });
    });
  });
});
