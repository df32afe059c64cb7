import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createApplication, type Application } from '../src/app.js';
import { loadConfig } from '../src/config/pricing.js';
import { InsufficientInventoryError, NotFoundError } from '../src/lib/errors.js';
import { silentLogger } from '../src/lib/logger.js';
import type { Address } from '../src/models/types.js';
import type { CartService } from '../src/services/cart.service.js';

const tokyo: Address = {
  recipient: 'Test Buyer',
  line1: '1-1 Marunouchi',
  city: 'Chiyoda',
  postalCode: '100-0001',
  country: 'JP',
};

describe('CartService', () => {
  let application: Application;
  let service: CartService;

  beforeEach(() => {
    vi.useFakeTimers();
    application = createApplication(loadConfig({}), silentLogger);
    service = application.service;
  });

  afterEach(() => {
    application.stop();
    application.store.clear();
    vi.useRealTimers();
  });

  describe('createCart', () => {
    it('creates an empty cart in the default currency', async () => {
      const { cart, pricing } = await service.createCart();

      expect(cart.currency).toBe('JPY');
      expect(cart.items).toEqual([]);
      expect(cart.estimate).toEqual({ subtotal: 0, discount: 0, tax: 0, shipping: 0, total: 0 });
      expect(pricing.breakdown.items).toEqual([]);
      expect(application.store.size()).toBe(1);
    });

    it('honors the requested currency and user', async () => {
      const { cart } = await service.createCart({ currency: 'USD', userId: 'user_1' });

      expect(cart.currency).toBe('USD');
      expect(cart.userId).toBe('user_1');
    });
  });

  describe('getCart', () => {
    it('retrieves an existing cart', async () => {
      const { cart } = await service.createCart();
      expect((await service.getCart(cart.id)).id).toBe(cart.id);
    });

    it('throws NotFoundError for non-existent cart', async () => {
      await expect(service.getCart('non-existent')).rejects.toThrow(NotFoundError);
    });

    it('throws NotFoundError for expired cart', async () => {
      const { cart } = await service.createCart();

      vi.advanceTimersByTime(900_001);

      await expect(service.getCart(cart.id)).rejects.toThrow('Cart not found or expired');
    });
  });

  describe('addItem', () => {
    it('prices a cart without an address, so without shipping', async () => {
      const { cart } = await service.createCart();
      const result = await service.addItem(cart.id, 'seal-tsuge-12', 2);

      expect(result.cart.items).toHaveLength(1);
      // 10% of 8000
      expect(result.cart.estimate).toEqual({ subtotal: 8000, discount: 0, tax: 800, shipping: 0, total: 8800 });
      expect((await service.getCart(cart.id)).estimate?.total).toBe(8800);
    });

    it('applies the bulk discount from ten units', async () => {
      const { cart } = await service.createCart();
      await service.updateAddresses(cart.id, { shippingAddress: tokyo });
      const result = await service.addItem(cart.id, 'SEAL-TSUGE-12', 10);

      // 40000 less 5%, domestic and above the free shipping threshold
      expect(result.cart.estimate).toEqual({ subtotal: 40000, discount: 2000, tax: 3800, shipping: 0, total: 41800 });
      expect(result.pricing.breakdown.discounts).toEqual([
        {
          type: 'item',
          source: 'bulk',
          description: '5% off 10+ units',
          amount: 2000,
          metadata: { minQuantity: 10 },
        },
      ]);
    });

    it('throws NotFoundError for an unknown product', async () => {
      const { cart } = await service.createCart();
      await expect(service.addItem(cart.id, 'SEAL-GOLD-30', 1)).rejects.toThrow('Product not found: SEAL-GOLD-30');
    });

    it('keeps the stored cart when stock runs out', async () => {
      const { cart } = await service.createCart();
      await service.addItem(cart.id, 'SEAL-TITAN-18', 3);

      await expect(service.addItem(cart.id, 'SEAL-TITAN-18', 3)).rejects.toThrow(InsufficientInventoryError);

      const stored = await service.getCart(cart.id);
      expect(stored.items[0].quantity).toBe(3);
    });
  });

  describe('removeItem', () => {
    it('removes the line and reprices', async () => {
      const { cart } = await service.createCart();
      await service.addItem(cart.id, 'SEAL-TSUGE-12', 1);
      const added = await service.addItem(cart.id, 'CASE-LEATHER', 1);
      const caseLine = added.cart.items.find((item) => item.sku === 'CASE-LEATHER');

      const result = await service.removeItem(cart.id, caseLine?.id ?? '');

      expect(result.cart.items.map((item) => item.sku)).toEqual(['SEAL-TSUGE-12']);
      expect(result.cart.estimate?.subtotal).toBe(4000);
    });

    it('throws NotFoundError for an unknown item', async () => {
      const { cart } = await service.createCart();
      await expect(service.removeItem(cart.id, 'missing')).rejects.toThrow('Cart item not found: missing');
    });
  });

  describe('updateAddresses', () => {
    it('charges the domestic fee below the threshold', async () => {
      const { cart } = await service.createCart();
      await service.addItem(cart.id, 'SEAL-TSUGE-12', 2);

      const result = await service.updateAddresses(cart.id, { shippingAddress: tokyo });

      // tax on 8000 + 800 shipping
      expect(result.cart.estimate).toEqual({ subtotal: 8000, discount: 0, tax: 880, shipping: 800, total: 9680 });
      expect(result.pricing.breakdown.items[0].shipping).toBe(800);
    });

    it('charges the international fee abroad', async () => {
      const { cart } = await service.createCart();
      await service.addItem(cart.id, 'SEAL-TSUGE-12', 2);

      const result = await service.updateAddresses(cart.id, {
        shippingAddress: { ...tokyo, city: 'Seattle', postalCode: '98101', country: 'US' },
      });

      expect(result.cart.estimate).toEqual({ subtotal: 8000, discount: 0, tax: 1150, shipping: 3500, total: 12650 });
    });

    it('ships free once the net reaches the threshold', async () => {
      const { cart } = await service.createCart();
      await service.updateAddresses(cart.id, { shippingAddress: tokyo });
      await service.addItem(cart.id, 'SEAL-TSUGE-12', 2);

      const result = await service.addItem(cart.id, 'CASE-LEATHER', 2);

      expect(result.cart.estimate).toEqual({ subtotal: 12000, discount: 0, tax: 1200, shipping: 0, total: 13200 });
    });
  });

  describe('promotions', () => {
    it('applies a known code', async () => {
      const { cart } = await service.createCart();
      await service.addItem(cart.id, 'SEAL-TSUGE-12', 2);
      await service.updateAddresses(cart.id, { shippingAddress: tokyo });

      const result = await service.applyPromotion(cart.id, 'welcome500');

      expect(result.cart.promotion).toEqual({ code: 'WELCOME500', discountAmount: 500, applied: true });
      expect(result.cart.estimate).toEqual({ subtotal: 8000, discount: 500, tax: 830, shipping: 800, total: 9130 });
    });

    it('keeps an unknown code without applying it', async () => {
      const { cart } = await service.createCart();
      await service.addItem(cart.id, 'SEAL-TSUGE-12', 2);

      const result = await service.applyPromotion(cart.id, 'NOPE');

      expect(result.cart.promotion).toEqual({ code: 'NOPE', discountAmount: 0, applied: false });
      expect(result.cart.estimate?.discount).toBe(0);
    });

    it('removes the code and its discount', async () => {
      const { cart } = await service.createCart();
      await service.addItem(cart.id, 'SEAL-TSUGE-12', 2);
      await service.applyPromotion(cart.id, 'SPRING1000');

      const result = await service.removePromotion(cart.id);

      expect(result.cart).not.toHaveProperty('promotion');
      expect(result.cart.estimate?.discount).toBe(0);
    });
  });

  describe('estimate', () => {
    it('reuses the cached shipping quote unless bypassed', async () => {
      const { cart } = await service.createCart();
      await service.updateAddresses(cart.id, { shippingAddress: tokyo });
      await service.addItem(cart.id, 'SEAL-TSUGE-12', 1);
      const cached = application.shippingCache.size();

      await service.estimate(cart.id);
      expect(application.shippingCache.size()).toBe(cached);

      const result = await service.estimate(cart.id, { bypassShippingCache: true });
      expect(result.cart.estimate).toEqual({ subtotal: 4000, discount: 0, tax: 480, shipping: 800, total: 5280 });
    });
  });

  describe('quote', () => {
    it('prices a snapshot without storing it', async () => {
      const result = await service.quote({
        cart: {
          currency: 'JPY',
          items: [
            {
              id: 'line_1',
              productId: 'prod_proof',
              sku: 'DESIGN-PROOF',
              quantity: 1,
              unitPrice: 500,
              weightGrams: 0,
              requiresShipping: false,
            },
          ],
        },
        shippingAddress: tokyo,
      });

      expect(result.estimate).toEqual({ subtotal: 500, discount: 0, tax: 50, shipping: 0, total: 550 });
      expect(application.store.size()).toBe(0);
    });
  });
});
