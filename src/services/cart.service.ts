import { randomUUID } from 'node:crypto';
import { InMemoryCartStore } from '../clients/cartStore.js';
import {
  createCart,
  mergeItem,
  removeItem,
  setPromotionCode,
  updateAddresses,
  withPricing,
} from '../models/cart.js';
import type { Address, CatalogEntry, StoredCart } from '../models/types.js';
import { NotFoundError } from '../lib/errors.js';
import type { CartPricingEngine } from '../pricing/engine.js';
import type { PriceCartCommand, PriceCartResult } from '../pricing/types.js';

export interface CartPricingResponse {
  cart: StoredCart;
  pricing: PriceCartResult;
}

/**
 * Cart service: cart mutations, each followed by a repricing through the
 * engine. A mutation whose repricing fails is not stored.
 */
export class CartService {
  private readonly catalog: Map<string, CatalogEntry>;

  constructor(
    private readonly store: InMemoryCartStore,
    private readonly engine: CartPricingEngine,
    catalog: readonly CatalogEntry[],
    private readonly ttlMs: number,
    private readonly defaultCurrency: string
  ) {
    this.catalog = new Map(catalog.map((entry) => [entry.sku, entry]));
  }

  async createCart(input: { currency?: string; userId?: string } = {}): Promise<CartPricingResponse> {
    const cart = createCart(
      randomUUID(),
      input.currency ?? this.defaultCurrency,
      this.ttlMs,
      input.userId
    );
    const pricing = await this.engine.calculate({ cart });
    const priced = withPricing(cart, pricing);
    await this.store.create(priced);
    return { cart: priced, pricing };
  }

  async getCart(id: string): Promise<StoredCart> {
    const cart = await this.store.get(id);
    if (!cart) {
      throw new NotFoundError('Cart not found or expired');
    }
    return cart;
  }

  async addItem(id: string, sku: string, quantity: number): Promise<CartPricingResponse> {
    const entry = this.catalog.get(sku.trim().toUpperCase());
    if (!entry) {
      throw new NotFoundError(`Product not found: ${sku}`);
    }
    const cart = await this.getCart(id);
    return this.reprice(mergeItem(cart, entry, quantity));
  }

  async removeItem(cartId: string, itemId: string): Promise<CartPricingResponse> {
    const cart = await this.getCart(cartId);
    if (!cart.items.some((item) => item.id === itemId)) {
      throw new NotFoundError(`Cart item not found: ${itemId}`);
    }
    return this.reprice(removeItem(cart, itemId));
  }

  async updateAddresses(
    cartId: string,
    addresses: { shippingAddress?: Address; billingAddress?: Address }
  ): Promise<CartPricingResponse> {
    const cart = await this.getCart(cartId);
    return this.reprice(updateAddresses(cart, addresses));
  }

  async applyPromotion(cartId: string, code: string): Promise<CartPricingResponse> {
    const cart = await this.getCart(cartId);
    return this.reprice(setPromotionCode(cart, code));
  }

  async removePromotion(cartId: string): Promise<CartPricingResponse> {
    const cart = await this.getCart(cartId);
    return this.reprice(setPromotionCode(cart, null));
  }

  /**
   * Recompute and store the estimate without changing the cart
   */
  async estimate(
    cartId: string,
    options: { bypassShippingCache?: boolean } = {}
  ): Promise<CartPricingResponse> {
    const cart = await this.getCart(cartId);
    return this.reprice(cart, options.bypassShippingCache ?? false);
  }

  /**
   * Price an arbitrary cart snapshot; nothing is stored
   */
  async quote(command: PriceCartCommand): Promise<PriceCartResult> {
    return this.engine.calculate(command);
  }

  private async reprice(cart: StoredCart, bypassShippingCache = false): Promise<CartPricingResponse> {
    const pricing = await this.engine.calculate({ cart, bypassShippingCache });
    const stored = await this.store.update(withPricing(cart, pricing));
    return { cart: stored, pricing };
  }
}
