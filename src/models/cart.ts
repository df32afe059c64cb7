import { randomUUID } from 'node:crypto';
import type { Address, CartEstimate, CartItem, CatalogEntry, StoredCart } from './types.js';
import type { PriceCartResult } from '../pricing/types.js';

/**
 * Create a new empty cart
 */
export function createCart(
  id: string,
  currency: string,
  ttlMs: number,
  userId?: string
): StoredCart {
  const now = new Date();
  const expiresAt = new Date(now.getTime() + ttlMs);

  return {
    id,
    ...(userId ? { userId } : {}),
    currency: currency.trim().toUpperCase(),
    items: [],
    createdAt: now,
    updatedAt: now,
    expiresAt,
  };
}

/**
 * Merge a catalog entry into the cart by sku
 */
export function mergeItem(cart: StoredCart, entry: CatalogEntry, quantity: number): StoredCart {
  const existingIndex = cart.items.findIndex((item) => item.sku === entry.sku);
  let updatedItems: CartItem[];

  if (existingIndex >= 0) {
    updatedItems = [...cart.items];
    updatedItems[existingIndex] = {
      ...updatedItems[existingIndex],
      quantity: updatedItems[existingIndex].quantity + quantity,
    };
  } else {
    const newItem: CartItem = {
      id: randomUUID(),
      productId: entry.productId,
      sku: entry.sku,
      quantity,
      unitPrice: entry.unitPrice,
      currency: cart.currency,
      weightGrams: entry.weightGrams,
      requiresShipping: entry.requiresShipping,
      ...(entry.taxCode ? { taxCode: entry.taxCode } : {}),
    };
    updatedItems = [...cart.items, newItem];
  }

  return {
    ...cart,
    items: updatedItems,
    updatedAt: new Date(),
  };
}

/**
 * Remove an item from the cart by item id
 */
export function removeItem(cart: StoredCart, itemId: string): StoredCart {
  return {
    ...cart,
    items: cart.items.filter((item) => item.id !== itemId),
    updatedAt: new Date(),
  };
}

export function updateAddresses(
  cart: StoredCart,
  addresses: { shippingAddress?: Address; billingAddress?: Address }
): StoredCart {
  return {
    ...cart,
    ...(addresses.shippingAddress ? { shippingAddress: addresses.shippingAddress } : {}),
    ...(addresses.billingAddress ? { billingAddress: addresses.billingAddress } : {}),
    updatedAt: new Date(),
  };
}

/**
 * Attach a promotion code, or detach it when code is null
 */
export function setPromotionCode(cart: StoredCart, code: string | null): StoredCart {
  const { promotion: _previous, ...rest } = cart;
  const normalized = code?.trim().toUpperCase();
  return {
    ...rest,
    ...(normalized ? { promotion: { code: normalized, discountAmount: 0, applied: false } } : {}),
    updatedAt: new Date(),
  };
}

/**
 * Record a pricing result on the cart: the estimate, and whether the
 * attached promotion actually applied
 */
export function withPricing(cart: StoredCart, result: PriceCartResult): StoredCart {
  const estimate: CartEstimate = { ...result.estimate };
  const promotionLine = result.breakdown.discounts.find((d) => d.type === 'promotion');

  return {
    ...cart,
    estimate,
    ...(cart.promotion
      ? {
          promotion: {
            code: cart.promotion.code,
            applied: promotionLine !== undefined,
            discountAmount: promotionLine?.amount ?? 0,
          },
        }
      : {}),
  };
}
