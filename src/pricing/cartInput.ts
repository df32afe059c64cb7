import { CurrencyMismatchError, InvalidInputError } from '../lib/errors.js';
import { isMoney } from '../lib/money.js';
import type { Cart } from '../models/types.js';

export function normalizeCurrency(currency: string | undefined): string {
  return (currency ?? '').trim().toUpperCase();
}

/**
 * Check quantities, prices and that some currency is resolvable
 */
export function validateCartInput(cart: Cart): void {
  let currency = normalizeCurrency(cart.currency);
  if (cart.items.length === 0) {
    if (!currency) {
      throw new InvalidInputError('cart currency required when no items provided');
    }
    return;
  }

  for (const item of cart.items) {
    if (!Number.isSafeInteger(item.quantity) || item.quantity <= 0) {
      throw new InvalidInputError(`item ${item.id} quantity must be positive`);
    }
    if (!isMoney(item.unitPrice)) {
      throw new InvalidInputError(`item ${item.id} unit price must be an integer amount`);
    }
    if (item.unitPrice < 0) {
      throw new InvalidInputError(`item ${item.id} unit price cannot be negative`);
    }
    // Negative weights are accepted; shipping falls back to the net amount for them.
    if (!Number.isSafeInteger(item.weightGrams)) {
      throw new InvalidInputError(`item ${item.id} weight must be whole grams`);
    }
    const itemCurrency = normalizeCurrency(item.currency);
    if (!itemCurrency && !currency) {
      throw new InvalidInputError(`item ${item.id} currency missing`);
    }
    if (!currency) {
      currency = itemCurrency;
    }
  }
}

/**
 * Resolve the single currency of a cart. The cart-level currency wins; items
 * without a currency inherit it; any other disagreement is a mismatch.
 */
export function resolveCurrency(cart: Cart): string {
  let base = normalizeCurrency(cart.currency);
  if (!base) {
    base = normalizeCurrency(cart.items[0]?.currency);
    if (!base) {
      throw new CurrencyMismatchError('cart currency could not be resolved');
    }
  }

  for (const item of cart.items) {
    const itemCurrency = normalizeCurrency(item.currency) || base;
    if (itemCurrency !== base) {
      throw new CurrencyMismatchError(`item ${item.id} is priced in ${itemCurrency}, cart in ${base}`);
    }
  }
  return base;
}

/**
 * An explicit override beats the code attached to the cart; blank means none
 */
export function resolvePromotionCode(cart: Cart, override?: string): string | undefined {
  const raw = override !== undefined ? override : cart.promotion?.code;
  const code = (raw ?? '').trim().toUpperCase();
  return code || undefined;
}
