import { InvalidInputError } from '../lib/errors.js';
import { silentLogger, type Logger } from '../lib/logger.js';
import {
  assertNonNegativeMoney,
  checkedAdd,
  checkedMultiply,
  saturatingAdd,
  saturatingMultiply,
} from '../lib/money.js';
import type {
  Cart,
  DiscountBreakdown,
  ItemPricingBreakdown,
  PricingBreakdown,
  ShippingBreakdown,
  TaxBreakdown,
} from '../models/types.js';
import { allocateByWeight } from './allocator.js';
import { resolveCurrency, resolvePromotionCode, validateCartInput } from './cartInput.js';
import { aggregateItemDiscounts, buildDiscountBreakdowns } from './discounts.js';
import { buildShippingCacheKey, ShippingQuoteCache } from './shippingQuoteCache.js';
import type {
  CalculateOptions,
  InventoryAvailability,
  ItemDiscountRule,
  PriceCartCommand,
  PriceCartResult,
  PromotionValidator,
  ShippableItem,
  ShippingEstimator,
  TaxCalculator,
} from './types.js';

export interface CartPricingEngineDeps {
  promotion: PromotionValidator;
  tax?: TaxCalculator;
  shipping?: ShippingEstimator;
  inventory?: InventoryAvailability;
  itemRules?: readonly ItemDiscountRule[];
  /** Ignored when `cache` is supplied */
  cacheTtlMs?: number;
  /** Ignored when `cache` is supplied */
  now?: () => number;
  /** Swept by its owner; without one the engine sweeps a cache of its own */
  cache?: ShippingQuoteCache;
  logger?: Logger;
}

interface AppliedPromotion {
  discount: number;
  breakdown: DiscountBreakdown;
}

interface Amount<T> {
  amount: number;
  breakdown: T[];
}

/**
 * Turns a cart snapshot into a reconciled pricing breakdown: item rules,
 * promotion, shipping and tax, each allocated back onto the items so that
 * item totals sum exactly to the cart total.
 *
 * Safe to share between concurrent callers; the shipping quote cache is the
 * only state kept between calls.
 */
export class CartPricingEngine {
  private readonly promotion: PromotionValidator;
  private readonly tax?: TaxCalculator;
  private readonly shipping?: ShippingEstimator;
  private readonly inventory?: InventoryAvailability;
  private readonly itemRules: readonly ItemDiscountRule[];
  private readonly cache: ShippingQuoteCache;
  private readonly logger: Logger;

  constructor(deps: CartPricingEngineDeps) {
    this.promotion = deps.promotion;
    this.tax = deps.tax;
    this.shipping = deps.shipping;
    this.inventory = deps.inventory;
    this.itemRules = deps.itemRules ?? [];
    if (deps.cache) {
      this.cache = deps.cache;
    } else {
      this.cache = new ShippingQuoteCache({ ttlMs: deps.cacheTtlMs, now: deps.now });
      this.cache.startSweeper();
    }
    this.logger = deps.logger ?? silentLogger;
  }

  get shippingCache(): ShippingQuoteCache {
    return this.cache;
  }

  async calculate(command: PriceCartCommand, options: CalculateOptions = {}): Promise<PriceCartResult> {
    validateCartInput(command.cart);

    const cart: Cart = {
      ...command.cart,
      shippingAddress: command.shippingAddress ?? command.cart.shippingAddress,
      billingAddress: command.billingAddress ?? command.cart.billingAddress,
    };

    const currency = resolveCurrency(cart);
    if (cart.items.length === 0) {
      return emptyResult(currency);
    }

    if (this.inventory) {
      await this.inventory.validateAvailability(
        cart.items.map((item) => ({ productId: item.productId, sku: item.sku, quantity: item.quantity }))
      );
    }

    let promotionCode = resolvePromotionCode(cart, command.promotionCode);

    const items: ItemPricingBreakdown[] = [];
    const itemDiscountTotals = new Map<string, number>();
    const ruleDescriptions = new Map<string, string>();
    const ruleMetadata = new Map<string, Record<string, unknown>>();
    const taxWeights: number[] = [];
    const shippingWeights: number[] = [];
    let subtotal = 0;

    for (const item of cart.items) {
      const lineSubtotal = checkedMultiply(item.unitPrice, item.quantity, `item ${item.id} subtotal`);
      const outcome = await aggregateItemDiscounts(this.itemRules, item, lineSubtotal, this.logger);

      for (const [name, amount] of outcome.perRule) {
        itemDiscountTotals.set(name, checkedAdd(itemDiscountTotals.get(name) ?? 0, amount, 'item discount'));
      }
      for (const [name, description] of outcome.descriptions) {
        if (!ruleDescriptions.has(name)) ruleDescriptions.set(name, description);
      }
      for (const [name, fields] of outcome.metadata) {
        if (!ruleMetadata.has(name)) ruleMetadata.set(name, fields);
      }

      const net = Math.max(0, lineSubtotal - outcome.total);
      subtotal = checkedAdd(subtotal, lineSubtotal, 'cart subtotal');

      taxWeights.push(net);
      let shippingWeight = 0;
      if (item.requiresShipping) {
        shippingWeight = saturatingMultiply(item.weightGrams, item.quantity);
        if (shippingWeight <= 0) {
          shippingWeight = net;
        }
      }
      shippingWeights.push(shippingWeight);

      items.push({
        itemId: item.id,
        currency,
        subtotal: lineSubtotal,
        discount: outcome.total,
        tax: 0,
        shipping: 0,
        total: 0,
        metadata: { quantity: item.quantity, unitPrice: item.unitPrice, weightGrams: item.weightGrams },
      });
    }

    let totalItemDiscount = 0;
    for (const amount of itemDiscountTotals.values()) {
      totalItemDiscount += amount;
    }

    const applied = await this.applyPromotion(cart, promotionCode);
    if (!applied) {
      promotionCode = undefined;
    }

    let promotionDiscount = applied?.discount ?? 0;
    const maxPromotion = Math.max(0, subtotal - totalItemDiscount);
    if (promotionDiscount > maxPromotion) {
      this.logger.warn('pricing_discount_clamped', {
        cartId: cart.id,
        subtotal,
        discount: totalItemDiscount + promotionDiscount,
      });
      promotionDiscount = maxPromotion;
    }
    const promotionBreakdown = applied ? { ...applied.breakdown, amount: promotionDiscount } : null;
    const totalDiscount = totalItemDiscount + promotionDiscount;

    const promotionShares = allocateByWeight(promotionDiscount, taxWeights);
    items.forEach((line, idx) => {
      line.discount += promotionShares[idx];
      // Tax follows the net after every discount; shipping weights stay physical.
      taxWeights[idx] = Math.max(0, line.subtotal - line.discount);
    });

    const netSubtotal = Math.max(0, subtotal - totalDiscount);

    const shipping = await this.calculateShipping(
      cart,
      currency,
      subtotal,
      totalDiscount,
      promotionCode,
      command.bypassShippingCache ?? false,
      options.signal
    );

    const tax = await this.calculateTax(
      cart,
      currency,
      items,
      subtotal,
      totalDiscount,
      shipping.amount,
      promotionCode,
      options.signal
    );

    distributeTaxAndShipping(items, taxWeights, shippingWeights, tax.amount, shipping.amount);

    const total = Math.max(0, checkedAdd(checkedAdd(netSubtotal, tax.amount, 'cart total'), shipping.amount, 'cart total'));

    const metadata: Record<string, unknown> = { netSubtotal };
    if (promotionCode) {
      metadata.promotionCode = promotionCode;
    }

    this.logger.debug('pricing_calculated', {
      cartId: cart.id,
      currency,
      subtotal,
      discount: totalDiscount,
      tax: tax.amount,
      shipping: shipping.amount,
      total,
    });

    const breakdown: PricingBreakdown = {
      currency,
      subtotal,
      discount: totalDiscount,
      tax: tax.amount,
      shipping: shipping.amount,
      total,
      rounding: 0,
      items,
      discounts: buildDiscountBreakdowns(itemDiscountTotals, promotionBreakdown, ruleDescriptions, ruleMetadata),
      taxes: tax.breakdown,
      shippingDetails: shipping.breakdown,
      metadata,
    };

    return {
      breakdown,
      estimate: {
        subtotal,
        discount: totalDiscount,
        tax: tax.amount,
        shipping: shipping.amount,
        total,
      },
    };
  }

  private async applyPromotion(cart: Cart, code: string | undefined): Promise<AppliedPromotion | null> {
    if (!code) {
      return null;
    }

    const result = await this.promotion.validate({
      code,
      ...(cart.userId ? { userId: cart.userId } : {}),
      ...(cart.id ? { cartId: cart.id } : {}),
    });
    if (!result.eligible) {
      this.logger.debug('pricing_promotion_rejected', { cartId: cart.id, code, reason: result.reason });
      return null;
    }
    if (!Number.isSafeInteger(result.discountAmount)) {
      throw new InvalidInputError(`promotion ${result.code} discount must be an integer amount`);
    }

    const discount = Math.max(0, result.discountAmount);
    return {
      discount,
      breakdown: {
        type: 'promotion',
        code: result.code,
        source: 'promotion_service',
        description: result.reason,
        amount: discount,
      },
    };
  }

  private async calculateShipping(
    cart: Cart,
    currency: string,
    subtotal: number,
    discount: number,
    promotionCode: string | undefined,
    bypassCache: boolean,
    signal?: AbortSignal
  ): Promise<Amount<ShippingBreakdown>> {
    const address = cart.shippingAddress;
    if (!this.shipping || !address) {
      return { amount: 0, breakdown: [] };
    }

    const shippable: ShippableItem[] = [];
    let totalWeight = 0;
    for (const item of cart.items) {
      if (!item.requiresShipping) continue;
      totalWeight = saturatingAdd(totalWeight, saturatingMultiply(item.weightGrams, item.quantity));
      shippable.push({
        itemId: item.id,
        sku: item.sku,
        quantity: item.quantity,
        weightGrams: item.weightGrams,
        requiresShipping: item.requiresShipping,
      });
    }

    if (shippable.length === 0) {
      return { amount: 0, breakdown: [] };
    }

    const cacheKey = buildShippingCacheKey({
      address,
      currency,
      totalWeightGrams: totalWeight,
      subtotal,
      discount,
      promotionCode,
      items: shippable,
    });
    if (!bypassCache) {
      const cached = this.cache.get(cacheKey);
      if (cached) {
        this.logger.debug('pricing_shipping_cache_hit', { cartId: cart.id });
        return cached;
      }
    }

    const quote = await this.shipping.estimateShipping(
      {
        currency,
        items: shippable,
        shippingAddress: address,
        cartSubtotal: subtotal,
        discountTotal: discount,
        ...(promotionCode ? { promotionCode } : {}),
      },
      signal
    );
    assertNonNegativeMoney(quote.amount, 'shipping amount');

    this.cache.set(cacheKey, quote);
    return { amount: quote.amount, breakdown: quote.breakdown };
  }

  private async calculateTax(
    cart: Cart,
    currency: string,
    items: readonly ItemPricingBreakdown[],
    subtotal: number,
    discount: number,
    shippingAmount: number,
    promotionCode: string | undefined,
    signal?: AbortSignal
  ): Promise<Amount<TaxBreakdown>> {
    if (!this.tax) {
      return { amount: 0, breakdown: [] };
    }

    const quote = await this.tax.calculateTax(
      {
        currency,
        items: items.map((line, idx) => {
          const source = cart.items[idx];
          return {
            itemId: line.itemId,
            sku: source.sku,
            quantity: source.quantity,
            subtotal: line.subtotal,
            discount: line.discount,
            ...(source.taxCode ? { taxCode: source.taxCode } : {}),
          };
        }),
        cartSubtotal: subtotal,
        discountTotal: discount,
        shippingAmount,
        ...(cart.billingAddress ? { billingAddress: cart.billingAddress } : {}),
        ...(cart.shippingAddress ? { shippingAddress: cart.shippingAddress } : {}),
        ...(promotionCode ? { promotionCode } : {}),
      },
      signal
    );
    assertNonNegativeMoney(quote.amount, 'tax amount');

    return { amount: quote.amount, breakdown: quote.breakdown };
  }
}

function distributeTaxAndShipping(
  items: ItemPricingBreakdown[],
  taxWeights: readonly number[],
  shippingWeights: readonly number[],
  taxAmount: number,
  shippingAmount: number
): void {
  const taxShares = allocateByWeight(taxAmount, taxWeights);
  const shippingShares = allocateByWeight(shippingAmount, shippingWeights);
  items.forEach((line, idx) => {
    line.tax = taxShares[idx];
    line.shipping = shippingShares[idx];
    line.total = Math.max(0, line.subtotal - line.discount + line.tax + line.shipping);
  });
}

function emptyResult(currency: string): PriceCartResult {
  return {
    breakdown: {
      currency,
      subtotal: 0,
      discount: 0,
      tax: 0,
      shipping: 0,
      total: 0,
      rounding: 0,
      items: [],
      discounts: [],
      taxes: [],
      shippingDetails: [],
      metadata: { netSubtotal: 0 },
    },
    estimate: { subtotal: 0, discount: 0, tax: 0, shipping: 0, total: 0 },
  };
}
