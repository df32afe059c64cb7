import { applyBasisPoints } from '../lib/money.js';
import type { CartItem } from '../models/types.js';
import type { ItemDiscountResult, ItemDiscountRule } from '../pricing/types.js';

/**
 * Percentage off a line once its quantity reaches a threshold
 */
export class QuantityBreakRule implements ItemDiscountRule {
  constructor(
    readonly name: string,
    private readonly minQuantity: number,
    private readonly percentOffBps: number
  ) {}

  apply(item: CartItem, lineSubtotal: number): ItemDiscountResult {
    if (item.quantity < this.minQuantity) {
      return { amount: 0 };
    }

    return {
      amount: applyBasisPoints(lineSubtotal, this.percentOffBps),
      description: `${this.percentOffBps / 100}% off ${this.minQuantity}+ units`,
      metadata: { minQuantity: this.minQuantity },
    };
  }
}
