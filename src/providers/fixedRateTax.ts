import { applyBasisPoints } from '../lib/money.js';
import type { TaxCalculationRequest, TaxCalculator, TaxQuote } from '../pricing/types.js';

/**
 * Flat consumption tax on discounted goods plus shipping
 */
export class FixedRateTaxCalculator implements TaxCalculator {
  constructor(
    private readonly rateBps: number,
    private readonly jurisdiction: string,
    private readonly name = 'Consumption tax'
  ) {}

  async calculateTax(request: TaxCalculationRequest): Promise<TaxQuote> {
    const base = Math.max(0, request.cartSubtotal - request.discountTotal) + request.shippingAmount;
    const amount = applyBasisPoints(base, this.rateBps, 'halfUp');

    return {
      amount,
      breakdown: [
        {
          name: this.name,
          jurisdiction: this.jurisdiction,
          rate: this.rateBps / 10_000,
          amount,
        },
      ],
    };
  }
}
