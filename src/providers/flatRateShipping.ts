import type {
  ShippingEstimateRequest,
  ShippingEstimator,
  ShippingQuote,
} from '../pricing/types.js';

export interface FlatRateShippingOptions {
  domesticCountry: string;
  domesticFee: number;
  internationalFee: number;
  /** Net merchandise amount at which shipping becomes free; 0 disables */
  freeShippingThreshold: number;
}

/**
 * Domestic/international flat fee with a free-shipping threshold
 */
export class FlatRateShippingEstimator implements ShippingEstimator {
  constructor(private readonly options: FlatRateShippingOptions) {}

  async estimateShipping(request: ShippingEstimateRequest): Promise<ShippingQuote> {
    const country = request.shippingAddress.country.trim().toUpperCase();
    const domestic = country === this.options.domesticCountry.toUpperCase();
    const net = request.cartSubtotal - request.discountTotal;
    const threshold = this.options.freeShippingThreshold;
    const free = domestic && threshold > 0 && net >= threshold;

    const amount = free ? 0 : domestic ? this.options.domesticFee : this.options.internationalFee;

    return {
      amount,
      breakdown: [
        {
          serviceLevel: domestic ? 'standard' : 'international',
          carrier: 'flat-rate',
          amount,
          currency: request.currency,
          metadata: { freeShipping: free },
        },
      ],
    };
  }
}
