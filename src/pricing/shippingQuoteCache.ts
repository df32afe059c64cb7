import { ExpiringMap, type ExpiringMapOptions } from '../lib/expiringMap.js';
import type { Address } from '../models/types.js';
import type { ShippableItem, ShippingQuote } from './types.js';

export const DEFAULT_SHIPPING_QUOTE_TTL_MS = 5 * 60_000;

export interface ShippingQuoteCacheOptions extends ExpiringMapOptions {
  ttlMs?: number;
}

/**
 * Shipping quotes keyed by request fingerprint. Quotes are copied on the way
 * in and out so a caller cannot alter a cached quote.
 */
export class ShippingQuoteCache {
  private readonly quotes: ExpiringMap<ShippingQuote>;
  readonly ttlMs: number;

  constructor(options: ShippingQuoteCacheOptions = {}) {
    const { ttlMs, ...mapOptions } = options;
    this.ttlMs = ttlMs !== undefined && ttlMs > 0 ? ttlMs : DEFAULT_SHIPPING_QUOTE_TTL_MS;
    this.quotes = new ExpiringMap(mapOptions);
  }

  get(key: string): ShippingQuote | null {
    const quote = this.quotes.get(key);
    return quote ? structuredClone(quote) : null;
  }

  set(key: string, quote: ShippingQuote): void {
    this.quotes.set(key, structuredClone(quote), this.quotes.now() + this.ttlMs);
  }

  startSweeper(): void {
    this.quotes.startSweeper();
  }

  stopSweeper(): void {
    this.quotes.stopSweeper();
  }

  size(): number {
    return this.quotes.size();
  }

  clear(): void {
    this.quotes.clear();
  }
}

export interface ShippingFingerprintInput {
  address?: Address;
  currency: string;
  totalWeightGrams: number;
  subtotal: number;
  discount: number;
  promotionCode?: string;
  items: readonly ShippableItem[];
}

const normalize = (value: string | undefined) => (value ?? '').trim().toUpperCase();

/**
 * Derive the cache key for a shipping request. Any change in destination,
 * money, promotion or shippable composition yields a different key.
 */
export function buildShippingCacheKey(input: ShippingFingerprintInput): string {
  const parts = [
    input.currency,
    String(input.totalWeightGrams),
    String(input.subtotal),
    String(input.discount),
    normalize(input.promotionCode),
  ];

  if (input.address) {
    parts.unshift(
      normalize(input.address.country),
      normalize(input.address.postalCode),
      normalize(input.address.state)
    );
  }

  const itemParts = input.items
    .map((item) => [normalize(item.sku), String(item.quantity), String(item.weightGrams)].join(','))
    .sort();
  if (itemParts.length > 0) {
    parts.push(itemParts.join(';'));
  }

  return parts.join('|');
}
