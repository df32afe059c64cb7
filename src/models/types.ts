/**
 * Core domain types for the cart pricing API.
 * Every amount is an integer in minor units of the cart currency.
 */

export interface Address {
  recipient: string;
  line1: string;
  line2?: string;
  city: string;
  state?: string;
  postalCode: string;
  country: string;
  phone?: string;
}

export interface CartPromotion {
  code: string;
  discountAmount: number;
  applied: boolean;
}

export interface CartItem {
  id: string;
  productId: string;
  sku: string;
  quantity: number;
  unitPrice: number;
  currency?: string;
  weightGrams: number;
  requiresShipping: boolean;
  taxCode?: string;
}

/**
 * Snapshot of a cart as handed to the pricing engine
 */
export interface Cart {
  id?: string;
  userId?: string;
  currency: string;
  items: CartItem[];
  shippingAddress?: Address;
  billingAddress?: Address;
  promotion?: CartPromotion;
}

export interface CartEstimate {
  subtotal: number;
  discount: number;
  tax: number;
  shipping: number;
  total: number;
}

/**
 * Cart as held by the store, with its last computed estimate
 */
export interface StoredCart extends Cart {
  id: string;
  estimate?: CartEstimate;
  createdAt: Date;
  updatedAt: Date;
  expiresAt: Date;
}

export interface ItemPricingBreakdown {
  itemId: string;
  currency: string;
  subtotal: number;
  discount: number;
  tax: number;
  shipping: number;
  total: number;
  metadata: Record<string, unknown>;
}

export type DiscountType = 'item' | 'promotion';

export interface DiscountBreakdown {
  type: DiscountType;
  code?: string;
  source: string;
  description: string;
  amount: number;
  metadata?: Record<string, unknown>;
}

export interface TaxBreakdown {
  name: string;
  jurisdiction?: string;
  rate?: number;
  amount: number;
  metadata?: Record<string, unknown>;
}

export interface ShippingBreakdown {
  serviceLevel: string;
  carrier?: string;
  amount: number;
  currency?: string;
  estimateDays?: number;
  metadata?: Record<string, unknown>;
}

export interface PricingBreakdown {
  currency: string;
  subtotal: number;
  discount: number;
  tax: number;
  shipping: number;
  total: number;
  rounding: number;
  items: ItemPricingBreakdown[];
  discounts: DiscountBreakdown[];
  taxes: TaxBreakdown[];
  shippingDetails: ShippingBreakdown[];
  metadata: Record<string, unknown>;
}

/**
 * Seal product offered by the catalog
 */
export interface CatalogEntry {
  sku: string;
  productId: string;
  name: string;
  unitPrice: number;
  weightGrams: number;
  requiresShipping: boolean;
  taxCode?: string;
}
