import type {
  Address,
  Cart,
  CartEstimate,
  CartItem,
  PricingBreakdown,
  ShippingBreakdown,
  TaxBreakdown,
} from '../models/types.js';

export interface PriceCartCommand {
  cart: Cart;
  /** Overrides the code attached to the cart; a blank string removes it. */
  promotionCode?: string;
  shippingAddress?: Address;
  billingAddress?: Address;
  bypassShippingCache?: boolean;
}

export interface PriceCartResult {
  breakdown: PricingBreakdown;
  estimate: CartEstimate;
}

export interface CalculateOptions {
  signal?: AbortSignal;
}

// Item discount rules

export interface ItemDiscountResult {
  amount: number;
  description?: string;
  metadata?: Record<string, unknown>;
}

export interface ItemDiscountRule {
  readonly name: string;
  apply(item: CartItem, lineSubtotal: number): ItemDiscountResult | Promise<ItemDiscountResult>;
}

// Promotions

export interface ValidatePromotionCommand {
  code: string;
  userId?: string;
  cartId?: string;
}

export interface PromotionValidationResult {
  code: string;
  eligible: boolean;
  discountAmount: number;
  reason: string;
}

export interface PromotionValidator {
  validate(command: ValidatePromotionCommand): Promise<PromotionValidationResult>;
}

// Tax

export interface TaxableItem {
  itemId: string;
  sku: string;
  quantity: number;
  subtotal: number;
  discount: number;
  taxCode?: string;
}

export interface TaxCalculationRequest {
  currency: string;
  items: TaxableItem[];
  cartSubtotal: number;
  discountTotal: number;
  shippingAmount: number;
  billingAddress?: Address;
  shippingAddress?: Address;
  promotionCode?: string;
}

export interface TaxQuote {
  amount: number;
  breakdown: TaxBreakdown[];
}

export interface TaxCalculator {
  calculateTax(request: TaxCalculationRequest, signal?: AbortSignal): Promise<TaxQuote>;
}

// Shipping

export interface ShippableItem {
  itemId: string;
  sku: string;
  quantity: number;
  weightGrams: number;
  requiresShipping: boolean;
}

export interface ShippingEstimateRequest {
  currency: string;
  items: ShippableItem[];
  shippingAddress: Address;
  cartSubtotal: number;
  discountTotal: number;
  promotionCode?: string;
}

export interface ShippingQuote {
  amount: number;
  breakdown: ShippingBreakdown[];
}

export interface ShippingEstimator {
  estimateShipping(request: ShippingEstimateRequest, signal?: AbortSignal): Promise<ShippingQuote>;
}

// Inventory

export interface InventoryLine {
  productId: string;
  sku: string;
  quantity: number;
}

export interface InventoryAvailability {
  validateAvailability(lines: InventoryLine[]): Promise<void>;
}
