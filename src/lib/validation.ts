import { ValidationError } from './errors.js';
import type { Address, Cart, CartItem } from '../models/types.js';
import type { PriceCartCommand } from '../pricing/types.js';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireObject(body: unknown, label = 'Request body'): JsonObject {
  if (!isObject(body)) {
    throw new ValidationError(`${label} must be an object`);
  }
  return body;
}

function requireString(data: JsonObject, field: string, label = field): string {
  const value = data[field];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`${label} must be a non-empty string`);
  }
  return value.trim();
}

function optionalString(data: JsonObject, field: string, label = field): string | undefined {
  const value = data[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${label} must be a string`);
  }
  return value.trim() || undefined;
}

function requireNumber(data: JsonObject, field: string, label = field): number {
  const value = data[field];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`${label} must be a number`);
  }
  return value;
}

function optionalBoolean(data: JsonObject, field: string, label = field): boolean | undefined {
  const value = data[field];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new ValidationError(`${label} must be a boolean`);
  }
  return value;
}

/**
 * Validate SKU is non-empty
 */
export function validateSku(sku: string): void {
  if (!sku || sku.trim().length === 0) {
    throw new ValidationError('SKU must be non-empty');
  }
}

/**
 * Validate quantity is >= 1
 */
export function validateQuantity(quantity: number): void {
  if (!Number.isInteger(quantity) || quantity < 1) {
    throw new ValidationError('Quantity must be an integer >= 1');
  }
}

/**
 * Validate currency is a three-letter ISO 4217 code
 */
export function validateCurrency(currency: string): string {
  const normalized = currency.trim().toUpperCase();
  if (!/^[A-Z]{3}$/.test(normalized)) {
    throw new ValidationError('currency must be a three-letter code');
  }
  return normalized;
}

export function validateCreateCartRequest(body: unknown): { currency?: string; userId?: string } {
  if (body === undefined || body === null) {
    return {};
  }
  const data = requireObject(body);
  const currency = optionalString(data, 'currency');
  const userId = optionalString(data, 'userId');

  return {
    ...(currency ? { currency: validateCurrency(currency) } : {}),
    ...(userId ? { userId } : {}),
  };
}

export function validateAddItemRequest(body: unknown): { sku: string; quantity: number } {
  const data = requireObject(body);
  const { sku, quantity } = data;

  if (typeof sku !== 'string') {
    throw new ValidationError('sku must be a string');
  }

  if (typeof quantity !== 'number') {
    throw new ValidationError('quantity must be a number');
  }

  validateSku(sku);
  validateQuantity(quantity);

  return { sku: sku.trim(), quantity };
}

export function validateAddress(value: unknown, label: string): Address {
  const data = requireObject(value, label);
  const line2 = optionalString(data, 'line2', `${label}.line2`);
  const state = optionalString(data, 'state', `${label}.state`);
  const phone = optionalString(data, 'phone', `${label}.phone`);

  return {
    recipient: requireString(data, 'recipient', `${label}.recipient`),
    line1: requireString(data, 'line1', `${label}.line1`),
    ...(line2 ? { line2 } : {}),
    city: requireString(data, 'city', `${label}.city`),
    ...(state ? { state } : {}),
    postalCode: requireString(data, 'postalCode', `${label}.postalCode`),
    country: requireString(data, 'country', `${label}.country`).toUpperCase(),
    ...(phone ? { phone } : {}),
  };
}

function optionalAddress(data: JsonObject, field: string): Address | undefined {
  const value = data[field];
  return value === undefined || value === null ? undefined : validateAddress(value, field);
}

export function validateAddressesRequest(body: unknown): {
  shippingAddress?: Address;
  billingAddress?: Address;
} {
  const data = requireObject(body);
  const shippingAddress = optionalAddress(data, 'shippingAddress');
  const billingAddress = optionalAddress(data, 'billingAddress');

  if (!shippingAddress && !billingAddress) {
    throw new ValidationError('shippingAddress or billingAddress is required');
  }

  return {
    ...(shippingAddress ? { shippingAddress } : {}),
    ...(billingAddress ? { billingAddress } : {}),
  };
}

export function validatePromotionRequest(body: unknown): { code: string } {
  const data = requireObject(body);
  return { code: requireString(data, 'code').toUpperCase() };
}

export function validateEstimateRequest(body: unknown): { bypassShippingCache: boolean } {
  if (body === undefined || body === null) {
    return { bypassShippingCache: false };
  }
  const data = requireObject(body);
  return { bypassShippingCache: optionalBoolean(data, 'bypassShippingCache') ?? false };
}

function validateQuoteItem(value: unknown, index: number): CartItem {
  const label = `items[${index}]`;
  const data = requireObject(value, label);
  const currency = optionalString(data, 'currency', `${label}.currency`);
  const taxCode = optionalString(data, 'taxCode', `${label}.taxCode`);
  const weightGrams = data.weightGrams === undefined ? 0 : requireNumber(data, 'weightGrams', `${label}.weightGrams`);

  return {
    id: optionalString(data, 'id', `${label}.id`) ?? `item_${index + 1}`,
    productId: requireString(data, 'productId', `${label}.productId`),
    sku: requireString(data, 'sku', `${label}.sku`),
    quantity: requireNumber(data, 'quantity', `${label}.quantity`),
    unitPrice: requireNumber(data, 'unitPrice', `${label}.unitPrice`),
    ...(currency ? { currency } : {}),
    weightGrams,
    requiresShipping: optionalBoolean(data, 'requiresShipping', `${label}.requiresShipping`) ?? true,
    ...(taxCode ? { taxCode } : {}),
  };
}

/**
 * Validate a quote preview request carrying a full cart snapshot.
 * Amount rules (positive quantity, non-negative price) are left to the
 * pricing engine.
 */
export function validateQuoteRequest(body: unknown): PriceCartCommand {
  const data = requireObject(body);
  const cartData = requireObject(data.cart, 'cart');

  if (!Array.isArray(cartData.items)) {
    throw new ValidationError('cart.items must be an array');
  }

  const id = optionalString(cartData, 'id', 'cart.id');
  const userId = optionalString(cartData, 'userId', 'cart.userId');
  const currency = optionalString(cartData, 'currency', 'cart.currency');
  const cartShipping = optionalAddress(cartData, 'shippingAddress');
  const cartBilling = optionalAddress(cartData, 'billingAddress');
  const cartPromotion = optionalString(cartData, 'promotionCode', 'cart.promotionCode');

  const cart: Cart = {
    ...(id ? { id } : {}),
    ...(userId ? { userId } : {}),
    currency: currency ?? '',
    items: cartData.items.map((item, index) => validateQuoteItem(item, index)),
    ...(cartShipping ? { shippingAddress: cartShipping } : {}),
    ...(cartBilling ? { billingAddress: cartBilling } : {}),
    ...(cartPromotion ? { promotion: { code: cartPromotion, discountAmount: 0, applied: false } } : {}),
  };

  const promotionCode = data.promotionCode;
  if (promotionCode !== undefined && typeof promotionCode !== 'string') {
    throw new ValidationError('promotionCode must be a string');
  }
  const shippingAddress = optionalAddress(data, 'shippingAddress');
  const billingAddress = optionalAddress(data, 'billingAddress');

  return {
    cart,
    ...(promotionCode !== undefined ? { promotionCode } : {}),
    ...(shippingAddress ? { shippingAddress } : {}),
    ...(billingAddress ? { billingAddress } : {}),
    bypassShippingCache: optionalBoolean(data, 'bypassShippingCache') ?? false,
  };
}
