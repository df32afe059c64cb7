import type { ContentfulStatusCode } from 'hono/utils/http-status';

/**
 * Custom error classes for the cart pricing API
 */

export class CartError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: ContentfulStatusCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CartError';
  }
}

export class NotFoundError extends CartError {
  constructor(message = 'Resource not found') {
    super(message, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends CartError {
  constructor(message = 'Validation failed') {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }
}

export class InsufficientInventoryError extends CartError {
  constructor(
    public readonly sku: string,
    public readonly available: number,
    public readonly requested: number
  ) {
    super(
      `Insufficient inventory for ${sku}. Available: ${available}, Requested: ${requested}`,
      'INSUFFICIENT_INVENTORY',
      409
    );
    this.name = 'InsufficientInventoryError';
  }
}

/**
 * Closed set of failures raised by the pricing engine itself
 */
export type PricingErrorKind = 'INVALID_INPUT' | 'CURRENCY_MISMATCH';

export class PricingError extends CartError {
  constructor(
    public readonly kind: PricingErrorKind,
    message: string,
    statusCode: ContentfulStatusCode,
    options?: { cause?: unknown }
  ) {
    super(`cart pricing: ${message}`, kind, statusCode, options);
    this.name = 'PricingError';
  }
}

export class InvalidInputError extends PricingError {
  constructor(message = 'invalid input', options?: { cause?: unknown }) {
    super('INVALID_INPUT', message, 400, options);
    this.name = 'InvalidInputError';
  }
}

export class CurrencyMismatchError extends PricingError {
  constructor(message = 'currency mismatch') {
    super('CURRENCY_MISMATCH', message, 422);
    this.name = 'CurrencyMismatchError';
  }
}

export function isPricingError(
  error: unknown,
  kind?: PricingErrorKind
): error is PricingError {
  return error instanceof PricingError && (kind === undefined || error.kind === kind);
}

/**
 * Error envelope for API responses
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
  };
}

export function statusFor(error: unknown): ContentfulStatusCode {
  return error instanceof CartError ? error.statusCode : 500;
}

export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof CartError) {
    return {
      error: {
        code: error.code,
        message: error.message,
      },
    };
  }

  return {
    error: {
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    },
  };
}
