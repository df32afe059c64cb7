import { InvalidInputError } from './errors.js';

/**
 * Largest amount in minor units that a JavaScript number holds exactly
 */
export const MAX_MONEY = Number.MAX_SAFE_INTEGER;

export function isMoney(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value);
}

/**
 * Throw InvalidInputError unless value is a safe integer >= 0
 */
export function assertNonNegativeMoney(value: number, label: string): number {
  if (!isMoney(value)) {
    throw new InvalidInputError(`${label} must be an integer amount in minor units`);
  }
  if (value < 0) {
    throw new InvalidInputError(`${label} cannot be negative`);
  }
  return value;
}

// Operands are safe integers, so a result that is still a safe integer is exact.

export function checkedMultiply(a: number, b: number, label: string): number {
  const product = a * b;
  if (!Number.isSafeInteger(product)) {
    throw new InvalidInputError(`${label} overflow`);
  }
  return product;
}

export function checkedAdd(a: number, b: number, label: string): number {
  const sum = a + b;
  if (!Number.isSafeInteger(sum)) {
    throw new InvalidInputError(`${label} overflow`);
  }
  return sum;
}

/**
 * Multiply without failing, pinning the result at MAX_MONEY
 */
export function saturatingMultiply(a: number, b: number): number {
  const product = a * b;
  return Number.isSafeInteger(product) ? product : MAX_MONEY;
}

export function saturatingAdd(a: number, b: number): number {
  const sum = a + b;
  return Number.isSafeInteger(sum) ? sum : MAX_MONEY;
}

/**
 * amount × bps / 10000, computed exactly and rounded as requested
 */
export function applyBasisPoints(
  amount: number,
  bps: number,
  rounding: 'floor' | 'halfUp' = 'floor'
): number {
  const scaled = BigInt(amount) * BigInt(bps) + (rounding === 'halfUp' ? 5000n : 0n);
  const result = Number(scaled / 10_000n);
  if (!Number.isSafeInteger(result)) {
    throw new InvalidInputError('basis point amount overflow');
  }
  return result;
}
