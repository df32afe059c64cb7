import { InvalidInputError } from '../lib/errors.js';

interface Remainder {
  index: number;
  remainder: bigint;
}

/**
 * Split `amount` across `weights` so the parts sum exactly to `amount`
 * (largest-remainder apportionment).
 *
 * Weights <= 0 count as zero. When no weight is positive the amount is
 * spread evenly and the leftover units go to the first indices. Leftover
 * units from integer division go to the largest remainders, ties by index.
 */
export function allocateByWeight(amount: number, weights: readonly number[]): number[] {
  if (!Number.isSafeInteger(amount) || amount < 0) {
    throw new InvalidInputError(`cannot allocate amount ${amount}`);
  }
  if (weights.length === 0) {
    return [];
  }

  const allocations = new Array<number>(weights.length).fill(0);
  if (amount === 0) {
    return allocations;
  }

  const positive = weights.map((w) => (Number.isFinite(w) && w > 0 ? BigInt(Math.trunc(w)) : 0n));
  const totalWeight = positive.reduce((sum, w) => sum + w, 0n);

  if (totalWeight === 0n) {
    const base = Math.floor(amount / weights.length);
    let leftover = amount % weights.length;
    for (let i = 0; i < allocations.length; i++) {
      allocations[i] = base;
      if (leftover > 0) {
        allocations[i]++;
        leftover--;
      }
    }
    return allocations;
  }

  const total = BigInt(amount);
  const remainders: Remainder[] = [];
  let distributed = 0;

  positive.forEach((weight, index) => {
    const scaled = total * weight;
    const share = Number(scaled / totalWeight);
    allocations[index] = share;
    distributed += share;
    remainders.push({ index, remainder: scaled % totalWeight });
  });

  let leftover = amount - distributed;
  if (leftover <= 0) {
    return allocations;
  }

  remainders.sort((a, b) => {
    if (a.remainder === b.remainder) return a.index - b.index;
    return a.remainder > b.remainder ? -1 : 1;
  });

  for (const entry of remainders) {
    if (leftover === 0) break;
    allocations[entry.index]++;
    leftover--;
  }

  return allocations;
}
