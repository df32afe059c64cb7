import { InvalidInputError } from '../lib/errors.js';
import { checkedAdd, isMoney } from '../lib/money.js';
import type { Logger } from '../lib/logger.js';
import type { CartItem, DiscountBreakdown } from '../models/types.js';
import { allocateByWeight } from './allocator.js';
import type { ItemDiscountRule } from './types.js';

export interface ItemDiscountOutcome {
  /** Combined discount, never above the line subtotal */
  total: number;
  perRule: Map<string, number>;
  descriptions: Map<string, string>;
  /** First metadata each rule reported */
  metadata: Map<string, Record<string, unknown>>;
  clamped: boolean;
}

/**
 * Run every rule against one item and combine their contributions by name.
 * When the combined discount exceeds the line subtotal each rule's share is
 * rescaled so the combined discount equals the line subtotal.
 */
export async function aggregateItemDiscounts(
  rules: readonly ItemDiscountRule[],
  item: CartItem,
  lineSubtotal: number,
  logger?: Logger
): Promise<ItemDiscountOutcome> {
  let perRule = new Map<string, number>();
  const descriptions = new Map<string, string>();
  const metadata = new Map<string, Record<string, unknown>>();
  let combined = 0;

  for (const rule of rules) {
    const result = await rule.apply(item, lineSubtotal);
    if (!isMoney(result.amount)) {
      throw new InvalidInputError(`rule ${rule.name} produced a non-integer discount`);
    }
    if (result.amount < 0) {
      throw new InvalidInputError(`rule ${rule.name} produced negative discount`);
    }
    combined = checkedAdd(combined, result.amount, `item ${item.id} discount`);
    perRule.set(rule.name, checkedAdd(perRule.get(rule.name) ?? 0, result.amount, `rule ${rule.name} discount`));
    const description = result.description?.trim();
    if (description && !descriptions.has(rule.name)) {
      descriptions.set(rule.name, description);
    }
    if (result.metadata && !metadata.has(rule.name)) {
      metadata.set(rule.name, { ...result.metadata });
    }
  }

  const clamped = combined > lineSubtotal && perRule.size > 0;
  if (clamped) {
    logger?.warn('pricing_rule_clamped', {
      itemId: item.id,
      subtotal: lineSubtotal,
      discount: combined,
    });
    perRule = scaleDiscountAllocations(perRule, lineSubtotal);
  }

  let total = 0;
  for (const amount of perRule.values()) {
    total += amount;
  }

  return { total, perRule, descriptions, metadata, clamped };
}

/**
 * Rescale per-rule contributions so they sum to `target`, proportionally to
 * their current amounts. Names are ordered ascending before allocation.
 */
export function scaleDiscountAllocations(
  contributions: ReadonlyMap<string, number>,
  target: number
): Map<string, number> {
  const names = [...contributions.keys()].sort(compareNames);
  const scaled = new Map<string, number>();
  if (names.length === 0) {
    return scaled;
  }

  const weights = names.map((name) => Math.max(0, contributions.get(name) ?? 0));
  const totalWeight = weights.reduce((sum, w) => sum + w, 0);
  if (target <= 0 || totalWeight === 0) {
    for (const name of names) scaled.set(name, 0);
    return scaled;
  }

  const allocations = allocateByWeight(target, weights);
  names.forEach((name, i) => scaled.set(name, allocations[i]));
  return scaled;
}

/**
 * One `item` line per rule with a positive total, plus the promotion line,
 * ordered by type then source.
 */
export function buildDiscountBreakdowns(
  itemTotals: ReadonlyMap<string, number>,
  promotion: DiscountBreakdown | null,
  descriptions: ReadonlyMap<string, string> = new Map(),
  metadata: ReadonlyMap<string, Record<string, unknown>> = new Map()
): DiscountBreakdown[] {
  const result: DiscountBreakdown[] = [];
  for (const [name, amount] of itemTotals) {
    if (amount <= 0) continue;
    const ruleMetadata = metadata.get(name);
    result.push({
      type: 'item',
      source: name,
      description: descriptions.get(name) ?? `${name} discount`,
      amount,
      ...(ruleMetadata ? { metadata: ruleMetadata } : {}),
    });
  }
  if (promotion) {
    result.push(promotion);
  }

  return result.sort((a, b) => {
    if (a.type === b.type) return compareNames(a.source, b.source);
    return compareNames(a.type, b.type);
  });
}

function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
