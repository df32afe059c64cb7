import { InsufficientInventoryError } from '../lib/errors.js';
import type { InventoryAvailability, InventoryLine } from '../pricing/types.js';

/**
 * Availability check against a fixed stock table
 */
export class StockInventory implements InventoryAvailability {
  private readonly stock: Map<string, number>;

  constructor(stock: Record<string, number>) {
    this.stock = new Map(Object.entries(stock));
  }

  async validateAvailability(lines: InventoryLine[]): Promise<void> {
    const requested = new Map<string, number>();
    for (const line of lines) {
      requested.set(line.sku, (requested.get(line.sku) ?? 0) + line.quantity);
    }

    for (const [sku, quantity] of requested) {
      const available = this.stock.get(sku) ?? 0;
      if (quantity > available) {
        throw new InsufficientInventoryError(sku, available, quantity);
      }
    }
  }
}
