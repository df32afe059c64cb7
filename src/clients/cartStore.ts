import type { StoredCart } from '../models/types.js';
import { NotFoundError } from '../lib/errors.js';
import { ExpiringMap, type ExpiringMapOptions } from '../lib/expiringMap.js';

/**
 * In-memory cart store; every read or write slides the cart's expiry forward
 */
export class InMemoryCartStore {
  private readonly carts: ExpiringMap<StoredCart>;

  constructor(
    private readonly ttlMs: number,
    options: ExpiringMapOptions = {}
  ) {
    this.carts = new ExpiringMap(options);
  }

  async create(cart: StoredCart): Promise<StoredCart> {
    this.carts.set(cart.id, cart, cart.expiresAt.getTime());
    return cart;
  }

  /**
   * Returns null if expired or not found
   */
  async get(id: string): Promise<StoredCart | null> {
    const cart = this.carts.get(id);
    return cart ? this.save(cart) : null;
  }

  /**
   * Throws NotFoundError if the cart doesn't exist or has expired
   */
  async update(cart: StoredCart): Promise<StoredCart> {
    if (!this.carts.get(cart.id)) {
      throw new NotFoundError('Cart not found or expired');
    }
    return this.save(cart);
  }

  async delete(id: string): Promise<void> {
    this.carts.delete(id);
  }

  private save(cart: StoredCart): StoredCart {
    const now = new Date(this.carts.now());
    const refreshed: StoredCart = {
      ...cart,
      updatedAt: now,
      expiresAt: new Date(now.getTime() + this.ttlMs),
    };
    this.carts.set(refreshed.id, refreshed, refreshed.expiresAt.getTime());
    return refreshed;
  }

  startSweeper(): void {
    this.carts.startSweeper();
  }

  stopSweeper(): void {
    this.carts.stopSweeper();
  }

  size(): number {
    return this.carts.size();
  }

  clear(): void {
    this.carts.clear();
  }
}
