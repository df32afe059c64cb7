export interface ExpiringMapOptions {
  /** Clock in epoch milliseconds */
  now?: () => number;
  sweepIntervalMs?: number;
  sweepScanLimit?: number;
  sweepBudgetMs?: number;
}

interface Entry<V> {
  value: V;
  expiresAt: number;
}

/**
 * Map whose entries carry an absolute expiry. Expired entries are dropped
 * lazily on read and by an optional bounded sweeper.
 */
export class ExpiringMap<V> {
  private entries = new Map<string, Entry<V>>();
  private sweepInterval: NodeJS.Timeout | null = null;
  private readonly sweepIntervalMs: number;
  private readonly sweepScanLimit: number;
  private readonly sweepBudgetMs: number;
  readonly now: () => number;

  constructor(options: ExpiringMapOptions = {}) {
    this.now = options.now ?? (() => Date.now());
    this.sweepIntervalMs = options.sweepIntervalMs ?? 60_000;
    this.sweepScanLimit = options.sweepScanLimit ?? 100;
    this.sweepBudgetMs = options.sweepBudgetMs ?? 50;
  }

  /**
   * Returns null if missing or expired; an expired entry is removed
   */
  get(key: string): V | null {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return null;
    }

    return entry.value;
  }

  set(key: string, value: V, expiresAt: number): void {
    this.entries.set(key, { value, expiresAt });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  private isExpired(entry: Entry<V>): boolean {
    return this.now() > entry.expiresAt;
  }

  /**
   * Scans up to sweepScanLimit entries or runs for up to sweepBudgetMs
   */
  sweep(): number {
    const startTime = Date.now();
    let scanned = 0;
    let removed = 0;

    for (const [key, entry] of this.entries.entries()) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        removed++;
      }

      scanned++;
      if (scanned >= this.sweepScanLimit) {
        break;
      }

      if (Date.now() - startTime >= this.sweepBudgetMs) {
        break;
      }
    }
    return removed;
  }

  startSweeper(): void {
    if (this.sweepInterval) {
      return;
    }

    this.sweepInterval = setInterval(() => {
      this.sweep();
    }, this.sweepIntervalMs);

    // Don't keep process alive just for sweeper
    this.sweepInterval.unref();
  }

  stopSweeper(): void {
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = null;
    }
  }

  size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
