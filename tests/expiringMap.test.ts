import { describe, it, expect } from 'vitest';
import { ExpiringMap } from '../src/lib/expiringMap.js';

describe('ExpiringMap', () => {
  it('keeps an entry up to and including its expiry instant', () => {
    let now = 0;
    const map = new ExpiringMap<string>({ now: () => now });

    map.set('k', 'v', 100);
    now = 100;
    expect(map.get('k')).toBe('v');

    now = 101;
    expect(map.get('k')).toBeNull();
    expect(map.size()).toBe(0);
  });

  it('caps each sweep at the scan limit', () => {
    let now = 0;
    const map = new ExpiringMap<number>({ now: () => now, sweepScanLimit: 2 });
    for (let i = 0; i < 5; i++) {
      map.set(`k${i}`, i, 10);
    }

    now = 11;
    expect(map.sweep()).toBe(2);
    expect(map.size()).toBe(3);
    expect(map.sweep()).toBe(2);
    expect(map.sweep()).toBe(1);
    expect(map.size()).toBe(0);
  });

  it('leaves live entries during a sweep', () => {
    let now = 0;
    const map = new ExpiringMap<number>({ now: () => now });
    map.set('old', 1, 10);
    map.set('fresh', 2, 1_000);

    now = 500;
    expect(map.sweep()).toBe(1);
    expect(map.get('fresh')).toBe(2);
  });

  it('deletes and clears entries', () => {
    const map = new ExpiringMap<number>();
    map.set('a', 1, Number.MAX_SAFE_INTEGER);
    map.set('b', 2, Number.MAX_SAFE_INTEGER);

    expect(map.delete('a')).toBe(true);
    expect(map.delete('a')).toBe(false);
    map.clear();
    expect(map.size()).toBe(0);
  });
});
